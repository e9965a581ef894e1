import { integer, real, sqliteTable, text, unique } from "drizzle-orm/sqlite-core";

export const customers = sqliteTable("customers", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  name: text("name").notNull(),
  contactPerson: text("contact_person"),
  phone: text("phone"),
  email: text("email"),
  address: text("address"),
  satisfactionScore: integer("satisfaction_score"),
  feedback: text("feedback"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const customerPreferences = sqliteTable("customer_preferences", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  customerId: integer("customer_id").notNull(),
  preferenceKey: text("preference_key").notNull(),
  preferenceValue: text("preference_value").notNull()
});

export const orders = sqliteTable("orders", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  customerId: integer("customer_id").notNull(),
  orderDate: text("order_date").notNull(),
  deliveryDate: text("delivery_date").notNull(),
  status: text("status").notNull(),
  totalAmount: real("total_amount"),
  notes: text("notes"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const orderItems = sqliteTable("order_items", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  orderId: integer("order_id").notNull(),
  productName: text("product_name").notNull(),
  quantity: real("quantity").notNull(),
  unitPrice: real("unit_price").notNull(),
  subtotal: real("subtotal")
});

export const farmers = sqliteTable("farmers", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  name: text("name").notNull(),
  contactPerson: text("contact_person"),
  phone: text("phone"),
  email: text("email"),
  address: text("address"),
  productSpecialties: text("product_specialties"),
  pickupSchedule: text("pickup_schedule"),
  performanceNotes: text("performance_notes"),
  trainingNeeds: text("training_needs"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const farmerPayments = sqliteTable("farmer_payments", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  farmerId: integer("farmer_id").notNull(),
  paymentDate: text("payment_date").notNull(),
  amount: real("amount").notNull(),
  notes: text("notes")
});

export const farmerQualityRecords = sqliteTable("farmer_quality_records", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  farmerId: integer("farmer_id").notNull(),
  product: text("product").notNull(),
  qualityScore: integer("quality_score").notNull(),
  notes: text("notes"),
  recordedAt: text("recorded_at").notNull()
});

export const dailyLogs = sqliteTable("daily_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  logDate: text("log_date").notNull(),
  ordersFulfilled: integer("orders_fulfilled"),
  qualityControlNotes: text("quality_control_notes"),
  deliveryRouteNotes: text("delivery_route_notes"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const temperatureReadings = sqliteTable("temperature_readings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  dailyLogId: integer("daily_log_id").notNull(),
  temperature: real("temperature").notNull(),
  location: text("location").notNull(),
  recordedAt: text("recorded_at").notNull()
});

export const operationalIssues = sqliteTable("operational_issues", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  dailyLogId: integer("daily_log_id").notNull(),
  description: text("description").notNull(),
  severity: text("severity").notNull(),
  status: text("status").notNull(),
  resolution: text("resolution"),
  reportedAt: text("reported_at").notNull(),
  resolvedAt: text("resolved_at")
});

export const transactions = sqliteTable("transactions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  date: text("date").notNull(),
  type: text("type").notNull(),
  description: text("description"),
  amount: real("amount").notNull(),
  relatedEntityId: integer("related_entity_id"),
  relatedEntityType: text("related_entity_type"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const invoices = sqliteTable("invoices", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  customerId: integer("customer_id").notNull(),
  orderId: integer("order_id").notNull(),
  invoiceDate: text("invoice_date").notNull(),
  dueDate: text("due_date").notNull(),
  totalAmount: real("total_amount").notNull(),
  status: text("status").notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const goals = sqliteTable("goals", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  businessId: text("business_id").notNull().default("island_harvest"),
  name: text("name").notNull(),
  description: text("description"),
  targetValue: real("target_value"),
  currentValue: real("current_value").notNull().default(0),
  startDate: text("start_date"),
  endDate: text("end_date"),
  status: text("status").notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const messageTemplates = sqliteTable("message_templates", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
  type: text("type").notNull(),
  subject: text("subject"),
  body: text("body").notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const meetings = sqliteTable("meetings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  title: text("title").notNull(),
  dateTime: text("date_time").notNull(),
  attendees: text("attendees"),
  notes: text("notes"),
  remindersSent: integer("reminders_sent", { mode: "boolean" }).notNull().default(false),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const followUpTasks = sqliteTable("follow_up_tasks", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  description: text("description").notNull(),
  dueDate: text("due_date"),
  status: text("status").notNull(),
  assignedTo: text("assigned_to"),
  relatedEntityId: integer("related_entity_id"),
  relatedEntityType: text("related_entity_type"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const documents = sqliteTable("documents", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  filePath: text("file_path").notNull().unique(),
  type: text("type"),
  version: text("version"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const performanceMetrics = sqliteTable(
  "performance_metrics",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    value: real("value").notNull(),
    date: text("date").notNull(),
    notes: text("notes"),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at")
  },
  (table) => ({
    nameDate: unique("performance_metrics_name_date").on(table.name, table.date)
  })
);

export const partnerships = sqliteTable("partnerships", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  type: text("type"),
  contactPerson: text("contact_person"),
  status: text("status").notNull(),
  notes: text("notes"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at")
});

export const schemaMigrations = sqliteTable("schema_migrations", {
  version: text("version").primaryKey(),
  description: text("description"),
  appliedAt: text("applied_at").notNull()
});

/** Every table the store is expected to hold, ledger included. */
export const catalog = [
  customers,
  customerPreferences,
  orders,
  orderItems,
  farmers,
  farmerPayments,
  farmerQualityRecords,
  dailyLogs,
  temperatureReadings,
  operationalIssues,
  transactions,
  invoices,
  goals,
  messageTemplates,
  meetings,
  followUpTasks,
  documents,
  performanceMetrics,
  partnerships,
  schemaMigrations
] as const;

/** Tables whose rows are partitioned by business_id. */
export const TENANT_TABLES = [
  "customers",
  "farmers",
  "orders",
  "transactions",
  "invoices",
  "daily_logs",
  "goals"
] as const;

export type TenantTable = (typeof TENANT_TABLES)[number];

/** Tables shared by every business. */
export const SHARED_TABLES = [
  "message_templates",
  "meetings",
  "follow_up_tasks",
  "documents",
  "performance_metrics",
  "partnerships"
] as const;

export type SharedTable = (typeof SHARED_TABLES)[number];
