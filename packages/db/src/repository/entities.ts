import { z } from "zod";

import type { TenantTable } from "../schema";

/** Columns every tenant-scoped row carries. */
export type TenantRecord = {
  id: number;
  businessId: string;
  createdAt: string;
  updatedAt: string | null;
};

export type BaseField = keyof TenantRecord;

/** Caller-controlled fields of a record, i.e. everything except the managed base columns. */
export type EntityField<TRecord extends TenantRecord> = Exclude<keyof TRecord & string, BaseField>;

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | readonly string[]
  | { readonly [key: string]: string }
  | undefined;

export type FieldValues = { readonly [field: string]: FieldValue };

export type SortDirection = "asc" | "desc";

export type OrderTerm<TRecord extends TenantRecord> = {
  field: EntityField<TRecord> | "createdAt" | "updatedAt";
  direction: SortDirection;
};

export type EntityDefinition<TRecord extends TenantRecord, TCreate, TUpdate> = {
  entityType: string;
  table: TenantTable;
  columns: Readonly<Record<EntityField<TRecord>, string>>;
  createSchema: z.ZodType<FieldValues, z.ZodTypeDef, TCreate>;
  /** Legally mutable fields only; `businessId` is never among them. */
  updateSchema: z.ZodType<FieldValues, z.ZodTypeDef, TUpdate>;
  /** Fields whose combined value is unique within one business. */
  naturalKey: readonly EntityField<TRecord>[];
  defaultOrder: readonly OrderTerm<TRecord>[];
  fromRow(row: unknown): TRecord;
};

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}/, "expected an ISO date");
const optionalText = z.string().trim().nullable().optional();
const optionalDate = isoDate.nullable().optional();
const score = z.number().int().min(1).max(10);

const baseRowShape = {
  id: z.number().int(),
  business_id: z.string(),
  created_at: z.string(),
  updated_at: z.string().nullable()
};

type BaseRow = {
  id: number;
  business_id: string;
  created_at: string;
  updated_at: string | null;
};

function baseFromRow(row: BaseRow): TenantRecord {
  return {
    id: row.id,
    businessId: row.business_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/** A JSON array column; anything else reads as empty. */
export function parseStringList(value: string | null): string[] {
  if (!value) {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed)
      ? parsed.filter((entry): entry is string => typeof entry === "string")
      : [];
  } catch {
    return [];
  }
}

/** Day or slot name to time; legacy non-string values are kept as their JSON text. */
export type PickupSchedule = { [slot: string]: string };

function parsePickupSchedule(value: string | null | undefined): PickupSchedule {
  if (!value) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return {};
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(parsed).map(([slot, time]: [string, unknown]) => [
      slot,
      typeof time === "string" ? time : JSON.stringify(time)
    ])
  );
}

// customers

const customerFields = {
  name: z.string().trim().min(1),
  contactPerson: optionalText,
  phone: optionalText,
  email: z.string().trim().email().nullable().optional(),
  address: optionalText,
  satisfactionScore: score.nullable().optional(),
  feedback: optionalText
};

export const customerCreateSchema = z.object(customerFields);
export const customerUpdateSchema = z.object(customerFields).partial();

const customerRowSchema = z
  .object({
    ...baseRowShape,
    name: z.string(),
    contact_person: z.string().nullable(),
    phone: z.string().nullable(),
    email: z.string().nullable(),
    address: z.string().nullable(),
    satisfaction_score: z.number().int().nullable(),
    feedback: z.string().nullable()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    name: row.name,
    contactPerson: row.contact_person,
    phone: row.phone,
    email: row.email,
    address: row.address,
    satisfactionScore: row.satisfaction_score,
    feedback: row.feedback
  }));

export type Customer = z.output<typeof customerRowSchema>;
export type CustomerCreate = z.input<typeof customerCreateSchema>;
export type CustomerUpdate = z.input<typeof customerUpdateSchema>;

export const customerEntity: EntityDefinition<Customer, CustomerCreate, CustomerUpdate> = {
  entityType: "customer",
  table: "customers",
  columns: {
    name: "name",
    contactPerson: "contact_person",
    phone: "phone",
    email: "email",
    address: "address",
    satisfactionScore: "satisfaction_score",
    feedback: "feedback"
  },
  createSchema: customerCreateSchema,
  updateSchema: customerUpdateSchema,
  naturalKey: ["name"],
  defaultOrder: [{ field: "name", direction: "asc" }],
  fromRow: (row) => customerRowSchema.parse(row)
};

// farmers

const farmerFields = {
  name: z.string().trim().min(1),
  contactPerson: optionalText,
  phone: optionalText,
  email: z.string().trim().email().nullable().optional(),
  address: optionalText,
  productSpecialties: z.array(z.string().trim().min(1)),
  pickupSchedule: z.record(z.string().trim().min(1), z.string().trim()),
  performanceNotes: optionalText,
  trainingNeeds: optionalText
};

export const farmerCreateSchema = z.object({
  ...farmerFields,
  productSpecialties: farmerFields.productSpecialties.default([]),
  pickupSchedule: farmerFields.pickupSchedule.optional()
});
export const farmerUpdateSchema = z.object(farmerFields).partial();

const farmerRowSchema = z
  .object({
    ...baseRowShape,
    name: z.string(),
    contact_person: z.string().nullable(),
    phone: z.string().nullable(),
    email: z.string().nullable(),
    address: z.string().nullable(),
    product_specialties: z.string().nullable(),
    pickup_schedule: z.string().nullable().optional(),
    performance_notes: z.string().nullable(),
    training_needs: z.string().nullable()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    name: row.name,
    contactPerson: row.contact_person,
    phone: row.phone,
    email: row.email,
    address: row.address,
    productSpecialties: parseStringList(row.product_specialties),
    pickupSchedule: parsePickupSchedule(row.pickup_schedule),
    performanceNotes: row.performance_notes,
    trainingNeeds: row.training_needs
  }));

export type Farmer = z.output<typeof farmerRowSchema>;
export type FarmerCreate = z.input<typeof farmerCreateSchema>;
export type FarmerUpdate = z.input<typeof farmerUpdateSchema>;

export const farmerEntity: EntityDefinition<Farmer, FarmerCreate, FarmerUpdate> = {
  entityType: "farmer",
  table: "farmers",
  columns: {
    name: "name",
    contactPerson: "contact_person",
    phone: "phone",
    email: "email",
    address: "address",
    productSpecialties: "product_specialties",
    pickupSchedule: "pickup_schedule",
    performanceNotes: "performance_notes",
    trainingNeeds: "training_needs"
  },
  createSchema: farmerCreateSchema,
  updateSchema: farmerUpdateSchema,
  naturalKey: ["name"],
  defaultOrder: [{ field: "name", direction: "asc" }],
  fromRow: (row) => farmerRowSchema.parse(row)
};

// orders

export const ORDER_STATUSES = ["Pending", "Confirmed", "Delivered", "Cancelled"] as const;

const orderFields = {
  customerId: z.number().int().positive(),
  orderDate: isoDate,
  deliveryDate: isoDate,
  status: z.enum(ORDER_STATUSES),
  totalAmount: z.number().nonnegative().nullable().optional(),
  notes: optionalText
};

export const orderCreateSchema = z.object({
  ...orderFields,
  status: orderFields.status.default("Pending")
});
export const orderUpdateSchema = z.object(orderFields).omit({ customerId: true }).partial();

const orderRowSchema = z
  .object({
    ...baseRowShape,
    customer_id: z.number().int(),
    order_date: z.string(),
    delivery_date: z.string(),
    status: z.string(),
    total_amount: z.number().nullable(),
    notes: z.string().nullable()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    customerId: row.customer_id,
    orderDate: row.order_date,
    deliveryDate: row.delivery_date,
    status: row.status,
    totalAmount: row.total_amount,
    notes: row.notes
  }));

export type Order = z.output<typeof orderRowSchema>;
export type OrderCreate = z.input<typeof orderCreateSchema>;
export type OrderUpdate = z.input<typeof orderUpdateSchema>;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const orderEntity: EntityDefinition<Order, OrderCreate, OrderUpdate> = {
  entityType: "order",
  table: "orders",
  columns: {
    customerId: "customer_id",
    orderDate: "order_date",
    deliveryDate: "delivery_date",
    status: "status",
    totalAmount: "total_amount",
    notes: "notes"
  },
  createSchema: orderCreateSchema,
  updateSchema: orderUpdateSchema,
  naturalKey: [],
  defaultOrder: [{ field: "orderDate", direction: "desc" }],
  fromRow: (row) => orderRowSchema.parse(row)
};

// transactions

const transactionFields = {
  date: isoDate,
  type: z.string().trim().min(1),
  description: optionalText,
  amount: z.number().finite(),
  relatedEntityId: z.number().int().positive().nullable().optional(),
  relatedEntityType: optionalText
};

export const transactionCreateSchema = z.object(transactionFields);
export const transactionUpdateSchema = z.object(transactionFields).partial();

const transactionRowSchema = z
  .object({
    ...baseRowShape,
    date: z.string(),
    type: z.string(),
    description: z.string().nullable(),
    amount: z.number(),
    related_entity_id: z.number().int().nullable(),
    related_entity_type: z.string().nullable()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    date: row.date,
    type: row.type,
    description: row.description,
    amount: row.amount,
    relatedEntityId: row.related_entity_id,
    relatedEntityType: row.related_entity_type
  }));

export type FinancialTransaction = z.output<typeof transactionRowSchema>;
export type TransactionCreate = z.input<typeof transactionCreateSchema>;
export type TransactionUpdate = z.input<typeof transactionUpdateSchema>;

export const transactionEntity: EntityDefinition<
  FinancialTransaction,
  TransactionCreate,
  TransactionUpdate
> = {
  entityType: "transaction",
  table: "transactions",
  columns: {
    date: "date",
    type: "type",
    description: "description",
    amount: "amount",
    relatedEntityId: "related_entity_id",
    relatedEntityType: "related_entity_type"
  },
  createSchema: transactionCreateSchema,
  updateSchema: transactionUpdateSchema,
  naturalKey: [],
  defaultOrder: [{ field: "date", direction: "desc" }],
  fromRow: (row) => transactionRowSchema.parse(row)
};

// invoices

export const INVOICE_STATUSES = ["Issued", "Paid", "Overdue", "Cancelled"] as const;

const invoiceFields = {
  customerId: z.number().int().positive(),
  orderId: z.number().int().positive(),
  invoiceDate: isoDate,
  dueDate: isoDate,
  totalAmount: z.number().nonnegative(),
  status: z.enum(INVOICE_STATUSES)
};

export const invoiceCreateSchema = z.object({
  ...invoiceFields,
  status: invoiceFields.status.default("Issued")
});
export const invoiceUpdateSchema = z
  .object(invoiceFields)
  .pick({ dueDate: true, totalAmount: true, status: true })
  .partial();

const invoiceRowSchema = z
  .object({
    ...baseRowShape,
    customer_id: z.number().int(),
    order_id: z.number().int(),
    invoice_date: z.string(),
    due_date: z.string(),
    total_amount: z.number(),
    status: z.string()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    customerId: row.customer_id,
    orderId: row.order_id,
    invoiceDate: row.invoice_date,
    dueDate: row.due_date,
    totalAmount: row.total_amount,
    status: row.status
  }));

export type Invoice = z.output<typeof invoiceRowSchema>;
export type InvoiceCreate = z.input<typeof invoiceCreateSchema>;
export type InvoiceUpdate = z.input<typeof invoiceUpdateSchema>;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const invoiceEntity: EntityDefinition<Invoice, InvoiceCreate, InvoiceUpdate> = {
  entityType: "invoice",
  table: "invoices",
  columns: {
    customerId: "customer_id",
    orderId: "order_id",
    invoiceDate: "invoice_date",
    dueDate: "due_date",
    totalAmount: "total_amount",
    status: "status"
  },
  createSchema: invoiceCreateSchema,
  updateSchema: invoiceUpdateSchema,
  naturalKey: ["orderId"],
  defaultOrder: [{ field: "invoiceDate", direction: "desc" }],
  fromRow: (row) => invoiceRowSchema.parse(row)
};

// daily logs

const dailyLogFields = {
  logDate: isoDate,
  ordersFulfilled: z.number().int().nonnegative().nullable().optional(),
  qualityControlNotes: optionalText,
  deliveryRouteNotes: optionalText
};

export const dailyLogCreateSchema = z.object(dailyLogFields);
export const dailyLogUpdateSchema = z.object(dailyLogFields).omit({ logDate: true }).partial();

const dailyLogRowSchema = z
  .object({
    ...baseRowShape,
    log_date: z.string(),
    orders_fulfilled: z.number().int().nullable(),
    quality_control_notes: z.string().nullable(),
    delivery_route_notes: z.string().nullable()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    logDate: row.log_date,
    ordersFulfilled: row.orders_fulfilled,
    qualityControlNotes: row.quality_control_notes,
    deliveryRouteNotes: row.delivery_route_notes
  }));

export type DailyLog = z.output<typeof dailyLogRowSchema>;
export type DailyLogCreate = z.input<typeof dailyLogCreateSchema>;
export type DailyLogUpdate = z.input<typeof dailyLogUpdateSchema>;

export const dailyLogEntity: EntityDefinition<DailyLog, DailyLogCreate, DailyLogUpdate> = {
  entityType: "daily_log",
  table: "daily_logs",
  columns: {
    logDate: "log_date",
    ordersFulfilled: "orders_fulfilled",
    qualityControlNotes: "quality_control_notes",
    deliveryRouteNotes: "delivery_route_notes"
  },
  createSchema: dailyLogCreateSchema,
  updateSchema: dailyLogUpdateSchema,
  naturalKey: ["logDate"],
  defaultOrder: [{ field: "logDate", direction: "desc" }],
  fromRow: (row) => dailyLogRowSchema.parse(row)
};

// goals

export const GOAL_STATUSES = ["In Progress", "Achieved", "Overdue", "Cancelled"] as const;

const goalFields = {
  name: z.string().trim().min(1),
  description: optionalText,
  targetValue: z.number().positive().nullable().optional(),
  currentValue: z.number().finite(),
  startDate: optionalDate,
  endDate: optionalDate,
  status: z.enum(GOAL_STATUSES)
};

export const goalCreateSchema = z.object({
  ...goalFields,
  currentValue: goalFields.currentValue.default(0),
  status: goalFields.status.default("In Progress")
});
export const goalUpdateSchema = z.object(goalFields).partial();

const goalRowSchema = z
  .object({
    ...baseRowShape,
    name: z.string(),
    description: z.string().nullable(),
    target_value: z.number().nullable(),
    current_value: z.number(),
    start_date: z.string().nullable(),
    end_date: z.string().nullable(),
    status: z.string()
  })
  .transform((row) => ({
    ...baseFromRow(row),
    name: row.name,
    description: row.description,
    targetValue: row.target_value,
    currentValue: row.current_value,
    startDate: row.start_date,
    endDate: row.end_date,
    status: row.status
  }));

export type Goal = z.output<typeof goalRowSchema>;
export type GoalCreate = z.input<typeof goalCreateSchema>;
export type GoalUpdate = z.input<typeof goalUpdateSchema>;
export type GoalStatus = (typeof GOAL_STATUSES)[number];

export const goalEntity: EntityDefinition<Goal, GoalCreate, GoalUpdate> = {
  entityType: "goal",
  table: "goals",
  columns: {
    name: "name",
    description: "description",
    targetValue: "target_value",
    currentValue: "current_value",
    startDate: "start_date",
    endDate: "end_date",
    status: "status"
  },
  createSchema: goalCreateSchema,
  updateSchema: goalUpdateSchema,
  naturalKey: [],
  defaultOrder: [{ field: "createdAt", direction: "desc" }],
  fromRow: (row) => goalRowSchema.parse(row)
};
