import { z } from "zod";

import type { SharedTable } from "../schema";
import { parseStringList, type FieldValues, type SortDirection } from "./entities";

/** Columns every store-wide row carries. */
export type SharedRecord = {
  id: number;
  createdAt: string;
  updatedAt: string | null;
};

export type SharedBaseField = keyof SharedRecord;

export type SharedField<TRecord extends SharedRecord> = Exclude<keyof TRecord & string, SharedBaseField>;

export type SharedOrderTerm<TRecord extends SharedRecord> = {
  field: SharedField<TRecord> | SharedBaseField;
  direction: SortDirection;
};

export type SharedEntityDefinition<TRecord extends SharedRecord, TCreate, TUpdate> = {
  entityType: string;
  table: SharedTable;
  columns: Readonly<Record<SharedField<TRecord>, string>>;
  createSchema: z.ZodType<FieldValues, z.ZodTypeDef, TCreate>;
  updateSchema: z.ZodType<FieldValues, z.ZodTypeDef, TUpdate>;
  defaultOrder: readonly SharedOrderTerm<TRecord>[];
  fromRow(row: unknown): TRecord;
};

const text = z.string().trim().min(1);
const optionalText = z.string().trim().nullable().optional();
const dayPattern = /^\d{4}-\d{2}-\d{2}$/;

/** `YYYY-MM-DD`; a longer ISO timestamp is cut to its day. */
export const isoDaySchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}/, "expected an ISO date")
  .transform((value) => value.slice(0, 10))
  .refine((value) => dayPattern.test(value) && !Number.isNaN(Date.parse(value)), "expected an ISO date");

/** Any parseable timestamp, stored as UTC ISO text so stored values compare as strings. */
export const isoDateTimeSchema = z
  .string()
  .trim()
  .refine((value) => !Number.isNaN(Date.parse(value)), "expected an ISO timestamp")
  .transform((value) => new Date(value).toISOString());

const sharedRowShape = {
  id: z.number().int(),
  created_at: z.string(),
  updated_at: z.string().nullable()
};

function sharedFromRow(row: { id: number; created_at: string; updated_at: string | null }): SharedRecord {
  return { id: row.id, createdAt: row.created_at, updatedAt: row.updated_at };
}

// message templates

const templateFields = {
  name: text,
  type: text,
  subject: optionalText,
  body: z.string().min(1)
};

export const messageTemplateCreateSchema = z.object(templateFields);
export const messageTemplateUpdateSchema = z.object(templateFields).partial();

const messageTemplateRowSchema = z
  .object({
    ...sharedRowShape,
    name: z.string(),
    type: z.string(),
    subject: z.string().nullable(),
    body: z.string()
  })
  .transform((row) => ({
    ...sharedFromRow(row),
    name: row.name,
    type: row.type,
    subject: row.subject,
    body: row.body
  }));

export type MessageTemplate = z.output<typeof messageTemplateRowSchema>;
export type MessageTemplateCreate = z.input<typeof messageTemplateCreateSchema>;
export type MessageTemplateUpdate = z.input<typeof messageTemplateUpdateSchema>;

export const messageTemplateEntity: SharedEntityDefinition<
  MessageTemplate,
  MessageTemplateCreate,
  MessageTemplateUpdate
> = {
  entityType: "message_template",
  table: "message_templates",
  columns: { name: "name", type: "type", subject: "subject", body: "body" },
  createSchema: messageTemplateCreateSchema,
  updateSchema: messageTemplateUpdateSchema,
  defaultOrder: [{ field: "name", direction: "asc" }],
  fromRow: (row) => messageTemplateRowSchema.parse(row)
};

// meetings

const meetingFields = {
  title: text,
  dateTime: isoDateTimeSchema,
  attendees: z.array(text),
  notes: optionalText,
  remindersSent: z.boolean()
};

export const meetingCreateSchema = z.object({
  ...meetingFields,
  attendees: meetingFields.attendees.default([]),
  remindersSent: meetingFields.remindersSent.default(false)
});
export const meetingUpdateSchema = z.object(meetingFields).partial();

const meetingRowSchema = z
  .object({
    ...sharedRowShape,
    title: z.string(),
    date_time: z.string(),
    attendees: z.string().nullable(),
    notes: z.string().nullable(),
    reminders_sent: z.number().int()
  })
  .transform((row) => ({
    ...sharedFromRow(row),
    title: row.title,
    dateTime: row.date_time,
    attendees: parseStringList(row.attendees),
    notes: row.notes,
    remindersSent: row.reminders_sent !== 0
  }));

export type Meeting = z.output<typeof meetingRowSchema>;
export type MeetingCreate = z.input<typeof meetingCreateSchema>;
export type MeetingUpdate = z.input<typeof meetingUpdateSchema>;

export const meetingEntity: SharedEntityDefinition<Meeting, MeetingCreate, MeetingUpdate> = {
  entityType: "meeting",
  table: "meetings",
  columns: {
    title: "title",
    dateTime: "date_time",
    attendees: "attendees",
    notes: "notes",
    remindersSent: "reminders_sent"
  },
  createSchema: meetingCreateSchema,
  updateSchema: meetingUpdateSchema,
  defaultOrder: [{ field: "dateTime", direction: "desc" }],
  fromRow: (row) => meetingRowSchema.parse(row)
};

// follow-up tasks

export const TASK_PENDING = "Pending";
export const TASK_COMPLETED = "Completed";

const followUpTaskFields = {
  description: text,
  dueDate: isoDaySchema.nullable().optional(),
  status: text,
  assignedTo: optionalText,
  relatedEntityId: z.number().int().nullable().optional(),
  relatedEntityType: optionalText
};

/** New tasks always start pending. */
export const followUpTaskCreateSchema = z.object({
  ...followUpTaskFields,
  status: z.literal(TASK_PENDING).default(TASK_PENDING)
});
export const followUpTaskUpdateSchema = z.object(followUpTaskFields).partial();

const followUpTaskRowSchema = z
  .object({
    ...sharedRowShape,
    description: z.string(),
    due_date: z.string().nullable(),
    status: z.string(),
    assigned_to: z.string().nullable(),
    related_entity_id: z.number().int().nullable(),
    related_entity_type: z.string().nullable()
  })
  .transform((row) => ({
    ...sharedFromRow(row),
    description: row.description,
    dueDate: row.due_date,
    status: row.status,
    assignedTo: row.assigned_to,
    relatedEntityId: row.related_entity_id,
    relatedEntityType: row.related_entity_type
  }));

export type FollowUpTask = z.output<typeof followUpTaskRowSchema>;
export type FollowUpTaskCreate = z.input<typeof followUpTaskCreateSchema>;
export type FollowUpTaskUpdate = z.input<typeof followUpTaskUpdateSchema>;

export const followUpTaskEntity: SharedEntityDefinition<FollowUpTask, FollowUpTaskCreate, FollowUpTaskUpdate> = {
  entityType: "follow_up_task",
  table: "follow_up_tasks",
  columns: {
    description: "description",
    dueDate: "due_date",
    status: "status",
    assignedTo: "assigned_to",
    relatedEntityId: "related_entity_id",
    relatedEntityType: "related_entity_type"
  },
  createSchema: followUpTaskCreateSchema,
  updateSchema: followUpTaskUpdateSchema,
  defaultOrder: [{ field: "dueDate", direction: "asc" }],
  fromRow: (row) => followUpTaskRowSchema.parse(row)
};

// documents

const documentFields = {
  name: text,
  filePath: text,
  type: optionalText,
  version: optionalText
};

export const documentCreateSchema = z.object({
  ...documentFields,
  version: text.default("1.0")
});
export const documentUpdateSchema = z.object(documentFields).partial();

const documentRowSchema = z
  .object({
    ...sharedRowShape,
    name: z.string(),
    file_path: z.string(),
    type: z.string().nullable(),
    version: z.string().nullable()
  })
  .transform((row) => ({
    ...sharedFromRow(row),
    name: row.name,
    filePath: row.file_path,
    type: row.type,
    version: row.version
  }));

export type DocumentRecord = z.output<typeof documentRowSchema>;
export type DocumentCreate = z.input<typeof documentCreateSchema>;
export type DocumentUpdate = z.input<typeof documentUpdateSchema>;

export const documentEntity: SharedEntityDefinition<DocumentRecord, DocumentCreate, DocumentUpdate> = {
  entityType: "document",
  table: "documents",
  columns: { name: "name", filePath: "file_path", type: "type", version: "version" },
  createSchema: documentCreateSchema,
  updateSchema: documentUpdateSchema,
  defaultOrder: [{ field: "createdAt", direction: "desc" }],
  fromRow: (row) => documentRowSchema.parse(row)
};

// performance metrics

const metricFields = {
  name: text,
  value: z.number().finite(),
  date: isoDaySchema,
  notes: optionalText
};

export const performanceMetricCreateSchema = z.object(metricFields);
export const performanceMetricUpdateSchema = z.object(metricFields).partial();

const performanceMetricRowSchema = z
  .object({
    ...sharedRowShape,
    name: z.string(),
    value: z.number(),
    date: z.string(),
    notes: z.string().nullable()
  })
  .transform((row) => ({
    ...sharedFromRow(row),
    name: row.name,
    value: row.value,
    date: row.date,
    notes: row.notes
  }));

export type PerformanceMetric = z.output<typeof performanceMetricRowSchema>;
export type PerformanceMetricCreate = z.input<typeof performanceMetricCreateSchema>;
export type PerformanceMetricUpdate = z.input<typeof performanceMetricUpdateSchema>;

export const performanceMetricEntity: SharedEntityDefinition<
  PerformanceMetric,
  PerformanceMetricCreate,
  PerformanceMetricUpdate
> = {
  entityType: "performance_metric",
  table: "performance_metrics",
  columns: { name: "name", value: "value", date: "date", notes: "notes" },
  createSchema: performanceMetricCreateSchema,
  updateSchema: performanceMetricUpdateSchema,
  defaultOrder: [{ field: "date", direction: "desc" }],
  fromRow: (row) => performanceMetricRowSchema.parse(row)
};

// partnerships

export const PARTNERSHIP_PROSPECT = "Prospect";
export const PARTNERSHIP_ACTIVE = "Active";

const partnershipFields = {
  name: text,
  type: optionalText,
  contactPerson: optionalText,
  status: text,
  notes: optionalText
};

export const partnershipCreateSchema = z.object({
  ...partnershipFields,
  status: text.default(PARTNERSHIP_PROSPECT)
});
export const partnershipUpdateSchema = z.object(partnershipFields).partial();

const partnershipRowSchema = z
  .object({
    ...sharedRowShape,
    name: z.string(),
    type: z.string().nullable(),
    contact_person: z.string().nullable(),
    status: z.string(),
    notes: z.string().nullable()
  })
  .transform((row) => ({
    ...sharedFromRow(row),
    name: row.name,
    type: row.type,
    contactPerson: row.contact_person,
    status: row.status,
    notes: row.notes
  }));

export type Partnership = z.output<typeof partnershipRowSchema>;
export type PartnershipCreate = z.input<typeof partnershipCreateSchema>;
export type PartnershipUpdate = z.input<typeof partnershipUpdateSchema>;

export const partnershipEntity: SharedEntityDefinition<Partnership, PartnershipCreate, PartnershipUpdate> = {
  entityType: "partnership",
  table: "partnerships",
  columns: {
    name: "name",
    type: "type",
    contactPerson: "contact_person",
    status: "status",
    notes: "notes"
  },
  createSchema: partnershipCreateSchema,
  updateSchema: partnershipUpdateSchema,
  defaultOrder: [{ field: "createdAt", direction: "desc" }],
  fromRow: (row) => partnershipRowSchema.parse(row)
};
