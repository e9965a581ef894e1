import type { Logger } from "@harvest-hub/core";
import { z } from "zod";

import { countBy } from "../repository/aggregates";
import {
  TASK_COMPLETED,
  TASK_PENDING,
  followUpTaskEntity,
  meetingEntity,
  messageTemplateEntity,
  type FollowUpTask,
  type FollowUpTaskCreate,
  type FollowUpTaskUpdate,
  type Meeting,
  type MeetingCreate,
  type MeetingUpdate,
  type MessageTemplate,
  type MessageTemplateCreate,
  type MessageTemplateUpdate
} from "../repository/shared-entities";
import type { SharedRepository } from "../repository/shared-repository";
import {
  isoDay,
  parseOrReject,
  resolveSharedDependencies,
  type SharedServiceDependencies
} from "./context";
import { DEFAULT_MESSAGE_TEMPLATES } from "./default-templates";

const DAY_MS = 24 * 60 * 60 * 1000;

export type TemplateVariables = Readonly<Record<string, string | number>>;

export type CommunicationSummary = {
  templates: { total: number; byType: Record<string, number> };
  meetings: { total: number; upcoming: number; past: number };
  tasks: { total: number; pending: number; overdue: number; completed: number };
};

/** Replaces every `{key}` placeholder; placeholders without a variable stay as written. */
export function personalize(body: string, variables: TemplateVariables): string {
  let result = body;
  for (const [key, value] of Object.entries(variables)) {
    result = result.split(`{${key}}`).join(String(value));
  }
  return result;
}

/** Message templates, meetings and follow-up tasks. These tables are shared by every business. */
export class CommunicationService {
  private readonly shared: SharedRepository;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: SharedServiceDependencies) {
    const resolved = resolveSharedDependencies(deps);
    this.shared = resolved.shared;
    this.log = resolved.logger;
    this.now = resolved.now;
  }

  // templates

  createTemplate(input: MessageTemplateCreate): MessageTemplate {
    return this.shared.create(messageTemplateEntity, input);
  }

  getTemplate(id: number): MessageTemplate | null {
    return this.shared.getById(messageTemplateEntity, id);
  }

  getTemplateByName(name: string): MessageTemplate | null {
    return this.shared.findOne(messageTemplateEntity, { where: { name: name.trim() } });
  }

  /** Ordered by name. */
  listTemplates(type?: string): MessageTemplate[] {
    return this.shared.list(messageTemplateEntity, { where: type === undefined ? {} : { type } });
  }

  updateTemplate(id: number, patch: MessageTemplateUpdate): MessageTemplate | null {
    return this.shared.update(messageTemplateEntity, id, patch);
  }

  deleteTemplate(id: number): boolean {
    return this.shared.delete(messageTemplateEntity, id);
  }

  /** The template body with its placeholders filled; null when the template does not exist. */
  personalizeTemplate(id: number, variables: TemplateVariables): string | null {
    const template = this.getTemplate(id);
    return template ? personalize(template.body, variables) : null;
  }

  /** Creates the stock templates that are missing by name and returns the ones it created. */
  createDefaultTemplates(): MessageTemplate[] {
    return this.shared.transaction(() => {
      const created: MessageTemplate[] = [];
      for (const template of DEFAULT_MESSAGE_TEMPLATES) {
        if (!this.getTemplateByName(template.name)) {
          created.push(this.createTemplate(template));
        }
      }
      if (created.length > 0) {
        this.log.info("Default message templates created", { count: created.length });
      }
      return created;
    });
  }

  // meetings

  createMeeting(input: MeetingCreate): Meeting {
    return this.shared.create(meetingEntity, input);
  }

  getMeeting(id: number): Meeting | null {
    return this.shared.getById(meetingEntity, id);
  }

  /** Latest first. */
  listMeetings(): Meeting[] {
    return this.shared.list(meetingEntity);
  }

  /** Meetings from now through `daysAhead` days ahead, soonest first. */
  listUpcomingMeetings(daysAhead = 7): Meeting[] {
    const days = parseOrReject(this.log, z.number().int().min(0), daysAhead, "meeting", "list");
    const now = this.now();
    return this.shared.list(meetingEntity, {
      ranges: [
        {
          field: "dateTime",
          from: now.toISOString(),
          through: new Date(now.getTime() + days * DAY_MS).toISOString()
        }
      ],
      orderBy: [{ field: "dateTime", direction: "asc" }]
    });
  }

  /** Meetings on any day from `startDate` through `endDate` (UTC days), soonest first. */
  listMeetingsInRange(startDate: string, endDate: string): Meeting[] {
    const day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
    const range = parseOrReject(
      this.log,
      z.object({ startDate: day, endDate: day }),
      { startDate, endDate },
      "meeting",
      "list"
    );
    const dayAfterEnd = new Date(Date.parse(`${range.endDate}T00:00:00.000Z`) + DAY_MS);
    return this.shared.list(meetingEntity, {
      ranges: [
        {
          field: "dateTime",
          from: `${range.startDate}T00:00:00.000Z`,
          before: dayAfterEnd.toISOString()
        }
      ],
      orderBy: [{ field: "dateTime", direction: "asc" }]
    });
  }

  updateMeeting(id: number, patch: MeetingUpdate): Meeting | null {
    return this.shared.update(meetingEntity, id, patch);
  }

  markRemindersSent(id: number): Meeting | null {
    return this.updateMeeting(id, { remindersSent: true });
  }

  getMeetingAttendees(id: number): string[] {
    return this.getMeeting(id)?.attendees ?? [];
  }

  deleteMeeting(id: number): boolean {
    return this.shared.delete(meetingEntity, id);
  }

  // follow-up tasks

  createTask(input: FollowUpTaskCreate): FollowUpTask {
    return this.shared.create(followUpTaskEntity, input);
  }

  getTask(id: number): FollowUpTask | null {
    return this.shared.getById(followUpTaskEntity, id);
  }

  /** By due date, undated tasks first. */
  listTasks(): FollowUpTask[] {
    return this.shared.list(followUpTaskEntity);
  }

  listPendingTasks(): FollowUpTask[] {
    return this.shared.list(followUpTaskEntity, { where: { status: TASK_PENDING } });
  }

  /** Pending tasks due before today (UTC). */
  listOverdueTasks(): FollowUpTask[] {
    return this.shared.list(followUpTaskEntity, {
      where: { status: TASK_PENDING },
      ranges: [{ field: "dueDate", before: isoDay(this.now()) }]
    });
  }

  listTasksForEntity(entityId: number, entityType: string): FollowUpTask[] {
    return this.shared.list(followUpTaskEntity, {
      where: { relatedEntityId: entityId, relatedEntityType: entityType }
    });
  }

  completeTask(id: number): FollowUpTask | null {
    return this.updateTaskStatus(id, TASK_COMPLETED);
  }

  updateTaskStatus(id: number, status: string): FollowUpTask | null {
    return this.updateTask(id, { status });
  }

  updateTask(id: number, patch: FollowUpTaskUpdate): FollowUpTask | null {
    return this.shared.update(followUpTaskEntity, id, patch);
  }

  deleteTask(id: number): boolean {
    return this.shared.delete(followUpTaskEntity, id);
  }

  getCommunicationSummary(): CommunicationSummary {
    const templates = this.listTemplates();
    const meetings = this.listMeetings();
    const tasks = this.listTasks();
    const now = this.now().toISOString();

    return {
      templates: {
        total: templates.length,
        byType: Object.fromEntries(countBy(templates, (template) => template.type))
      },
      meetings: {
        total: meetings.length,
        upcoming: this.listUpcomingMeetings().length,
        past: meetings.filter((meeting) => meeting.dateTime < now).length
      },
      tasks: {
        total: tasks.length,
        pending: tasks.filter((task) => task.status === TASK_PENDING).length,
        overdue: this.listOverdueTasks().length,
        completed: tasks.filter((task) => task.status === TASK_COMPLETED).length
      }
    };
  }
}
