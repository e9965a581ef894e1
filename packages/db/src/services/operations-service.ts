import { NotFoundError, type Logger } from "@harvest-hub/core";
import type Database from "better-sqlite3";
import { z } from "zod";

import { averageBy, dayKey } from "../repository/aggregates";
import {
  dailyLogEntity,
  type DailyLog,
  type DailyLogCreate,
  type DailyLogUpdate
} from "../repository/entities";
import type { TenantRepository, TenantScope } from "../repository/tenant-repository";
import { guardChild, parseOrReject, resolveDependencies, type ServiceDependencies } from "./context";
import type { DateRange } from "./financial-service";

export const ISSUE_SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;

const temperatureInputSchema = z.object({
  temperature: z.number().finite(),
  location: z.string().trim().min(1),
  recordedAt: z.string().datetime().optional()
});

const issueInputSchema = z.object({
  description: z.string().trim().min(1),
  severity: z.enum(ISSUE_SEVERITIES).default("Medium")
});

export type TemperatureInput = z.input<typeof temperatureInputSchema>;
export type IssueInput = z.input<typeof issueInputSchema>;
export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

export type TemperatureReading = {
  id: number;
  dailyLogId: number;
  temperature: number;
  location: string;
  recordedAt: string;
};

export type OperationalIssue = {
  id: number;
  dailyLogId: number;
  description: string;
  severity: string;
  status: "Open" | "Resolved";
  resolution: string | null;
  reportedAt: string;
  resolvedAt: string | null;
};

export type OperationsAnalytics = {
  totalDaysLogged: number;
  totalOrdersFulfilled: number;
  averageOrdersPerDay: number;
  totalIssues: number;
  openIssues: number;
  resolvedIssues: number;
  averageTemperature: number;
  temperatureReadingsCount: number;
};

type TemperatureRow = {
  id: number;
  daily_log_id: number;
  temperature: number;
  location: string;
  recorded_at: string;
};

type IssueRow = {
  id: number;
  daily_log_id: number;
  description: string;
  severity: string;
  status: string;
  resolution: string | null;
  reported_at: string;
  resolved_at: string | null;
};

function toTemperatureReading(row: TemperatureRow): TemperatureReading {
  return {
    id: row.id,
    dailyLogId: row.daily_log_id,
    temperature: row.temperature,
    location: row.location,
    recordedAt: row.recorded_at
  };
}

function toIssue(row: IssueRow): OperationalIssue {
  return {
    id: row.id,
    dailyLogId: row.daily_log_id,
    description: row.description,
    severity: row.severity,
    status: row.status === "Resolved" ? "Resolved" : "Open",
    resolution: row.resolution,
    reportedAt: row.reported_at,
    resolvedAt: row.resolved_at
  };
}

export class OperationsService {
  private readonly db: Database.Database;
  private readonly repository: TenantRepository;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: ServiceDependencies) {
    const resolved = resolveDependencies(deps);
    this.db = resolved.handle.db;
    this.repository = resolved.repository;
    this.log = resolved.logger;
    this.now = resolved.now;
  }

  createDailyLog(businessId: string, input: DailyLogCreate): DailyLog {
    return this.repository.create(dailyLogEntity, businessId, input);
  }

  getDailyLog(businessId: string, logDate: string): DailyLog | null {
    return this.repository.findOne(dailyLogEntity, businessId, { logDate });
  }

  listDailyLogs(scope: TenantScope, range: DateRange = {}): DailyLog[] {
    return this.repository
      .listByTenant(dailyLogEntity, scope)
      .filter((log) => {
        const day = dayKey(log.logDate);
        return (!range.start || day >= range.start) && (!range.end || day <= range.end);
      });
  }

  updateDailyLog(id: number, patch: DailyLogUpdate): DailyLog | null {
    return this.repository.update(dailyLogEntity, id, patch);
  }

  /** Returns the log for that business and date, creating an empty one on first use. */
  ensureDailyLog(businessId: string, logDate: string): DailyLog {
    return this.repository.transaction(
      () => this.getDailyLog(businessId, logDate) ?? this.createDailyLog(businessId, { logDate })
    );
  }

  addTemperatureReading(businessId: string, logDate: string, input: TemperatureInput): TemperatureReading {
    const parsed = parseOrReject(this.log, temperatureInputSchema, input, "temperature_reading", "create");

    return this.repository.transaction(() => {
      const dailyLog = this.ensureDailyLog(businessId, logDate);
      return guardChild(this.log, "create", "temperature_reading", () => {
        const result = this.db
          .prepare(
            `
              INSERT INTO temperature_readings (daily_log_id, temperature, location, recorded_at)
              VALUES (?, ?, ?, ?)
            `
          )
          .run(
            dailyLog.id,
            parsed.temperature,
            parsed.location,
            parsed.recordedAt ?? this.now().toISOString()
          );
        const row = this.db
          .prepare("SELECT * FROM temperature_readings WHERE id = ?")
          .get(Number(result.lastInsertRowid)) as TemperatureRow;
        return toTemperatureReading(row);
      });
    });
  }

  listTemperatureReadings(dailyLogId: number): TemperatureReading[] {
    const rows = guardChild(this.log, "list", "temperature_reading", () =>
      this.db
        .prepare("SELECT * FROM temperature_readings WHERE daily_log_id = ? ORDER BY recorded_at, id")
        .all(dailyLogId)
    ) as TemperatureRow[];
    return rows.map(toTemperatureReading);
  }

  addIssue(businessId: string, logDate: string, input: IssueInput): OperationalIssue {
    const parsed = parseOrReject(this.log, issueInputSchema, input, "operational_issue", "create");

    return this.repository.transaction(() => {
      const dailyLog = this.ensureDailyLog(businessId, logDate);
      const issue = guardChild(this.log, "create", "operational_issue", () => {
        const result = this.db
          .prepare(
            `
              INSERT INTO operational_issues (daily_log_id, description, severity, status, reported_at)
              VALUES (?, ?, ?, 'Open', ?)
            `
          )
          .run(dailyLog.id, parsed.description, parsed.severity, this.now().toISOString());
        return this.requireIssue(Number(result.lastInsertRowid));
      });
      this.log.info("Operational issue reported", {
        issueId: issue.id,
        businessId,
        severity: issue.severity
      });
      return issue;
    });
  }

  listIssues(dailyLogId: number): OperationalIssue[] {
    const rows = guardChild(this.log, "list", "operational_issue", () =>
      this.db
        .prepare("SELECT * FROM operational_issues WHERE daily_log_id = ? ORDER BY reported_at, id")
        .all(dailyLogId)
    ) as IssueRow[];
    return rows.map(toIssue);
  }

  resolveIssue(issueId: number, resolution: string): OperationalIssue | null {
    return guardChild(this.log, "update", "operational_issue", () => {
      const result = this.db
        .prepare(
          `
            UPDATE operational_issues
            SET status = 'Resolved', resolution = ?, resolved_at = ?
            WHERE id = ?
          `
        )
        .run(resolution, this.now().toISOString(), issueId);
      return result.changes === 0 ? null : this.requireIssue(issueId);
    });
  }

  listOpenIssues(scope: TenantScope): OperationalIssue[] {
    return this.listDailyLogs(scope)
      .flatMap((log) => this.listIssues(log.id))
      .filter((issue) => issue.status === "Open");
  }

  getOperationsAnalytics(scope: TenantScope, range: DateRange = {}): OperationsAnalytics {
    const logs = this.listDailyLogs(scope, range);
    const issues = logs.flatMap((log) => this.listIssues(log.id));
    const readings = logs.flatMap((log) => this.listTemperatureReadings(log.id));
    const totalOrdersFulfilled = logs.reduce((total, log) => total + (log.ordersFulfilled ?? 0), 0);
    const openIssues = issues.filter((issue) => issue.status === "Open").length;
    const averageTemperature = averageBy(readings, (reading) => reading.temperature);

    return {
      totalDaysLogged: logs.length,
      totalOrdersFulfilled,
      averageOrdersPerDay: logs.length > 0 ? totalOrdersFulfilled / logs.length : 0,
      totalIssues: issues.length,
      openIssues,
      resolvedIssues: issues.length - openIssues,
      averageTemperature: averageTemperature === null ? 0 : Math.round(averageTemperature * 10) / 10,
      temperatureReadingsCount: readings.length
    };
  }

  private requireIssue(issueId: number): OperationalIssue {
    const row = this.db.prepare("SELECT * FROM operational_issues WHERE id = ?").get(issueId) as
      | IssueRow
      | undefined;
    if (!row) {
      throw new NotFoundError("operational_issue", issueId);
    }
    return toIssue(row);
  }
}
