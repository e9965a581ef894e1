import type { Logger } from "@harvest-hub/core";
import { z } from "zod";

import { averageBy, countBy, dayKey } from "../repository/aggregates";
import {
  goalEntity,
  type Goal,
  type GoalCreate,
  type GoalStatus,
  type GoalUpdate
} from "../repository/entities";
import {
  PARTNERSHIP_ACTIVE,
  PARTNERSHIP_PROSPECT,
  partnershipEntity,
  performanceMetricCreateSchema,
  performanceMetricEntity,
  type Partnership,
  type PartnershipCreate,
  type PartnershipUpdate,
  type PerformanceMetric,
  type PerformanceMetricCreate,
  type PerformanceMetricUpdate
} from "../repository/shared-entities";
import type { SharedRepository } from "../repository/shared-repository";
import type { TenantRepository, TenantScope } from "../repository/tenant-repository";
import {
  appendStampedLine,
  isoDay,
  parseOrReject,
  resolveDependencies,
  type ServiceDependencies
} from "./context";

const DAY_MS = 24 * 60 * 60 * 1000;
const RECENT_DAYS = 30;

export type GoalsOverview = {
  totalGoals: number;
  achievedGoals: number;
  inProgressGoals: number;
  overdueGoals: number;
  averageProgressPercentage: number;
};

export type StrategicOverview = {
  goals: GoalsOverview;
  partnerships: { total: number; active: number; prospects: number };
};

export type RecordMetricInput = Omit<PerformanceMetricCreate, "date"> & {
  /** Defaults to today (UTC). */
  date?: string;
};

export type MetricTrendPoint = {
  date: string;
  value: number;
  notes: string | null;
};

export type HealthLevel = "Excellent" | "Good" | "Fair" | "Needs Improvement";

export type BusinessHealthScore = {
  score: number;
  maxScore: number;
  percentage: number;
  healthLevel: HealthLevel;
  factors: string[];
};

export function healthLevelFor(score: number): HealthLevel {
  if (score >= 80) {
    return "Excellent";
  }
  if (score >= 60) {
    return "Good";
  }
  if (score >= 40) {
    return "Fair";
  }
  return "Needs Improvement";
}

/** Progress against target as a percentage, capped at 100; 0 without a positive target. */
export function goalProgressPercentage(goal: Pick<Goal, "currentValue" | "targetValue">): number {
  if (!goal.targetValue || goal.targetValue <= 0) {
    return 0;
  }
  return Math.min((goal.currentValue / goal.targetValue) * 100, 100);
}

/**
 * Goals belong to one business; partnerships and performance metrics are
 * shared by every business.
 */
export class StrategicService {
  private readonly repository: TenantRepository;
  private readonly shared: SharedRepository;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: ServiceDependencies) {
    const resolved = resolveDependencies(deps);
    this.repository = resolved.repository;
    this.shared = resolved.shared;
    this.log = resolved.logger;
    this.now = resolved.now;
  }

  createGoal(businessId: string, input: GoalCreate): Goal {
    return this.repository.create(goalEntity, businessId, input);
  }

  getGoal(id: number): Goal | null {
    return this.repository.getById(goalEntity, id);
  }

  /** Newest first, optionally narrowed to one status. */
  listGoals(scope: TenantScope, status?: GoalStatus): Goal[] {
    return this.repository.listByTenant(goalEntity, scope, {
      where: status === undefined ? {} : { status }
    });
  }

  updateGoal(id: number, patch: GoalUpdate): Goal | null {
    return this.repository.update(goalEntity, id, patch);
  }

  deleteGoal(id: number): boolean {
    return this.repository.delete(goalEntity, id);
  }

  /**
   * Records the latest value. Reaching the target marks the goal Achieved;
   * otherwise a goal past its end date becomes Overdue.
   */
  updateGoalProgress(id: number, currentValue: number): Goal | null {
    const value = parseOrReject(this.log, z.number().finite(), currentValue, "goal", "update");

    return this.repository.transaction(() => {
      const goal = this.getGoal(id);
      if (!goal) {
        return null;
      }

      let status: GoalStatus | undefined;
      if (goal.targetValue !== null && goal.targetValue > 0 && value >= goal.targetValue) {
        status = "Achieved";
      } else if (goal.endDate !== null && isoDay(this.now()) > dayKey(goal.endDate)) {
        status = "Overdue";
      }

      const updated = this.updateGoal(id, status === undefined ? { currentValue: value } : { currentValue: value, status });
      if (status !== undefined && status !== goal.status) {
        this.log.info("Goal status changed", { goalId: id, from: goal.status, to: status });
      }
      return updated;
    });
  }

  getGoalProgressPercentage(id: number): number {
    const goal = this.getGoal(id);
    return goal ? goalProgressPercentage(goal) : 0;
  }

  getGoalsOverview(scope: TenantScope): GoalsOverview {
    const goals = this.listGoals(scope);
    const byStatus = countBy(goals, (goal) => goal.status);
    const withTargets = goals.filter((goal) => goal.targetValue !== null && goal.targetValue > 0);

    return {
      totalGoals: goals.length,
      achievedGoals: byStatus.get("Achieved") ?? 0,
      inProgressGoals: byStatus.get("In Progress") ?? 0,
      overdueGoals: byStatus.get("Overdue") ?? 0,
      averageProgressPercentage: averageBy(withTargets, goalProgressPercentage) ?? 0
    };
  }

  // partnerships

  createPartnership(input: PartnershipCreate): Partnership {
    return this.shared.create(partnershipEntity, input);
  }

  getPartnership(id: number): Partnership | null {
    return this.shared.getById(partnershipEntity, id);
  }

  /** Newest first, optionally narrowed to one status. */
  listPartnerships(status?: string): Partnership[] {
    return this.shared.list(partnershipEntity, { where: status === undefined ? {} : { status } });
  }

  updatePartnership(id: number, patch: PartnershipUpdate): Partnership | null {
    return this.shared.update(partnershipEntity, id, patch);
  }

  /** Sets the status; a note is appended to the partnership notes as a stamped line. */
  updatePartnershipStatus(id: number, status: string, note?: string): Partnership | null {
    return this.shared.transaction(() => {
      const partnership = this.getPartnership(id);
      if (!partnership) {
        return null;
      }
      const trimmed = note?.trim();
      const updated = this.updatePartnership(
        id,
        trimmed
          ? {
              status,
              notes: appendStampedLine(partnership.notes, `Status changed to ${status.trim()}: ${trimmed}`, this.now())
            }
          : { status }
      );
      this.log.info("Partnership status changed", { partnershipId: id, from: partnership.status, to: updated?.status });
      return updated;
    });
  }

  deletePartnership(id: number): boolean {
    return this.shared.delete(partnershipEntity, id);
  }

  // performance metrics

  /** One value per metric and day: recording the same day again replaces the value. */
  recordPerformanceMetric(input: RecordMetricInput): PerformanceMetric {
    const metric = parseOrReject(
      this.log,
      performanceMetricCreateSchema,
      { ...input, date: input.date ?? isoDay(this.now()) },
      "performance_metric",
      "create"
    );

    return this.shared.transaction(() => {
      const existing = this.shared.findOne(performanceMetricEntity, {
        where: { name: metric.name, date: metric.date }
      });
      if (!existing) {
        return this.shared.create(performanceMetricEntity, metric);
      }
      const patch: PerformanceMetricUpdate =
        metric.notes === undefined ? { value: metric.value } : { value: metric.value, notes: metric.notes };
      const updated = this.shared.update(performanceMetricEntity, existing.id, patch);
      return updated ?? existing;
    });
  }

  getPerformanceMetric(id: number): PerformanceMetric | null {
    return this.shared.getById(performanceMetricEntity, id);
  }

  /** Latest day first, optionally for one metric. */
  listPerformanceMetrics(name?: string): PerformanceMetric[] {
    return this.shared.list(performanceMetricEntity, { where: name === undefined ? {} : { name } });
  }

  getLatestMetricValue(name: string): number | null {
    return this.shared.findOne(performanceMetricEntity, { where: { name } })?.value ?? null;
  }

  /** Values from `days` days ago through today (UTC days), oldest first. */
  getMetricTrend(name: string, days = RECENT_DAYS): MetricTrendPoint[] {
    const span = parseOrReject(this.log, z.number().int().min(0), days, "performance_metric", "list");
    const now = this.now();
    return this.shared
      .list(performanceMetricEntity, {
        where: { name },
        ranges: [{ field: "date", from: isoDay(new Date(now.getTime() - span * DAY_MS)), through: isoDay(now) }],
        orderBy: [{ field: "date", direction: "asc" }]
      })
      .map((metric) => ({ date: metric.date, value: metric.value, notes: metric.notes }));
  }

  deletePerformanceMetric(id: number): boolean {
    return this.shared.delete(performanceMetricEntity, id);
  }

  // insights

  getStrategicOverview(scope: TenantScope): StrategicOverview {
    const partnerships = this.listPartnerships();
    const byStatus = countBy(partnerships, (partnership) => partnership.status);
    return {
      goals: this.getGoalsOverview(scope),
      partnerships: {
        total: partnerships.length,
        active: byStatus.get(PARTNERSHIP_ACTIVE) ?? 0,
        prospects: byStatus.get(PARTNERSHIP_PROSPECT) ?? 0
      }
    };
  }

  /** Suggestions for goal areas the business does not track yet, and for goals needing attention. */
  getGoalRecommendations(scope: TenantScope): string[] {
    const goals = this.listGoals(scope);
    const names = goals.map((goal) => goal.name.toLowerCase());
    const mentions = (...words: string[]) => names.some((name) => words.some((word) => name.includes(word)));
    const recommendations: string[] = [];

    if (!mentions("farmer")) {
      recommendations.push("Set a goal to onboard a specific number of farmers (e.g., 25 farmers)");
    }
    if (!mentions("customer", "hotel", "restaurant")) {
      recommendations.push("Set a goal to acquire a specific number of customers (e.g., 25 hotels/restaurants)");
    }
    if (!mentions("revenue", "sales")) {
      recommendations.push("Set monthly or quarterly revenue targets");
    }
    if (!mentions("quality")) {
      recommendations.push("Set quality improvement goals (e.g., maintain 95% customer satisfaction)");
    }

    const overdue = goals.filter((goal) => goal.status === "Overdue").length;
    if (overdue > 0) {
      recommendations.push(`Review and update ${overdue} overdue goals`);
    }
    const withoutTargets = goals.filter((goal) => !goal.targetValue).length;
    if (withoutTargets > 0) {
      recommendations.push(`Add specific target values to ${withoutTargets} goals for better tracking`);
    }
    return recommendations;
  }

  /**
   * Out of 100: goal achievement (30), active partnerships (20), metrics
   * recorded in the last 30 days (25) and recent planning activity (25).
   */
  calculateBusinessHealthScore(scope: TenantScope): BusinessHealthScore {
    const now = this.now();
    const recentSince = new Date(now.getTime() - RECENT_DAYS * DAY_MS);
    const goals = this.listGoals(scope);
    const partnerships = this.listPartnerships();
    const factors: string[] = [];
    let score = 0;

    if (goals.length > 0) {
      const achieved = goals.filter((goal) => goal.status === "Achieved").length;
      const goalScore = Math.min((achieved / goals.length) * 30, 30);
      score += goalScore;
      factors.push(`Goal Achievement: ${goalScore.toFixed(1)}/30`);
    } else {
      factors.push("Goal Achievement: 0/30 (No goals set)");
    }

    if (partnerships.length > 0) {
      const active = partnerships.filter((partnership) => partnership.status === PARTNERSHIP_ACTIVE).length;
      const partnershipScore = Math.min((active / Math.max(partnerships.length, 5)) * 20, 20);
      score += partnershipScore;
      factors.push(`Partnership Development: ${partnershipScore.toFixed(1)}/20`);
    } else {
      factors.push("Partnership Development: 0/20 (No partnerships tracked)");
    }

    const recentMetrics = this.shared.list(performanceMetricEntity, {
      ranges: [{ field: "date", from: isoDay(recentSince) }]
    });
    if (recentMetrics.length > 0) {
      const metricsScore = Math.min(new Set(recentMetrics.map((metric) => metric.name)).size * 5, 25);
      score += metricsScore;
      factors.push(`Performance Tracking: ${metricsScore.toFixed(1)}/25`);
    } else {
      factors.push("Performance Tracking: 0/25 (No recent metrics)");
    }

    const since = recentSince.toISOString();
    let activity = 0;
    if (goals.some((goal) => goal.updatedAt !== null && goal.updatedAt >= since)) {
      activity += 10;
    }
    if (goals.some((goal) => goal.currentValue > 0)) {
      activity += 10;
    }
    if (partnerships.some((partnership) => partnership.createdAt >= since)) {
      activity += 5;
    }
    score += activity;
    factors.push(`Strategic Activity: ${activity}/25`);

    return {
      score,
      maxScore: 100,
      percentage: score,
      healthLevel: healthLevelFor(score),
      factors
    };
  }
}
