import { getBusinessProfile, listActiveBusinesses } from "@harvest-hub/core";

import { groupSum, monthKey, roundCurrency, sumBy } from "../repository/aggregates";
import { transactionEntity, type FinancialTransaction } from "../repository/entities";
import { ALL_TENANTS, type TenantRepository } from "../repository/tenant-repository";
import { isoDay, resolveDependencies, type ServiceDependencies } from "./context";
import { EXPENSE_TYPES, REVENUE_TYPES } from "./financial-service";

/** Share of the monthly goal at which revenue counts as on track. */
const ON_TRACK_THRESHOLD_PERCENT = 75;

export type BusinessTotals = Record<string, number>;

export type TopBusiness = {
  businessId: string;
  name: string;
  revenue: number;
};

export type ConsolidatedSummary = {
  totalRevenue: number;
  totalExpenses: number;
  netProfit: number;
  profitMargin: number;
  revenueByBusiness: BusinessTotals;
  topPerformingBusiness: TopBusiness | null;
};

export type MonthlyRevenuePoint = {
  month: string;
  revenue: number;
};

export type BusinessComparisonRow = {
  businessId: string;
  business: string;
  revenue: number;
  profit: number;
  profitMargin: number;
};

export type RevenueGoalProgress = {
  current: number;
  goal: number;
  progressPercent: number;
  remaining: number;
  status: "on_track" | "needs_attention";
};

function margin(profit: number, revenue: number): number {
  return revenue > 0 ? Math.round((profit / revenue) * 10000) / 100 : 0;
}

function profileName(businessId: string): string {
  return getBusinessProfile(businessId)?.name ?? businessId;
}

/**
 * Consolidated reporting across every business. This is the one place that
 * reads transactions with `ALL_TENANTS`; figures are then split by business_id.
 */
export class UnifiedFinancialService {
  private readonly repository: TenantRepository;
  private readonly now: () => Date;

  constructor(deps: ServiceDependencies) {
    const resolved = resolveDependencies(deps);
    this.repository = resolved.repository;
    this.now = resolved.now;
  }

  getTotalRevenue(): number {
    return sumBy(this.revenueTransactions(), (transaction) => transaction.amount);
  }

  getTotalExpenses(): number {
    return sumBy(this.expenseTransactions(), (transaction) => Math.abs(transaction.amount));
  }

  /** Every active business is present, with 0 when it has no revenue yet. */
  getRevenueByBusiness(): BusinessTotals {
    return this.withActiveBusinesses(
      groupSum(
        this.revenueTransactions(),
        (transaction) => transaction.businessId,
        (transaction) => transaction.amount
      )
    );
  }

  getExpensesByBusiness(): BusinessTotals {
    return this.withActiveBusinesses(
      groupSum(
        this.expenseTransactions(),
        (transaction) => transaction.businessId,
        (transaction) => Math.abs(transaction.amount)
      )
    );
  }

  getProfitByBusiness(): BusinessTotals {
    const revenue = this.getRevenueByBusiness();
    const expenses = this.getExpensesByBusiness();
    const profit: BusinessTotals = {};
    for (const businessId of new Set([...Object.keys(revenue), ...Object.keys(expenses)])) {
      profit[businessId] = roundCurrency((revenue[businessId] ?? 0) - (expenses[businessId] ?? 0));
    }
    return profit;
  }

  /** Highest revenue wins; ties go to the business listed first. Null when nothing has revenue. */
  getTopPerformingBusiness(): TopBusiness | null {
    let top: TopBusiness | null = null;
    for (const [businessId, revenue] of Object.entries(this.getRevenueByBusiness())) {
      if (revenue > 0 && (top === null || revenue > top.revenue)) {
        top = { businessId, name: profileName(businessId), revenue };
      }
    }
    return top;
  }

  getFinancialSummary(): ConsolidatedSummary {
    const totalRevenue = this.getTotalRevenue();
    const totalExpenses = this.getTotalExpenses();
    const netProfit = roundCurrency(totalRevenue - totalExpenses);
    return {
      totalRevenue,
      totalExpenses,
      netProfit,
      profitMargin: margin(netProfit, totalRevenue),
      revenueByBusiness: this.getRevenueByBusiness(),
      topPerformingBusiness: this.getTopPerformingBusiness()
    };
  }

  /** Revenue per calendar month over the trailing window, oldest month first. */
  getMonthlyRevenueTrend(months = 6): MonthlyRevenuePoint[] {
    const start = new Date(this.now().getTime());
    start.setUTCDate(start.getUTCDate() - months * 30);
    const since = isoDay(start);

    const recent = this.revenueTransactions().filter((transaction) => transaction.date >= since);
    return [...groupSum(recent, (transaction) => monthKey(transaction.date), (t) => t.amount)]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([month, revenue]) => ({ month, revenue }));
  }

  getBusinessComparison(): BusinessComparisonRow[] {
    const revenue = this.getRevenueByBusiness();
    const profit = this.getProfitByBusiness();
    return Object.entries(revenue).map(([businessId, businessRevenue]) => ({
      businessId,
      business: profileName(businessId),
      revenue: businessRevenue,
      profit: profit[businessId] ?? 0,
      profitMargin: margin(profit[businessId] ?? 0, businessRevenue)
    }));
  }

  getRevenueGoalProgress(monthlyGoal: number): RevenueGoalProgress {
    const current = this.getTotalRevenue();
    const progressPercent = monthlyGoal > 0 ? (current / monthlyGoal) * 100 : 0;
    return {
      current,
      goal: monthlyGoal,
      progressPercent,
      remaining: Math.max(0, roundCurrency(monthlyGoal - current)),
      status: progressPercent >= ON_TRACK_THRESHOLD_PERCENT ? "on_track" : "needs_attention"
    };
  }

  private allTransactions(): FinancialTransaction[] {
    return this.repository.listByTenant(transactionEntity, ALL_TENANTS);
  }

  private revenueTransactions(): FinancialTransaction[] {
    return this.allTransactions().filter((transaction) => REVENUE_TYPES.includes(transaction.type));
  }

  private expenseTransactions(): FinancialTransaction[] {
    return this.allTransactions().filter((transaction) => EXPENSE_TYPES.includes(transaction.type));
  }

  private withActiveBusinesses(totals: Map<string, number>): BusinessTotals {
    const result: BusinessTotals = {};
    for (const profile of listActiveBusinesses()) {
      result[profile.id] = totals.get(profile.id) ?? 0;
    }
    for (const [businessId, total] of totals) {
      result[businessId] = total;
    }
    return result;
  }
}
