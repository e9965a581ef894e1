import { NotFoundError, ValidationError, type Logger } from "@harvest-hub/core";
import { z } from "zod";

import { dayKey, groupSum, monthKey, roundCurrency, sumBy } from "../repository/aggregates";
import {
  customerEntity,
  INVOICE_STATUSES,
  invoiceEntity,
  orderEntity,
  transactionEntity,
  type FinancialTransaction,
  type Invoice,
  type InvoiceStatus,
  type TransactionCreate
} from "../repository/entities";
import type { TenantRepository, TenantScope } from "../repository/tenant-repository";
import { isoDay, parseOrReject, resolveDependencies, type ServiceDependencies } from "./context";

export const REVENUE_TYPES: readonly string[] = ["Revenue", "Payment Received"];
export const EXPENSE_TYPES: readonly string[] = ["Expense", "Farmer Payment"];

const DEFAULT_PAYMENT_TERMS_DAYS = 30;

const expenseInputSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
  description: z.string().trim().min(1),
  amount: z.number().finite(),
  category: z.string().trim().min(1).nullable().optional()
});

const invoiceInputSchema = z.object({
  invoiceDate: z.string().regex(/^\d{4}-\d{2}-\d{2}/).optional(),
  dueDate: z.string().regex(/^\d{4}-\d{2}-\d{2}/).optional()
});

export type ExpenseInput = z.input<typeof expenseInputSchema>;
export type InvoiceInput = z.input<typeof invoiceInputSchema>;

export type DateRange = {
  /** Inclusive `YYYY-MM-DD`. */
  start?: string;
  /** Inclusive `YYYY-MM-DD`. */
  end?: string;
};

export type TransactionFilter = DateRange & {
  type?: string;
};

export type RevenueSummary = {
  totalRevenue: number;
  transactionCount: number;
  averageTransaction: number;
  monthlyBreakdown: Record<string, number>;
};

export type ExpenseSummary = {
  totalExpenses: number;
  transactionCount: number;
  averageExpense: number;
  categoryBreakdown: Record<string, number>;
  monthlyBreakdown: Record<string, number>;
};

export type ProfitLoss = {
  totalRevenue: number;
  totalExpenses: number;
  netProfit: number;
  profitMarginPercentage: number;
  revenue: RevenueSummary;
  expenses: ExpenseSummary;
};

export type CashFlow = {
  cashInflows: number;
  cashOutflows: number;
  netCashFlow: number;
  dailyCashFlow: Record<string, number>;
};

export type CustomerBalance = {
  customerId: number;
  customerName: string;
  totalOutstanding: number;
  overdueAmount: number;
  invoiceCount: number;
};

export type AccountsReceivable = {
  totalOutstanding: number;
  totalOverdue: number;
  unpaidInvoiceCount: number;
  overdueInvoiceCount: number;
  customerBalances: CustomerBalance[];
};

/** Text before the first colon of an expense description, else "Other". */
export function expenseCategory(description: string | null): string {
  if (!description || !description.includes(":")) {
    return "Other";
  }
  return description.slice(0, description.indexOf(":")).trim() || "Other";
}

function addDays(isoDate: string, days: number): string {
  const date = new Date(`${dayKey(isoDate)}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return isoDay(date);
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

export class FinancialService {
  private readonly repository: TenantRepository;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: ServiceDependencies) {
    const resolved = resolveDependencies(deps);
    this.repository = resolved.repository;
    this.log = resolved.logger;
    this.now = resolved.now;
  }

  createTransaction(businessId: string, input: TransactionCreate): FinancialTransaction {
    return this.repository.create(transactionEntity, businessId, input);
  }

  getTransaction(id: number): FinancialTransaction | null {
    return this.repository.getById(transactionEntity, id);
  }

  deleteTransaction(id: number): boolean {
    return this.repository.delete(transactionEntity, id);
  }

  /** Expenses are stored negative; a category becomes a `Category: ` description prefix. */
  createExpense(businessId: string, input: ExpenseInput): FinancialTransaction {
    const parsed = parseOrReject(this.log, expenseInputSchema, input, "transaction", "create");
    return this.createTransaction(businessId, {
      date: parsed.date,
      type: "Expense",
      description: parsed.category ? `${parsed.category}: ${parsed.description}` : parsed.description,
      amount: -Math.abs(parsed.amount)
    });
  }

  /** Newest first; date bounds compare on the day and are inclusive. */
  listTransactions(scope: TenantScope, filter: TransactionFilter = {}): FinancialTransaction[] {
    const transactions = this.repository.listByTenant(transactionEntity, scope, {
      where: filter.type ? { type: filter.type } : {},
      orderBy: [{ field: "date", direction: "desc" }]
    });
    return transactions.filter((transaction) => {
      const day = dayKey(transaction.date);
      return (!filter.start || day >= filter.start) && (!filter.end || day <= filter.end);
    });
  }

  /** Bills an order: business, customer and total come from the order, plus a Revenue booking. */
  createInvoice(orderId: number, input: InvoiceInput = {}): Invoice {
    const parsed = parseOrReject(this.log, invoiceInputSchema, input, "invoice", "create");

    return this.repository.transaction(() => {
      const order = this.repository.getById(orderEntity, orderId);
      if (!order) {
        throw new NotFoundError("order", orderId);
      }
      if (order.totalAmount === null) {
        throw new ValidationError(`order ${orderId} has no total to invoice`, {
          entityType: "invoice",
          operation: "create",
          issues: ["totalAmount: required"]
        });
      }

      const invoiceDate = parsed.invoiceDate ?? isoDay(this.now());
      const invoice = this.repository.create(invoiceEntity, order.businessId, {
        customerId: order.customerId,
        orderId: order.id,
        invoiceDate,
        dueDate: parsed.dueDate ?? addDays(invoiceDate, DEFAULT_PAYMENT_TERMS_DAYS),
        totalAmount: order.totalAmount,
        status: "Issued"
      });

      this.repository.create(transactionEntity, order.businessId, {
        date: invoiceDate,
        type: "Revenue",
        description: `Invoice #${invoice.id} for ${this.customerName(order.customerId)}`,
        amount: invoice.totalAmount,
        relatedEntityId: invoice.id,
        relatedEntityType: "Invoice"
      });

      this.log.info("Invoice created", { invoiceId: invoice.id, orderId, businessId: invoice.businessId });
      return invoice;
    });
  }

  getInvoice(id: number): Invoice | null {
    return this.repository.getById(invoiceEntity, id);
  }

  listInvoices(scope: TenantScope): Invoice[] {
    return this.repository.listByTenant(invoiceEntity, scope);
  }

  /** The first move to Paid books a Payment Received transaction. */
  updateInvoiceStatus(invoiceId: number, status: InvoiceStatus): Invoice | null {
    const next = parseOrReject(this.log, z.enum(INVOICE_STATUSES), status, "invoice", "update");

    return this.repository.transaction(() => {
      const invoice = this.repository.getById(invoiceEntity, invoiceId);
      if (!invoice) {
        return null;
      }
      const updated = this.repository.update(invoiceEntity, invoiceId, { status: next });

      if (next === "Paid" && invoice.status !== "Paid") {
        this.repository.create(transactionEntity, invoice.businessId, {
          date: isoDay(this.now()),
          type: "Payment Received",
          description: `Payment received for Invoice #${invoice.id} from ${this.customerName(invoice.customerId)}`,
          amount: invoice.totalAmount,
          relatedEntityId: invoice.id,
          relatedEntityType: "Invoice"
        });
      }
      return updated;
    });
  }

  /** Unpaid, not cancelled, and due strictly before `asOf`. */
  listOverdueInvoices(scope: TenantScope, asOf: string = isoDay(this.now())): Invoice[] {
    return this.listInvoices(scope).filter(
      (invoice) =>
        invoice.status !== "Paid" && invoice.status !== "Cancelled" && dayKey(invoice.dueDate) < asOf
    );
  }

  getRevenueSummary(scope: TenantScope, range: DateRange = {}): RevenueSummary {
    const revenue = this.listTransactions(scope, range).filter((transaction) =>
      REVENUE_TYPES.includes(transaction.type)
    );
    const totalRevenue = sumBy(revenue, (transaction) => transaction.amount);
    return {
      totalRevenue,
      transactionCount: revenue.length,
      averageTransaction: revenue.length > 0 ? roundCurrency(totalRevenue / revenue.length) : 0,
      monthlyBreakdown: Object.fromEntries(
        groupSum(
          revenue,
          (transaction) => monthKey(transaction.date),
          (transaction) => transaction.amount
        )
      )
    };
  }

  getExpenseSummary(scope: TenantScope, range: DateRange = {}): ExpenseSummary {
    const expenses = this.listTransactions(scope, range).filter((transaction) =>
      EXPENSE_TYPES.includes(transaction.type)
    );
    const totalExpenses = sumBy(expenses, (transaction) => Math.abs(transaction.amount));
    return {
      totalExpenses,
      transactionCount: expenses.length,
      averageExpense: expenses.length > 0 ? roundCurrency(totalExpenses / expenses.length) : 0,
      categoryBreakdown: Object.fromEntries(
        groupSum(
          expenses,
          (transaction) => expenseCategory(transaction.description),
          (transaction) => Math.abs(transaction.amount)
        )
      ),
      monthlyBreakdown: Object.fromEntries(
        groupSum(
          expenses,
          (transaction) => monthKey(transaction.date),
          (transaction) => Math.abs(transaction.amount)
        )
      )
    };
  }

  getProfitLoss(scope: TenantScope, range: DateRange = {}): ProfitLoss {
    const revenue = this.getRevenueSummary(scope, range);
    const expenses = this.getExpenseSummary(scope, range);
    const netProfit = roundCurrency(revenue.totalRevenue - expenses.totalExpenses);
    return {
      totalRevenue: revenue.totalRevenue,
      totalExpenses: expenses.totalExpenses,
      netProfit,
      profitMarginPercentage: percentage(netProfit, revenue.totalRevenue),
      revenue,
      expenses
    };
  }

  getCashFlow(scope: TenantScope, range: DateRange = {}): CashFlow {
    const transactions = this.listTransactions(scope, range);
    const cashInflows = sumBy(transactions, (transaction) => Math.max(transaction.amount, 0));
    const cashOutflows = sumBy(transactions, (transaction) => Math.max(-transaction.amount, 0));
    return {
      cashInflows,
      cashOutflows,
      netCashFlow: roundCurrency(cashInflows - cashOutflows),
      dailyCashFlow: Object.fromEntries(
        groupSum(
          [...transactions].reverse(),
          (transaction) => dayKey(transaction.date),
          (transaction) => transaction.amount
        )
      )
    };
  }

  getAccountsReceivable(scope: TenantScope, asOf: string = isoDay(this.now())): AccountsReceivable {
    const unpaid = this.listInvoices(scope).filter(
      (invoice) => invoice.status !== "Paid" && invoice.status !== "Cancelled"
    );
    const overdueIds = new Set(this.listOverdueInvoices(scope, asOf).map((invoice) => invoice.id));

    const balances = new Map<number, CustomerBalance>();
    for (const invoice of unpaid) {
      const balance = balances.get(invoice.customerId) ?? {
        customerId: invoice.customerId,
        customerName: this.customerName(invoice.customerId),
        totalOutstanding: 0,
        overdueAmount: 0,
        invoiceCount: 0
      };
      balance.totalOutstanding = roundCurrency(balance.totalOutstanding + invoice.totalAmount);
      balance.invoiceCount += 1;
      if (overdueIds.has(invoice.id)) {
        balance.overdueAmount = roundCurrency(balance.overdueAmount + invoice.totalAmount);
      }
      balances.set(invoice.customerId, balance);
    }

    return {
      totalOutstanding: sumBy(unpaid, (invoice) => invoice.totalAmount),
      totalOverdue: sumBy(
        unpaid.filter((invoice) => overdueIds.has(invoice.id)),
        (invoice) => invoice.totalAmount
      ),
      unpaidInvoiceCount: unpaid.length,
      overdueInvoiceCount: overdueIds.size,
      customerBalances: [...balances.values()].sort((a, b) => b.totalOutstanding - a.totalOutstanding)
    };
  }

  private customerName(customerId: number): string {
    return this.repository.getById(customerEntity, customerId)?.name ?? `Customer ${customerId}`;
  }
}
