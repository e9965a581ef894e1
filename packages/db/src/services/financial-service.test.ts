import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { NotFoundError, ValidationError, createLogger } from "@harvest-hub/core";
import { afterEach, describe, expect, it } from "vitest";

import { customerEntity, orderEntity } from "../repository/entities";
import { TenantRepository } from "../repository/tenant-repository";
import { closeStore, ensureCreated, openStore, type StoreHandle } from "../store";
import { FinancialService, expenseCategory } from "./financial-service";

const tempRoots: string[] = [];
const handles: StoreHandle[] = [];
const quiet = createLogger({ sink: () => undefined });
const frozenNow = () => new Date("2026-04-01T10:00:00.000Z");

function createService() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-finance-"));
  tempRoots.push(dir);
  const handle = openStore({ location: path.join(dir, "hub.db"), logger: quiet });
  handles.push(handle);
  ensureCreated(handle, undefined, quiet);
  const repository = new TenantRepository(handle, { logger: quiet, now: frozenNow });
  return { repository, service: new FinancialService({ handle, repository, logger: quiet, now: frozenNow }) };
}

function seedOrder(
  repository: TenantRepository,
  businessId: string,
  customerName: string,
  totalAmount: number | null
) {
  const customer =
    repository.findOne(customerEntity, businessId, { name: customerName }) ??
    repository.create(customerEntity, businessId, { name: customerName });
  return repository.create(orderEntity, businessId, {
    customerId: customer.id,
    orderDate: "2026-03-01",
    deliveryDate: "2026-03-02",
    totalAmount
  });
}

describe("expenseCategory", () => {
  it("reads the text before the first colon", () => {
    expect(expenseCategory("Supplies: Crates: large")).toBe("Supplies");
    expect(expenseCategory("Fuel")).toBe("Other");
    expect(expenseCategory(": nothing")).toBe("Other");
    expect(expenseCategory(null)).toBe("Other");
  });
});

describe("FinancialService", () => {
  afterEach(() => {
    for (const handle of handles.splice(0)) {
      closeStore(handle);
    }
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("stores expenses as negative amounts with a category prefix", () => {
    const { service } = createService();

    const crates = service.createExpense("island_harvest", {
      date: "2026-03-10",
      description: "Crates",
      amount: 45,
      category: "Supplies"
    });
    const fuel = service.createExpense("island_harvest", { date: "2026-03-11", description: "Fuel", amount: -12 });

    expect(crates).toMatchObject({ type: "Expense", description: "Supplies: Crates", amount: -45 });
    expect(fuel).toMatchObject({ description: "Fuel", amount: -12 });
    expect(service.getTransaction(crates.id)?.id).toBe(crates.id);
    expect(service.deleteTransaction(crates.id)).toBe(true);
    expect(service.getTransaction(crates.id)).toBeNull();
  });

  it("lists transactions newest first within an inclusive day range", () => {
    const { service } = createService();
    for (const [date, type] of [
      ["2026-03-01", "Revenue"],
      ["2026-03-15T16:45:00.000Z", "Revenue"],
      ["2026-03-31", "Expense"],
      ["2026-04-01", "Revenue"]
    ]) {
      service.createTransaction("island_harvest", { date, type, amount: 10 });
    }
    service.createTransaction("private_chef", { date: "2026-03-20", type: "Revenue", amount: 99 });

    expect(
      service
        .listTransactions("island_harvest", { start: "2026-03-15", end: "2026-03-31" })
        .map((transaction) => transaction.date)
    ).toEqual(["2026-03-31", "2026-03-15T16:45:00.000Z"]);
    expect(
      service.listTransactions("island_harvest", { type: "Revenue" }).map((transaction) => transaction.date)
    ).toEqual(["2026-04-01", "2026-03-15T16:45:00.000Z", "2026-03-01"]);
  });

  it("invoices an order and books the revenue", () => {
    const { repository, service } = createService();
    const order = seedOrder(repository, "private_chef", "Villa Rosa", 200);

    const invoice = service.createInvoice(order.id);

    expect(invoice).toMatchObject({
      businessId: "private_chef",
      orderId: order.id,
      customerId: order.customerId,
      invoiceDate: "2026-04-01",
      dueDate: "2026-05-01",
      totalAmount: 200,
      status: "Issued"
    });
    expect(service.listTransactions("private_chef")).toEqual([
      expect.objectContaining({
        date: "2026-04-01",
        type: "Revenue",
        description: `Invoice #${invoice.id} for Villa Rosa`,
        amount: 200,
        relatedEntityId: invoice.id,
        relatedEntityType: "Invoice"
      })
    ]);
    expect(service.listInvoices("island_harvest")).toEqual([]);
  });

  it("refuses to invoice twice, a missing order, or an order without a total", () => {
    const { repository, service } = createService();
    const order = seedOrder(repository, "island_harvest", "Harbour Cafe", 80);
    const untotalled = seedOrder(repository, "island_harvest", "Harbour Cafe", null);
    service.createInvoice(order.id, { invoiceDate: "2026-03-01", dueDate: "2026-03-15" });

    expect(() => service.createInvoice(order.id)).toThrowError(
      new ValidationError(`invoice already exists in island_harvest: orderId=${order.id}`)
    );
    expect(() => service.createInvoice(404)).toThrowError(new NotFoundError("order", 404));
    expect(() => service.createInvoice(untotalled.id)).toThrowError(
      new ValidationError(`order ${untotalled.id} has no total to invoice`)
    );
    expect(service.listTransactions("island_harvest")).toHaveLength(1);
  });

  it("books a payment the first time an invoice is paid", () => {
    const { repository, service } = createService();
    const order = seedOrder(repository, "island_harvest", "Harbour Cafe", 80);
    const invoice = service.createInvoice(order.id, { invoiceDate: "2026-03-01" });

    expect(service.updateInvoiceStatus(invoice.id, "Paid")?.status).toBe("Paid");
    service.updateInvoiceStatus(invoice.id, "Paid");

    const payments = service.listTransactions("island_harvest", { type: "Payment Received" });
    expect(payments).toEqual([
      expect.objectContaining({
        date: "2026-04-01",
        description: `Payment received for Invoice #${invoice.id} from Harbour Cafe`,
        amount: 80
      })
    ]);
    expect(service.updateInvoiceStatus(404, "Paid")).toBeNull();
  });

  it("finds unpaid invoices past their due date", () => {
    const { repository, service } = createService();
    const late = service.createInvoice(seedOrder(repository, "island_harvest", "Harbour Cafe", 200).id, {
      invoiceDate: "2026-02-01",
      dueDate: "2026-03-01"
    });
    const paid = service.createInvoice(seedOrder(repository, "island_harvest", "Harbour Cafe", 20).id, {
      invoiceDate: "2026-02-01",
      dueDate: "2026-03-01"
    });
    service.createInvoice(seedOrder(repository, "island_harvest", "Hill Market", 80).id, {
      invoiceDate: "2026-03-20",
      dueDate: "2026-04-01"
    });
    service.updateInvoiceStatus(paid.id, "Paid");

    expect(service.listOverdueInvoices("island_harvest").map((invoice) => invoice.id)).toEqual([late.id]);
    expect(service.listOverdueInvoices("island_harvest", "2026-04-02")).toHaveLength(2);
  });

  it("summarises revenue, expenses, profit and cash flow", () => {
    const { service } = createService();
    service.createTransaction("island_harvest", { date: "2026-03-05", type: "Revenue", amount: 200 });
    service.createTransaction("island_harvest", { date: "2026-04-02", type: "Payment Received", amount: 50 });
    service.createExpense("island_harvest", {
      date: "2026-03-10",
      description: "Crates",
      amount: 30,
      category: "Supplies"
    });
    service.createTransaction("island_harvest", {
      date: "2026-04-03",
      type: "Farmer Payment",
      description: "Payment to Green Valley",
      amount: -20
    });
    service.createTransaction("island_harvest", { date: "2026-04-04", type: "Transfer", amount: 10 });
    service.createTransaction("private_chef", { date: "2026-04-04", type: "Revenue", amount: 1000 });

    const profitLoss = service.getProfitLoss("island_harvest");

    expect(profitLoss.revenue).toEqual({
      totalRevenue: 250,
      transactionCount: 2,
      averageTransaction: 125,
      monthlyBreakdown: { "2026-04": 50, "2026-03": 200 }
    });
    expect(profitLoss.expenses).toEqual({
      totalExpenses: 50,
      transactionCount: 2,
      averageExpense: 25,
      categoryBreakdown: { Other: 20, Supplies: 30 },
      monthlyBreakdown: { "2026-04": 20, "2026-03": 30 }
    });
    expect(profitLoss.netProfit).toBe(200);
    expect(profitLoss.profitMarginPercentage).toBe(80);
    expect(service.getRevenueSummary("island_harvest", { start: "2026-04-01" }).totalRevenue).toBe(50);
    expect(service.getCashFlow("island_harvest")).toEqual({
      cashInflows: 260,
      cashOutflows: 50,
      netCashFlow: 210,
      dailyCashFlow: {
        "2026-03-05": 200,
        "2026-03-10": -30,
        "2026-04-02": 50,
        "2026-04-03": -20,
        "2026-04-04": 10
      }
    });
  });

  it("reports a zero margin when there is no revenue", () => {
    const { service } = createService();
    service.createExpense("island_harvest", { date: "2026-03-10", description: "Fuel", amount: 15 });

    const profitLoss = service.getProfitLoss("island_harvest");

    expect(profitLoss.netProfit).toBe(-15);
    expect(profitLoss.profitMarginPercentage).toBe(0);
  });

  it("breaks receivables down per customer", () => {
    const { repository, service } = createService();
    const late = service.createInvoice(seedOrder(repository, "island_harvest", "Harbour Cafe", 200).id, {
      invoiceDate: "2026-02-01",
      dueDate: "2026-03-01"
    });
    const current = service.createInvoice(seedOrder(repository, "island_harvest", "Hill Market", 80).id, {
      invoiceDate: "2026-03-20",
      dueDate: "2026-05-01"
    });
    const settled = service.createInvoice(seedOrder(repository, "island_harvest", "Hill Market", 20).id, {
      invoiceDate: "2026-03-20",
      dueDate: "2026-05-01"
    });
    service.updateInvoiceStatus(settled.id, "Paid");

    expect(service.getAccountsReceivable("island_harvest")).toEqual({
      totalOutstanding: 280,
      totalOverdue: 200,
      unpaidInvoiceCount: 2,
      overdueInvoiceCount: 1,
      customerBalances: [
        {
          customerId: late.customerId,
          customerName: "Harbour Cafe",
          totalOutstanding: 200,
          overdueAmount: 200,
          invoiceCount: 1
        },
        {
          customerId: current.customerId,
          customerName: "Hill Market",
          totalOutstanding: 80,
          overdueAmount: 0,
          invoiceCount: 1
        }
      ]
    });
  });
});
