import { NotFoundError, type Logger } from "@harvest-hub/core";
import type Database from "better-sqlite3";
import { z } from "zod";

import { averageBy, countBy, roundCurrency, sumBy } from "../repository/aggregates";
import {
  customerEntity,
  orderEntity,
  ORDER_STATUSES,
  type Customer,
  type CustomerCreate,
  type CustomerUpdate,
  type Order,
  type OrderStatus
} from "../repository/entities";
import type { TenantRepository, TenantScope } from "../repository/tenant-repository";
import {
  appendStampedLine,
  guardChild,
  parseOrReject,
  resolveDependencies,
  type ServiceDependencies
} from "./context";

const orderItemInputSchema = z.object({
  productName: z.string().trim().min(1),
  quantity: z.number().positive(),
  unitPrice: z.number().nonnegative()
});

const createOrderInputSchema = z.object({
  orderDate: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
  deliveryDate: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
  items: z.array(orderItemInputSchema).min(1),
  notes: z.string().trim().nullable().optional()
});

export type OrderItemInput = z.input<typeof orderItemInputSchema>;
export type CreateOrderInput = z.input<typeof createOrderInputSchema>;

export type OrderItem = {
  id: number;
  orderId: number;
  productName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number | null;
};

export type CustomerAnalytics = {
  customerName: string;
  totalOrders: number;
  totalRevenue: number;
  averageOrderValue: number;
  satisfactionScore: number | null;
  orderStatusBreakdown: Record<string, number>;
  lastOrderDate: string | null;
};

type OrderItemRow = {
  id: number;
  order_id: number;
  product_name: string;
  quantity: number;
  unit_price: number;
  subtotal: number | null;
};

export class CustomerService {
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

  createCustomer(businessId: string, input: CustomerCreate): Customer {
    return this.repository.create(customerEntity, businessId, input);
  }

  getCustomer(id: number): Customer | null {
    return this.repository.getById(customerEntity, id);
  }

  getCustomerByName(scope: TenantScope, name: string): Customer | null {
    return this.repository.findOne(customerEntity, scope, { name });
  }

  listCustomers(scope: TenantScope): Customer[] {
    return this.repository.listByTenant(customerEntity, scope);
  }

  updateCustomer(id: number, patch: CustomerUpdate): Customer | null {
    return this.repository.update(customerEntity, id, patch);
  }

  deleteCustomer(id: number): boolean {
    return this.repository.delete(customerEntity, id);
  }

  updateSatisfactionScore(id: number, score: number): Customer | null {
    return this.repository.update(customerEntity, id, { satisfactionScore: score });
  }

  addFeedback(id: number, feedback: string): Customer | null {
    return this.repository.transaction(() => {
      const customer = this.repository.getById(customerEntity, id);
      if (!customer) {
        return null;
      }
      return this.repository.update(customerEntity, id, {
        feedback: appendStampedLine(customer.feedback, feedback.trim(), this.now())
      });
    });
  }

  setPreference(customerId: number, key: string, value: string): void {
    this.requireCustomer(customerId);
    guardChild(this.log, "update", "customer_preference", () => {
      this.db
        .prepare(
          `
            INSERT INTO customer_preferences (customer_id, preference_key, preference_value)
            VALUES (?, ?, ?)
            ON CONFLICT(customer_id, preference_key) DO UPDATE SET
              preference_value = excluded.preference_value
          `
        )
        .run(customerId, key, value);
    });
  }

  getPreferences(customerId: number): Record<string, string> {
    const rows = guardChild(this.log, "list", "customer_preference", () =>
      this.db
        .prepare(
          `
            SELECT preference_key, preference_value
            FROM customer_preferences
            WHERE customer_id = ?
            ORDER BY preference_key
          `
        )
        .all(customerId)
    ) as Array<{ preference_key: string; preference_value: string }>;

    // fromEntries defines own properties, so a "__proto__" key is kept as data.
    return Object.fromEntries(rows.map((row) => [row.preference_key, row.preference_value]));
  }

  /** The order lands in the customer's business, with its items, in one transaction. */
  createOrder(customerId: number, input: CreateOrderInput): Order {
    const parsed = parseOrReject(this.log, createOrderInputSchema, input, "order", "create");
    const totalAmount = sumBy(parsed.items, (item) => item.quantity * item.unitPrice);

    return this.repository.transaction(() => {
      const customer = this.requireCustomer(customerId);
      const order = this.repository.create(orderEntity, customer.businessId, {
        customerId,
        orderDate: parsed.orderDate,
        deliveryDate: parsed.deliveryDate,
        status: "Pending",
        totalAmount,
        notes: parsed.notes ?? null
      });

      guardChild(this.log, "create", "order_item", () => {
        const insert = this.db.prepare(
          `
            INSERT INTO order_items (order_id, product_name, quantity, unit_price, subtotal)
            VALUES (?, ?, ?, ?, ?)
          `
        );
        for (const item of parsed.items) {
          insert.run(
            order.id,
            item.productName,
            item.quantity,
            item.unitPrice,
            roundCurrency(item.quantity * item.unitPrice)
          );
        }
      });

      this.log.info("Order created", {
        orderId: order.id,
        businessId: order.businessId,
        itemCount: parsed.items.length
      });
      return order;
    });
  }

  getOrderItems(orderId: number): OrderItem[] {
    const rows = guardChild(this.log, "list", "order_item", () =>
      this.db.prepare("SELECT * FROM order_items WHERE order_id = ? ORDER BY id").all(orderId)
    ) as OrderItemRow[];
    return rows.map((row) => ({
      id: row.id,
      orderId: row.order_id,
      productName: row.product_name,
      quantity: row.quantity,
      unitPrice: row.unit_price,
      subtotal: row.subtotal
    }));
  }

  listCustomerOrders(customerId: number): Order[] {
    const customer = this.requireCustomer(customerId);
    return this.repository.listByTenant(orderEntity, customer.businessId, {
      where: { customerId }
    });
  }

  updateOrderStatus(orderId: number, status: OrderStatus): Order | null {
    const next = parseOrReject(this.log, z.enum(ORDER_STATUSES), status, "order", "update");
    return this.repository.update(orderEntity, orderId, { status: next });
  }

  getCustomerAnalytics(customerId: number): CustomerAnalytics | null {
    const customer = this.getCustomer(customerId);
    if (!customer) {
      return null;
    }
    const orders = this.listCustomerOrders(customerId);
    const totalRevenue = sumBy(orders, (order) => order.totalAmount);
    const lastOrderDate = orders.reduce<string | null>(
      (latest, order) => (latest === null || order.orderDate > latest ? order.orderDate : latest),
      null
    );

    return {
      customerName: customer.name,
      totalOrders: orders.length,
      totalRevenue,
      averageOrderValue: roundCurrency(averageBy(orders, (order) => order.totalAmount ?? 0) ?? 0),
      satisfactionScore: customer.satisfactionScore,
      orderStatusBreakdown: Object.fromEntries(countBy(orders, (order) => order.status)),
      lastOrderDate
    };
  }

  private requireCustomer(customerId: number): Customer {
    const customer = this.repository.getById(customerEntity, customerId);
    if (!customer) {
      throw new NotFoundError("customer", customerId);
    }
    return customer;
  }
}
