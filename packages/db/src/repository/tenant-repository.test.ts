import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  RepositoryError,
  ValidationError,
  createLogger,
  type LogEntry
} from "@harvest-hub/core";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";

import { closeStore, ensureCreated, openStore, type StoreHandle } from "../store";

import {
  customerCreateSchema,
  customerEntity,
  farmerEntity,
  goalEntity,
  orderEntity,
  type Customer,
  type CustomerUpdate,
  type EntityDefinition
} from "./entities";
import { ALL_TENANTS, TenantRepository } from "./tenant-repository";

const tempRoots: string[] = [];
const handles: StoreHandle[] = [];
const quiet = createLogger({ sink: () => undefined });
const frozenNow = () => new Date("2026-04-01T12:00:00.000Z");

function openCreatedStore(): StoreHandle {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-repository-"));
  tempRoots.push(dir);
  const handle = openStore({ location: path.join(dir, "hub.db"), logger: quiet });
  handles.push(handle);
  ensureCreated(handle, undefined, quiet);
  return handle;
}

function createRepository(now: () => Date = frozenNow) {
  const handle = openCreatedStore();
  return { handle, repository: new TenantRepository(handle, { logger: quiet, now }) };
}

describe("TenantRepository", () => {
  afterEach(() => {
    for (const handle of handles.splice(0)) {
      closeStore(handle);
    }
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("stamps new rows with their business and creation time", () => {
    const { repository } = createRepository();

    const created = repository.create(customerEntity, " island_harvest ", {
      name: "Harbour Cafe",
      email: "orders@example.com",
      satisfactionScore: 8
    });

    expect(created).toEqual({
      id: 1,
      businessId: "island_harvest",
      createdAt: "2026-04-01T12:00:00.000Z",
      updatedAt: null,
      name: "Harbour Cafe",
      contactPerson: null,
      phone: null,
      email: "orders@example.com",
      address: null,
      satisfactionScore: 8,
      feedback: null
    });
    expect(repository.getById(customerEntity, created.id)).toEqual(created);
    expect(repository.getById(customerEntity, 99)).toBeNull();
  });

  it("keeps each business's rows apart unless every tenant is requested", () => {
    const { repository } = createRepository();
    repository.create(customerEntity, "island_harvest", { name: "Zephyr Deli" });
    repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });
    repository.create(customerEntity, "private_chef", { name: "Villa Rosa" });

    expect(repository.listByTenant(customerEntity, "island_harvest").map((row) => row.name)).toEqual([
      "Harbour Cafe",
      "Zephyr Deli"
    ]);
    expect(repository.listByTenant(customerEntity, "private_chef").map((row) => row.name)).toEqual([
      "Villa Rosa"
    ]);
    expect(repository.listByTenant(customerEntity, "unknown_business")).toEqual([]);
    expect(repository.listByTenant(customerEntity, ALL_TENANTS).map((row) => row.name)).toEqual([
      "Harbour Cafe",
      "Villa Rosa",
      "Zephyr Deli"
    ]);
  });

  it("filters by field values, null included", () => {
    const { repository } = createRepository();
    repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe", email: "a@example.com" });
    repository.create(customerEntity, "island_harvest", { name: "Hill Market" });

    expect(
      repository
        .listByTenant(customerEntity, "island_harvest", { where: { email: null } })
        .map((row) => row.name)
    ).toEqual(["Hill Market"]);
    expect(repository.findOne(customerEntity, "island_harvest", { name: "Harbour Cafe" })?.email).toBe(
      "a@example.com"
    );
    expect(repository.findOne(customerEntity, "private_chef", { name: "Harbour Cafe" })).toBeNull();
  });

  it("honours an explicit order", () => {
    const { repository } = createRepository();
    repository.create(customerEntity, "island_harvest", { name: "Alpha", satisfactionScore: 3 });
    repository.create(customerEntity, "island_harvest", { name: "Bravo", satisfactionScore: 9 });

    const rows = repository.listByTenant(customerEntity, "island_harvest", {
      orderBy: [{ field: "satisfactionScore", direction: "desc" }]
    });

    expect(rows.map((row) => row.name)).toEqual(["Bravo", "Alpha"]);
  });

  it("enforces natural keys within one business only", () => {
    const { repository } = createRepository();
    repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });

    expect(() =>
      repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" })
    ).toThrowError(new ValidationError("customer already exists in island_harvest: name=Harbour Cafe"));
    expect(repository.create(customerEntity, "private_chef", { name: "Harbour Cafe" }).businessId).toBe(
      "private_chef"
    );
  });

  it("rejects a rename onto an existing natural key", () => {
    const { repository } = createRepository();
    repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });
    const other = repository.create(customerEntity, "island_harvest", { name: "Hill Market" });

    expect(() => repository.update(customerEntity, other.id, { name: "Harbour Cafe" })).toThrowError(
      ValidationError
    );
    expect(repository.update(customerEntity, other.id, { name: "Hill Market" })?.name).toBe("Hill Market");
  });

  it("moves updatedAt strictly forward even when the clock stands still", () => {
    const { repository } = createRepository();
    const created = repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });

    const first = repository.update(customerEntity, created.id, { feedback: "Great produce" });
    const second = repository.update(customerEntity, created.id, { satisfactionScore: 9 });

    expect(first?.updatedAt).toBe("2026-04-01T12:00:00.001Z");
    expect(second?.updatedAt).toBe("2026-04-01T12:00:00.002Z");
    expect(second?.feedback).toBe("Great produce");
    expect(second?.businessId).toBe("island_harvest");
    expect(second?.createdAt).toBe(created.createdAt);
  });

  it("returns null when updating a missing row", () => {
    const { repository } = createRepository();
    expect(repository.update(customerEntity, 404, { feedback: "none" })).toBeNull();
  });

  it("drops fields the entity does not declare", () => {
    const { repository } = createRepository();
    const input = { name: "Harbour Cafe", loyaltyTier: "gold" };

    const created = repository.create(customerEntity, "island_harvest", input);

    expect(created).not.toHaveProperty("loyaltyTier");
    expect(created.name).toBe("Harbour Cafe");
  });

  it("rejects invalid input with the failing field", () => {
    const entries: LogEntry[] = [];
    const handle = openCreatedStore();
    const repository = new TenantRepository(handle, {
      logger: createLogger({ sink: (entry) => entries.push(entry) }),
      now: frozenNow
    });

    expect(() =>
      repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe", satisfactionScore: 11 })
    ).toThrowError(
      new ValidationError(
        "Invalid customer input: satisfactionScore: Number must be less than or equal to 10"
      )
    );
    expect(entries).toEqual([
      expect.objectContaining({
        level: "warn",
        message: "Repository input rejected",
        operation: "create",
        entityType: "customer"
      })
    ]);
  });

  it("requires a business id", () => {
    const { repository } = createRepository();
    expect(() => repository.create(customerEntity, "   ", { name: "Harbour Cafe" })).toThrowError(
      new ValidationError("customer requires a business id")
    );
    expect(() => repository.listByTenant(customerEntity, "")).toThrowError(ValidationError);
  });

  it("maps foreign key failures to validation errors", () => {
    const { repository } = createRepository();

    expect(() =>
      repository.create(orderEntity, "island_harvest", {
        customerId: 999,
        orderDate: "2026-04-01",
        deliveryDate: "2026-04-02"
      })
    ).toThrowError(new ValidationError("create order rejected: FOREIGN KEY constraint failed"));
  });

  it("deletes rows and refuses to orphan children", () => {
    const { handle, repository } = createRepository();
    const kept = repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });
    const removed = repository.create(customerEntity, "island_harvest", { name: "Hill Market" });
    handle.db
      .prepare("INSERT INTO customer_preferences (customer_id, preference_key, preference_value) VALUES (?, ?, ?)")
      .run(removed.id, "delivery_window", "morning");
    repository.create(orderEntity, "island_harvest", {
      customerId: kept.id,
      orderDate: "2026-04-01",
      deliveryDate: "2026-04-02"
    });

    expect(repository.delete(customerEntity, removed.id)).toBe(true);
    expect(repository.delete(customerEntity, removed.id)).toBe(false);
    expect(handle.db.prepare("SELECT COUNT(*) AS count FROM customer_preferences").get()).toEqual({
      count: 0
    });
    expect(() => repository.delete(customerEntity, kept.id)).toThrowError(ValidationError);
    expect(repository.getById(customerEntity, kept.id)?.name).toBe("Harbour Cafe");
  });

  it("round-trips list columns", () => {
    const { repository } = createRepository();

    const farmer = repository.create(farmerEntity, "island_harvest", {
      name: "Green Valley",
      productSpecialties: ["mango", "breadfruit"]
    });
    const bare = repository.create(farmerEntity, "island_harvest", { name: "Blue Ridge" });

    expect(repository.getById(farmerEntity, farmer.id)?.productSpecialties).toEqual(["mango", "breadfruit"]);
    expect(bare.productSpecialties).toEqual([]);
  });

  it("fills schema defaults", () => {
    const { repository } = createRepository();

    const goal = repository.create(goalEntity, "island_harvest", { name: "Grow revenue", targetValue: 5000 });

    expect(goal.currentValue).toBe(0);
    expect(goal.status).toBe("In Progress");
  });

  it("rolls back every write made inside a failed transaction", () => {
    const { repository } = createRepository();

    expect(() =>
      repository.transaction(() => {
        repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });
        repository.create(customerEntity, "island_harvest", { name: "Hill Market" });
        throw new Error("boom");
      })
    ).toThrowError(new RepositoryError("update", "unit_of_work", "boom"));
    expect(repository.listByTenant(customerEntity, ALL_TENANTS)).toEqual([]);
  });

  it("labels transaction failures apart from the transaction entity", () => {
    const entries: LogEntry[] = [];
    const handle = openCreatedStore();
    const repository = new TenantRepository(handle, {
      logger: createLogger({ sink: (entry) => entries.push(entry) }),
      now: frozenNow
    });

    expect(() =>
      repository.transaction(() => {
        throw new Error("boom");
      })
    ).toThrowError(RepositoryError);
    expect(entries).toEqual([
      expect.objectContaining({
        level: "error",
        message: "Repository operation failed",
        operation: "update",
        entityType: "unit_of_work"
      })
    ]);
  });

  it("logs a create whose fields have no column before rejecting it", () => {
    const entries: LogEntry[] = [];
    const handle = openCreatedStore();
    const repository = new TenantRepository(handle, {
      logger: createLogger({ sink: (entry) => entries.push(entry) }),
      now: frozenNow
    });
    const createSchema = customerCreateSchema.extend({ loyaltyTier: z.string() });
    const withUnmappedField: EntityDefinition<Customer, z.input<typeof createSchema>, CustomerUpdate> = {
      ...customerEntity,
      createSchema
    };

    expect(() =>
      repository.create(withUnmappedField, "island_harvest", { name: "Harbour Cafe", loyaltyTier: "gold" })
    ).toThrowError(new ValidationError("Unknown customer field: loyaltyTier"));
    expect(entries).toEqual([
      expect.objectContaining({
        level: "warn",
        message: "Repository operation rejected",
        operation: "create",
        entityType: "customer"
      })
    ]);
    expect(repository.listByTenant(customerEntity, ALL_TENANTS)).toEqual([]);
  });

  it("stores pickup schedules as JSON", () => {
    const { handle, repository } = createRepository();

    const farmer = repository.create(farmerEntity, "island_harvest", {
      name: "Green Valley",
      pickupSchedule: { monday: "07:00", thursday: "06:30" }
    });

    expect(farmer.pickupSchedule).toEqual({ monday: "07:00", thursday: "06:30" });
    expect(handle.db.prepare("SELECT pickup_schedule FROM farmers WHERE id = ?").get(farmer.id)).toEqual({
      pickup_schedule: '{"monday":"07:00","thursday":"06:30"}'
    });
    expect(repository.create(farmerEntity, "island_harvest", { name: "Blue Ridge" }).pickupSchedule).toEqual({});
  });

  it("passes validation errors out of a transaction unchanged", () => {
    const { repository } = createRepository();
    repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });

    expect(() =>
      repository.transaction(() => {
        repository.create(customerEntity, "island_harvest", { name: "Hill Market" });
        repository.create(customerEntity, "island_harvest", { name: "Harbour Cafe" });
      })
    ).toThrowError(ValidationError);
    expect(repository.listByTenant(customerEntity, "island_harvest").map((row) => row.name)).toEqual([
      "Harbour Cafe"
    ]);
  });
});
