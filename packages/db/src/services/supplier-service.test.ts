import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { NotFoundError, ValidationError, createLogger } from "@harvest-hub/core";
import { afterEach, describe, expect, it } from "vitest";

import { farmerEntity, transactionEntity } from "../repository/entities";
import { TenantRepository } from "../repository/tenant-repository";
import { closeStore, ensureCreated, openStore, type StoreHandle } from "../store";
import { FARMER_PAYMENT_TYPE, SupplierService } from "./supplier-service";

const tempRoots: string[] = [];
const handles: StoreHandle[] = [];
const quiet = createLogger({ sink: () => undefined });

function createService(start = "2026-04-01T08:15:00.000Z") {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-suppliers-"));
  tempRoots.push(dir);
  const handle = openStore({ location: path.join(dir, "hub.db"), logger: quiet });
  handles.push(handle);
  ensureCreated(handle, undefined, quiet);

  const clock = { current: new Date(start) };
  const now = () => clock.current;
  const repository = new TenantRepository(handle, { logger: quiet, now });
  return {
    clock,
    handle,
    repository,
    service: new SupplierService({ handle, repository, logger: quiet, now })
  };
}

describe("SupplierService", () => {
  afterEach(() => {
    for (const handle of handles.splice(0)) {
      closeStore(handle);
    }
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("manages farmers per business", () => {
    const { service } = createService();
    const valley = service.createFarmer("island_harvest", {
      name: "Green Valley",
      productSpecialties: ["Mango", "Breadfruit"]
    });
    service.createFarmer("private_chef", { name: "Blue Ridge" });

    expect(service.listFarmers("island_harvest").map((farmer) => farmer.name)).toEqual(["Green Valley"]);
    expect(service.getFarmerByName("island_harvest", "Green Valley")?.id).toBe(valley.id);
    expect(service.updateFarmer(valley.id, { productSpecialties: ["Mango"] })?.productSpecialties).toEqual([
      "Mango"
    ]);
    expect(service.deleteFarmer(valley.id)).toBe(true);
    expect(service.getFarmer(valley.id)).toBeNull();
  });

  it("books a payment as an outgoing transaction in the farmer's business", () => {
    const { repository, service } = createService();
    const ridge = service.createFarmer("private_chef", { name: "Blue Ridge" });

    const payment = service.recordPayment(ridge.id, { amount: 120.5 });

    expect(payment).toEqual({
      id: 1,
      farmerId: ridge.id,
      paymentDate: "2026-04-01T08:15:00.000Z",
      amount: 120.5,
      notes: null
    });
    expect(repository.listByTenant(transactionEntity, "private_chef")).toEqual([
      expect.objectContaining({
        businessId: "private_chef",
        date: "2026-04-01",
        type: FARMER_PAYMENT_TYPE,
        description: "Payment to Blue Ridge",
        amount: -120.5,
        relatedEntityId: ridge.id,
        relatedEntityType: "Farmer"
      })
    ]);
    expect(repository.listByTenant(transactionEntity, "island_harvest")).toEqual([]);
  });

  it("uses payment notes as the transaction description", () => {
    const { repository, service } = createService();
    const ridge = service.createFarmer("island_harvest", { name: "Blue Ridge" });

    service.recordPayment(ridge.id, { amount: 40, notes: "March invoice" });

    expect(repository.listByTenant(transactionEntity, "island_harvest")[0]?.description).toBe("March invoice");
  });

  it("rejects payments that are not positive or have no farmer", () => {
    const { repository, service } = createService();
    const ridge = service.createFarmer("island_harvest", { name: "Blue Ridge" });

    expect(() => service.recordPayment(ridge.id, { amount: 0 })).toThrowError(
      new ValidationError("Invalid farmer_payment input: amount: Number must be greater than 0")
    );
    expect(() => service.recordPayment(404, { amount: 10 })).toThrowError(new NotFoundError("farmer", 404));
    expect(service.listPayments(ridge.id)).toEqual([]);
    expect(repository.listByTenant(transactionEntity, "island_harvest")).toEqual([]);
  });

  it("keeps quality records and stamped notes", () => {
    const { service } = createService();
    const valley = service.createFarmer("island_harvest", { name: "Green Valley" });

    const record = service.addQualityRecord(valley.id, { product: "Mango", qualityScore: 8 });
    service.addPerformanceNote(valley.id, "Consistent deliveries");
    const trained = service.addTrainingNeed(valley.id, "Cold chain handling");

    expect(record).toEqual({
      id: 1,
      farmerId: valley.id,
      product: "Mango",
      qualityScore: 8,
      notes: null,
      recordedAt: "2026-04-01T08:15:00.000Z"
    });
    expect(service.listQualityRecords(valley.id)).toEqual([record]);
    expect(trained?.performanceNotes).toBe("[2026-04-01 08:15] Consistent deliveries");
    expect(trained?.trainingNeeds).toBe("[2026-04-01 08:15] Cold chain handling");
    expect(service.addPerformanceNote(404, "nobody")).toBeNull();
    expect(() => service.addQualityRecord(valley.id, { product: "Mango", qualityScore: 11 })).toThrowError(
      ValidationError
    );
  });

  it("keeps a pickup schedule per farmer", () => {
    const { repository, service } = createService();
    const valley = service.createFarmer("island_harvest", {
      name: "Green Valley",
      pickupSchedule: { monday: "07:00" }
    });
    const ridge = service.createFarmer("island_harvest", { name: "Blue Ridge" });

    expect(service.getPickupSchedule(valley.id)).toEqual({ monday: "07:00" });
    expect(service.setPickupSchedule(valley.id, { tuesday: " 06:30 " })?.pickupSchedule).toEqual({
      tuesday: "06:30"
    });
    expect(service.getPickupSchedule(ridge.id)).toEqual({});
    expect(service.getPickupSchedule(404)).toEqual({});
    expect(service.setPickupSchedule(404, { monday: "07:00" })).toBeNull();
    expect(repository.getById(farmerEntity, valley.id)?.pickupSchedule).toEqual({ tuesday: "06:30" });
  });

  it("reads pickup schedules written before values were validated", () => {
    const { handle, service } = createService();
    const valley = service.createFarmer("island_harvest", { name: "Green Valley" });
    const ridge = service.createFarmer("island_harvest", { name: "Blue Ridge" });
    handle.db.prepare("UPDATE farmers SET pickup_schedule = ? WHERE id = ?").run('{"monday":"07:00","crates":3}', valley.id);
    handle.db.prepare("UPDATE farmers SET pickup_schedule = ? WHERE id = ?").run("every other day", ridge.id);

    expect(service.getPickupSchedule(valley.id)).toEqual({ monday: "07:00", crates: "3" });
    expect(service.getPickupSchedule(ridge.id)).toEqual({});
  });

  it("summarises one farmer", () => {
    const { clock, service } = createService();
    const valley = service.createFarmer("island_harvest", {
      name: "Green Valley",
      productSpecialties: ["Mango"]
    });
    service.recordPayment(valley.id, { amount: 100 });
    clock.current = new Date("2026-04-10T09:00:00.000Z");
    service.recordPayment(valley.id, { amount: 50.25 });
    service.addQualityRecord(valley.id, { product: "Mango", qualityScore: 7 });
    service.addQualityRecord(valley.id, { product: "Mango", qualityScore: 9 });

    expect(service.getFarmerAnalytics(valley.id)).toEqual({
      farmerName: "Green Valley",
      productSpecialties: ["Mango"],
      totalPayments: 150.25,
      paymentCount: 2,
      averagePayment: 75.13,
      averageQualityScore: 8,
      qualityRecordCount: 2,
      lastPaymentDate: "2026-04-10T09:00:00.000Z"
    });
    expect(service.getFarmerAnalytics(404)).toBeNull();
  });

  it("ranks farmers by total payments within a business", () => {
    const { service } = createService();
    const valley = service.createFarmer("island_harvest", { name: "Green Valley" });
    const ridge = service.createFarmer("island_harvest", { name: "Blue Ridge" });
    const other = service.createFarmer("private_chef", { name: "Cliff Farm" });
    service.recordPayment(valley.id, { amount: 30 });
    service.recordPayment(ridge.id, { amount: 45 });
    service.recordPayment(valley.id, { amount: 20 });
    service.recordPayment(other.id, { amount: 500 });
    service.addQualityRecord(ridge.id, { product: "Kale", qualityScore: 6 });

    expect(service.getSupplierOverview("island_harvest")).toEqual({
      totalFarmers: 2,
      totalPaymentsAmount: 95,
      totalPaymentCount: 3,
      averageQualityScore: 6,
      topFarmersByPayments: [
        { farmerId: valley.id, name: "Green Valley", totalPayments: 50 },
        { farmerId: ridge.id, name: "Blue Ridge", totalPayments: 45 }
      ]
    });
  });

  it("finds farmers by product regardless of case", () => {
    const { service } = createService();
    service.createFarmer("island_harvest", { name: "Green Valley", productSpecialties: ["Sweet Mango"] });
    service.createFarmer("island_harvest", { name: "Blue Ridge", productSpecialties: ["Kale"] });

    expect(service.searchByProduct("island_harvest", " mango ").map((farmer) => farmer.name)).toEqual([
      "Green Valley"
    ]);
    expect(service.searchByProduct("island_harvest", "  ")).toEqual([]);
  });
});
