import { NotFoundError, type Logger } from "@harvest-hub/core";
import type Database from "better-sqlite3";
import { z } from "zod";

import { averageBy, groupSum, roundCurrency, sumBy } from "../repository/aggregates";
import {
  farmerEntity,
  transactionEntity,
  type Farmer,
  type FarmerCreate,
  type FarmerUpdate,
  type PickupSchedule
} from "../repository/entities";
import type { TenantRepository, TenantScope } from "../repository/tenant-repository";
import {
  appendStampedLine,
  guardChild,
  isoDay,
  parseOrReject,
  resolveDependencies,
  type ServiceDependencies
} from "./context";

export const FARMER_PAYMENT_TYPE = "Farmer Payment";

const paymentInputSchema = z.object({
  amount: z.number().positive(),
  notes: z.string().trim().nullable().optional()
});

const qualityInputSchema = z.object({
  product: z.string().trim().min(1),
  qualityScore: z.number().int().min(1).max(10),
  notes: z.string().trim().nullable().optional()
});

export type FarmerPaymentInput = z.input<typeof paymentInputSchema>;
export type QualityRecordInput = z.input<typeof qualityInputSchema>;

export type FarmerPayment = {
  id: number;
  farmerId: number;
  paymentDate: string;
  amount: number;
  notes: string | null;
};

export type QualityRecord = {
  id: number;
  farmerId: number;
  product: string;
  qualityScore: number;
  notes: string | null;
  recordedAt: string;
};

export type FarmerAnalytics = {
  farmerName: string;
  productSpecialties: string[];
  totalPayments: number;
  paymentCount: number;
  averagePayment: number;
  averageQualityScore: number;
  qualityRecordCount: number;
  lastPaymentDate: string | null;
};

export type SupplierOverview = {
  totalFarmers: number;
  totalPaymentsAmount: number;
  totalPaymentCount: number;
  averageQualityScore: number;
  topFarmersByPayments: Array<{ farmerId: number; name: string; totalPayments: number }>;
};

type PaymentRow = {
  id: number;
  farmer_id: number;
  payment_date: string;
  amount: number;
  notes: string | null;
};

type QualityRow = {
  id: number;
  farmer_id: number;
  product: string;
  quality_score: number;
  notes: string | null;
  recorded_at: string;
};

function toPayment(row: PaymentRow): FarmerPayment {
  return {
    id: row.id,
    farmerId: row.farmer_id,
    paymentDate: row.payment_date,
    amount: row.amount,
    notes: row.notes
  };
}

function toQualityRecord(row: QualityRow): QualityRecord {
  return {
    id: row.id,
    farmerId: row.farmer_id,
    product: row.product,
    qualityScore: row.quality_score,
    notes: row.notes,
    recordedAt: row.recorded_at
  };
}

const TOP_FARMER_LIMIT = 5;

export class SupplierService {
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

  createFarmer(businessId: string, input: FarmerCreate): Farmer {
    return this.repository.create(farmerEntity, businessId, input);
  }

  getFarmer(id: number): Farmer | null {
    return this.repository.getById(farmerEntity, id);
  }

  getFarmerByName(scope: TenantScope, name: string): Farmer | null {
    return this.repository.findOne(farmerEntity, scope, { name });
  }

  listFarmers(scope: TenantScope): Farmer[] {
    return this.repository.listByTenant(farmerEntity, scope);
  }

  updateFarmer(id: number, patch: FarmerUpdate): Farmer | null {
    return this.repository.update(farmerEntity, id, patch);
  }

  /** Empty when the farmer is unknown or has no schedule. */
  getPickupSchedule(farmerId: number): PickupSchedule {
    return this.getFarmer(farmerId)?.pickupSchedule ?? {};
  }

  setPickupSchedule(farmerId: number, schedule: PickupSchedule): Farmer | null {
    return this.updateFarmer(farmerId, { pickupSchedule: schedule });
  }

  deleteFarmer(id: number): boolean {
    return this.repository.delete(farmerEntity, id);
  }

  /** Stores the payment and books the matching outgoing transaction in the farmer's business. */
  recordPayment(farmerId: number, input: FarmerPaymentInput): FarmerPayment {
    const parsed = parseOrReject(this.log, paymentInputSchema, input, "farmer_payment", "create");
    const paidAt = this.now();

    return this.repository.transaction(() => {
      const farmer = this.requireFarmer(farmerId);
      const paymentId = guardChild(this.log, "create", "farmer_payment", () =>
        Number(
          this.db
            .prepare(
              `
                INSERT INTO farmer_payments (farmer_id, payment_date, amount, notes)
                VALUES (?, ?, ?, ?)
              `
            )
            .run(farmerId, paidAt.toISOString(), parsed.amount, parsed.notes ?? null).lastInsertRowid
        )
      );

      this.repository.create(transactionEntity, farmer.businessId, {
        date: isoDay(paidAt),
        type: FARMER_PAYMENT_TYPE,
        description: parsed.notes ? parsed.notes : `Payment to ${farmer.name}`,
        amount: -Math.abs(parsed.amount),
        relatedEntityId: farmerId,
        relatedEntityType: "Farmer"
      });

      this.log.info("Farmer payment recorded", {
        farmerId,
        businessId: farmer.businessId,
        amount: parsed.amount
      });
      return this.requirePayment(paymentId);
    });
  }

  listPayments(farmerId: number): FarmerPayment[] {
    const rows = guardChild(this.log, "list", "farmer_payment", () =>
      this.db
        .prepare("SELECT * FROM farmer_payments WHERE farmer_id = ? ORDER BY payment_date, id")
        .all(farmerId)
    ) as PaymentRow[];
    return rows.map(toPayment);
  }

  addQualityRecord(farmerId: number, input: QualityRecordInput): QualityRecord {
    const parsed = parseOrReject(this.log, qualityInputSchema, input, "farmer_quality_record", "create");
    this.requireFarmer(farmerId);

    return guardChild(this.log, "create", "farmer_quality_record", () => {
      const result = this.db
        .prepare(
          `
            INSERT INTO farmer_quality_records (farmer_id, product, quality_score, notes, recorded_at)
            VALUES (?, ?, ?, ?, ?)
          `
        )
        .run(
          farmerId,
          parsed.product,
          parsed.qualityScore,
          parsed.notes ?? null,
          this.now().toISOString()
        );
      const row = this.db
        .prepare("SELECT * FROM farmer_quality_records WHERE id = ?")
        .get(Number(result.lastInsertRowid)) as QualityRow;
      return toQualityRecord(row);
    });
  }

  listQualityRecords(farmerId: number): QualityRecord[] {
    const rows = guardChild(this.log, "list", "farmer_quality_record", () =>
      this.db
        .prepare("SELECT * FROM farmer_quality_records WHERE farmer_id = ? ORDER BY recorded_at, id")
        .all(farmerId)
    ) as QualityRow[];
    return rows.map(toQualityRecord);
  }

  addPerformanceNote(farmerId: number, note: string): Farmer | null {
    return this.repository.transaction(() => {
      const farmer = this.getFarmer(farmerId);
      if (!farmer) {
        return null;
      }
      return this.updateFarmer(farmerId, {
        performanceNotes: appendStampedLine(farmer.performanceNotes, note.trim(), this.now())
      });
    });
  }

  addTrainingNeed(farmerId: number, need: string): Farmer | null {
    return this.repository.transaction(() => {
      const farmer = this.getFarmer(farmerId);
      if (!farmer) {
        return null;
      }
      return this.updateFarmer(farmerId, {
        trainingNeeds: appendStampedLine(farmer.trainingNeeds, need.trim(), this.now())
      });
    });
  }

  getFarmerAnalytics(farmerId: number): FarmerAnalytics | null {
    const farmer = this.getFarmer(farmerId);
    if (!farmer) {
      return null;
    }
    const payments = this.listPayments(farmerId);
    const qualityRecords = this.listQualityRecords(farmerId);
    const totalPayments = sumBy(payments, (payment) => payment.amount);

    return {
      farmerName: farmer.name,
      productSpecialties: farmer.productSpecialties,
      totalPayments,
      paymentCount: payments.length,
      averagePayment: payments.length > 0 ? roundCurrency(totalPayments / payments.length) : 0,
      averageQualityScore: averageBy(qualityRecords, (record) => record.qualityScore) ?? 0,
      qualityRecordCount: qualityRecords.length,
      lastPaymentDate: payments.length > 0 ? payments[payments.length - 1].paymentDate : null
    };
  }

  getSupplierOverview(scope: TenantScope): SupplierOverview {
    const farmers = this.listFarmers(scope);
    const payments = farmers.flatMap((farmer) => this.listPayments(farmer.id));
    const qualityRecords = farmers.flatMap((farmer) => this.listQualityRecords(farmer.id));
    const namesById = new Map(farmers.map((farmer) => [farmer.id, farmer.name]));

    const totalsByFarmer = groupSum(
      payments,
      (payment) => String(payment.farmerId),
      (payment) => payment.amount
    );
    const topFarmersByPayments = [...totalsByFarmer.entries()]
      .map(([farmerId, totalPayments]) => ({
        farmerId: Number(farmerId),
        name: namesById.get(Number(farmerId)) ?? `Farmer ${farmerId}`,
        totalPayments
      }))
      .sort((a, b) => b.totalPayments - a.totalPayments || a.farmerId - b.farmerId)
      .slice(0, TOP_FARMER_LIMIT);

    return {
      totalFarmers: farmers.length,
      totalPaymentsAmount: sumBy(payments, (payment) => payment.amount),
      totalPaymentCount: payments.length,
      averageQualityScore: averageBy(qualityRecords, (record) => record.qualityScore) ?? 0,
      topFarmersByPayments
    };
  }

  /** Case-insensitive substring match against each farmer's specialties. */
  searchByProduct(scope: TenantScope, product: string): Farmer[] {
    const needle = product.trim().toLowerCase();
    if (needle.length === 0) {
      return [];
    }
    return this.listFarmers(scope).filter((farmer) =>
      farmer.productSpecialties.some((specialty) => specialty.toLowerCase().includes(needle))
    );
  }

  private requireFarmer(farmerId: number): Farmer {
    const farmer = this.getFarmer(farmerId);
    if (!farmer) {
      throw new NotFoundError("farmer", farmerId);
    }
    return farmer;
  }

  private requirePayment(paymentId: number): FarmerPayment {
    const row = this.db.prepare("SELECT * FROM farmer_payments WHERE id = ?").get(paymentId) as
      | PaymentRow
      | undefined;
    if (!row) {
      throw new NotFoundError("farmer_payment", paymentId);
    }
    return toPayment(row);
  }
}
