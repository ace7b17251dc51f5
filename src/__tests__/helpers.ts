import { ConflictError } from "../lib/errors";
import type { HistoryStore } from "../lib/history/store";
import { orderEntries } from "../lib/history/trend";
import {
  ComplianceLevel,
  type ComplianceResult,
  type HistoryFilter,
  type ManufacturerAggregate,
  type ManufacturerHistoryEntry,
} from "../lib/types";

export const LABEL_TEXT = [
  "CRUNCHY OAT BISCUITS",
  "Net Wt: 200 g",
  "MRP: Rs. 45.00 (Incl. of all taxes)",
  "Manufactured by: Sunrise Foods Pvt Ltd, Plot 12, MIDC, Pune 411001",
  "Country of Origin: India",
  "Customer Care: 1800-123-4567",
  "Mfg. Date: 05/2024",
  "Best Before 9 months from manufacture",
  "Batch No: SB2405A",
  "FSSAI Lic. No. 10012345678901",
].join("\n");

export function makeComplianceResult(overrides: Partial<ComplianceResult> = {}): ComplianceResult {
  return {
    catalogueVersion: "lm-pc-2011.1",
    score: 1,
    presentRequired: 4,
    requiredTotal: 4,
    missingRequired: [],
    missingOptional: [],
    invalidFields: [],
    perFieldStatus: {},
    complianceLevel: ComplianceLevel.EXCELLENT,
    compliant: true,
    ...overrides,
  };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/**
 * In-process store that yields between every step, so interleaved
 * read-modify-write cycles would show up as lost updates.
 */
export class MemoryHistoryStore implements HistoryStore {
  readonly entries: ManufacturerHistoryEntry[] = [];
  readonly aggregates = new Map<string, ManufacturerAggregate>();

  async append(entry: ManufacturerHistoryEntry): Promise<void> {
    await tick();
    const exists = this.entries.some(
      (e) =>
        e.manufacturerKey === entry.manufacturerKey &&
        e.productIdentifier === entry.productIdentifier &&
        e.timestamp === entry.timestamp
    );
    if (exists) throw new ConflictError("duplicate entry");
    this.entries.push({ ...entry });
  }

  async readEntries(manufacturerKey: string): Promise<ManufacturerHistoryEntry[]> {
    await tick();
    return this.entries.filter((e) => e.manufacturerKey === manufacturerKey);
  }

  async listEntries(filter: HistoryFilter = {}): Promise<ManufacturerHistoryEntry[]> {
    await tick();
    const matching = orderEntries(
      this.entries.filter(
        (e) =>
          (filter.manufacturerKey === undefined || e.manufacturerKey === filter.manufacturerKey) &&
          (filter.category === undefined || e.category === filter.category)
      )
    );
    return filter.limit !== undefined && filter.limit > 0 ? matching.slice(-filter.limit) : matching;
  }

  async readAggregate(manufacturerKey: string): Promise<ManufacturerAggregate | null> {
    await tick();
    return this.aggregates.get(manufacturerKey) ?? null;
  }

  async writeAggregate(aggregate: ManufacturerAggregate): Promise<void> {
    await tick();
    this.aggregates.set(aggregate.manufacturerKey, { ...aggregate });
  }

  async listManufacturerKeys(): Promise<string[]> {
    return [...new Set(this.entries.map((e) => e.manufacturerKey))].sort();
  }
}
