import type { HistoryFilter, ManufacturerAggregate, ManufacturerHistoryEntry } from "../types";

/**
 * Persistence seam for the tracker. One append-only entry log per
 * manufacturer key plus one cached aggregate per key.
 *
 * `append` rejects a repeated (manufacturerKey, productIdentifier, timestamp)
 * with a ConflictError. `readEntries` and `listEntries` return oldest
 * first, ties in append order.
 */
export interface HistoryStore {
  append(entry: ManufacturerHistoryEntry): Promise<void>;
  readEntries(manufacturerKey: string): Promise<ManufacturerHistoryEntry[]>;
  listEntries(filter?: HistoryFilter): Promise<ManufacturerHistoryEntry[]>;
  readAggregate(manufacturerKey: string): Promise<ManufacturerAggregate | null>;
  writeAggregate(aggregate: ManufacturerAggregate): Promise<void>;
  listManufacturerKeys(): Promise<string[]>;
}
