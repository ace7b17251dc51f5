import { config } from "../config";
import { ConflictError, PersistenceError, describeError } from "../errors";
import { normalizeManufacturerKey } from "../normalization";
import { complianceLevelFor } from "../compliance/evaluate";
import { DEFAULT_COMPLIANT_THRESHOLD, type RuleCatalogue } from "../compliance/catalogue";
import {
  ComplianceLevel,
  Requirement,
  type CategoryStats,
  type ComplianceResult,
  type ExportFormat,
  type FieldPresence,
  type HistoryOutcome,
  type ManufacturerAggregate,
  type ManufacturerAnalytics,
  type ManufacturerComparison,
  type ManufacturerHistoryEntry,
  type ManufacturerProfile,
  type ManufacturerRanking,
} from "../types";
import { categorizeProduct } from "./categories";
import { formatEntries } from "./export";
import { KeyedLock } from "./keyed-lock";
import type { HistoryStore } from "./store";
import { buildAggregate, orderEntries, type AggregateOptions } from "./trend";

const RECENT_ENTRY_LIMIT = 10;
const RANKING_LIMIT = 5;
const DEFAULT_HISTORY_LIMIT = 50;

export interface RecordContext {
  manufacturerName: string;
  productIdentifier: string;
  timestamp: string;
  /** Used to pick a category when `category` is not given */
  productTitle?: string;
  category?: string;
}

export interface ScanHistoryQuery {
  manufacturerName?: string;
  category?: string;
  /** 0 returns everything */
  limit?: number;
}

function emptyLevelDistribution(): Record<ComplianceLevel, number> {
  return {
    [ComplianceLevel.EXCELLENT]: 0,
    [ComplianceLevel.GOOD]: 0,
    [ComplianceLevel.FAIR]: 0,
    [ComplianceLevel.POOR]: 0,
  };
}

function sameAggregate(a: ManufacturerAggregate, b: ManufacturerAggregate): boolean {
  return (
    a.manufacturerKey === b.manufacturerKey &&
    a.manufacturerName === b.manufacturerName &&
    a.count === b.count &&
    a.meanScore === b.meanScore &&
    a.compliantCount === b.compliantCount &&
    a.trend === b.trend &&
    a.lastEntryAt === b.lastEntryAt
  );
}

function toProfile(aggregate: ManufacturerAggregate): ManufacturerProfile {
  return { ...aggregate, complianceLevel: complianceLevelFor(aggregate.meanScore) };
}

function toRanking(aggregate: ManufacturerAggregate): ManufacturerRanking {
  return {
    manufacturerKey: aggregate.manufacturerKey,
    manufacturerName: aggregate.manufacturerName,
    meanScore: aggregate.meanScore,
    count: aggregate.count,
  };
}

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Append-only compliance history per manufacturer, with a cached
 * aggregate per key that can always be rebuilt from the entry log.
 */
export class HistoryTracker {
  private readonly lock = new KeyedLock();
  private readonly opts: AggregateOptions;

  constructor(
    private readonly store: HistoryStore,
    opts: Partial<AggregateOptions> = {}
  ) {
    this.opts = {
      trendWindow: opts.trendWindow ?? config.trendWindow,
      trendEpsilon: opts.trendEpsilon ?? config.trendEpsilon,
      compliantThreshold: opts.compliantThreshold ?? DEFAULT_COMPLIANT_THRESHOLD,
    };
  }

  /**
   * Append one evaluation and refresh the manufacturer's aggregate.
   * A repeat of the same (manufacturer, product, timestamp) is a no-op.
   * Store failures are reported as `not_recorded`, never thrown.
   */
  async record(result: ComplianceResult, ctx: RecordContext): Promise<HistoryOutcome> {
    const manufacturerKey = normalizeManufacturerKey(ctx.manufacturerName);
    if (!manufacturerKey) {
      console.log(`[tracker] "${ctx.manufacturerName}" has no identifying name, skipping ${ctx.productIdentifier}`);
      return { status: "skipped", reason: "manufacturer name has nothing to identify it by" };
    }
    const entry: ManufacturerHistoryEntry = {
      manufacturerKey,
      manufacturerName: ctx.manufacturerName.trim(),
      productIdentifier: ctx.productIdentifier,
      score: result.score,
      timestamp: ctx.timestamp,
      catalogueVersion: result.catalogueVersion,
      missingRequired: [...result.missingRequired],
      missingOptional: [...result.missingOptional],
      category: ctx.category?.trim() || categorizeProduct(ctx.productTitle ?? ""),
    };

    try {
      return await this.lock.run(manufacturerKey, async (): Promise<HistoryOutcome> => {
        try {
          await this.store.append(entry);
        } catch (err) {
          if (!(err instanceof ConflictError)) throw err;
          console.log(`[tracker] Duplicate entry for ${manufacturerKey} / ${ctx.productIdentifier}, skipping`);
          const existing = await this.syncAggregate(manufacturerKey);
          if (!existing) throw new PersistenceError(`No history found for ${manufacturerKey} after conflict`);
          return { status: "duplicate", profile: toProfile(existing) };
        }

        // The entry is durable from here on; a snapshot failure only leaves the cache stale
        const aggregate = await this.syncAggregate(manufacturerKey);
        if (!aggregate) throw new PersistenceError(`Entry for ${manufacturerKey} not readable after append`);
        console.log(
          `[tracker] ${aggregate.manufacturerName}: ${aggregate.count} scans, mean ${aggregate.meanScore.toFixed(2)}, ${aggregate.trend}`
        );
        return { status: "recorded", profile: toProfile(aggregate) };
      });
    } catch (err) {
      const failure =
        err instanceof PersistenceError ? err : new PersistenceError(`History update failed: ${describeError(err)}`);
      console.error(`[tracker] Could not record ${manufacturerKey}: ${failure.message}`);
      return { status: "not_recorded", reason: failure.message };
    }
  }

  async getProfile(manufacturerName: string): Promise<ManufacturerProfile | null> {
    const key = normalizeManufacturerKey(manufacturerName);
    if (!key) return null;
    const aggregate = await this.lock.run(key, () => this.syncAggregate(key));
    return aggregate ? toProfile(aggregate) : null;
  }

  /** Recompute one manufacturer's snapshot from its entry log */
  async rebuildAggregate(manufacturerName: string): Promise<ManufacturerProfile | null> {
    const key = normalizeManufacturerKey(manufacturerName);
    if (!key) return null;
    const aggregate = await this.lock.run(key, () => this.refresh(key));
    return aggregate ? toProfile(aggregate) : null;
  }

  /** Recompute every snapshot. Returns the number of manufacturers rebuilt. */
  async rebuildAll(): Promise<number> {
    const keys = await this.store.listManufacturerKeys();
    let rebuilt = 0;
    for (const key of keys) {
      const aggregate = await this.lock.run(key, () => this.refresh(key));
      if (aggregate) rebuilt++;
    }
    console.log(`[tracker] Rebuilt ${rebuilt} manufacturer aggregates`);
    return rebuilt;
  }

  /**
   * Presence of every catalogue field over the entries scored against
   * `catalogue`, plus the most recent entries.
   */
  async getAnalytics(manufacturerName: string, catalogue: RuleCatalogue): Promise<ManufacturerAnalytics | null> {
    const key = normalizeManufacturerKey(manufacturerName);
    if (!key) return null;
    const entries = await this.store.readEntries(key);
    const aggregate = buildAggregate(key, entries, this.opts);
    if (!aggregate) return null;

    const scored = entries.filter((e) => e.catalogueVersion === catalogue.version);
    const fieldPresence: FieldPresence[] = catalogue.rules.map((rule) => {
      const missing = (e: ManufacturerHistoryEntry) =>
        rule.requirement === Requirement.REQUIRED ? e.missingRequired : e.missingOptional;
      const presentCount = scored.filter((e) => !missing(e).includes(rule.field)).length;
      return {
        fieldName: rule.field,
        requirement: rule.requirement,
        presentCount,
        percentage: scored.length > 0 ? roundTo((presentCount / scored.length) * 100, 1) : 0,
      };
    });

    return {
      profile: toProfile(aggregate),
      catalogueVersion: catalogue.version,
      fieldPresence,
      recentEntries: orderEntries(entries).reverse().slice(0, RECENT_ENTRY_LIMIT),
    };
  }

  async compareManufacturers(): Promise<ManufacturerComparison> {
    const keys = await this.store.listManufacturerKeys();
    const aggregates: ManufacturerAggregate[] = [];
    for (const key of keys) {
      const aggregate = await this.lock.run(key, () => this.syncAggregate(key));
      if (aggregate) aggregates.push(aggregate);
    }

    const levelDistribution = emptyLevelDistribution();
    for (const aggregate of aggregates) {
      levelDistribution[complianceLevelFor(aggregate.meanScore)]++;
    }

    const byKey = (a: ManufacturerAggregate, b: ManufacturerAggregate) =>
      a.manufacturerKey.localeCompare(b.manufacturerKey);
    const best = [...aggregates].sort((a, b) => b.meanScore - a.meanScore || byKey(a, b));
    const worst = [...aggregates].sort((a, b) => a.meanScore - b.meanScore || byKey(a, b));
    const busiest = [...aggregates].sort((a, b) => b.count - a.count || byKey(a, b));

    const totalMeans = aggregates.reduce((sum, a) => sum + a.meanScore, 0);

    return {
      manufacturerCount: aggregates.length,
      totalScans: aggregates.reduce((sum, a) => sum + a.count, 0),
      averageScore: aggregates.length > 0 ? totalMeans / aggregates.length : 0,
      levelDistribution,
      topPerformers: best.slice(0, RANKING_LIMIT).map(toRanking),
      bottomPerformers: worst.slice(0, RANKING_LIMIT).map(toRanking),
      mostActive: busiest.slice(0, RANKING_LIMIT).map(toRanking),
    };
  }

  // ===== Scan history =====

  /** Most recent scans, oldest first, optionally narrowed to one manufacturer or category */
  async getScanHistory(query: ScanHistoryQuery = {}): Promise<ManufacturerHistoryEntry[]> {
    let manufacturerKey: string | undefined;
    if (query.manufacturerName !== undefined) {
      manufacturerKey = normalizeManufacturerKey(query.manufacturerName);
      if (!manufacturerKey) return [];
    }
    return this.store.listEntries({
      manufacturerKey,
      category: query.category,
      limit: query.limit ?? DEFAULT_HISTORY_LIMIT,
    });
  }

  /** Per-category scan counts and scores, best mean first */
  async getCategoryStats(): Promise<CategoryStats[]> {
    const entries = await this.store.listEntries();
    const groups = new Map<string, ManufacturerHistoryEntry[]>();
    for (const entry of entries) {
      const group = groups.get(entry.category);
      if (group) group.push(entry);
      else groups.set(entry.category, [entry]);
    }

    const stats: CategoryStats[] = [];
    for (const [category, group] of groups) {
      const levelDistribution = emptyLevelDistribution();
      for (const entry of group) levelDistribution[complianceLevelFor(entry.score)]++;
      stats.push({
        category,
        totalScans: group.length,
        meanScore: group.reduce((sum, e) => sum + e.score, 0) / group.length,
        manufacturerCount: new Set(group.map((e) => e.manufacturerKey)).size,
        levelDistribution,
      });
    }
    return stats.sort((a, b) => b.meanScore - a.meanScore || a.category.localeCompare(b.category));
  }

  async exportHistory(format: ExportFormat, query: ScanHistoryQuery = {}): Promise<string> {
    const entries = await this.getScanHistory({ ...query, limit: query.limit ?? 0 });
    console.log(`[tracker] Exporting ${entries.length} scans as ${format}`);
    return formatEntries(entries, format);
  }

  // ===== Internals (callers hold the key's lock) =====

  /**
   * Aggregate built from the entry log, written back when the stored
   * snapshot differs. A failed write is logged; the log stays authoritative.
   */
  private async syncAggregate(key: string): Promise<ManufacturerAggregate | null> {
    const entries = await this.store.readEntries(key);
    const aggregate = buildAggregate(key, entries, this.opts);
    if (!aggregate) return null;
    try {
      const cached = await this.store.readAggregate(key);
      if (!cached || !sameAggregate(cached, aggregate)) await this.store.writeAggregate(aggregate);
    } catch (err) {
      console.warn(`[tracker] Snapshot for ${key} not updated: ${describeError(err)}`);
    }
    return aggregate;
  }

  private async refresh(key: string): Promise<ManufacturerAggregate | null> {
    const entries = await this.store.readEntries(key);
    const aggregate = buildAggregate(key, entries, this.opts);
    if (aggregate) await this.store.writeAggregate(aggregate);
    return aggregate;
  }
}
