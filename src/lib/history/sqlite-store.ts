import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "../config";
import { ConflictError, PersistenceError, describeError } from "../errors";
import { isFieldName } from "../field-merge";
import { FALLBACK_CATEGORY } from "./categories";
import {
  TrendDirection,
  type FieldName,
  type HistoryFilter,
  type ManufacturerAggregate,
  type ManufacturerHistoryEntry,
} from "../types";
import type { HistoryStore } from "./store";

interface HistoryRow {
  manufacturer_key: string;
  manufacturer_name: string;
  product_identifier: string;
  score: number;
  timestamp: string;
  catalogue_version: string;
  missing_required: string;
  missing_optional: string;
  category: string;
}

const ENTRY_COLUMNS = `manufacturer_key, manufacturer_name, product_identifier, score,
  timestamp, catalogue_version, missing_required, missing_optional, category`;

interface NewHistoryRow extends HistoryRow {
  recorded_at: string;
}

interface AggregateRow {
  manufacturer_key: string;
  manufacturer_name: string;
  entry_count: number;
  mean_score: number;
  compliant_count: number;
  trend: string;
  last_entry_at: string;
}

export function openHistoryDatabase(dbPath: string = config.dbPath): Database.Database {
  if (dbPath === ":memory:") {
    const memoryDb = new Database(dbPath);
    initSchema(memoryDb);
    return memoryDb;
  }

  const resolved = path.resolve(process.cwd(), dbPath);
  const dir = path.dirname(resolved);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(resolved);
  db.pragma("journal_mode = WAL");
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS manufacturer_history (
      seq                INTEGER PRIMARY KEY AUTOINCREMENT,
      manufacturer_key   TEXT NOT NULL,
      manufacturer_name  TEXT NOT NULL,
      product_identifier TEXT NOT NULL,
      score              REAL NOT NULL,
      timestamp          TEXT NOT NULL,
      catalogue_version  TEXT NOT NULL,
      missing_required   TEXT NOT NULL DEFAULT '[]',
      missing_optional   TEXT NOT NULL DEFAULT '[]',
      category           TEXT NOT NULL DEFAULT '${FALLBACK_CATEGORY}',
      recorded_at        TEXT NOT NULL,
      UNIQUE (manufacturer_key, product_identifier, timestamp)
    );
    CREATE INDEX IF NOT EXISTS idx_history_key ON manufacturer_history(manufacturer_key, timestamp);
    CREATE INDEX IF NOT EXISTS idx_history_time ON manufacturer_history(timestamp);

    CREATE TRIGGER IF NOT EXISTS manufacturer_history_no_update
    BEFORE UPDATE ON manufacturer_history
    BEGIN
      SELECT RAISE(ABORT, 'manufacturer_history is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS manufacturer_history_no_delete
    BEFORE DELETE ON manufacturer_history
    BEGIN
      SELECT RAISE(ABORT, 'manufacturer_history is append-only');
    END;

    CREATE TABLE IF NOT EXISTS manufacturer_aggregates (
      manufacturer_key  TEXT PRIMARY KEY,
      manufacturer_name TEXT NOT NULL,
      entry_count       INTEGER NOT NULL,
      mean_score        REAL NOT NULL,
      compliant_count   INTEGER NOT NULL,
      trend             TEXT NOT NULL,
      last_entry_at     TEXT NOT NULL,
      updated_at        TEXT NOT NULL
    );
  `);

  // Migrate: columns added after the first schema
  const cols = db
    .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('manufacturer_history')")
    .all();
  const colNames = new Set(cols.map((c) => c.name));
  if (!colNames.has("missing_optional")) {
    db.exec("ALTER TABLE manufacturer_history ADD COLUMN missing_optional TEXT NOT NULL DEFAULT '[]'");
  }
  if (!colNames.has("category")) {
    db.exec(`ALTER TABLE manufacturer_history ADD COLUMN category TEXT NOT NULL DEFAULT '${FALLBACK_CATEGORY}'`);
  }
  db.exec("CREATE INDEX IF NOT EXISTS idx_history_category ON manufacturer_history(category)");
}

function isTrendDirection(value: string): value is TrendDirection {
  return Object.values(TrendDirection).some((t) => t === value);
}

function parseFieldList(column: string, json: string): FieldName[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new PersistenceError(`Corrupt ${column} column: ${json}`);
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((f): f is FieldName => typeof f === "string" && isFieldName(f));
}

function mapRowToEntry(row: HistoryRow): ManufacturerHistoryEntry {
  return {
    manufacturerKey: row.manufacturer_key,
    manufacturerName: row.manufacturer_name,
    productIdentifier: row.product_identifier,
    score: row.score,
    timestamp: row.timestamp,
    catalogueVersion: row.catalogue_version,
    missingRequired: parseFieldList("missing_required", row.missing_required),
    missingOptional: parseFieldList("missing_optional", row.missing_optional),
    category: row.category,
  };
}

function mapRowToAggregate(row: AggregateRow): ManufacturerAggregate {
  return {
    manufacturerKey: row.manufacturer_key,
    manufacturerName: row.manufacturer_name,
    count: row.entry_count,
    meanScore: row.mean_score,
    compliantCount: row.compliant_count,
    trend: isTrendDirection(row.trend) ? row.trend : TrendDirection.INSUFFICIENT_DATA,
    lastEntryAt: row.last_entry_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

export class SqliteHistoryStore implements HistoryStore {
  private readonly insertEntry: Database.Statement<[NewHistoryRow]>;
  private readonly selectEntries: Database.Statement<[string], HistoryRow>;
  private readonly selectAggregate: Database.Statement<[string], AggregateRow>;
  private readonly upsertAggregate: Database.Statement<[AggregateRow & { updated_at: string }]>;
  private readonly selectKeys: Database.Statement<[], { manufacturer_key: string }>;

  constructor(private readonly db: Database.Database) {
    initSchema(db);

    this.insertEntry = db.prepare<[NewHistoryRow]>(`
      INSERT INTO manufacturer_history (
        manufacturer_key, manufacturer_name, product_identifier, score,
        timestamp, catalogue_version, missing_required, missing_optional,
        category, recorded_at
      ) VALUES (
        @manufacturer_key, @manufacturer_name, @product_identifier, @score,
        @timestamp, @catalogue_version, @missing_required, @missing_optional,
        @category, @recorded_at
      )
    `);

    this.selectEntries = db.prepare<[string], HistoryRow>(`
      SELECT ${ENTRY_COLUMNS}
      FROM manufacturer_history
      WHERE manufacturer_key = ?
      ORDER BY timestamp ASC, seq ASC
    `);

    this.selectAggregate = db.prepare<[string], AggregateRow>(`
      SELECT manufacturer_key, manufacturer_name, entry_count, mean_score,
             compliant_count, trend, last_entry_at
      FROM manufacturer_aggregates
      WHERE manufacturer_key = ?
    `);

    this.upsertAggregate = db.prepare<[AggregateRow & { updated_at: string }]>(`
      INSERT INTO manufacturer_aggregates (
        manufacturer_key, manufacturer_name, entry_count, mean_score,
        compliant_count, trend, last_entry_at, updated_at
      ) VALUES (
        @manufacturer_key, @manufacturer_name, @entry_count, @mean_score,
        @compliant_count, @trend, @last_entry_at, @updated_at
      )
      ON CONFLICT(manufacturer_key) DO UPDATE SET
        manufacturer_name = excluded.manufacturer_name,
        entry_count = excluded.entry_count,
        mean_score = excluded.mean_score,
        compliant_count = excluded.compliant_count,
        trend = excluded.trend,
        last_entry_at = excluded.last_entry_at,
        updated_at = excluded.updated_at
    `);

    this.selectKeys = db.prepare<[], { manufacturer_key: string }>(
      "SELECT DISTINCT manufacturer_key FROM manufacturer_history ORDER BY manufacturer_key"
    );
  }

  static open(dbPath: string = config.dbPath): SqliteHistoryStore {
    return new SqliteHistoryStore(openHistoryDatabase(dbPath));
  }

  async append(entry: ManufacturerHistoryEntry): Promise<void> {
    try {
      this.db.transaction(() => {
        this.insertEntry.run({
          manufacturer_key: entry.manufacturerKey,
          manufacturer_name: entry.manufacturerName,
          product_identifier: entry.productIdentifier,
          score: entry.score,
          timestamp: entry.timestamp,
          catalogue_version: entry.catalogueVersion,
          missing_required: JSON.stringify(entry.missingRequired),
          missing_optional: JSON.stringify(entry.missingOptional),
          category: entry.category,
          recorded_at: new Date().toISOString(),
        });
      })();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(
          `Entry already recorded for ${entry.manufacturerKey} / ${entry.productIdentifier} @ ${entry.timestamp}`
        );
      }
      throw new PersistenceError(`Failed to append history entry: ${describeError(err)}`);
    }
  }

  async readEntries(manufacturerKey: string): Promise<ManufacturerHistoryEntry[]> {
    try {
      return this.selectEntries.all(manufacturerKey).map(mapRowToEntry);
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to read history for ${manufacturerKey}: ${describeError(err)}`);
    }
  }

  async listEntries(filter: HistoryFilter = {}): Promise<ManufacturerHistoryEntry[]> {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filter.manufacturerKey !== undefined) {
      where.push("manufacturer_key = ?");
      params.push(filter.manufacturerKey);
    }
    if (filter.category !== undefined) {
      where.push("category = ?");
      params.push(filter.category);
    }
    const whereSql = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";

    // Newest N first, then flipped back to oldest first
    let sql = `SELECT seq, ${ENTRY_COLUMNS} FROM manufacturer_history ${whereSql} ORDER BY timestamp DESC, seq DESC`;
    if (filter.limit !== undefined && filter.limit > 0) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }
    sql = `SELECT ${ENTRY_COLUMNS} FROM (${sql}) ORDER BY timestamp ASC, seq ASC`;

    try {
      return this.db.prepare<(string | number)[], HistoryRow>(sql).all(...params).map(mapRowToEntry);
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to list history: ${describeError(err)}`);
    }
  }

  async readAggregate(manufacturerKey: string): Promise<ManufacturerAggregate | null> {
    try {
      const row = this.selectAggregate.get(manufacturerKey);
      return row ? mapRowToAggregate(row) : null;
    } catch (err) {
      throw new PersistenceError(`Failed to read aggregate for ${manufacturerKey}: ${describeError(err)}`);
    }
  }

  async writeAggregate(aggregate: ManufacturerAggregate): Promise<void> {
    try {
      this.upsertAggregate.run({
        manufacturer_key: aggregate.manufacturerKey,
        manufacturer_name: aggregate.manufacturerName,
        entry_count: aggregate.count,
        mean_score: aggregate.meanScore,
        compliant_count: aggregate.compliantCount,
        trend: aggregate.trend,
        last_entry_at: aggregate.lastEntryAt,
        updated_at: new Date().toISOString(),
      });
    } catch (err) {
      throw new PersistenceError(`Failed to write aggregate for ${aggregate.manufacturerKey}: ${describeError(err)}`);
    }
  }

  async listManufacturerKeys(): Promise<string[]> {
    try {
      return this.selectKeys.all().map((row) => row.manufacturer_key);
    } catch (err) {
      throw new PersistenceError(`Failed to list manufacturers: ${describeError(err)}`);
    }
  }

  close(): void {
    this.db.close();
  }
}
