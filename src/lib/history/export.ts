import { complianceLevelFor } from "../compliance/evaluate";
import type { ExportFormat, ManufacturerHistoryEntry } from "../types";

const CSV_COLUMNS = [
  "timestamp",
  "manufacturer_key",
  "manufacturer_name",
  "product_identifier",
  "category",
  "score",
  "compliance_level",
  "catalogue_version",
  "missing_required",
  "missing_optional",
] as const;

function csvCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvRow(entry: ManufacturerHistoryEntry): string {
  const cells: Record<(typeof CSV_COLUMNS)[number], string | number> = {
    timestamp: entry.timestamp,
    manufacturer_key: entry.manufacturerKey,
    manufacturer_name: entry.manufacturerName,
    product_identifier: entry.productIdentifier,
    category: entry.category,
    score: entry.score,
    compliance_level: complianceLevelFor(entry.score),
    catalogue_version: entry.catalogueVersion,
    missing_required: entry.missingRequired.join(";"),
    missing_optional: entry.missingOptional.join(";"),
  };
  return CSV_COLUMNS.map((col) => csvCell(cells[col])).join(",");
}

/** One header line, then one line per entry; lists are `;`-joined */
export function entriesToCsv(entries: readonly ManufacturerHistoryEntry[]): string {
  return [CSV_COLUMNS.join(","), ...entries.map(csvRow)].join("\n") + "\n";
}

export function entriesToJson(entries: readonly ManufacturerHistoryEntry[]): string {
  return JSON.stringify(entries, null, 2);
}

export function formatEntries(entries: readonly ManufacturerHistoryEntry[], format: ExportFormat): string {
  return format === "csv" ? entriesToCsv(entries) : entriesToJson(entries);
}
