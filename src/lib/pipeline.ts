import { config } from "./config";
import { mergeCandidates } from "./field-merge";
import { normalizeManufacturerKey } from "./normalization";
import { loadCatalogue, type RuleCatalogue } from "./compliance/catalogue";
import { evaluateCompliance, summarizeCompliance } from "./compliance/evaluate";
import { SqliteHistoryStore } from "./history/sqlite-store";
import type { HistoryStore } from "./history/store";
import { HistoryTracker } from "./history/tracker";
import { parseProductPage } from "./sources/platform-metadata";
import { collectCandidates, getSourceAdapters } from "./sources/registry";
import type { ProductPage, SourceAdapter } from "./sources/types";
import {
  FieldName,
  type EvaluationReport,
  type FieldValue,
  type HistoryOutcome,
  type MergedRecord,
  type RawCandidate,
  type SourceType,
} from "./types";

export interface ProductEvaluationInput {
  productIdentifier: string;
  /** Candidates a caller already extracted, in emission order */
  candidates?: RawCandidate[];
  ocrText?: string;
  productPage?: ProductPage;
  /** Overrides the merged manufacturer_name as the history key */
  manufacturerName?: string;
  /** Picks the history category; defaults to the product page title */
  productTitle?: string;
  /** Overrides the category picked from the title */
  category?: string;
  timestamp?: string;
}

export interface EvaluatorOptions {
  catalogue?: RuleCatalogue;
  cataloguePath?: string;
  store?: HistoryStore;
  dbPath?: string;
  tracker?: HistoryTracker;
  adapters?: SourceAdapter[];
  trackHistory?: boolean;
}

export interface Evaluator {
  catalogue: RuleCatalogue;
  tracker: HistoryTracker | null;
  evaluateProduct(input: ProductEvaluationInput): Promise<EvaluationReport>;
  close(): void;
}

function manufacturerFor(input: ProductEvaluationInput, record: MergedRecord): string | null {
  const merged = record.fields[FieldName.MANUFACTURER_NAME]?.value;
  const names = [input.manufacturerName, typeof merged === "string" ? merged : undefined];
  // Suffix-only names such as "Pvt. Ltd." identify nobody
  const usable = names.map((n) => n?.trim() ?? "").find((n) => normalizeManufacturerKey(n) !== "");
  return usable ?? null;
}

function titleFor(input: ProductEvaluationInput): string | undefined {
  if (input.productTitle) return input.productTitle;
  return input.productPage ? (parseProductPage(input.productPage).title ?? undefined) : undefined;
}

function reportFields(record: MergedRecord): EvaluationReport["mergedFields"] {
  const out: Partial<Record<FieldName, { value: FieldValue; source: SourceType }>> = {};
  for (const field of Object.values(FieldName)) {
    const merged = record.fields[field];
    if (merged) out[field] = { value: merged.value, source: merged.source };
  }
  return out;
}

/**
 * Wire catalogue, adapters and history together. The catalogue loads up
 * front so a broken one fails here with a ConfigError, before any product
 * is evaluated.
 */
export function createEvaluator(opts: EvaluatorOptions = {}): Evaluator {
  const catalogue = opts.catalogue ?? loadCatalogue(opts.cataloguePath ?? config.cataloguePath);
  const adapters = opts.adapters ?? getSourceAdapters();

  let ownedStore: SqliteHistoryStore | null = null;
  let tracker: HistoryTracker | null = null;
  if (opts.trackHistory !== false) {
    if (opts.tracker) {
      tracker = opts.tracker;
    } else {
      const store = opts.store ?? (ownedStore = SqliteHistoryStore.open(opts.dbPath ?? config.dbPath));
      tracker = new HistoryTracker(store, { compliantThreshold: catalogue.compliantThreshold });
    }
  }

  async function evaluateProduct(input: ProductEvaluationInput): Promise<EvaluationReport> {
    const { productIdentifier } = input;
    const timestamp = input.timestamp ?? new Date().toISOString();

    const extracted =
      input.ocrText || input.productPage
        ? await collectCandidates(
            { productIdentifier, ocrText: input.ocrText, productPage: input.productPage },
            adapters
          )
        : [];
    const candidates: RawCandidate[] = [...extracted, ...(input.candidates ?? [])];

    const record = mergeCandidates(productIdentifier, candidates, { timestamp });
    const compliance = evaluateCompliance(record, catalogue);
    const summary = summarizeCompliance(compliance);
    console.log(
      `[pipeline] ${productIdentifier}: ${summary.score} required fields (${compliance.complianceLevel}), ` +
        `${record.diagnostics.length} candidates dropped`
    );

    const manufacturerName = manufacturerFor(input, record);
    let history: HistoryOutcome;
    if (!tracker) {
      history = { status: "skipped", reason: "history tracking disabled" };
    } else if (!manufacturerName) {
      history = { status: "skipped", reason: "no manufacturer name supplied or extracted" };
    } else {
      history = await tracker.record(compliance, {
        manufacturerName,
        productIdentifier,
        timestamp,
        productTitle: titleFor(input),
        category: input.category,
      });
    }

    const report: EvaluationReport = {
      productIdentifier,
      evaluatedAt: timestamp,
      mergedFields: reportFields(record),
      complianceSummary: summary,
      compliance,
      history,
      diagnostics: [...record.diagnostics],
    };
    if (history.status === "recorded" || history.status === "duplicate") {
      report.manufacturerProfile = history.profile;
    }
    return report;
  }

  return {
    catalogue,
    tracker,
    evaluateProduct,
    close() {
      ownedStore?.close();
    },
  };
}
