import { describe, it, expect, vi } from "vitest";
import { createEvaluator } from "../lib/pipeline";
import { loadCatalogue } from "../lib/compliance/catalogue";
import { ConfigError } from "../lib/errors";
import { SqliteHistoryStore } from "../lib/history/sqlite-store";
import { getSourceAdapters } from "../lib/sources/registry";
import { textRecognitionAdapter } from "../lib/sources/text-recognition";
import type { SourceAdapter } from "../lib/sources/types";
import { ComplianceLevel, FieldName, SourceType } from "../lib/types";
import { LABEL_TEXT, MemoryHistoryStore } from "./helpers";

const catalogue = loadCatalogue("catalogues/legal-metrology-v1.json");
const adapters = getSourceAdapters({ enableAi: false });

describe("createEvaluator", () => {
  it("fails up front on a missing catalogue", () => {
    expect(() => createEvaluator({ cataloguePath: "catalogues/does-not-exist.json", trackHistory: false })).toThrow(
      ConfigError
    );
  });
});

describe("evaluateProduct", () => {
  it("scores caller-supplied candidates without history", async () => {
    const evaluator = createEvaluator({ catalogue, adapters, trackHistory: false });

    const report = await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      timestamp: "2024-06-01T10:00:00.000Z",
      candidates: [
        { fieldName: "mrp", value: "MRP ₹120.00", source: SourceType.AI_ENHANCEMENT },
        { fieldName: "net_quantity", value: "500 g", source: SourceType.PLATFORM_METADATA },
      ],
    });

    expect(report.complianceSummary).toEqual({
      score: "2/4",
      missingRequired: [FieldName.MANUFACTURER_NAME, FieldName.COUNTRY_OF_ORIGIN],
      missingOptional: [
        FieldName.CONSUMER_CARE,
        FieldName.MANUFACTURE_DATE,
        FieldName.BEST_BEFORE,
        FieldName.BATCH_NUMBER,
        FieldName.LICENSE_NUMBER,
      ],
    });
    expect(report.mergedFields[FieldName.MRP]).toEqual({ value: "MRP ₹120.00", source: SourceType.AI_ENHANCEMENT });
    expect(report.history).toEqual({ status: "skipped", reason: "history tracking disabled" });
    expect(report.manufacturerProfile).toBeUndefined();
  });

  it("skips history when no manufacturer is known", async () => {
    const evaluator = createEvaluator({ catalogue, adapters, store: new MemoryHistoryStore() });

    const report = await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      candidates: [{ fieldName: "mrp", value: "MRP ₹120.00", source: SourceType.TEXT_RECOGNITION }],
    });

    expect(report.history).toEqual({ status: "skipped", reason: "no manufacturer name supplied or extracted" });
  });

  it("extracts, scores and records a full label", async () => {
    const evaluator = createEvaluator({ catalogue, adapters, store: SqliteHistoryStore.open(":memory:") });
    const input = { productIdentifier: "sku-1", ocrText: LABEL_TEXT, timestamp: "2024-06-01T10:00:00.000Z" };

    const report = await evaluator.evaluateProduct(input);

    expect(report.complianceSummary.score).toBe("4/4");
    expect(report.compliance.complianceLevel).toBe(ComplianceLevel.EXCELLENT);
    expect(report.mergedFields[FieldName.MANUFACTURER_NAME]).toEqual({
      value: "Sunrise Foods Pvt Ltd",
      source: SourceType.TEXT_RECOGNITION,
    });
    expect(report.history.status).toBe("recorded");
    expect(report.manufacturerProfile?.manufacturerKey).toBe("sunrise foods");
    expect(report.manufacturerProfile?.count).toBe(1);
    expect(report.manufacturerProfile?.complianceLevel).toBe(ComplianceLevel.EXCELLENT);

    const replay = await evaluator.evaluateProduct(input);
    expect(replay.history.status).toBe("duplicate");
    expect(replay.manufacturerProfile?.count).toBe(1);

    evaluator.close();
  });

  it("skips history when the only manufacturer name is a bare legal suffix", async () => {
    const store = new MemoryHistoryStore();
    const evaluator = createEvaluator({ catalogue, adapters, store });

    const report = await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      manufacturerName: "Pvt. Ltd.",
      candidates: [{ fieldName: "mrp", value: "MRP ₹120.00", source: SourceType.TEXT_RECOGNITION }],
    });

    expect(report.history).toEqual({ status: "skipped", reason: "no manufacturer name supplied or extracted" });
    expect(store.entries).toEqual([]);
  });

  it("files the entry under the category of the product title", async () => {
    const store = new MemoryHistoryStore();
    const evaluator = createEvaluator({ catalogue, adapters, store });

    await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      ocrText: LABEL_TEXT,
      productTitle: "Crunchy Oat Biscuits",
      timestamp: "2024-06-01T10:00:00.000Z",
    });

    expect(store.entries.map((e) => e.category)).toEqual(["Food & Beverages"]);
  });

  it("prefers an explicit manufacturer name over the extracted one", async () => {
    const store = new MemoryHistoryStore();
    const evaluator = createEvaluator({ catalogue, adapters, store });

    await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      ocrText: LABEL_TEXT,
      manufacturerName: "Sunrise Brands",
      timestamp: "2024-06-01T10:00:00.000Z",
    });

    expect(store.entries.map((e) => e.manufacturerKey)).toEqual(["sunrise brands"]);
  });

  it("still returns a report when history cannot be written", async () => {
    const store = new MemoryHistoryStore();
    vi.spyOn(store, "append").mockRejectedValue(new Error("disk full"));
    const evaluator = createEvaluator({ catalogue, adapters, store });

    const report = await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      ocrText: LABEL_TEXT,
      timestamp: "2024-06-01T10:00:00.000Z",
    });

    expect(report.complianceSummary.score).toBe("4/4");
    expect(report.history).toEqual({ status: "not_recorded", reason: "History update failed: disk full" });
    expect(report.manufacturerProfile).toBeUndefined();
  });

  it("drops the output of an adapter that throws and keeps the rest", async () => {
    const broken: SourceAdapter = {
      name: "broken",
      source: SourceType.AI_ENHANCEMENT,
      async extract() {
        throw new TypeError("boom");
      },
    };
    const evaluator = createEvaluator({
      catalogue,
      adapters: [broken, textRecognitionAdapter],
      trackHistory: false,
    });

    const report = await evaluator.evaluateProduct({ productIdentifier: "sku-1", ocrText: LABEL_TEXT });

    expect(report.complianceSummary.score).toBe("4/4");
    expect(report.mergedFields[FieldName.MRP]).toEqual({ value: "MRP: Rs. 45.00", source: SourceType.TEXT_RECOGNITION });
  });

  it("reports malformed candidates as diagnostics", async () => {
    const evaluator = createEvaluator({ catalogue, adapters, trackHistory: false });

    const report = await evaluator.evaluateProduct({
      productIdentifier: "sku-1",
      candidates: [
        { fieldName: "allergens", value: "nuts", source: SourceType.TEXT_RECOGNITION },
        { fieldName: "mrp", value: "MRP ₹120.00", source: SourceType.TEXT_RECOGNITION },
      ],
    });

    expect(report.diagnostics).toEqual([
      { index: 0, fieldName: "allergens", source: SourceType.TEXT_RECOGNITION, message: 'Unknown field "allergens"' },
    ]);
    expect(report.complianceSummary.score).toBe("1/4");
  });
});
