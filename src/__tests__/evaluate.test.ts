import { describe, it, expect } from "vitest";
import { loadCatalogue, parseCatalogue } from "../lib/compliance/catalogue";
import { complianceLevelFor, evaluateCompliance, summarizeCompliance } from "../lib/compliance/evaluate";
import { mergeCandidates } from "../lib/field-merge";
import { ComplianceLevel, FieldName, FieldStatus, SourceType, type RawCandidate } from "../lib/types";

const catalogue = loadCatalogue("catalogues/legal-metrology-v1.json");

function makeRecord(candidates: RawCandidate[]) {
  return mergeCandidates("sku-1", candidates, { timestamp: "2024-06-01T10:00:00.000Z" });
}

const PARTIAL_LABEL: RawCandidate[] = [
  { fieldName: "mrp", value: "MRP ₹120.00", source: SourceType.TEXT_RECOGNITION },
  { fieldName: "net_quantity", value: "500 g", source: SourceType.TEXT_RECOGNITION },
  { fieldName: "consumer_care", value: "Customer care: 1800-123-4567", source: SourceType.TEXT_RECOGNITION },
];

describe("evaluateCompliance", () => {
  it("scores present required fields over all required fields", () => {
    const result = evaluateCompliance(makeRecord(PARTIAL_LABEL), catalogue);

    expect(result.catalogueVersion).toBe("lm-pc-2011.1");
    expect(result.score).toBe(0.5);
    expect(result.presentRequired).toBe(2);
    expect(result.requiredTotal).toBe(4);
    expect(result.missingRequired).toEqual([FieldName.MANUFACTURER_NAME, FieldName.COUNTRY_OF_ORIGIN]);
    expect(result.missingOptional).toEqual([
      FieldName.MANUFACTURE_DATE,
      FieldName.BEST_BEFORE,
      FieldName.BATCH_NUMBER,
      FieldName.LICENSE_NUMBER,
    ]);
    expect(result.perFieldStatus[FieldName.CONSUMER_CARE]).toBe(FieldStatus.PRESENT);
    expect(result.complianceLevel).toBe(ComplianceLevel.FAIR);
    expect(result.compliant).toBe(false);
  });

  it("ignores optional fields in the score", () => {
    const withoutCare = evaluateCompliance(makeRecord(PARTIAL_LABEL.slice(0, 2)), catalogue);
    expect(withoutCare.score).toBe(0.5);
  });

  it("marks a present value the catalogue rejects as invalid", () => {
    const strict = parseCatalogue({
      version: "strict-1",
      fields: [
        { field: "mrp", requirement: "required", validator: "currency_amount" },
        { field: "net_quantity", requirement: "required", validator: "currency_amount" },
      ],
    });

    const result = evaluateCompliance(makeRecord(PARTIAL_LABEL), strict);

    expect(result.perFieldStatus[FieldName.NET_QUANTITY]).toBe(FieldStatus.INVALID);
    expect(result.invalidFields).toEqual([FieldName.NET_QUANTITY]);
    expect(result.missingRequired).toEqual([FieldName.NET_QUANTITY]);
    expect(result.score).toBe(0.5);
  });

  it("decides compliance from the catalogue's own threshold", () => {
    const lenient = parseCatalogue({
      version: "lenient-1",
      compliantThreshold: 0.5,
      fields: [
        { field: "mrp", requirement: "required", validator: "currency_amount" },
        { field: "country_of_origin", requirement: "required", validator: "country" },
      ],
    });

    const result = evaluateCompliance(makeRecord(PARTIAL_LABEL), lenient);

    expect(result.score).toBe(0.5);
    expect(result.compliant).toBe(true);
  });

  it("is pure", () => {
    const record = makeRecord(PARTIAL_LABEL);
    const before = JSON.stringify(record);
    expect(evaluateCompliance(record, catalogue)).toEqual(evaluateCompliance(record, catalogue));
    expect(JSON.stringify(record)).toBe(before);
  });
});

describe("summarizeCompliance", () => {
  it("formats the score as present/total", () => {
    const summary = summarizeCompliance(evaluateCompliance(makeRecord(PARTIAL_LABEL), catalogue));
    expect(summary.score).toBe("2/4");
    expect(summary.missingRequired).toEqual(["manufacturer_name", "country_of_origin"]);
  });
});

describe("complianceLevelFor", () => {
  it("maps scores onto bands", () => {
    expect(complianceLevelFor(1)).toBe(ComplianceLevel.EXCELLENT);
    expect(complianceLevelFor(0.9)).toBe(ComplianceLevel.EXCELLENT);
    expect(complianceLevelFor(0.75)).toBe(ComplianceLevel.GOOD);
    expect(complianceLevelFor(0.74)).toBe(ComplianceLevel.FAIR);
    expect(complianceLevelFor(0.25)).toBe(ComplianceLevel.POOR);
  });
});
