import { describe, it, expect } from "vitest";
import { entriesToCsv, entriesToJson, formatEntries } from "../lib/history/export";
import { FieldName, type ManufacturerHistoryEntry } from "../lib/types";

function makeEntry(overrides: Partial<ManufacturerHistoryEntry> = {}): ManufacturerHistoryEntry {
  return {
    manufacturerKey: "sunrise foods",
    manufacturerName: "Sunrise Foods",
    productIdentifier: "sku-1",
    score: 0.5,
    timestamp: "2024-06-01T10:00:00.000Z",
    catalogueVersion: "lm-pc-2011.1",
    missingRequired: [FieldName.MANUFACTURER_NAME, FieldName.COUNTRY_OF_ORIGIN],
    missingOptional: [FieldName.BATCH_NUMBER],
    category: "Food & Beverages",
    ...overrides,
  };
}

describe("entriesToCsv", () => {
  it("writes a header and one row per entry", () => {
    expect(entriesToCsv([makeEntry()])).toBe(
      "timestamp,manufacturer_key,manufacturer_name,product_identifier,category,score,compliance_level," +
        "catalogue_version,missing_required,missing_optional\n" +
        "2024-06-01T10:00:00.000Z,sunrise foods,Sunrise Foods,sku-1,Food & Beverages,0.5,fair," +
        "lm-pc-2011.1,manufacturer_name;country_of_origin,batch_number\n"
    );
  });

  it("quotes cells holding commas, quotes or newlines", () => {
    const csv = entriesToCsv([makeEntry({ manufacturerName: 'Sunrise Foods, "Unit 2"', productIdentifier: "sku\n1" })]);
    const row = csv.slice(csv.indexOf("\n") + 1);
    expect(row.startsWith('2024-06-01T10:00:00.000Z,sunrise foods,"Sunrise Foods, ""Unit 2""","sku\n1",')).toBe(true);
  });

  it("writes only the header for no entries", () => {
    expect(entriesToCsv([]).split("\n")).toHaveLength(2);
  });
});

describe("formatEntries", () => {
  it("emits indented JSON", () => {
    const json = formatEntries([makeEntry()], "json");
    expect(json).toBe(entriesToJson([makeEntry()]));
    expect(JSON.parse(json)).toEqual([makeEntry()]);
    expect(json.split("\n")[1]).toBe("  {");
  });
});
