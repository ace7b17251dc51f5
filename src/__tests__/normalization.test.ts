import { describe, it, expect } from "vitest";
import {
  hasContactDetails,
  isBlankValue,
  isLabelDate,
  normalizeCountry,
  normalizeManufacturerKey,
  parseBatchCode,
  parseCurrencyAmount,
  parseFssaiLicense,
  parseNetQuantity,
} from "../lib/normalization";

describe("parseNetQuantity", () => {
  it("reads magnitude and canonical unit from label text", () => {
    expect(parseNetQuantity("Net Wt. 500 g")).toEqual({ magnitude: 500, unit: "g" });
    expect(parseNetQuantity("1,000 ml")).toEqual({ magnitude: 1000, unit: "ml" });
    expect(parseNetQuantity("1.5 Ltr")).toEqual({ magnitude: 1.5, unit: "l" });
  });

  it("canonicalizes structured values", () => {
    expect(parseNetQuantity({ magnitude: 2, unit: "KG" })).toEqual({ magnitude: 2, unit: "kg" });
  });

  it("rejects values without a unit or with a non-positive magnitude", () => {
    expect(parseNetQuantity("200")).toBeNull();
    expect(parseNetQuantity({ magnitude: 0, unit: "g" })).toBeNull();
  });
});

describe("parseCurrencyAmount", () => {
  it("reads Indian digit grouping after the MRP marker", () => {
    expect(parseCurrencyAmount("MRP: ₹ 1,29,999.00 (Incl. of all taxes)")).toBe(129999);
  });

  it("reads rupee amounts written with Rs.", () => {
    expect(parseCurrencyAmount("Rs. 45/-")).toBe(45);
  });

  it("does not treat a bare quantity as a price", () => {
    expect(parseCurrencyAmount("200 g")).toBeNull();
  });

  it("rejects zero", () => {
    expect(parseCurrencyAmount("₹0")).toBeNull();
  });
});

describe("isLabelDate", () => {
  it("accepts month/year and shelf-life durations", () => {
    expect(isLabelDate("Mfg: 05/2024")).toBe(true);
    expect(isLabelDate("Best before 12 months")).toBe(true);
  });

  it("rejects impossible day/month combinations and plain codes", () => {
    expect(isLabelDate("31/13/2024")).toBe(false);
    expect(isLabelDate("Batch A12")).toBe(false);
  });
});

describe("normalizeCountry", () => {
  it("maps phrases and abbreviations to a canonical country", () => {
    expect(normalizeCountry("Made in India")).toBe("INDIA");
    expect(normalizeCountry("Product of U.S.A.")).toBe("USA");
  });

  it("returns null for unrecognised names", () => {
    expect(normalizeCountry("Atlantis")).toBeNull();
  });
});

describe("hasContactDetails", () => {
  it("accepts a phone number of at least ten digits or an email", () => {
    expect(hasContactDetails("Call 1800-123-4567")).toBe(true);
    expect(hasContactDetails("care@sunrise.example")).toBe(true);
  });

  it("rejects short numbers", () => {
    expect(hasContactDetails("Call 12345")).toBe(false);
  });
});

describe("parseBatchCode", () => {
  it("strips the batch prefix and uppercases", () => {
    expect(parseBatchCode("Batch No: b1234x")).toBe("B1234X");
  });

  it("requires at least one digit", () => {
    expect(parseBatchCode("ABCDEF")).toBeNull();
  });
});

describe("parseFssaiLicense", () => {
  it("collects exactly fourteen digits", () => {
    expect(parseFssaiLicense("FSSAI Lic. No. 100 123 456 78901")).toBe("10012345678901");
    expect(parseFssaiLicense("Lic. No. 12345")).toBeNull();
  });
});

describe("isBlankValue", () => {
  it("treats not-found markers as blank", () => {
    expect(isBlankValue("  Not Found. ")).toBe(true);
    expect(isBlankValue("N/A")).toBe(true);
    expect(isBlankValue("   ")).toBe(true);
  });

  it("never treats a structured quantity as blank", () => {
    expect(isBlankValue({ magnitude: 1, unit: "g" })).toBe(false);
  });
});

describe("normalizeManufacturerKey", () => {
  it("folds case, punctuation and legal suffixes", () => {
    expect(normalizeManufacturerKey("Acme Foods Pvt. Ltd.")).toBe("acme foods");
    expect(normalizeManufacturerKey("  ACME   FOODS ")).toBe("acme foods");
    expect(normalizeManufacturerKey("Acme Foods Private Limited")).toBe("acme foods");
    expect(normalizeManufacturerKey("Sunrise Agro Co.")).toBe("sunrise agro");
  });

  it("returns an empty key when nothing identifying is left", () => {
    expect(normalizeManufacturerKey("")).toBe("");
    expect(normalizeManufacturerKey("Pvt. Ltd.")).toBe("");
    expect(normalizeManufacturerKey("Limited")).toBe("");
  });
});
