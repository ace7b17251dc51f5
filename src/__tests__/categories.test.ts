import { describe, it, expect } from "vitest";
import { categorizeProduct, FALLBACK_CATEGORY, PRODUCT_CATEGORIES } from "../lib/history/categories";

describe("categorizeProduct", () => {
  it("matches whole keywords and their plurals", () => {
    expect(categorizeProduct("Sunrise Oat Biscuits 200 g")).toBe("Food & Beverages");
    expect(categorizeProduct("Herbal SHAMPOO for dry hair")).toBe("Cosmetics & Personal Care");
    expect(categorizeProduct("Steel Dinner Plates, set of 6")).toBe("Home & Kitchen");
  });

  it("does not match a keyword inside a longer word", () => {
    expect(categorizeProduct("Toilet cleaner")).toBe("Home & Kitchen");
  });

  it("takes the first category in table order", () => {
    expect(categorizeProduct("Protein bar snack")).toBe("Food & Beverages");
  });

  it("falls back for empty or unmatched titles", () => {
    expect(categorizeProduct("")).toBe(FALLBACK_CATEGORY);
    expect(categorizeProduct("Assorted items")).toBe("General Products");
  });

  it("lists the known categories in table order", () => {
    expect(PRODUCT_CATEGORIES[0]).toBe("Food & Beverages");
    expect(PRODUCT_CATEGORIES).toHaveLength(10);
  });
});
