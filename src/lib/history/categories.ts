import categoryTable from "../../../catalogues/product-categories.json";
import { cleanText, escapeRegExp } from "../normalization";

export const FALLBACK_CATEGORY = categoryTable.fallback;

// Whole words, optionally pluralised: "biscuits" hits "biscuit", "toilet" misses "oil"
const CATEGORY_PATTERNS: [string, RegExp][] = categoryTable.categories.map((c) => [
  c.name,
  new RegExp(`(^|[^a-z0-9])(?:${c.keywords.map(escapeRegExp).join("|")})(?:s|es)?(?![a-z0-9])`, "i"),
]);

export const PRODUCT_CATEGORIES: readonly string[] = categoryTable.categories.map((c) => c.name);

/** First category whose keywords appear in the product title */
export function categorizeProduct(title: string): string {
  const text = cleanText(title);
  if (!text) return FALLBACK_CATEGORY;
  for (const [name, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(text)) return name;
  }
  return FALLBACK_CATEGORY;
}
