import { cleanText } from "../normalization";
import { FieldName, SourceType, type CandidateField } from "../types";
import type { LabelSources, SourceAdapter } from "./types";

// Words that usually start the next label clause in flattened OCR text
const NEXT_CLAUSE = String.raw`(?=,|\n|\s+(?:Net|MRP|FSSAI|Customer|Consumer|Best|Mfg|Mfd|Batch|Lot)\b|$)`;
const DATE_VALUE = String.raw`\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}|\d{1,2}[/.-]\d{4}|[A-Za-z]{3,9}\.?\s*'?\d{2,4}`;

/** Label patterns per field. Capture group 1 holds the value. */
const LABEL_PATTERNS: [FieldName, RegExp][] = [
  [FieldName.MRP, /(\bM\.?R\.?P\.?[^0-9₹\n]{0,20}(?:₹|Rs\.?|INR)?\s*\d[\d,]*(?:\.\d{1,2})?)/gi],
  [
    FieldName.NET_QUANTITY,
    /\bNet\s*(?:Wt|Weight|Quantity|Qty|Content|Vol(?:ume)?)\.?\s*[:-]?\s*(\d+(?:\.\d+)?\s*[a-z]+)/gi,
  ],
  [
    FieldName.MANUFACTURER_NAME,
    new RegExp(
      String.raw`\b(?:Manufactured|Mfd|Mfg|Marketed|Packed)\.?\s*(?:&\s*Marketed\s*)?by\s*[:-]?\s*([^,\n]{3,80}?)` +
        NEXT_CLAUSE,
      "gi"
    ),
  ],
  [
    FieldName.COUNTRY_OF_ORIGIN,
    new RegExp(
      String.raw`\b(?:Country\s*of\s*Origin\s*[:-]?\s*|Made\s*in\s*|Product\s*of\s*)([A-Za-z][A-Za-z ]{1,40}?)` +
        String.raw`(?=[,.\n]|\s+(?:Net|MRP|FSSAI|Mfg|Best)\b|$)`,
      "gi"
    ),
  ],
  [
    FieldName.CONSUMER_CARE,
    /\b(?:Customer\s*Care|Consumer\s*Care|Helpline|Toll\s*Free|For\s*(?:feedback|complaints?))[^:\n]{0,30}:\s*([^\n]{5,120})/gi,
  ],
  [
    FieldName.MANUFACTURE_DATE,
    new RegExp(
      String.raw`\b(?:Mfg|Mfd|Pkd|Packed|Manufactured)\.?\s*(?:Date|On)?\.?\s*[:-]?\s*(${DATE_VALUE})`,
      "gi"
    ),
  ],
  [
    FieldName.BEST_BEFORE,
    new RegExp(
      String.raw`\b(?:Best\s*Before|Use\s*By|Exp(?:iry)?\.?(?:\s*Date)?)\s*[:-]?\s*` +
        String.raw`(\d+\s*(?:days?|months?|years?|yrs?)(?:\s*from\s*[a-z]+)?|${DATE_VALUE})`,
      "gi"
    ),
  ],
  [FieldName.BATCH_NUMBER, /\b(?:Batch|Lot)\s*(?:No\.?|Number|Code)?\s*[:.#-]?\s*([A-Z0-9][A-Z0-9/-]{2,19})\b/gi],
  [
    FieldName.LICENSE_NUMBER,
    /\b(?:FSSAI\s*(?:Lic(?:ence|ense)?\.?)?|Lic(?:ence|ense)?\.?)\s*(?:No\.?)?\s*[:-]?\s*(\d(?:\s?\d){13})(?!\d)/gi,
  ],
];

// Fewer matching fields than this and the text is not a packaging label
const MIN_MATCHED_FIELDS = 2;

/** All distinct matches per field, in order of appearance */
export function matchLabelFields(text: string): Map<FieldName, string[]> {
  const found = new Map<FieldName, string[]>();
  for (const [field, pattern] of LABEL_PATTERNS) {
    const values: string[] = [];
    for (const match of text.matchAll(pattern)) {
      const value = cleanText(match[1] ?? "");
      if (value && !values.includes(value)) values.push(value);
    }
    if (values.length > 0) found.set(field, values);
  }
  return found;
}

export function isLabelText(text: string): boolean {
  return matchLabelFields(text).size >= MIN_MATCHED_FIELDS;
}

export const textRecognitionAdapter: SourceAdapter = {
  name: "text-recognition",
  source: SourceType.TEXT_RECOGNITION,

  async extract(input: LabelSources): Promise<CandidateField[]> {
    const text = input.ocrText ?? "";
    if (!text.trim()) return [];

    const found = matchLabelFields(text);
    if (found.size < MIN_MATCHED_FIELDS) {
      console.log(`[ocr] ${input.productIdentifier}: text does not look like a label (${found.size} fields), skipping`);
      return [];
    }

    const candidates: CandidateField[] = [];
    for (const [fieldName, values] of found) {
      for (const value of values) {
        candidates.push({ fieldName, value, source: SourceType.TEXT_RECOGNITION });
      }
    }
    console.log(`[ocr] ${input.productIdentifier}: ${candidates.length} candidates across ${found.size} fields`);
    return candidates;
  },
};
