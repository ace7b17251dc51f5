// ===== Net Quantity Units =====
// Maps label spellings to the canonical unit

export const UNIT_MAP: Record<string, string> = {
  g: "g",
  gm: "g",
  gms: "g",
  gr: "g",
  gram: "g",
  grams: "g",
  gramme: "g",
  grammes: "g",

  kg: "kg",
  kgs: "kg",
  kilo: "kg",
  kilogram: "kg",
  kilograms: "kg",

  mg: "mg",
  milligram: "mg",
  milligrams: "mg",

  ml: "ml",
  millilitre: "ml",
  millilitres: "ml",
  milliliter: "ml",
  milliliters: "ml",

  l: "l",
  lt: "l",
  ltr: "l",
  ltrs: "l",
  litre: "l",
  litres: "l",
  liter: "l",
  liters: "l",

  cm: "cm",
  m: "m",

  pc: "pcs",
  pcs: "pcs",
  piece: "pcs",
  pieces: "pcs",
  n: "pcs",
  nos: "pcs",
  unit: "pcs",
  units: "pcs",
  tablets: "pcs",
  capsules: "pcs",
  pack: "pack",
  packs: "pack",
};

export const CANONICAL_UNITS = new Set(Object.values(UNIT_MAP));

// ===== "Not Found" Sentinels =====
// What OCR post-processing and the AI pass write when a field is absent

export const NOT_FOUND_SENTINELS = new Set([
  "not found",
  "not found on package",
  "not available",
  "not mentioned",
  "not specified",
  "n/a",
  "na",
  "nil",
  "none",
  "null",
  "unknown",
  "-",
  "--",
]);

// ===== Manufacturer Names =====
// Trailing legal-entity suffixes dropped from manufacturer keys

export const LEGAL_SUFFIXES = [
  "private limited",
  "pvt ltd",
  "pvt",
  "private",
  "limited",
  "ltd",
  "llp",
  "inc",
  "incorporated",
  "corporation",
  "corp",
  "company",
  "co",
];

// ===== Countries =====

export const COUNTRY_ALIASES: Record<string, string> = {
  india: "INDIA",
  bharat: "INDIA",
  usa: "USA",
  "u.s.a": "USA",
  "united states": "USA",
  "united states of america": "USA",
  uk: "UK",
  "united kingdom": "UK",
  england: "UK",
  germany: "GERMANY",
  france: "FRANCE",
  italy: "ITALY",
  spain: "SPAIN",
  netherlands: "NETHERLANDS",
  switzerland: "SWITZERLAND",
  china: "CHINA",
  prc: "CHINA",
  japan: "JAPAN",
  korea: "SOUTH KOREA",
  "south korea": "SOUTH KOREA",
  thailand: "THAILAND",
  vietnam: "VIETNAM",
  malaysia: "MALAYSIA",
  indonesia: "INDONESIA",
  singapore: "SINGAPORE",
  "sri lanka": "SRI LANKA",
  bangladesh: "BANGLADESH",
  nepal: "NEPAL",
  uae: "UAE",
  "united arab emirates": "UAE",
  turkey: "TURKEY",
  brazil: "BRAZIL",
  australia: "AUSTRALIA",
  "new zealand": "NEW ZEALAND",
  canada: "CANADA",
};
