import { FieldName, type FieldValue } from "./types";
import {
  cleanText,
  isBlankValue,
  isLabelDate,
  normalizeCountry,
  hasContactDetails,
  parseBatchCode,
  parseCurrencyAmount,
  parseFssaiLicense,
  parseNetQuantity,
} from "./normalization";

export type ValidationResult = { valid: true } | { valid: false; reason: string };

export type FieldValidator = (value: FieldValue) => ValidationResult;

export const VALIDATOR_IDS = [
  "currency_amount",
  "net_quantity",
  "entity_name",
  "country",
  "contact",
  "label_date",
  "batch_code",
  "fssai_license",
] as const;

export type ValidatorId = (typeof VALIDATOR_IDS)[number];

export function isValidatorId(id: string): id is ValidatorId {
  return VALIDATOR_IDS.some((v) => v === id);
}

const OK: ValidationResult = { valid: true };

function reject(reason: string): ValidationResult {
  return { valid: false, reason };
}

/** Structured values are only meaningful for net quantity */
function textOf(value: FieldValue): string | null {
  return typeof value === "string" ? cleanText(value) : null;
}

export const VALIDATORS: Record<ValidatorId, FieldValidator> = {
  currency_amount(value) {
    const text = textOf(value);
    if (text === null) return reject("expected a price string");
    return parseCurrencyAmount(text) !== null ? OK : reject("not a positive currency amount");
  },

  net_quantity(value) {
    return parseNetQuantity(value) !== null ? OK : reject("no numeric magnitude with a recognised unit");
  },

  entity_name(value) {
    const text = textOf(value);
    if (text === null) return reject("expected a name");
    if (text.length < 3 || !/[a-z].*[a-z]/i.test(text)) return reject("too short to name an entity");
    return OK;
  },

  country(value) {
    const text = textOf(value);
    if (text === null) return reject("expected a country");
    return normalizeCountry(text) !== null ? OK : reject("no recognised country");
  },

  contact(value) {
    const text = textOf(value);
    if (text === null) return reject("expected contact details");
    return hasContactDetails(text) ? OK : reject("no email address or phone number");
  },

  label_date(value) {
    const text = textOf(value);
    if (text === null) return reject("expected a date");
    return isLabelDate(text) ? OK : reject("no date or shelf-life duration");
  },

  batch_code(value) {
    const text = textOf(value);
    if (text === null) return reject("expected a batch code");
    return parseBatchCode(text) !== null ? OK : reject("not a batch/lot code");
  },

  fssai_license(value) {
    const text = textOf(value);
    if (text === null) return reject("expected a licence number");
    return parseFssaiLicense(text) !== null ? OK : reject("FSSAI licence must have 14 digits");
  },
};

// Format check each field must pass before it can win a merge
export const FIELD_FORMATS: Record<FieldName, ValidatorId> = {
  [FieldName.MRP]: "currency_amount",
  [FieldName.NET_QUANTITY]: "net_quantity",
  [FieldName.MANUFACTURER_NAME]: "entity_name",
  [FieldName.COUNTRY_OF_ORIGIN]: "country",
  [FieldName.CONSUMER_CARE]: "contact",
  [FieldName.MANUFACTURE_DATE]: "label_date",
  [FieldName.BEST_BEFORE]: "label_date",
  [FieldName.BATCH_NUMBER]: "batch_code",
  [FieldName.LICENSE_NUMBER]: "fssai_license",
};

/** Empty and "not found" values fail before the format check runs */
export function validateValue(validatorId: ValidatorId, value: FieldValue): ValidationResult {
  if (isBlankValue(value)) return reject("empty or not-found marker");
  return VALIDATORS[validatorId](value);
}
