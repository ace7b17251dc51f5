import {
  ALL_FIELDS,
  ALL_SOURCES,
  FieldName,
  SourceType,
  type CandidateField,
  type Contender,
  type FieldValue,
  type MergeDiagnostic,
  type MergedField,
  type MergedRecord,
  type RawCandidate,
} from "./types";
import { InputError } from "./errors";
import { FIELD_FORMATS, validateValue, type ValidatorId } from "./validators";

// Priority: text recognition > AI enhancement > platform metadata
export const SOURCE_PRIORITY: Record<SourceType, number> = {
  [SourceType.TEXT_RECOGNITION]: 3,
  [SourceType.AI_ENHANCEMENT]: 2,
  [SourceType.PLATFORM_METADATA]: 1,
};

// Used when a candidate arrives without its own confidence
export const DEFAULT_SOURCE_CONFIDENCE: Record<SourceType, number> = {
  [SourceType.TEXT_RECOGNITION]: 0.9,
  [SourceType.AI_ENHANCEMENT]: 0.8,
  [SourceType.PLATFORM_METADATA]: 0.6,
};

export interface ResolutionStep {
  source: SourceType;
  validator: ValidatorId;
}

const SOURCES_BY_PRIORITY = [...ALL_SOURCES].sort((a, b) => SOURCE_PRIORITY[b] - SOURCE_PRIORITY[a]);

function inPriorityOrder(validator: ValidatorId): readonly ResolutionStep[] {
  return SOURCES_BY_PRIORITY.map((source) => ({ source, validator }));
}

/** Fallback chain per field: the first step with a valid value wins */
export const RESOLUTION_ORDER: Record<FieldName, readonly ResolutionStep[]> = {
  [FieldName.MRP]: inPriorityOrder(FIELD_FORMATS[FieldName.MRP]),
  [FieldName.NET_QUANTITY]: inPriorityOrder(FIELD_FORMATS[FieldName.NET_QUANTITY]),
  [FieldName.MANUFACTURER_NAME]: inPriorityOrder(FIELD_FORMATS[FieldName.MANUFACTURER_NAME]),
  [FieldName.COUNTRY_OF_ORIGIN]: inPriorityOrder(FIELD_FORMATS[FieldName.COUNTRY_OF_ORIGIN]),
  [FieldName.CONSUMER_CARE]: inPriorityOrder(FIELD_FORMATS[FieldName.CONSUMER_CARE]),
  [FieldName.MANUFACTURE_DATE]: inPriorityOrder(FIELD_FORMATS[FieldName.MANUFACTURE_DATE]),
  [FieldName.BEST_BEFORE]: inPriorityOrder(FIELD_FORMATS[FieldName.BEST_BEFORE]),
  [FieldName.BATCH_NUMBER]: inPriorityOrder(FIELD_FORMATS[FieldName.BATCH_NUMBER]),
  [FieldName.LICENSE_NUMBER]: inPriorityOrder(FIELD_FORMATS[FieldName.LICENSE_NUMBER]),
};

export function resolutionOrder(field: FieldName): readonly ResolutionStep[] {
  return RESOLUTION_ORDER[field];
}

// ===== Candidate Parsing =====

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFieldName(name: string): name is FieldName {
  return ALL_FIELDS.some((f) => f === name);
}

export function isSourceType(source: string): source is SourceType {
  return ALL_SOURCES.some((s) => s === source);
}

function toFieldValue(fieldName: FieldName, value: unknown): FieldValue | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (
    fieldName === FieldName.NET_QUANTITY &&
    isRecord(value) &&
    typeof value.magnitude === "number" &&
    typeof value.unit === "string"
  ) {
    return { magnitude: value.magnitude, unit: value.unit };
  }
  return null;
}

/** Check a candidate against the closed field and source enums */
export function parseCandidate(raw: RawCandidate): CandidateField {
  if (!isFieldName(raw.fieldName)) {
    throw new InputError(`Unknown field "${raw.fieldName}"`);
  }
  if (!isSourceType(raw.source)) {
    throw new InputError(`Unknown source "${raw.source}"`);
  }

  const value = toFieldValue(raw.fieldName, raw.value);
  if (value === null) {
    throw new InputError(`Unparseable value for ${raw.fieldName}`, { value: raw.value });
  }

  if (raw.confidence === undefined || raw.confidence === null) {
    return { fieldName: raw.fieldName, value, source: raw.source };
  }
  if (typeof raw.confidence !== "number" || !(raw.confidence >= 0 && raw.confidence <= 1)) {
    throw new InputError(`Confidence must be a number in [0, 1]`, { confidence: raw.confidence });
  }
  return { fieldName: raw.fieldName, value, source: raw.source, confidence: raw.confidence };
}

// ===== Resolution =====

interface IndexedContender extends Contender {
  index: number;
  valid: boolean;
}

function resolveField(field: FieldName, group: { candidate: CandidateField; index: number }[]): MergedField | null {
  const steps = resolutionOrder(field);
  const validatorFor = new Map(steps.map((s) => [s.source, s.validator]));

  const contenders: IndexedContender[] = group.map(({ candidate, index }) => {
    const validator = validatorFor.get(candidate.source) ?? FIELD_FORMATS[field];
    const check = validateValue(validator, candidate.value);
    return {
      index,
      source: candidate.source,
      value: candidate.value,
      confidence: candidate.confidence ?? DEFAULT_SOURCE_CONFIDENCE[candidate.source],
      accepted: false,
      valid: check.valid,
      rejection: check.valid ? null : check.reason,
    };
  });

  let winner: IndexedContender | null = null;
  for (const step of steps) {
    for (const c of contenders) {
      if (c.source !== step.source || !c.valid) continue;
      // Strictly greater keeps the first emitted on equal confidence
      if (!winner || c.confidence > winner.confidence) winner = c;
    }
    if (winner) break;
  }

  if (!winner) return null;

  const chosen = winner;
  const audit: Contender[] = contenders.map((c) => {
    let rejection = c.rejection;
    if (c === chosen) rejection = null;
    else if (c.valid && c.source === chosen.source) rejection = `lower confidence than the chosen ${chosen.source} value`;
    else if (c.valid) rejection = `outranked by ${chosen.source}`;
    return {
      source: c.source,
      value: c.value,
      confidence: c.confidence,
      accepted: c === chosen,
      rejection,
    };
  });

  return {
    value: chosen.value,
    source: chosen.source,
    confidence: chosen.confidence,
    contenders: audit,
  };
}

/**
 * Reconcile every candidate for one product into a single frozen record.
 * Malformed candidates are dropped into `diagnostics`; nothing here throws
 * for bad input. Pass `timestamp` for byte-identical output on replays.
 */
export function mergeCandidates(
  productIdentifier: string,
  rawCandidates: readonly RawCandidate[],
  opts: { timestamp?: string } = {}
): MergedRecord {
  const diagnostics: MergeDiagnostic[] = [];
  const groups = new Map<FieldName, { candidate: CandidateField; index: number }[]>();

  rawCandidates.forEach((raw, index) => {
    let candidate: CandidateField;
    try {
      candidate = parseCandidate(raw);
    } catch (err) {
      if (!(err instanceof InputError)) throw err;
      diagnostics.push({
        index,
        fieldName: String(raw.fieldName),
        source: String(raw.source),
        message: err.message,
      });
      console.warn(`[merge] ${productIdentifier}: dropped candidate #${index} (${raw.fieldName}/${raw.source}): ${err.message}`);
      return;
    }

    const group = groups.get(candidate.fieldName);
    if (group) {
      group.push({ candidate, index });
    } else {
      groups.set(candidate.fieldName, [{ candidate, index }]);
    }
  });

  const fields: Partial<Record<FieldName, MergedField>> = {};
  for (const field of ALL_FIELDS) {
    const group = groups.get(field);
    if (!group) continue;
    const merged = resolveField(field, group);
    if (merged) fields[field] = merged;
  }

  return Object.freeze({
    productIdentifier,
    timestamp: opts.timestamp ?? new Date().toISOString(),
    fields: Object.freeze(fields),
    diagnostics: Object.freeze(diagnostics),
  });
}
