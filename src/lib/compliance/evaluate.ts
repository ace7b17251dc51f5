import {
  ComplianceLevel,
  FieldName,
  FieldStatus,
  Requirement,
  type ComplianceResult,
  type ComplianceSummary,
  type MergedRecord,
} from "../types";
import { validateValue } from "../validators";
import type { RuleCatalogue } from "./catalogue";

// Score bands, highest first
const LEVEL_BANDS: [number, ComplianceLevel][] = [
  [0.9, ComplianceLevel.EXCELLENT],
  [0.75, ComplianceLevel.GOOD],
  [0.5, ComplianceLevel.FAIR],
];

export function complianceLevelFor(score: number): ComplianceLevel {
  for (const [min, level] of LEVEL_BANDS) {
    if (score >= min) return level;
  }
  return ComplianceLevel.POOR;
}

export function fieldStatus(record: MergedRecord, field: FieldName, catalogue: RuleCatalogue): FieldStatus {
  const rule = catalogue.rules.find((r) => r.field === field);
  const merged = record.fields[field];
  if (!rule || !merged) return FieldStatus.MISSING;
  return validateValue(rule.validator, merged.value).valid ? FieldStatus.PRESENT : FieldStatus.INVALID;
}

/**
 * Score a merged record against one catalogue version. Pure: the same
 * record and catalogue always produce an equal result.
 * Invalid fields count as absent for the score but are reported apart.
 */
export function evaluateCompliance(record: MergedRecord, catalogue: RuleCatalogue): ComplianceResult {
  const perFieldStatus: Partial<Record<FieldName, FieldStatus>> = {};
  const missingRequired: FieldName[] = [];
  const missingOptional: FieldName[] = [];
  const invalidFields: FieldName[] = [];
  let presentRequired = 0;

  for (const rule of catalogue.rules) {
    const status = fieldStatus(record, rule.field, catalogue);
    perFieldStatus[rule.field] = status;

    if (status === FieldStatus.INVALID) invalidFields.push(rule.field);

    if (status === FieldStatus.PRESENT) {
      if (rule.requirement === Requirement.REQUIRED) presentRequired++;
    } else if (rule.requirement === Requirement.REQUIRED) {
      missingRequired.push(rule.field);
    } else {
      missingOptional.push(rule.field);
    }
  }

  const requiredTotal = catalogue.requiredCount;
  const score = presentRequired / requiredTotal;

  return {
    catalogueVersion: catalogue.version,
    score,
    presentRequired,
    requiredTotal,
    missingRequired,
    missingOptional,
    invalidFields,
    perFieldStatus,
    complianceLevel: complianceLevelFor(score),
    compliant: score >= catalogue.compliantThreshold,
  };
}

export function summarizeCompliance(result: ComplianceResult): ComplianceSummary {
  return {
    score: `${result.presentRequired}/${result.requiredTotal}`,
    missingRequired: [...result.missingRequired],
    missingOptional: [...result.missingOptional],
  };
}
