import fs from "fs";
import path from "path";
import { z } from "zod";
import { FieldName, Requirement } from "../types";
import { ConfigError, describeError } from "../errors";
import { isFieldName } from "../field-merge";
import { isValidatorId, type ValidatorId } from "../validators";

export interface CatalogueRule {
  field: FieldName;
  requirement: Requirement;
  validator: ValidatorId;
  label: string;
}

export interface RuleCatalogue {
  version: string;
  name: string;
  rules: readonly CatalogueRule[];
  requiredCount: number;
  /** Score at or above which a product counts as compliant */
  compliantThreshold: number;
}

export const DEFAULT_COMPLIANT_THRESHOLD = 0.75;

const CatalogueFieldZ = z.object({
  field: z.string(),
  requirement: z.nativeEnum(Requirement),
  validator: z.string(),
  label: z.string().optional(),
});

const CatalogueDocumentZ = z.object({
  version: z.string().trim().min(1, "catalogue version is required"),
  name: z.string().optional(),
  compliantThreshold: z.number().gt(0).max(1).optional(),
  fields: z.array(CatalogueFieldZ).min(1, "catalogue has no fields"),
});

export type CatalogueDocument = z.infer<typeof CatalogueDocumentZ>;

/**
 * Validate a catalogue document. Anything short of a versioned, non-empty
 * catalogue with at least one required field is a ConfigError: scoring
 * against an empty rule set would report full compliance.
 */
export function parseCatalogue(input: unknown): RuleCatalogue {
  const parsed = CatalogueDocumentZ.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid rule catalogue: ${issues.join("; ")}`, { issues });
  }

  const doc = parsed.data;
  const seen = new Set<FieldName>();
  const rules: CatalogueRule[] = [];

  for (const entry of doc.fields) {
    if (!isFieldName(entry.field)) {
      throw new ConfigError(`Catalogue ${doc.version}: unknown field "${entry.field}"`);
    }
    if (!isValidatorId(entry.validator)) {
      throw new ConfigError(`Catalogue ${doc.version}: unknown validator "${entry.validator}" for ${entry.field}`);
    }
    if (seen.has(entry.field)) {
      throw new ConfigError(`Catalogue ${doc.version}: field "${entry.field}" listed twice`);
    }
    seen.add(entry.field);
    rules.push(
      Object.freeze({
        field: entry.field,
        requirement: entry.requirement,
        validator: entry.validator,
        label: entry.label ?? entry.field,
      })
    );
  }

  const requiredCount = rules.filter((r) => r.requirement === Requirement.REQUIRED).length;
  if (requiredCount === 0) {
    throw new ConfigError(`Catalogue ${doc.version}: no required fields`);
  }

  return Object.freeze({
    version: doc.version.trim(),
    name: doc.name ?? doc.version.trim(),
    rules: Object.freeze(rules),
    requiredCount,
    compliantThreshold: doc.compliantThreshold ?? DEFAULT_COMPLIANT_THRESHOLD,
  });
}

export function loadCatalogue(filePath: string): RuleCatalogue {
  const resolved = path.resolve(process.cwd(), filePath);

  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read rule catalogue at ${resolved}: ${describeError(err)}`);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Rule catalogue at ${resolved} is not valid JSON: ${describeError(err)}`);
  }

  const catalogue = parseCatalogue(doc);
  console.log(
    `[catalogue] Loaded ${catalogue.name} (${catalogue.version}): ${catalogue.rules.length} fields, ${catalogue.requiredCount} required`
  );
  return catalogue;
}
