import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import { config } from "../config";
import { describeError } from "../errors";
import { FieldName, SourceType, type CandidateField } from "../types";
import type { LabelSources, SourceAdapter } from "./types";

const TOOL_NAME = "report_label_fields";

const nullableText = (description: string) => ({
  type: ["string", "null"],
  description: `${description} null if it is not printed on the label.`,
});

const REPORT_LABEL_FIELDS_TOOL: Anthropic.Tool = {
  name: TOOL_NAME,
  description:
    "Report the Legal Metrology declarations printed on a packaged product label. Use null for any field you could not find.",
  input_schema: {
    type: "object" as const,
    properties: {
      mrp: nullableText('Maximum retail price with currency, e.g. "MRP ₹120.00".'),
      net_quantity: nullableText('Net quantity with unit, e.g. "500 g" or "1 L".'),
      manufacturer_name: nullableText("Name of the manufacturer, packer or marketer, without address."),
      country_of_origin: nullableText("Country of origin or manufacture."),
      consumer_care: nullableText("Consumer care phone number and/or email address."),
      manufacture_date: nullableText("Date of manufacture or packing as printed."),
      best_before: nullableText("Best before / expiry date or shelf life as printed."),
      batch_number: nullableText("Batch or lot number."),
      license_number: nullableText("FSSAI licence number (14 digits)."),
    },
    required: [
      "mrp",
      "net_quantity",
      "manufacturer_name",
      "country_of_origin",
      "consumer_care",
      "manufacture_date",
      "best_before",
      "batch_number",
      "license_number",
    ],
  },
};

const ReportedFieldsZ = z.object({
  mrp: z.string().nullish(),
  net_quantity: z.string().nullish(),
  manufacturer_name: z.string().nullish(),
  country_of_origin: z.string().nullish(),
  consumer_care: z.string().nullish(),
  manufacture_date: z.string().nullish(),
  best_before: z.string().nullish(),
  batch_number: z.string().nullish(),
  license_number: z.string().nullish(),
});

type ReportedFields = z.infer<typeof ReportedFieldsZ>;

const REPORTED_FIELDS: [keyof ReportedFields, FieldName][] = [
  ["mrp", FieldName.MRP],
  ["net_quantity", FieldName.NET_QUANTITY],
  ["manufacturer_name", FieldName.MANUFACTURER_NAME],
  ["country_of_origin", FieldName.COUNTRY_OF_ORIGIN],
  ["consumer_care", FieldName.CONSUMER_CARE],
  ["manufacture_date", FieldName.MANUFACTURE_DATE],
  ["best_before", FieldName.BEST_BEFORE],
  ["batch_number", FieldName.BATCH_NUMBER],
  ["license_number", FieldName.LICENSE_NUMBER],
];

function buildPrompt(ocrText: string): string {
  return `You are checking a packaged product label against the Indian Legal Metrology (Packaged Commodities) Rules, 2011.
The text below was produced by OCR and may contain misread characters, broken lines or text from unrelated parts of the pack.
Re-read it and report each declaration exactly as printed, correcting obvious OCR mistakes only.

OCR TEXT:
"""
${ocrText}
"""`;
}

let client: Anthropic | null = null;

function getClient(): Anthropic | null {
  if (!config.anthropicApiKey) return null;
  if (!client) {
    client = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return client;
}

export function toCandidates(reported: ReportedFields): CandidateField[] {
  const candidates: CandidateField[] = [];
  for (const [key, fieldName] of REPORTED_FIELDS) {
    const value = reported[key];
    if (value === null || value === undefined) continue;
    candidates.push({ fieldName, value, source: SourceType.AI_ENHANCEMENT });
  }
  return candidates;
}

export interface AiEnhancementOptions {
  client?: Anthropic | null; // null turns the lookup off
  model?: string;
  enabled?: boolean;
}

/**
 * Asks the model to re-read the OCR text through a forced tool call.
 * Disabled, keyless or failed lookups yield no candidates.
 */
export function createAiEnhancementAdapter(opts: AiEnhancementOptions = {}): SourceAdapter {
  return {
    name: "ai-enhancement",
    source: SourceType.AI_ENHANCEMENT,

    async extract(input: LabelSources): Promise<CandidateField[]> {
      if (!(opts.enabled ?? config.enableAiEnhancement)) {
        console.log("[ai-enhance] AI enhancement disabled, skipping");
        return [];
      }

      const ocrText = input.ocrText?.trim();
      if (!ocrText) return [];

      const anthropic = opts.client === undefined ? getClient() : opts.client;
      if (!anthropic) {
        console.log("[ai-enhance] No API key, skipping");
        return [];
      }

      let response: Anthropic.Message;
      try {
        response = await anthropic.messages.create({
          model: opts.model ?? config.aiModel,
          max_tokens: 1024,
          tools: [REPORT_LABEL_FIELDS_TOOL],
          tool_choice: { type: "tool", name: TOOL_NAME },
          messages: [{ role: "user", content: buildPrompt(ocrText) }],
        });
      } catch (err) {
        console.error(`[ai-enhance] Request failed for ${input.productIdentifier}: ${describeError(err)}`);
        return [];
      }

      for (const block of response.content) {
        if (block.type !== "tool_use" || block.name !== TOOL_NAME) continue;

        const parsed = ReportedFieldsZ.safeParse(block.input);
        if (!parsed.success) {
          console.warn(`[ai-enhance] Malformed ${TOOL_NAME} input for ${input.productIdentifier}: ${parsed.error.message}`);
          return [];
        }
        const candidates = toCandidates(parsed.data);
        console.log(`[ai-enhance] ${input.productIdentifier}: ${candidates.length} fields reported`);
        return candidates;
      }

      console.warn(`[ai-enhance] No ${TOOL_NAME} call for ${input.productIdentifier}`);
      return [];
    },
  };
}
