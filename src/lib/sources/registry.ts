import type Anthropic from "@anthropic-ai/sdk";
import { describeError } from "../errors";
import { SourceType, type CandidateField } from "../types";
import { createAiEnhancementAdapter } from "./ai-enhancement";
import { platformMetadataAdapter } from "./platform-metadata";
import { textRecognitionAdapter } from "./text-recognition";
import type { LabelSources, SourceAdapter } from "./types";

export interface GetAdaptersOpts {
  sources?: SourceType[] | null;
  aiClient?: Anthropic | null;
  enableAi?: boolean;
}

/** All source adapters in emission order, filtered by options */
export function getSourceAdapters(opts?: GetAdaptersOpts): SourceAdapter[] {
  const all: SourceAdapter[] = [
    textRecognitionAdapter,
    createAiEnhancementAdapter({ client: opts?.aiClient, enabled: opts?.enableAi }),
    platformMetadataAdapter,
  ];

  const wanted = opts?.sources;
  if (!wanted || wanted.length === 0) return all;
  return all.filter((a) => wanted.includes(a.source));
}

/**
 * Run every adapter over the same inputs. Output keeps adapter order, then
 * each adapter's own emission order, so merging it is deterministic.
 * An adapter that throws is logged and contributes nothing.
 */
export async function collectCandidates(
  input: LabelSources,
  adapters: SourceAdapter[] = getSourceAdapters()
): Promise<CandidateField[]> {
  const settled = await Promise.allSettled(adapters.map(async (adapter) => adapter.extract(input)));

  const candidates: CandidateField[] = [];
  settled.forEach((result, i) => {
    if (result.status === "fulfilled") {
      candidates.push(...result.value);
    } else {
      console.error(
        `[sources] ${adapters[i].name} failed for ${input.productIdentifier}: ${describeError(result.reason)}`
      );
    }
  });
  return candidates;
}
