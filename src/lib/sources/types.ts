import type { CandidateField, SourceType } from "../types";

export type Platform = "amazon" | "flipkart";

export interface ProductPage {
  platform: Platform;
  html: string;
  url?: string;
}

/**
 * Everything already obtained for one product. Each adapter reads the
 * part it understands and ignores the rest.
 */
export interface LabelSources {
  productIdentifier: string;
  ocrText?: string;
  productPage?: ProductPage;
}

/** Unified adapter interface: one per evidence source */
export interface SourceAdapter {
  name: string;
  source: SourceType;
  extract(input: LabelSources): Promise<CandidateField[]>;
}
