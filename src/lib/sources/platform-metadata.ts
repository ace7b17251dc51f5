import * as cheerio from "cheerio";
import { cleanText } from "../normalization";
import { FieldName, SourceType, type CandidateField } from "../types";
import type { LabelSources, Platform, ProductPage, SourceAdapter } from "./types";

/** Label-relevant facts a marketplace listing exposes */
export interface PageMetadata {
  title: string | null;
  mrp: string | null;
  quantity: string | null;
  manufacturer: string | null;
  origin: string | null;
}

const QUANTITY_IN_TEXT_RE = /(\d+(?:\.\d+)?)\s*(g|kg|ml|l|pcs?|pack)\b/i;
const QUANTITY_IN_TITLE_RE = /\((\d+(?:\.\d+)?)\s*(g|kg|ml|l|pcs?|pack)\)/i;

// Amazon pads detail-table values with bidi marks
function cellText(raw: string): string {
  return cleanText(raw.replace(/[\u200e\u200f]/g, ""));
}

function emptyMetadata(): PageMetadata {
  return { title: null, mrp: null, quantity: null, manufacturer: null, origin: null };
}

export function detectPlatform(url: string): Platform | null {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
  if (/(^|\.)amazon\.[a-z.]+$/.test(host)) return "amazon";
  if (/(^|\.)flipkart\.com$/.test(host)) return "flipkart";
  return null;
}

function applyDetail(data: PageMetadata, heading: string, value: string): void {
  const key = heading.toLowerCase();
  if (!value) return;
  if (key.includes("manufacturer") || key.includes("manufactured by")) data.manufacturer ??= value;
  if (key.includes("country of origin")) data.origin ??= value;
  if (key.includes("net quantity")) data.quantity = value;
}

// ===== Amazon =====

export function parseAmazonPage(html: string): PageMetadata {
  const $ = cheerio.load(html);
  const data = emptyMetadata();

  data.title = cellText($("#productTitle").text()) || null;

  // Struck-through M.R.P. first, then the selling price
  for (const sel of [
    "span.a-price.a-text-price span.a-offscreen",
    "#priceblock_ourprice",
    "#priceblock_dealprice",
    "span.a-price span.a-offscreen",
  ]) {
    const text = cellText($(sel).first().text());
    if (text) {
      data.mrp = text;
      break;
    }
  }

  $("#feature-bullets li span.a-list-item").each((_, el) => {
    if (data.quantity) return;
    const match = $(el).text().match(QUANTITY_IN_TEXT_RE);
    if (match) data.quantity = match[0];
  });

  $("#productDetails_techSpec_section_1 tr, #productDetails_detailBullets_sections1 tr").each((_, row) => {
    applyDetail(data, cellText($(row).find("th").text()), cellText($(row).find("td").text()));
  });

  $("table.a-normal.a-spacing-micro tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length < 2) return;
    applyDetail(data, cellText(cells.eq(0).text()), cellText(cells.eq(1).text()));
  });

  // "Manufacturer : Acme Foods" style detail bullets
  $("#detailBullets_feature_div li").each((_, li) => {
    const parts = $(li).find("span.a-list-item > span");
    if (parts.length < 2) return;
    applyDetail(data, cellText(parts.eq(0).text()).replace(/\s*:\s*$/, ""), cellText(parts.eq(1).text()));
  });

  return data;
}

// ===== Flipkart =====

export function parseFlipkartPage(html: string): PageMetadata {
  const $ = cheerio.load(html);
  const data = emptyMetadata();

  data.title = cellText($("span.VU-ZEz").first().text()) || null;

  for (const sel of ["div._3I9_wc._2p6lqe", "div.Nx9bqj.CxhGGd"]) {
    const text = cellText($(sel).first().text());
    if (text) {
      data.mrp = text;
      break;
    }
  }

  $(".highlight-points ul li").each((_, el) => {
    if (data.quantity) return;
    const match = $(el).text().match(QUANTITY_IN_TEXT_RE);
    if (match) data.quantity = match[0];
  });

  if (!data.quantity && data.title) {
    const match = data.title.match(QUANTITY_IN_TITLE_RE);
    if (match) data.quantity = `${match[1]} ${match[2]}`;
  }

  $("dl._21lJbe").each((_, dl) => {
    const dts = $(dl).find("dt");
    const dds = $(dl).find("dd");
    dts.each((i, dt) => {
      applyDetail(data, cellText($(dt).text()), cellText(dds.eq(i).text()));
    });
  });

  // Older listing layout keeps specifications in a table
  $("div._3k-BhJ tr").each((_, row) => {
    const heading = $(row).find("th, td").first();
    const value = $(row).find("td").last();
    applyDetail(data, cellText(heading.text()), cellText(value.text()));
  });

  return data;
}

export function parseProductPage(page: ProductPage): PageMetadata {
  return page.platform === "amazon" ? parseAmazonPage(page.html) : parseFlipkartPage(page.html);
}

export function metadataToCandidates(data: PageMetadata): CandidateField[] {
  const pairs: [FieldName, string | null][] = [
    [FieldName.MRP, data.mrp],
    [FieldName.NET_QUANTITY, data.quantity],
    [FieldName.MANUFACTURER_NAME, data.manufacturer],
    [FieldName.COUNTRY_OF_ORIGIN, data.origin],
  ];
  const candidates: CandidateField[] = [];
  for (const [fieldName, value] of pairs) {
    if (value) candidates.push({ fieldName, value, source: SourceType.PLATFORM_METADATA });
  }
  return candidates;
}

export const platformMetadataAdapter: SourceAdapter = {
  name: "platform-metadata",
  source: SourceType.PLATFORM_METADATA,

  async extract(input: LabelSources): Promise<CandidateField[]> {
    if (!input.productPage) return [];
    const data = parseProductPage(input.productPage);
    const candidates = metadataToCandidates(data);
    console.log(
      `[platform] ${input.productIdentifier}: ${candidates.length} fields from ${input.productPage.platform} listing` +
        (data.title ? ` "${data.title}"` : "")
    );
    return candidates;
  },
};
