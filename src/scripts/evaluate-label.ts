import fs from "fs";
import path from "path";
import { z } from "zod";
import { createEvaluator, type ProductEvaluationInput } from "../lib/pipeline";
import { detectPlatform } from "../lib/sources/platform-metadata";
import { formatFieldValue } from "../lib/normalization";
import { describeError } from "../lib/errors";

const InputFileZ = z.object({
  productIdentifier: z.string().min(1),
  manufacturerName: z.string().optional(),
  productTitle: z.string().optional(),
  category: z.string().optional(),
  timestamp: z.string().optional(),
  ocrText: z.string().optional(),
  productPage: z
    .object({
      platform: z.enum(["amazon", "flipkart"]),
      html: z.string(),
      url: z.string().optional(),
    })
    .optional(),
  candidates: z
    .array(
      z.object({
        fieldName: z.string(),
        value: z.unknown(),
        source: z.string(),
        confidence: z.unknown().optional(),
      })
    )
    .optional(),
});

function usage(): never {
  console.error(
    "Usage: evaluate-label --input <file.json>\n" +
      "       evaluate-label --id <product> [--ocr <text file>] [--html <page file> --url <product url>]\n" +
      "                      [--manufacturer <name>] [--title <product title>] [--category <name>]\n" +
      "                      [--no-history] [--json]"
  );
  process.exit(1);
}

function readText(file: string): string {
  return fs.readFileSync(path.resolve(process.cwd(), file), "utf-8");
}

function readInputFile(file: string): ProductEvaluationInput {
  const parsed = InputFileZ.safeParse(JSON.parse(readText(file)));
  if (!parsed.success) {
    throw new Error(`Invalid input file ${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  const doc = parsed.data;
  return {
    ...doc,
    candidates: doc.candidates?.map((c) => ({
      fieldName: c.fieldName,
      value: c.value,
      source: c.source,
      confidence: c.confidence,
    })),
  };
}

async function main() {
  const args = process.argv.slice(2);
  const flags = new Map<string, string>();
  let trackHistory = true;
  let asJson = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--no-history") {
      trackHistory = false;
    } else if (args[i] === "--json") {
      asJson = true;
    } else if (args[i].startsWith("--") && args[i + 1]) {
      flags.set(args[i].slice(2), args[i + 1]);
      i++;
    } else {
      usage();
    }
  }

  let input: ProductEvaluationInput;
  const inputFile = flags.get("input");
  const id = flags.get("id");
  if (inputFile) {
    input = readInputFile(inputFile);
  } else if (id) {
    input = {
      productIdentifier: id,
      manufacturerName: flags.get("manufacturer"),
      productTitle: flags.get("title"),
      category: flags.get("category"),
    };
    const ocrFile = flags.get("ocr");
    if (ocrFile) input.ocrText = readText(ocrFile);
    const htmlFile = flags.get("html");
    if (htmlFile) {
      const url = flags.get("url") ?? "";
      const platform = detectPlatform(url);
      if (!platform) {
        console.error(`Cannot tell the platform from --url "${url}" (expected an Amazon or Flipkart product URL)`);
        process.exit(1);
      }
      input.productPage = { platform, html: readText(htmlFile), url };
    }
  } else {
    usage();
  }

  const evaluator = createEvaluator({ trackHistory });
  try {
    const report = await evaluator.evaluateProduct(input);

    if (asJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log(`\n=== ${report.productIdentifier} ===`);
    for (const rule of evaluator.catalogue.rules) {
      const merged = report.mergedFields[rule.field];
      const status = report.compliance.perFieldStatus[rule.field] ?? "missing";
      const shown = merged ? `${formatFieldValue(merged.value)}  [${merged.source}]` : "-";
      console.log(`${rule.label.padEnd(34)} ${status.padEnd(8)} ${shown}`);
    }

    console.log(`\n=== Compliance (${report.compliance.catalogueVersion}) ===`);
    console.log(`Score: ${report.complianceSummary.score} (${report.compliance.complianceLevel})`);
    console.log(`Missing required: ${report.complianceSummary.missingRequired.join(", ") || "none"}`);
    console.log(`Missing optional: ${report.complianceSummary.missingOptional.join(", ") || "none"}`);

    console.log(`\n=== History ===`);
    if (report.history.status === "recorded" || report.history.status === "duplicate") {
      const p = report.history.profile;
      console.log(`${report.history.status}: ${p.manufacturerName} (${p.count} scans, mean ${p.meanScore.toFixed(2)}, ${p.trend})`);
    } else {
      console.log(`${report.history.status}: ${report.history.reason}`);
    }

    if (report.diagnostics.length > 0) {
      console.log(`\n=== Dropped candidates ===`);
      for (const d of report.diagnostics) {
        console.log(`#${d.index} ${d.fieldName}/${d.source}: ${d.message}`);
      }
    }
  } finally {
    evaluator.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", describeError(err));
  process.exit(1);
});
