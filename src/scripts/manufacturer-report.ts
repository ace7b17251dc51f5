import fs from "fs";
import path from "path";
import { config } from "../lib/config";
import { loadCatalogue } from "../lib/compliance/catalogue";
import { describeError } from "../lib/errors";
import { FALLBACK_CATEGORY, PRODUCT_CATEGORIES } from "../lib/history/categories";
import { SqliteHistoryStore } from "../lib/history/sqlite-store";
import { HistoryTracker, type ScanHistoryQuery } from "../lib/history/tracker";
import type { ExportFormat, ManufacturerRanking } from "../lib/types";

function pct(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function printRanking(title: string, rows: ManufacturerRanking[]): void {
  console.log(`\n${title}`);
  rows.forEach((r, i) => {
    console.log(`  ${i + 1}. ${r.manufacturerName.padEnd(36)} ${pct(r.meanScore).padStart(7)}  (${r.count} scans)`);
  });
}

async function main() {
  const args = process.argv.slice(2);
  let manufacturer: string | null = null;
  let category: string | null = null;
  let limit: number | undefined;
  let exportFormat: ExportFormat | null = null;
  let outPath: string | null = null;
  let rebuild = false;
  let history = false;
  let categories = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--manufacturer" && args[i + 1]) {
      manufacturer = args[i + 1];
      i++;
    } else if (args[i] === "--category" && args[i + 1]) {
      category = args[i + 1];
      i++;
    } else if (args[i] === "--limit" && args[i + 1]) {
      limit = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === "--export" && (args[i + 1] === "json" || args[i + 1] === "csv")) {
      exportFormat = args[i + 1] === "csv" ? "csv" : "json";
      i++;
    } else if (args[i] === "--out" && args[i + 1]) {
      outPath = args[i + 1];
      i++;
    } else if (args[i] === "--rebuild") {
      rebuild = true;
    } else if (args[i] === "--history") {
      history = true;
    } else if (args[i] === "--categories") {
      categories = true;
    }
  }

  if (category && category !== FALLBACK_CATEGORY && !PRODUCT_CATEGORIES.includes(category)) {
    console.warn(`[report] "${category}" is not a built-in category; known: ${PRODUCT_CATEGORIES.join(", ")}`);
  }

  const catalogue = loadCatalogue(config.cataloguePath);
  const store = SqliteHistoryStore.open(config.dbPath);
  const tracker = new HistoryTracker(store, { compliantThreshold: catalogue.compliantThreshold });
  const query: ScanHistoryQuery = {
    manufacturerName: manufacturer ?? undefined,
    category: category ?? undefined,
    limit: limit !== undefined && Number.isFinite(limit) ? limit : undefined,
  };

  try {
    if (rebuild) await tracker.rebuildAll();

    if (exportFormat) {
      const file = path.resolve(process.cwd(), outPath ?? `data/history-export.${exportFormat}`);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, await tracker.exportHistory(exportFormat, query));
      console.log(`[report] Wrote ${file}`);
      return;
    }

    if (history) {
      const entries = await tracker.getScanHistory(query);
      console.log(`\n=== Scan history (${entries.length}) ===`);
      for (const e of entries) {
        console.log(
          `  ${e.timestamp}  ${e.manufacturerName.padEnd(28)} ${e.productIdentifier.padEnd(20)} ` +
            `${e.category.padEnd(26)} ${pct(e.score).padStart(7)}`
        );
      }
      return;
    }

    if (categories) {
      console.log(`\n=== Categories ===`);
      for (const c of await tracker.getCategoryStats()) {
        console.log(
          `  ${c.category.padEnd(26)} ${pct(c.meanScore).padStart(7)}  ${c.totalScans} scans, ${c.manufacturerCount} manufacturers`
        );
      }
      return;
    }

    if (manufacturer) {
      const analytics = await tracker.getAnalytics(manufacturer, catalogue);
      if (!analytics) {
        console.error(`No history for "${manufacturer}"`);
        process.exitCode = 1;
        return;
      }

      const p = analytics.profile;
      console.log(`\n=== ${p.manufacturerName} (${p.manufacturerKey}) ===`);
      console.log(`Scans: ${p.count}  Compliant: ${p.compliantCount}`);
      console.log(`Mean score: ${pct(p.meanScore)} (${p.complianceLevel})`);
      console.log(`Trend: ${p.trend}`);
      console.log(`Last scan: ${p.lastEntryAt}`);

      console.log(`\nFields present (${analytics.catalogueVersion}):`);
      for (const f of analytics.fieldPresence) {
        console.log(
          `  ${f.fieldName.padEnd(20)} ${f.requirement.padEnd(9)} ${String(f.percentage).padStart(5)}%  (${f.presentCount})`
        );
      }

      console.log(`\nRecent scans:`);
      for (const e of analytics.recentEntries) {
        const missing = e.missingRequired.length > 0 ? `  missing: ${e.missingRequired.join(", ")}` : "";
        console.log(`  ${e.timestamp}  ${e.productIdentifier.padEnd(24)} ${pct(e.score).padStart(7)}${missing}`);
      }
      return;
    }

    const overview = await tracker.compareManufacturers();
    console.log(`\n=== Industry overview ===`);
    console.log(`Manufacturers: ${overview.manufacturerCount}`);
    console.log(`Total scans: ${overview.totalScans}`);
    console.log(`Average score: ${pct(overview.averageScore)}`);
    console.log(
      `Levels: ${Object.entries(overview.levelDistribution)
        .map(([level, n]) => `${level} ${n}`)
        .join(", ")}`
    );
    printRanking("Top performers", overview.topPerformers);
    printRanking("Needs improvement", overview.bottomPerformers);
    printRanking("Most active", overview.mostActive);
  } finally {
    store.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", describeError(err));
  process.exit(1);
});
