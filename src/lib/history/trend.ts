import { TrendDirection, type ManufacturerAggregate, type ManufacturerHistoryEntry } from "../types";

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Compare the mean of the last `window` scores with the mean of the
 * `window` scores before them. Scores are oldest first.
 */
export function computeTrend(scores: readonly number[], window: number, epsilon: number): TrendDirection {
  if (window < 1 || scores.length < 2 * window) return TrendDirection.INSUFFICIENT_DATA;

  const recent = scores.slice(-window);
  const previous = scores.slice(-2 * window, -window);
  const delta = mean(recent) - mean(previous);

  if (delta > epsilon) return TrendDirection.IMPROVING;
  if (delta < -epsilon) return TrendDirection.DECLINING;
  return TrendDirection.STABLE;
}

export interface AggregateOptions {
  trendWindow: number;
  trendEpsilon: number;
  compliantThreshold: number;
}

/**
 * Order entries by timestamp, keeping append order on ties.
 * Array.prototype.sort is stable, so equal keys keep their input order.
 */
export function orderEntries(entries: readonly ManufacturerHistoryEntry[]): ManufacturerHistoryEntry[] {
  return entries
    .map((entry, index) => ({ entry, index, at: Date.parse(entry.timestamp) }))
    .sort((a, b) => {
      const at = (Number.isNaN(a.at) ? 0 : a.at) - (Number.isNaN(b.at) ? 0 : b.at);
      return at !== 0 ? at : a.index - b.index;
    })
    .map((e) => e.entry);
}

/** Rebuild a manufacturer snapshot from its full entry log */
export function buildAggregate(
  manufacturerKey: string,
  entries: readonly ManufacturerHistoryEntry[],
  opts: AggregateOptions
): ManufacturerAggregate | null {
  if (entries.length === 0) return null;

  const ordered = orderEntries(entries);
  const scores = ordered.map((e) => e.score);
  const latest = ordered[ordered.length - 1];

  return {
    manufacturerKey,
    manufacturerName: latest.manufacturerName,
    count: ordered.length,
    meanScore: mean(scores),
    compliantCount: scores.filter((s) => s >= opts.compliantThreshold).length,
    trend: computeTrend(scores, opts.trendWindow, opts.trendEpsilon),
    lastEntryAt: latest.timestamp,
  };
}
