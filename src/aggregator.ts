import type { AggregateStatistics, NormalizedRecord, PriorityLevel } from "./types";
import { round1 } from "./utils";

export const TOP_INDUSTRIES = 5;

/** Counts in first-seen order. */
export function frequency<T>(values: Iterable<T>): Map<T, number> {
  const counts = new Map<T, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return counts;
}

/** Highest counts first; equal counts keep first-seen order (Array.prototype.sort is stable). */
export function mostCommon<T>(counts: Map<T, number>, limit?: number): Array<[T, number]> {
  const ranked = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function uniqueCompanies(records: readonly NormalizedRecord[]): number {
  return new Set(records.map((r) => r.company_name)).size;
}

export function responseRatePercent(detected: number, total: number): number {
  return total > 0 ? round1((detected / total) * 100) : 0;
}

export function computeStatistics(records: readonly NormalizedRecord[]): AggregateStatistics {
  const industries = frequency(
    records.flatMap((r) => (r.industry_sector ? [r.industry_sector] : []))
  );
  const pollution = frequency(records.flatMap((r) => r.pollution_categories));
  const priorities = frequency(records.map((r) => r.activist_priority_level));
  const priority_distribution: Record<PriorityLevel, number> = {
    high: priorities.get("high") ?? 0,
    medium: priorities.get("medium") ?? 0,
    low: priorities.get("low") ?? 0,
  };
  const detected = records.filter((r) => r.company_response.detected).length;

  return {
    total_records: records.length,
    unique_companies: uniqueCompanies(records),
    industry_breakdown: Object.fromEntries(mostCommon(industries, TOP_INDUSTRIES)),
    pollution_categories: Object.fromEntries(mostCommon(pollution)),
    priority_distribution,
    company_responses_detected: detected,
    response_rate_percent: responseRatePercent(detected, records.length),
  };
}
