import type { AggregateStatistics, NormalizedRecord } from "./types";

const RULE = "=".repeat(60);

export function describeRecord(r: NormalizedRecord): string {
  const pollution = r.pollution_categories.join(", ");
  const sector = r.industry_sector ?? "unknown sector";
  return `- ${r.company_name} (${sector}) - ${pollution} [${r.activist_priority_level} priority]`;
}

function table(title: string, counts: Record<string, number>): string[] {
  const rows = Object.entries(counts);
  if (rows.length === 0) return [];
  return ["", title, ...rows.map(([k, n]) => `  - ${k}: ${n}`)];
}

/** End-of-run summary, one entry per console line. */
export function formatSummary(stats: AggregateStatistics): string[] {
  const priorities = Object.fromEntries(
    Object.entries(stats.priority_distribution).filter(([, n]) => n > 0)
  );
  return [
    "SUMMARY STATISTICS:",
    RULE,
    `Unique companies: ${stats.unique_companies}`,
    ...table("Top industries targeted:", stats.industry_breakdown),
    ...table("Pollution categories:", stats.pollution_categories),
    ...table("Priority distribution:", priorities),
    "",
    `Company responses detected: ${stats.company_responses_detected} (${stats.response_rate_percent.toFixed(1)}%)`,
    RULE,
  ];
}

export const NO_RECORDS_HINTS: readonly string[] = [
  "No companies found. This could mean:",
  "  - The URLs scraped didn't contain campaign information",
  "  - The content structure is different than expected",
  "  - Try adjusting the URL filters or search terms",
];
