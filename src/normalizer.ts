import type { Logger } from "pino";
import {
  POLLUTION_CATEGORIES,
  PRIORITY_LEVELS,
  RESPONSE_TYPES,
  type CompanyResponse,
  type Location,
  type NormalizedRecord,
  type PageContext,
  type PageExtraction,
  type PollutionCategory,
  type PriorityLevel,
  type RawEntity,
  type RawLocation,
  type ResponseType,
} from "./types";
import { describeRawEntityErrors, isRawEntity } from "./validator";
import { md5, presentString } from "./utils";

export const SOURCE_ORGANIZATION = "Greenpeace";
export const RECORD_ID_PREFIX = "GP";
export const UNKNOWN_CAMPAIGN = "Unknown Campaign";
export const DEFAULT_PRIORITY: PriorityLevel = "medium";

const NAME_KEY_LENGTH = 10;
const URL_HASH_LENGTH = 6;

/**
 * Deterministic record id: `GP_<year>_<NAME10>_<urlhash6>`.
 * Two different entities can share an id (same truncated name on the same page); nothing checks for that.
 */
export function generateRecordId(companyName: string | null | undefined, sourceUrl: string, year: number): string {
  const short = companyName
    ? companyName.replace(/[\s,]+/g, "").slice(0, NAME_KEY_LENGTH).toUpperCase()
    : "";
  const urlHash = md5(sourceUrl).slice(0, URL_HASH_LENGTH);
  return [RECORD_ID_PREFIX, year, short || "UNKNOWN", urlHash].join("_");
}

function isPriorityLevel(s: string): s is PriorityLevel {
  return PRIORITY_LEVELS.some((p) => p === s);
}

function isPollutionCategory(s: string): s is PollutionCategory {
  return POLLUTION_CATEGORIES.some((c) => c === s);
}

function isResponseType(s: string): s is ResponseType {
  return RESPONSE_TYPES.some((r) => r === s);
}

export function resolvePriority(value: string | null | undefined): PriorityLevel {
  const p = presentString(value)?.toLowerCase();
  return p && isPriorityLevel(p) ? p : DEFAULT_PRIORITY;
}

export function resolvePageContext(url: string, page: PageExtraction, scrapedAt: Date): PageContext {
  return {
    url,
    campaignName: presentString(page.campaign_name) ?? UNKNOWN_CAMPAIGN,
    priority: resolvePriority(page.campaign_priority),
    scrapedAt,
  };
}

function categories(values: RawEntity["pollution_categories"]): PollutionCategory[] {
  const seen = new Set<PollutionCategory>();
  for (const v of values ?? []) {
    const c = presentString(v)?.toLowerCase();
    if (c && isPollutionCategory(c)) seen.add(c);
  }
  return Array.from(seen);
}

function textList(values: Array<string | null> | null | undefined): string[] {
  const out: string[] = [];
  for (const v of values ?? []) {
    const t = presentString(v);
    if (t) out.push(t);
  }
  return out;
}

function location(raw: RawLocation | null | undefined): Location | null {
  if (!raw) return null;
  const loc = {
    site: presentString(raw.site),
    region: presentString(raw.region),
    country: presentString(raw.country),
  };
  return loc.site || loc.region || loc.country ? loc : null;
}

function companyResponse(entity: RawEntity): CompanyResponse {
  if (entity.company_response_detected !== true) {
    return { detected: false, response_type: null, response_summary: null };
  }
  const type = presentString(entity.response_type)?.toLowerCase();
  return {
    detected: true,
    response_type: type && isResponseType(type) ? type : null,
    response_summary: presentString(entity.response_summary),
  };
}

export function normalizeEntity(entity: RawEntity, ctx: PageContext): NormalizedRecord {
  const companyName = entity.company_name.trim();
  return {
    record_id: generateRecordId(companyName, ctx.url, ctx.scrapedAt.getUTCFullYear()),
    source_organization: SOURCE_ORGANIZATION,
    source_url: ctx.url,
    scrape_date: ctx.scrapedAt.toISOString(),

    company_name: companyName,
    industry_sector: presentString(entity.industry_sector),

    campaign_name: ctx.campaignName,
    activist_priority_level: ctx.priority,

    pollution_categories: categories(entity.pollution_categories),
    specific_issues: textList(entity.specific_issues),
    pollutants: textList(entity.pollutants),
    project_or_asset: presentString(entity.project_or_asset),
    location: location(entity.location),

    accusation_summary: entity.accusation_summary.trim(),
    evidence_excerpt: presentString(entity.evidence_excerpt),
    claim_date: presentString(entity.claim_date),

    company_response: companyResponse(entity),

    extraction_confidence: "high",
    needs_manual_review: false,
  };
}

/**
 * All records for one page. Pages not flagged `has_campaign_targets` yield none,
 * whatever their entity list holds; malformed entities are logged and dropped.
 */
export function normalizePage(
  url: string,
  page: PageExtraction,
  scrapedAt: Date,
  log: Logger
): NormalizedRecord[] {
  if (page.has_campaign_targets !== true) return [];

  const ctx = resolvePageContext(url, page, scrapedAt);
  const records: NormalizedRecord[] = [];
  (page.target_companies ?? []).forEach((entity, index) => {
    if (!isRawEntity(entity)) {
      log.warn({ url, index, errors: describeRawEntityErrors() }, "Skipping malformed entity");
      return;
    }
    records.push(normalizeEntity(entity, ctx));
  });
  return records;
}
