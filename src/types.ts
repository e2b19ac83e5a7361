export const POLLUTION_CATEGORIES = [
  "air",
  "water",
  "land",
  "nuclear",
  "toxic_waste",
  "climate",
] as const;
export type PollutionCategory = (typeof POLLUTION_CATEGORIES)[number];

export const PRIORITY_LEVELS = ["high", "medium", "low"] as const;
export type PriorityLevel = (typeof PRIORITY_LEVELS)[number];

export const RESPONSE_TYPES = [
  "lawsuit",
  "slapp_lawsuit",
  "public_statement",
  "policy_change",
  "denial",
  "no_response",
] as const;
export type ResponseType = (typeof RESPONSE_TYPES)[number];

export type RawLocation = {
  site?: string | null;
  region?: string | null;
  country?: string | null;
};

/** One company as returned by the extraction service for one page. */
export type RawEntity = {
  company_name: string;
  industry_sector?: string | null;
  pollution_categories?: Array<string | null> | null;
  specific_issues?: Array<string | null> | null;
  pollutants?: Array<string | null> | null;
  project_or_asset?: string | null;
  location?: RawLocation | null;
  accusation_summary: string;
  evidence_excerpt?: string | null;
  claim_date?: string | null;
  company_response_detected?: boolean | null;
  /** Free text as sent; only known response types reach the record. */
  response_type?: string | null;
  response_summary?: string | null;
};

/** First element of the extraction service's `data`. Entities are checked one by one later. */
export type PageExtraction = {
  has_campaign_targets?: boolean;
  campaign_name?: string | null;
  campaign_priority?: string | null;
  target_companies?: unknown[] | null;
};

export type PageContext = {
  url: string;
  campaignName: string;
  priority: PriorityLevel;
  scrapedAt: Date;
};

export type Location = {
  site: string | null;
  region: string | null;
  country: string | null;
};

export type CompanyResponse = {
  detected: boolean;
  response_type: ResponseType | null;
  response_summary: string | null;
};

export type NormalizedRecord = {
  record_id: string;
  source_organization: string;
  source_url: string;
  scrape_date: string;

  company_name: string;
  industry_sector: string | null;

  campaign_name: string;
  activist_priority_level: PriorityLevel;

  pollution_categories: PollutionCategory[];
  specific_issues: string[];
  pollutants: string[];
  project_or_asset: string | null;
  location: Location | null;

  accusation_summary: string;
  evidence_excerpt: string | null;
  claim_date: string | null;

  company_response: CompanyResponse;

  extraction_confidence: "high";
  needs_manual_review: boolean;
};

export type AggregateStatistics = {
  total_records: number;
  unique_companies: number;
  industry_breakdown: Record<string, number>;
  pollution_categories: Record<string, number>;
  priority_distribution: Record<PriorityLevel, number>;
  company_responses_detected: number;
  response_rate_percent: number;
};

export type ArtifactMetadata = {
  scrape_date: string;
  source_organization: string;
  total_records: number;
  unique_companies: number;
  test_mode: boolean;
};

export type Artifact = {
  metadata: ArtifactMetadata;
  summary_statistics: Omit<AggregateStatistics, "total_records" | "unique_companies">;
  records: NormalizedRecord[];
};

export type ScrapeMode = "full" | "sample";

export type ExtractRequest = {
  urls: string[];
  schema: object;
  prompt: string;
};

export type ExtractResponse = {
  data: unknown[];
};

export type MapRequest = {
  url: string;
  search: string;
};

/** Site-map reply as received; `links` entries are checked before use. */
export type MapResponse = {
  links?: unknown;
};

/** Page-to-entities extraction, provided by an external service. */
export interface ExtractionService {
  extract(request: ExtractRequest): Promise<ExtractResponse>;
}

/** Site mapping (link discovery), provided by an external service. */
export interface SiteMapService {
  map(request: MapRequest): Promise<MapResponse>;
}
