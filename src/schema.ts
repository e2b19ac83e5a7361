import { POLLUTION_CATEGORIES, PRIORITY_LEVELS, RESPONSE_TYPES } from "./types";

/** Output schema handed to the extraction service with every page. */
export const EXTRACTION_SCHEMA = {
  type: "object",
  properties: {
    has_campaign_targets: {
      type: "boolean",
      description: "Whether this page describes a campaign targeting specific companies for pollution",
    },
    campaign_name: {
      type: "string",
      description: "Name of the campaign or issue, if clearly stated",
    },
    campaign_priority: {
      type: "string",
      enum: [...PRIORITY_LEVELS],
      description:
        "Prominence of the campaign on the page. high = featured campaign with detailed info, medium = mentioned with some details, low = brief mention",
    },
    target_companies: {
      type: "array",
      description: "Companies being targeted for pollution violations",
      items: {
        type: "object",
        properties: {
          company_name: { type: "string", description: "Exact name of the company as mentioned" },
          industry_sector: {
            type: "string",
            description:
              "Industry sector (e.g. oil & gas, coal, petrochemical, manufacturing, fashion, electronics, insurance, finance)",
          },
          pollution_categories: {
            type: "array",
            description: "Broad categories of pollution",
            items: { type: "string", enum: [...POLLUTION_CATEGORIES] },
          },
          specific_issues: {
            type: "array",
            description: "Specific environmental issues (e.g. methane leaks, water contamination, deforestation)",
            items: { type: "string" },
          },
          pollutants: {
            type: "array",
            description: "Specific chemicals or pollutants mentioned (e.g. methane, benzene, mercury, microplastics)",
            items: { type: "string" },
          },
          project_or_asset: {
            type: "string",
            description: "Specific project, facility, or asset mentioned",
          },
          location: {
            type: "object",
            description: "Geographic location details",
            properties: {
              site: { type: "string", description: "Specific site or facility name" },
              region: { type: "string", description: "State, province, or region" },
              country: { type: "string", description: "Country" },
            },
          },
          accusation_summary: {
            type: "string",
            description: "Clear summary of what the company is accused of (2-3 sentences max)",
          },
          evidence_excerpt: {
            type: "string",
            description: "Verbatim quote from the page supporting the accusation",
          },
          claim_date: {
            type: "string",
            description: "Date the claim or campaign was made, YYYY-MM-DD if available, otherwise null",
          },
          company_response_detected: {
            type: "boolean",
            description: "Whether the page mentions any company response (lawsuit, statement, policy change, denial)",
          },
          response_type: {
            type: ["string", "null"],
            enum: [...RESPONSE_TYPES, null],
            description: "Type of company response if mentioned. slapp_lawsuit = Strategic Lawsuit Against Public Participation",
          },
          response_summary: {
            type: "string",
            description: "Brief summary of the company response if mentioned",
          },
        },
        required: ["company_name", "pollution_categories", "accusation_summary"],
      },
    },
  },
  required: ["has_campaign_targets", "target_companies"],
} as const;

export const EXTRACTION_PROMPT = `Extract information about companies being targeted by Greenpeace for pollution violations.

CRITICAL RULES:
- Only include companies that are explicitly named as targets of criticism or campaigns
- Do NOT include Greenpeace itself, partner organizations, or companies mentioned positively
- Only include companies clearly associated with pollution/environmental harm
- Pollution categories must be from: ${POLLUTION_CATEGORIES.join(", ")}
- For location, extract as much detail as available (site, region/state, country)
- For dates, use YYYY-MM-DD format if you can determine a specific date, otherwise null
- For evidence_excerpt, copy verbatim text from the page (direct quote)
- For accusation_summary, write a clear 2-3 sentence summary in your own words
- Identify company responses like lawsuits (especially SLAPP suits), denials, or policy changes
- Campaign priority: HIGH if prominently featured with detailed info, MEDIUM if mentioned with some context, LOW if brief mention
- Be conservative - if unsure whether a company is a target, do not include it`;

const nullableString = { type: ["string", "null"] } as const;
const stringList = { type: ["array", "null"], items: { type: ["string", "null"] } } as const;

/** Shape a single raw entity must have before it can become a record. */
export const RawEntitySchema = {
  type: "object",
  properties: {
    company_name: { type: "string", minLength: 1, pattern: "\\S" },
    industry_sector: nullableString,
    pollution_categories: stringList,
    specific_issues: stringList,
    pollutants: stringList,
    project_or_asset: nullableString,
    location: {
      type: ["object", "null"],
      properties: {
        site: nullableString,
        region: nullableString,
        country: nullableString,
      },
    },
    accusation_summary: { type: "string", minLength: 1, pattern: "\\S" },
    evidence_excerpt: nullableString,
    claim_date: nullableString,
    company_response_detected: { type: ["boolean", "null"] },
    response_type: nullableString,
    response_summary: nullableString,
  },
  required: ["company_name", "accusation_summary"],
} as const;

export const MapResponseSchema = {
  type: "object",
  properties: {
    links: { type: ["array", "null"] },
  },
} as const;

export const PageExtractionSchema = {
  type: "object",
  properties: {
    has_campaign_targets: { type: "boolean" },
    campaign_name: nullableString,
    campaign_priority: nullableString,
    target_companies: { type: ["array", "null"] },
  },
} as const;

const countTable = { type: "object", additionalProperties: { type: "integer", minimum: 1 } } as const;

const RecordSchema = {
  type: "object",
  properties: {
    record_id: { type: "string", pattern: "^GP_\\d{4}_\\S+_[0-9a-f]{6}$" },
    source_organization: { type: "string" },
    source_url: { type: "string", minLength: 1 },
    scrape_date: { type: "string", minLength: 1 },
    company_name: { type: "string", minLength: 1 },
    industry_sector: nullableString,
    campaign_name: { type: "string" },
    activist_priority_level: { type: "string", enum: [...PRIORITY_LEVELS] },
    pollution_categories: { type: "array", items: { type: "string", enum: [...POLLUTION_CATEGORIES] } },
    specific_issues: { type: "array", items: { type: "string" } },
    pollutants: { type: "array", items: { type: "string" } },
    project_or_asset: nullableString,
    location: {
      type: ["object", "null"],
      properties: { site: nullableString, region: nullableString, country: nullableString },
      required: ["site", "region", "country"],
      additionalProperties: false,
    },
    accusation_summary: { type: "string", minLength: 1 },
    evidence_excerpt: nullableString,
    claim_date: nullableString,
    company_response: {
      type: "object",
      properties: {
        detected: { type: "boolean" },
        response_type: { type: ["string", "null"], enum: [...RESPONSE_TYPES, null] },
        response_summary: nullableString,
      },
      required: ["detected", "response_type", "response_summary"],
      additionalProperties: false,
    },
    extraction_confidence: { type: "string", enum: ["high"] },
    needs_manual_review: { type: "boolean" },
  },
  required: [
    "record_id",
    "source_organization",
    "source_url",
    "scrape_date",
    "company_name",
    "industry_sector",
    "campaign_name",
    "activist_priority_level",
    "pollution_categories",
    "specific_issues",
    "pollutants",
    "project_or_asset",
    "location",
    "accusation_summary",
    "evidence_excerpt",
    "claim_date",
    "company_response",
    "extraction_confidence",
    "needs_manual_review",
  ],
  additionalProperties: false,
} as const;

export const ArtifactSchema = {
  type: "object",
  properties: {
    metadata: {
      type: "object",
      properties: {
        scrape_date: { type: "string", minLength: 1 },
        source_organization: { type: "string" },
        total_records: { type: "integer", minimum: 0 },
        unique_companies: { type: "integer", minimum: 0 },
        test_mode: { type: "boolean" },
      },
      required: ["scrape_date", "source_organization", "total_records", "unique_companies", "test_mode"],
      additionalProperties: false,
    },
    summary_statistics: {
      type: "object",
      properties: {
        industry_breakdown: countTable,
        pollution_categories: countTable,
        priority_distribution: {
          type: "object",
          properties: {
            high: { type: "integer", minimum: 0 },
            medium: { type: "integer", minimum: 0 },
            low: { type: "integer", minimum: 0 },
          },
          required: ["high", "medium", "low"],
          additionalProperties: false,
        },
        company_responses_detected: { type: "integer", minimum: 0 },
        response_rate_percent: { type: "number", minimum: 0, maximum: 100 },
      },
      required: [
        "industry_breakdown",
        "pollution_categories",
        "priority_distribution",
        "company_responses_detected",
        "response_rate_percent",
      ],
      additionalProperties: false,
    },
    records: { type: "array", items: RecordSchema },
  },
  required: ["metadata", "summary_statistics", "records"],
  additionalProperties: false,
} as const;
