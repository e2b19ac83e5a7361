export * from "./types";
export { EXTRACTION_PROMPT, EXTRACTION_SCHEMA } from "./schema";
export { generateRecordId, normalizeEntity, normalizePage, resolvePageContext } from "./normalizer";
export { computeStatistics, frequency, mostCommon } from "./aggregator";
export { discoverPageUrls, SEED_URLS } from "./discovery";
export { extractPage, type PageResult } from "./extraction";
export { runPipeline, type PipelineDeps, type PipelineOptions, type PipelineRun } from "./pipeline";
export { buildArtifact, writeArtifact } from "./artifactWriter";
export { FirecrawlClient, type FirecrawlConfig } from "./adapters/firecrawl";
export { loadConfig, type RunConfig } from "./config";
export * from "./errors";
