import type { Logger } from "pino";
import { computeStatistics } from "./aggregator";
import { discoverPageUrls } from "./discovery";
import { extractPage } from "./extraction";
import { describeRecord, formatSummary } from "./report";
import type { AggregateStatistics, ExtractionService, NormalizedRecord, ScrapeMode, SiteMapService } from "./types";
import { sleep as defaultSleep } from "./utils";

export const SAMPLE_SIZE = 5;

export type PipelineDeps = {
  extraction: ExtractionService;
  siteMap?: SiteMapService;
  log: Logger;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type PipelineOptions = {
  mode: ScrapeMode;
  pageDelayMs: number;
};

export type PipelineRun = {
  urls: string[];
  records: NormalizedRecord[];
  failedUrls: string[];
  statistics: AggregateStatistics;
};

/**
 * Discovery, then one page at a time: extract, normalize, accumulate, report,
 * and wait `pageDelayMs` whatever the outcome. Page failures never stop the run.
 */
export async function runPipeline(deps: PipelineDeps, opts: PipelineOptions): Promise<PipelineRun> {
  const { extraction, log } = deps;
  const sleep = deps.sleep ?? defaultSleep;

  log.info({ mode: opts.mode }, "Starting campaign target pipeline");

  let urls = await discoverPageUrls(deps.siteMap, log);
  if (opts.mode === "sample") {
    urls = urls.slice(0, SAMPLE_SIZE);
    log.info({ pages: urls.length }, "Sample mode: processing a bounded subset of pages");
  }

  const state: { records: NormalizedRecord[]; failedUrls: string[] } = { records: [], failedUrls: [] };

  for (const [i, url] of urls.entries()) {
    log.info({ page: i + 1, of: urls.length, url }, "Processing page");

    const result = await extractPage(extraction, url, log, deps.clock);
    if (result.failed) state.failedUrls.push(url);

    if (result.records.length) {
      log.info({ url, found: result.records.length }, "Found target companies");
      for (const r of result.records) log.info(describeRecord(r));
      state.records.push(...result.records);
    } else {
      log.info({ url }, "No target companies found on this page");
    }

    await sleep(opts.pageDelayMs);
  }

  const statistics = computeStatistics(state.records);
  log.info(
    { records: state.records.length, failedPages: state.failedUrls.length },
    "Pipeline complete"
  );
  if (state.records.length) {
    for (const line of formatSummary(statistics)) log.info(line);
  }

  return { urls, records: state.records, failedUrls: state.failedUrls, statistics };
}
