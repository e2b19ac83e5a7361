import type { Logger } from "pino";
import { normalizePage } from "./normalizer";
import { EXTRACTION_PROMPT, EXTRACTION_SCHEMA } from "./schema";
import type { ExtractionService, NormalizedRecord } from "./types";
import { describePageExtractionErrors, isPageExtraction } from "./validator";
import { errorMessage } from "./utils";

export type PageResult = {
  url: string;
  records: NormalizedRecord[];
  failed: boolean;
  error?: string;
};

/**
 * Extract and normalize one page. Never throws: a failed call or an unusable
 * payload is logged and reported as a failed page with no records.
 */
export async function extractPage(
  service: ExtractionService,
  url: string,
  log: Logger,
  clock: () => Date = () => new Date()
): Promise<PageResult> {
  let data: unknown[];
  try {
    ({ data } = await service.extract({ urls: [url], schema: EXTRACTION_SCHEMA, prompt: EXTRACTION_PROMPT }));
  } catch (err) {
    log.error({ url, err }, "Extraction failed");
    return { url, records: [], failed: true, error: errorMessage(err) };
  }

  const scrapedAt = clock();
  if (data.length === 0) return { url, records: [], failed: false };

  const page = data[0];
  if (!isPageExtraction(page)) {
    const errors = describePageExtractionErrors();
    log.error({ url, errors }, "Extraction returned an unusable page payload");
    return { url, records: [], failed: true, error: errors.join("; ") };
  }

  return { url, records: normalizePage(url, page, scrapedAt, log), failed: false };
}
