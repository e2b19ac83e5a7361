/**
 * Firecrawl REST client. Implements both collaborator interfaces:
 * site mapping (`/v1/map`) and schema-driven extraction (`/v1/extract`).
 *
 * Extraction jobs are asynchronous on Firecrawl's side; `extract` polls the job
 * until it reaches a terminal status. There is no overall deadline beyond the
 * per-request HTTP timeout.
 */

import axios, { type AxiosInstance } from "axios";
import { ExtractionServiceError } from "../errors";
import { errorMessage, sleep as defaultSleep } from "../utils";
import type {
  ExtractionService,
  ExtractRequest,
  ExtractResponse,
  MapRequest,
  MapResponse,
  SiteMapService,
} from "../types";

export type FirecrawlConfig = {
  apiKey: string;
  apiUrl: string;
  timeoutMs: number;
  pollIntervalMs: number;
};

type FirecrawlMapResponse = {
  success: boolean;
  links?: unknown;
  error?: string;
};

type FirecrawlExtractStartResponse = {
  success: boolean;
  id?: string;
  data?: unknown;
  error?: string;
};

type FirecrawlExtractStatusResponse = {
  success: boolean;
  status?: "processing" | "completed" | "failed" | "cancelled";
  data?: unknown;
  error?: string;
};

export function createHttpClient(config: FirecrawlConfig): AxiosInstance {
  return axios.create({
    baseURL: config.apiUrl,
    timeout: config.timeoutMs,
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${config.apiKey}`,
    },
  });
}

/** Firecrawl returns one object per extract job; callers expect a list. */
function asDataList(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  return data === undefined || data === null ? [] : [data];
}

function httpFailure(err: unknown, operation: string): ExtractionServiceError {
  if (err instanceof ExtractionServiceError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const body: unknown = err.response?.data;
    const detail =
      body && typeof body === "object" && "error" in body && typeof body.error === "string"
        ? body.error
        : err.message;
    return new ExtractionServiceError(`Firecrawl ${operation} failed: ${detail}`, { status, operation });
  }
  return new ExtractionServiceError(`Firecrawl ${operation} failed: ${errorMessage(err)}`, { operation });
}

export class FirecrawlClient implements ExtractionService, SiteMapService {
  private readonly http: AxiosInstance;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    config: FirecrawlConfig,
    http: AxiosInstance = createHttpClient(config),
    sleep: (ms: number) => Promise<void> = defaultSleep
  ) {
    this.http = http;
    this.pollIntervalMs = config.pollIntervalMs;
    this.sleep = sleep;
  }

  async map(request: MapRequest): Promise<MapResponse> {
    try {
      const res = await this.http.post<FirecrawlMapResponse>("/v1/map", {
        url: request.url,
        search: request.search,
      });
      if (!res.data.success) {
        throw new ExtractionServiceError(`Firecrawl map failed: ${res.data.error || "Unknown error"}`, {
          operation: "map",
        });
      }
      return { links: res.data.links };
    } catch (err) {
      throw httpFailure(err, "map");
    }
  }

  async extract(request: ExtractRequest): Promise<ExtractResponse> {
    try {
      const res = await this.http.post<FirecrawlExtractStartResponse>("/v1/extract", {
        urls: request.urls,
        schema: request.schema,
        prompt: request.prompt,
      });
      if (!res.data.success) {
        throw new ExtractionServiceError(`Firecrawl extract failed: ${res.data.error || "Unknown error"}`, {
          operation: "extract",
        });
      }
      if (res.data.data !== undefined) return { data: asDataList(res.data.data) };
      if (!res.data.id) {
        throw new ExtractionServiceError("Firecrawl extract returned neither data nor a job id", {
          operation: "extract",
        });
      }
      return { data: asDataList(await this.waitForExtract(res.data.id)) };
    } catch (err) {
      throw httpFailure(err, "extract");
    }
  }

  private async waitForExtract(jobId: string): Promise<unknown> {
    for (;;) {
      const res = await this.http.get<FirecrawlExtractStatusResponse>(`/v1/extract/${jobId}`);
      const { status, data, error } = res.data;
      if (status === "completed") return data;
      if (status === "failed" || status === "cancelled" || !res.data.success) {
        throw new ExtractionServiceError(`Firecrawl extract job ${status ?? "errored"}: ${error || "Unknown error"}`, {
          operation: "extract",
          jobId,
        });
      }
      await this.sleep(this.pollIntervalMs);
    }
  }
}
