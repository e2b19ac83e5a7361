import { describe, it, expect, vi } from "vitest";
import axios, { AxiosError, type InternalAxiosRequestConfig } from "axios";
import { createHttpClient, FirecrawlClient, type FirecrawlConfig } from "../src/adapters/firecrawl";
import { ExtractionServiceError } from "../src/errors";

const config: FirecrawlConfig = {
  apiKey: "test-key",
  apiUrl: "https://firecrawl.test",
  timeoutMs: 1000,
  pollIntervalMs: 250,
};

type Reply = { status: number; data: unknown };
type Call = { method?: string; url?: string; body: unknown };

/** Axios instance answered in-process by `handler`. */
function stubHttp(handler: (call: Call) => Reply) {
  const calls: Call[] = [];
  const http = axios.create({
    baseURL: config.apiUrl,
    adapter: async (req: InternalAxiosRequestConfig) => {
      const body: unknown = typeof req.data === "string" ? JSON.parse(req.data) : undefined;
      const call = { method: req.method, url: req.url, body };
      calls.push(call);
      const { status, data } = handler(call);
      const response = { data, status, statusText: String(status), headers: {}, config: req };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", req, null, response);
      }
      return response;
    },
  });
  return { http, calls };
}

describe("createHttpClient", () => {
  it("targets the API with bearer auth", () => {
    const http = createHttpClient(config);
    expect(http.defaults.baseURL).toBe("https://firecrawl.test");
    expect(http.defaults.timeout).toBe(1000);
    expect(http.defaults.headers.Authorization).toBe("Bearer test-key");
  });
});

describe("FirecrawlClient.map", () => {
  it("posts the base URL and search terms", async () => {
    const { http, calls } = stubHttp(() => ({
      status: 200,
      data: { success: true, links: ["https://a.test/oil/", { url: "https://a.test/coal/" }] },
    }));
    const client = new FirecrawlClient(config, http);

    const res = await client.map({ url: "https://a.test", search: "toxic" });

    expect(calls).toEqual([{ method: "post", url: "/v1/map", body: { url: "https://a.test", search: "toxic" } }]);
    expect(res.links).toEqual(["https://a.test/oil/", { url: "https://a.test/coal/" }]);
  });

  it("raises when the service reports failure", async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { success: false, error: "Rate limited" } }));
    await expect(new FirecrawlClient(config, http).map({ url: "u", search: "s" })).rejects.toThrow(
      "Firecrawl map failed: Rate limited"
    );
  });

  it("keeps the HTTP status and the service's message", async () => {
    const { http } = stubHttp(() => ({ status: 401, data: { success: false, error: "Unauthorized: Invalid token" } }));

    const err = await new FirecrawlClient(config, http).map({ url: "u", search: "s" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionServiceError);
    if (!(err instanceof ExtractionServiceError)) return;
    expect(err.message).toBe("Firecrawl map failed: Unauthorized: Invalid token");
    expect(err.status).toBe(401);
    expect(err.code).toBe("EXTRACTION_SERVICE_ERROR");
  });
});

describe("FirecrawlClient.extract", () => {
  const request = { urls: ["https://a.test/oil/"], schema: { type: "object" }, prompt: "Extract." };

  it("polls the job until it completes and wraps the result in a list", async () => {
    let polls = 0;
    const page = { has_campaign_targets: false, target_companies: [] };
    const { http, calls } = stubHttp((call) => {
      if (call.method === "post") return { status: 200, data: { success: true, id: "job-1" } };
      polls++;
      return polls < 3
        ? { status: 200, data: { success: true, status: "processing" } }
        : { status: 200, data: { success: true, status: "completed", data: page } };
    });
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await new FirecrawlClient(config, http, sleep).extract(request);

    expect(res).toEqual({ data: [page] });
    expect(calls[0]).toEqual({ method: "post", url: "/v1/extract", body: request });
    expect(calls.slice(1).map((c) => c.url)).toEqual(["/v1/extract/job-1", "/v1/extract/job-1", "/v1/extract/job-1"]);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });

  it("accepts data returned inline", async () => {
    const { http, calls } = stubHttp(() => ({ status: 200, data: { success: true, data: [{ a: 1 }, { b: 2 }] } }));
    expect(await new FirecrawlClient(config, http).extract(request)).toEqual({ data: [{ a: 1 }, { b: 2 }] });
    expect(calls).toHaveLength(1);
  });

  it("treats a completed job without data as an empty list", async () => {
    const { http } = stubHttp((call) =>
      call.method === "post"
        ? { status: 200, data: { success: true, id: "job-2" } }
        : { status: 200, data: { success: true, status: "completed" } }
    );
    expect(await new FirecrawlClient(config, http).extract(request)).toEqual({ data: [] });
  });

  it("raises when the job fails", async () => {
    const { http } = stubHttp((call) =>
      call.method === "post"
        ? { status: 200, data: { success: true, id: "job-3" } }
        : { status: 200, data: { success: false, status: "failed", error: "LLM error" } }
    );
    await expect(new FirecrawlClient(config, http).extract(request)).rejects.toThrow(
      "Firecrawl extract job failed: LLM error"
    );
  });

  it("raises on a server error", async () => {
    const { http } = stubHttp(() => ({ status: 500, data: "Internal Server Error" }));
    await expect(new FirecrawlClient(config, http).extract(request)).rejects.toThrow(
      "Firecrawl extract failed: Request failed with status code 500"
    );
  });
});
