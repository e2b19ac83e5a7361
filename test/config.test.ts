import { describe, it, expect } from "vitest";
import { DEFAULTS, loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

const env = { FIRECRAWL_API_KEY: "test-key" };

describe("loadConfig", () => {
  it("requires the API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ FIRECRAWL_API_KEY: "  " })).toThrow(/FIRECRAWL_API_KEY not set/);
  });

  it("applies defaults", () => {
    expect(loadConfig(env)).toEqual({
      apiKey: "test-key",
      apiUrl: DEFAULTS.apiUrl,
      mode: "sample",
      outputPath: "output/greenpeace_targets.json",
      pageDelayMs: 2000,
      pollIntervalMs: 2000,
      timeoutMs: 60000,
      discovery: true,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ...env,
      FIRECRAWL_API_URL: "http://localhost:3002",
      SCRAPE_MODE: "FULL",
      OUTPUT_PATH: "data/out.json",
      PAGE_DELAY_MS: "0",
      EXTRACT_POLL_INTERVAL_MS: "500",
      FIRECRAWL_TIMEOUT_MS: "1000",
    });
    expect(config).toMatchObject({
      apiUrl: "http://localhost:3002",
      mode: "full",
      outputPath: "data/out.json",
      pageDelayMs: 0,
      pollIntervalMs: 500,
      timeoutMs: 1000,
    });
  });

  it("rejects bad numbers and modes", () => {
    expect(() => loadConfig({ ...env, PAGE_DELAY_MS: "-1" })).toThrow(
      'PAGE_DELAY_MS must be a non-negative integer, got "-1"'
    );
    expect(() => loadConfig({ ...env, SCRAPE_MODE: "everything" })).toThrow(ConfigError);
  });

  it("lets flags override the environment", () => {
    const config = loadConfig({ ...env, SCRAPE_MODE: "sample" }, ["--full", "--output", "x.json", "--no-discovery"]);
    expect(config.mode).toBe("full");
    expect(config.outputPath).toBe("x.json");
    expect(config.discovery).toBe(false);
    expect(loadConfig({ ...env, SCRAPE_MODE: "full" }, ["--sample"]).mode).toBe("sample");
  });

  it("rejects unknown flags and a dangling --output", () => {
    expect(() => loadConfig(env, ["--fast"])).toThrow("Unknown argument: --fast");
    expect(() => loadConfig(env, ["--output"])).toThrow("--output requires a path");
  });
});
