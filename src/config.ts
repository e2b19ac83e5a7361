import { ConfigError } from "./errors";
import type { ScrapeMode } from "./types";

export type RunConfig = {
  apiKey: string;
  apiUrl: string;
  mode: ScrapeMode;
  outputPath: string;
  pageDelayMs: number;
  pollIntervalMs: number;
  timeoutMs: number;
  discovery: boolean;
};

export const DEFAULTS = {
  apiUrl: "https://api.firecrawl.dev",
  mode: "sample",
  outputPath: "output/greenpeace_targets.json",
  pageDelayMs: 2000,
  pollIntervalMs: 2000,
  timeoutMs: 60000,
} as const;

type Env = Record<string, string | undefined>;

function nonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`, { name });
  return Number(raw);
}

function scrapeMode(raw: string | undefined): ScrapeMode {
  const m = raw?.trim().toLowerCase();
  if (!m) return DEFAULTS.mode;
  if (m === "full" || m === "sample") return m;
  throw new ConfigError(`SCRAPE_MODE must be "full" or "sample", got "${raw}"`);
}

/**
 * Run configuration from the environment, with CLI flags taking precedence:
 * `--full`, `--sample`, `--output <path>`, `--no-discovery`.
 */
export function loadConfig(env: Env = process.env, argv: readonly string[] = []): RunConfig {
  const apiKey = env.FIRECRAWL_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError("FIRECRAWL_API_KEY not set. Get a key from https://firecrawl.dev and export FIRECRAWL_API_KEY");
  }

  const config: RunConfig = {
    apiKey,
    apiUrl: env.FIRECRAWL_API_URL?.trim() || DEFAULTS.apiUrl,
    mode: scrapeMode(env.SCRAPE_MODE),
    outputPath: env.OUTPUT_PATH?.trim() || DEFAULTS.outputPath,
    pageDelayMs: nonNegativeInt(env, "PAGE_DELAY_MS", DEFAULTS.pageDelayMs),
    pollIntervalMs: nonNegativeInt(env, "EXTRACT_POLL_INTERVAL_MS", DEFAULTS.pollIntervalMs),
    timeoutMs: nonNegativeInt(env, "FIRECRAWL_TIMEOUT_MS", DEFAULTS.timeoutMs),
    discovery: true,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--full":
        config.mode = "full";
        break;
      case "--sample":
        config.mode = "sample";
        break;
      case "--no-discovery":
        config.discovery = false;
        break;
      case "--output": {
        const value = argv[++i];
        if (!value || value.startsWith("--")) throw new ConfigError("--output requires a path");
        config.outputPath = value;
        break;
      }
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }
  return config;
}
