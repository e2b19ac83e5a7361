import type { Logger } from "pino";
import { FirecrawlClient } from "../adapters/firecrawl";
import { buildArtifact, writeArtifact } from "../artifactWriter";
import { loadConfig, type RunConfig } from "../config";
import { ConfigError } from "../errors";
import { createLogger } from "../logger";
import { runPipeline } from "../pipeline";
import { NO_RECORDS_HINTS } from "../report";
import type { ExtractionService, SiteMapService } from "../types";

export type CliDeps = {
  /** Root logger; the CLI and the pipeline each take a child tagged with their module. */
  log?: Logger;
  /** Builds the collaborators; defaults to one Firecrawl client serving both. */
  services?: (config: RunConfig) => { extraction: ExtractionService; siteMap: SiteMapService };
  sleep?: (ms: number) => Promise<void>;
};

function firecrawlServices(config: RunConfig) {
  const client = new FirecrawlClient({
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
    pollIntervalMs: config.pollIntervalMs,
  });
  return { extraction: client, siteMap: client };
}

/** Returns the process exit code. */
export async function runCli(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  deps: CliDeps = {}
): Promise<number> {
  const root = deps.log ?? createLogger();
  const log = root.child({ module: "cli" });

  let config: RunConfig;
  try {
    config = loadConfig(env, argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ code: err.code }, err.message);
      return 1;
    }
    throw err;
  }

  const { extraction, siteMap } = (deps.services ?? firecrawlServices)(config);
  const run = await runPipeline(
    {
      extraction,
      siteMap: config.discovery ? siteMap : undefined,
      log: root.child({ module: "pipeline" }),
      sleep: deps.sleep,
    },
    { mode: config.mode, pageDelayMs: config.pageDelayMs }
  );

  if (run.records.length === 0) {
    for (const line of NO_RECORDS_HINTS) log.warn(line);
    return 0;
  }

  const file = writeArtifact(config.outputPath, buildArtifact(run.records));
  log.info({ file, records: run.records.length }, "Saved records");
  if (config.mode === "sample") {
    log.info("Sample mode processed a subset of pages; pass --full to process every discovered page");
  }
  return 0;
}
