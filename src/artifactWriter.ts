import fs from "fs";
import path from "path";
import { computeStatistics } from "./aggregator";
import { ArtifactValidationError } from "./errors";
import { SOURCE_ORGANIZATION } from "./normalizer";
import type { Artifact, NormalizedRecord } from "./types";
import { validateArtifact } from "./validator";

/** Below this many records the artifact is flagged `test_mode`. */
export const TEST_MODE_THRESHOLD = 10;

export function buildArtifact(records: NormalizedRecord[], writtenAt: Date = new Date()): Artifact {
  const { total_records, unique_companies, ...summary_statistics } = computeStatistics(records);
  return {
    metadata: {
      scrape_date: writtenAt.toISOString(),
      source_organization: SOURCE_ORGANIZATION,
      total_records,
      unique_companies,
      test_mode: records.length < TEST_MODE_THRESHOLD,
    },
    summary_statistics,
    records,
  };
}

/**
 * Validates and writes the artifact as pretty-printed JSON, creating parent
 * directories. Returns the absolute path written.
 */
export function writeArtifact(filePath: string, artifact: Artifact): string {
  const result = validateArtifact(artifact);
  if (!result.valid) throw new ArtifactValidationError(result.errors ?? []);

  const file = path.resolve(filePath);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(artifact, null, 2), "utf8");
  return file;
}
