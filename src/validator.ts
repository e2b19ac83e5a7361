import Ajv, { type ErrorObject } from "ajv";
import { ArtifactSchema, MapResponseSchema, PageExtractionSchema, RawEntitySchema } from "./schema";
import type { Artifact, PageExtraction, RawEntity } from "./types";

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });

export const isRawEntity = ajv.compile<RawEntity>(RawEntitySchema);
export const isPageExtraction = ajv.compile<PageExtraction>(PageExtractionSchema);
export const isMapResponse = ajv.compile<{ links?: unknown[] | null }>(MapResponseSchema);
const validateArtifactFn = ajv.compile<Artifact>(ArtifactSchema);

export type ValidationResult = { valid: boolean; errors?: string[] };

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map((e) => `${e.instancePath} ${e.message}`);
}

export function describeRawEntityErrors(): string[] {
  return formatErrors(isRawEntity.errors);
}

export function describePageExtractionErrors(): string[] {
  return formatErrors(isPageExtraction.errors);
}

export function describeMapResponseErrors(): string[] {
  return formatErrors(isMapResponse.errors);
}

export function validateArtifact(o: unknown): ValidationResult {
  const valid = validateArtifactFn(o);
  if (valid) return { valid: true };
  return { valid: false, errors: formatErrors(validateArtifactFn.errors) };
}
