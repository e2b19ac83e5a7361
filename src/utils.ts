import { createHash } from "crypto";

export const md5 = (s: string) => createHash("md5").update(s).digest("hex");

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Trimmed string, or null for absent and blank values. */
export function presentString(s: string | null | undefined): string | null {
  if (typeof s !== "string") return null;
  const t = s.trim();
  return t.length ? t : null;
}

/** One decimal place, ties to the even neighbour (6.25 -> 6.2, 18.75 -> 18.8). */
export function round1(x: number): number {
  const scaled = x * 10;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  if (diff > 0.5) return (floor + 1) / 10;
  if (diff < 0.5) return floor / 10;
  return (floor % 2 === 0 ? floor : floor + 1) / 10;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
