import type { Logger } from "pino";
import type { MapResponse, SiteMapService } from "./types";
import { describeMapResponseErrors, isMapResponse } from "./validator";

export const BASE_URL = "https://www.greenpeace.org/usa";
export const MAP_SEARCH = "toxic pollution chemical campaign";
export const MAX_PAGES = 50;

/** Greenpeace USA is organised by issue area; these are the known starting points. */
export const SEED_URLS: readonly string[] = [
  "https://www.greenpeace.org/usa/toxics/",
  "https://www.greenpeace.org/usa/oceans/",
  "https://www.greenpeace.org/usa/climate/",
  "https://www.greenpeace.org/usa/fighting-plastic-pollution/",
  "https://www.greenpeace.org/usa/issues/",
  "https://www.greenpeace.org/usa/preventing-chemical-disasters/",
  "https://www.greenpeace.org/usa/pvc-free/",
  "https://www.greenpeace.org/usa/green-electronics/",
  "https://www.greenpeace.org/usa/industrial-pollution/",
];

export const INCLUDE_KEYWORDS: readonly string[] = [
  "/toxics/", "/pollution/", "/chemical", "/oil", "/gas",
  "/coal", "/plastic", "/ocean", "/climate", "/industrial",
  "/electronics", "/fashion", "/detox", "/pvc",
  "/preventing-", "/fighting-", "disaster",
];

export const EXCLUDE_KEYWORDS: readonly string[] = [
  "donate", "give", "volunteer", "shop", "jobs",
  "about", "contact", "login", "privacy", "terms",
  "/tag/", "/author/", "/category/",
];

export function isCampaignUrl(url: string): boolean {
  const u = url.toLowerCase();
  return INCLUDE_KEYWORDS.some((k) => u.includes(k)) && !EXCLUDE_KEYWORDS.some((k) => u.includes(k));
}

/** URLs from `string` and `{url: string}` entries; anything else is dropped. */
export function linkUrls(links: readonly unknown[]): string[] {
  const urls: string[] = [];
  for (const link of links) {
    if (typeof link === "string") urls.push(link);
    else if (link && typeof link === "object" && "url" in link && typeof link.url === "string") urls.push(link.url);
  }
  return urls;
}

/** Seeds first, then discovered URLs; duplicates dropped, first occurrence wins. */
export function mergeUrls(seeds: readonly string[], discovered: readonly string[], max = MAX_PAGES): string[] {
  return Array.from(new Set([...seeds, ...discovered])).slice(0, max);
}

/**
 * Page URLs to process. Site mapping is best-effort: without a mapper, with no
 * links, or on any failure, the seed list is returned as is.
 */
export async function discoverPageUrls(mapper: SiteMapService | undefined, log: Logger): Promise<string[]> {
  log.info({ seeds: SEED_URLS.length }, "Using seed URLs (issue area pages)");
  if (!mapper) return [...SEED_URLS];

  let result: MapResponse;
  try {
    result = await mapper.map({ url: BASE_URL, search: MAP_SEARCH });
  } catch (err) {
    log.warn({ err }, "Site mapping failed, using seed URLs only");
    return [...SEED_URLS];
  }
  if (!isMapResponse(result)) {
    log.warn({ errors: describeMapResponseErrors() }, "Site mapping returned an unusable reply, using seed URLs only");
    return [...SEED_URLS];
  }
  if (!result.links) return [...SEED_URLS];

  const mapped = linkUrls(result.links);
  log.info({ discovered: mapped.length }, "Discovered additional URLs via mapping");
  const urls = mergeUrls(SEED_URLS, mapped.filter(isCampaignUrl));
  log.info({ total: urls.length }, "Total relevant URLs");
  return urls;
}
