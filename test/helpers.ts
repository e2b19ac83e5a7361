import pino, { type Logger } from "pino";
import fs from "fs";
import path from "path";
import type {
  ExtractionService,
  ExtractRequest,
  ExtractResponse,
  MapRequest,
  MapResponse,
  PageExtraction,
  SiteMapService,
} from "../src/types";
import { isPageExtraction } from "../src/validator";

export function readFixture(name: string): unknown {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "../fixtures/pages", name), "utf8"));
  return raw;
}

export function loadPage(name: string): PageExtraction {
  const page = readFixture(name);
  if (!isPageExtraction(page)) throw new Error(`fixture ${name} is not a page extraction`);
  return page;
}

type PageReply = unknown[] | Error;

/** Extraction stand-in: per-URL canned `data` lists, or an error to throw. */
export class FakeExtractionService implements ExtractionService {
  readonly requests: ExtractRequest[] = [];

  constructor(private readonly replies: Record<string, PageReply | undefined>) {}

  async extract(request: ExtractRequest): Promise<ExtractResponse> {
    this.requests.push(request);
    const reply = this.replies[request.urls[0]];
    if (reply instanceof Error) throw reply;
    return { data: reply ?? [] };
  }
}

export class FakeSiteMapService implements SiteMapService {
  readonly requests: MapRequest[] = [];

  constructor(private readonly reply: MapResponse | Error) {}

  async map(request: MapRequest): Promise<MapResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export const noSleep = async (_ms: number): Promise<void> => {};

export type LogLine = { level: number; msg: string; [key: string]: unknown };

/** Pino logger whose lines are kept in memory, parsed and as written. */
export function captureLogger(level = "info"): { log: Logger; lines: LogLine[]; raw: string[] } {
  const lines: LogLine[] = [];
  const raw: string[] = [];
  const log = pino(
    { level },
    {
      write(msg: string) {
        raw.push(msg);
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { log, lines, raw };
}
