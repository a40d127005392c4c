import { format } from "date-fns";
import { config, isPlaceholderApiKey } from "../config";
import type { RawEvent, RawEventMap, ScoredSport } from "../types";
import { HttpError, withRetry, type RetryOptions } from "../utils/http";
import { logger } from "../utils/logger";
import { getPath, type PathSegment } from "../utils/path";
import { SCORED_SPORTS } from "./scoring/config";

// =============================================
// API-SPORTS SOURCES
// =============================================

interface SportSource {
  baseUrl: () => string;
  eventsEndpoint: string;
  eventIdPath: readonly PathSegment[];
  oddsIdPath: readonly PathSegment[];
}

const SOURCES: Record<ScoredSport, SportSource> = {
  football: {
    baseUrl: () => config.FOOTBALL_API,
    eventsEndpoint: "/fixtures",
    eventIdPath: ["fixture", "id"],
    oddsIdPath: ["fixture", "id"],
  },
  basketball: {
    baseUrl: () => config.BASKETBALL_API,
    eventsEndpoint: "/games",
    eventIdPath: ["id"],
    oddsIdPath: ["game", "id"],
  },
  volleyball: {
    baseUrl: () => config.VOLLEYBALL_API,
    eventsEndpoint: "/games",
    eventIdPath: ["id"],
    oddsIdPath: ["game", "id"],
  },
};

// The odds endpoint pages its results; stop after this many pages
const MAX_ODDS_PAGES = 10;

export interface CollectOptions {
  date?: string;
  retry?: RetryOptions;
}

export function todayString(now: Date = new Date()): string {
  return format(now, "yyyy-MM-dd");
}

function isRecord(value: unknown): value is RawEvent {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeApiErrors(errors: unknown): string | null {
  if (Array.isArray(errors)) {
    return errors.length > 0 ? JSON.stringify(errors) : null;
  }
  if (isRecord(errors)) {
    return Object.keys(errors).length > 0 ? JSON.stringify(errors) : null;
  }
  return null;
}

interface ApiPage {
  items: RawEvent[];
  totalPages: number;
}

async function fetchPage(url: string, retry: RetryOptions | undefined): Promise<ApiPage> {
  return withRetry(async () => {
    const response = await fetch(url, {
      headers: { "x-apisports-key": config.SPORTS_API_KEY },
    });

    if (!response.ok) {
      throw new HttpError(`API-Sports error: ${response.status}`, response.status);
    }

    const body: unknown = await response.json();

    // API-Sports reports quota and parameter problems with HTTP 200 and an `errors` field
    const apiErrors = describeApiErrors(getPath(body, ["errors"], null));
    if (apiErrors) {
      throw new Error(`API-Sports rejected request: ${apiErrors}`);
    }

    const items = getPath(body, ["response"], []);
    const totalPages = getPath(body, ["paging", "total"], 1);

    return {
      items: Array.isArray(items) ? items.filter(isRecord) : [],
      totalPages: typeof totalPages === "number" ? totalPages : 1,
    };
  }, retry);
}

export async function fetchEvents(sport: ScoredSport, date: string, retry?: RetryOptions): Promise<RawEvent[]> {
  const source = SOURCES[sport];
  const url = `${source.baseUrl()}${source.eventsEndpoint}?date=${date}`;
  const page = await fetchPage(url, retry);
  return page.items;
}

export async function fetchOdds(sport: ScoredSport, date: string, retry?: RetryOptions): Promise<RawEvent[]> {
  const source = SOURCES[sport];
  const records: RawEvent[] = [];

  for (let pageNumber = 1; pageNumber <= MAX_ODDS_PAGES; pageNumber++) {
    const url = `${source.baseUrl()}/odds?date=${date}&page=${pageNumber}`;
    const page = await fetchPage(url, retry);
    records.push(...page.items);
    if (pageNumber >= page.totalPages) break;
    if (pageNumber === MAX_ODDS_PAGES) {
      logger.warn(
        `${sport} odds span ${page.totalPages} pages, only the first ${MAX_ODDS_PAGES} were read; later events are scored without prices`
      );
    }
  }

  return records;
}

/**
 * Attach each odds record's bookmakers to the event with the same id.
 * Events without odds are kept unchanged.
 */
export function attachOdds(sport: ScoredSport, events: RawEvent[], odds: RawEvent[]): RawEvent[] {
  const source = SOURCES[sport];
  const bookmakersById = new Map<string, unknown>();

  for (const record of odds) {
    const id = getPath(record, source.oddsIdPath, null);
    const bookmakers = getPath(record, ["bookmakers"], null);
    if (id === null || bookmakers === null) continue;
    bookmakersById.set(String(id), bookmakers);
  }

  return events.map((event) => {
    const id = getPath(event, source.eventIdPath, null);
    const bookmakers = id === null ? undefined : bookmakersById.get(String(id));
    return bookmakers === undefined ? event : { ...event, bookmakers };
  });
}

// Rejects only when the event list itself cannot be fetched
async function collectSport(sport: ScoredSport, date: string, retry?: RetryOptions): Promise<RawEvent[]> {
  const events = await fetchEvents(sport, date, retry);
  if (events.length === 0) return events;

  try {
    const odds = await fetchOdds(sport, date, retry);
    return attachOdds(sport, events, odds);
  } catch (error) {
    logger.warn(`Failed to fetch ${sport} odds, scoring without prices`, error);
    return events;
  }
}

/**
 * Collect the day's events for every sport.
 * Sports are fetched one after another to stay inside the API rate limit.
 * A failing sport contributes no events. When every sport fails, this rejects.
 */
export async function collectDailyEvents(options: CollectOptions = {}): Promise<RawEventMap> {
  const date = options.date ?? todayString();
  if (!config.SPORTS_API_KEY || isPlaceholderApiKey()) {
    logger.warn("SPORTS_API_KEY not configured");
    return { football: [], basketball: [], tennis: [], volleyball: [], data_raccolta: date };
  }

  logger.info(`Collecting sports data for ${date}...`);

  const collected: Record<ScoredSport, RawEvent[]> = { football: [], basketball: [], volleyball: [] };
  const failures: string[] = [];

  for (const sport of SCORED_SPORTS) {
    try {
      collected[sport] = await collectSport(sport, date, options.retry);
    } catch (error) {
      logger.error(`Failed to fetch ${sport} events`, error);
      failures.push(`${sport}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (failures.length === SCORED_SPORTS.length) {
    throw new Error(`No sports data collected for ${date} (${failures.join("; ")})`);
  }

  const { football, basketball, volleyball } = collected;
  logger.info(
    `Collected ${football.length} football, ${basketball.length} basketball, ${volleyball.length} volleyball events`
  );

  // No tennis source yet
  return { football, basketball, tennis: [], volleyball, data_raccolta: date };
}
