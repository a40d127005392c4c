import { afterEach, beforeEach, describe, expect, test, vi, type Mock } from "vitest";
import { closeDb } from "../db/index";
import * as runsRepo from "../db/repositories/runs.repo";
import { runDailyProcess } from "../services/daily.service";
import { collectDailyEvents } from "../services/data.service";
import type { RawEventMap } from "../types";
import {
  FOOTBALL_LYON_NICE,
  INTER_MILAN_EVENT,
  MATCH_DATE,
  VIRTUS_OLIMPIA_EVENT,
  VOLLEYBALL_PERUGIA_TRENTO,
} from "./fixtures/events.fixtures";

vi.mock("../services/data.service", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../services/data.service")>()),
  collectDailyEvents: vi.fn(),
}));

const collect = vi.mocked(collectDailyEvents);

type FetchMock = Mock<(input: string, init?: RequestInit) => Promise<Response>>;

const MATCH_DAY: RawEventMap = {
  football: [INTER_MILAN_EVENT, FOOTBALL_LYON_NICE],
  basketball: [VIRTUS_OLIMPIA_EVENT],
  tennis: [],
  volleyball: [VOLLEYBALL_PERUGIA_TRENTO],
  data_raccolta: MATCH_DATE,
};

const EMPTY_DAY: RawEventMap = { football: [], basketball: [], tennis: [], volleyball: [], data_raccolta: MATCH_DATE };

function telegramOk() {
  return new Response(
    JSON.stringify({ ok: true, result: { message_id: 7, chat: { id: 1001, type: "private" }, date: 0 } }),
    { status: 200 }
  );
}

function sentTexts(fetchMock: FetchMock): unknown[] {
  return fetchMock.mock.calls.map(([, init]) => {
    const body = init?.body;
    return typeof body === "string" ? JSON.parse(body).text : null;
  });
}

describe("runDailyProcess", () => {
  let fetchMock: FetchMock;

  beforeEach(() => {
    collect.mockReset();
    collect.mockResolvedValue(MATCH_DAY);
    fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>(async () => telegramOk());
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    closeDb();
  });

  test("records, ranks and sends the day's picks", async () => {
    const result = await runDailyProcess({ date: MATCH_DATE });

    expect(result.status).toBe("completed");
    if (result.status !== "completed") return;

    expect(result.runId).toBe(1);
    expect(result.sent).toBe(true);
    expect(result.picks.map((pick) => pick.eventLabel)).toEqual([
      "Inter vs Milan",
      "Virtus Bologna vs Olimpia Milano",
      "Lyon vs Nice",
    ]);

    expect(collect).toHaveBeenCalledWith({ date: MATCH_DATE });
    expect(fetchMock).toHaveBeenCalledTimes(2);

    const run = runsRepo.getRunByDate(MATCH_DATE);
    expect(run).toMatchObject({ status: "completed", candidatesCount: 4, picksCount: 3, sent: true, error: null });

    const stored = runsRepo.getPicksForRun(1);
    expect(stored.map((pick) => [pick.rank, pick.pick, pick.confidence])).toEqual([
      [1, "2", 0.649],
      [2, "Away", 0.505],
      [3, "1", 0.25],
    ]);
  });

  test("skips a date that was already sent", async () => {
    await runDailyProcess({ date: MATCH_DATE });
    const second = await runDailyProcess({ date: MATCH_DATE });

    expect(second).toEqual({ status: "skipped", date: MATCH_DATE });
    expect(collect).toHaveBeenCalledTimes(1);
    expect(runsRepo.getRecentRuns()).toHaveLength(1);
  });

  test("force reruns and resends", async () => {
    await runDailyProcess({ date: MATCH_DATE });
    const second = await runDailyProcess({ date: MATCH_DATE, force: true });

    expect(second.status).toBe("completed");
    if (second.status !== "completed") return;
    expect(second.runId).toBe(2);
    expect(second.sent).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  test("dry run records without sending", async () => {
    const result = await runDailyProcess({ date: MATCH_DATE, dryRun: true });

    expect(result.status).toBe("completed");
    if (result.status !== "completed") return;
    expect(result.sent).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(runsRepo.hasSentRunForDate(MATCH_DATE)).toBe(false);

    // an unsent run does not block the real one
    const real = await runDailyProcess({ date: MATCH_DATE });
    expect(real.status).toBe("completed");
  });

  test("sends the no-recommendation line on an empty day", async () => {
    collect.mockResolvedValue(EMPTY_DAY);

    const result = await runDailyProcess({ date: MATCH_DATE });

    expect(result.status).toBe("completed");
    if (result.status !== "completed") return;
    expect(result.picks).toEqual([]);
    expect(sentTexts(fetchMock)).toEqual([
      "No recommendation today (2026-10-19)",
      "No recommendation today (2026-10-19)",
    ]);
    expect(runsRepo.getLatestRun()).toMatchObject({ candidatesCount: 0, picksCount: 0, sent: true });
  });

  test("a run whose messages all fail is recorded but not marked sent", async () => {
    fetchMock.mockImplementation(
      async () => new Response(JSON.stringify({ ok: false, description: "Bad Request: chat not found" }), { status: 400 })
    );

    const result = await runDailyProcess({ date: MATCH_DATE });

    expect(result.status).toBe("completed");
    if (result.status !== "completed") return;
    expect(result.sent).toBe(false);
    expect(runsRepo.hasSentRunForDate(MATCH_DATE)).toBe(false);
  });

  test("an outage of every data source is recorded as failed and nothing is sent", async () => {
    const actual = await vi.importActual<typeof import("../services/data.service")>("../services/data.service");
    collect.mockImplementation(actual.collectDailyEvents);
    fetchMock.mockImplementation(async (input) =>
      input.startsWith("https://api.telegram.org")
        ? telegramOk()
        : new Response(JSON.stringify({ errors: { token: "Error/Missing application key" }, response: [] }), {
            status: 200,
          })
    );

    const result = await runDailyProcess({ date: MATCH_DATE });

    expect(result.status).toBe("failed");
    expect(fetchMock.mock.calls.some(([input]) => input.startsWith("https://api.telegram.org"))).toBe(false);
    expect(runsRepo.getLatestRun()).toMatchObject({ status: "failed", sent: false });
    expect(runsRepo.hasSentRunForDate(MATCH_DATE)).toBe(false);

    // the next attempt for the date is not skipped
    const retry = await runDailyProcess({ date: MATCH_DATE });
    expect(retry.status).toBe("failed");
  });

  test("collector errors are recorded as a failed run and never thrown", async () => {
    collect.mockRejectedValue(new Error("upstream down"));

    const result = await runDailyProcess({ date: MATCH_DATE });

    expect(result).toEqual({ status: "failed", date: MATCH_DATE, error: "upstream down" });
    expect(runsRepo.getLatestRun()).toMatchObject({
      date: MATCH_DATE,
      status: "failed",
      picksCount: 0,
      sent: false,
      error: "upstream down",
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
