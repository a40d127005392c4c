import { afterEach, describe, expect, test } from "vitest";
import { closeDb, getDb } from "../db/index";
import * as runsRepo from "../db/repositories/runs.repo";
import { makeCandidate } from "./fixtures/events.fixtures";

describe("runs.repo", () => {
  afterEach(() => {
    closeDb();
  });

  test("createRun stores the run and its ranked picks", () => {
    const picks = [
      makeCandidate({ eventLabel: "Inter vs Milan", pick: "2", odds: 4.5, confidence: 0.649 }),
      makeCandidate({ sport: "basketball", market: "ML", pick: "Away", odds: null, confidence: 0.42 }),
    ];

    const run = runsRepo.createRun({ date: "2026-10-19", status: "completed", candidatesCount: 5, picks });

    expect(run).toMatchObject({
      id: 1,
      date: "2026-10-19",
      status: "completed",
      candidatesCount: 5,
      picksCount: 2,
      sent: false,
      error: null,
    });
    expect(typeof run.createdAt).toBe("number");

    expect(runsRepo.getPicksForRun(run.id)).toEqual([
      { ...picks[0], runId: 1, rank: 1 },
      { ...picks[1], runId: 1, rank: 2 },
    ]);
  });

  test("markRunSent flags the date as delivered", () => {
    const run = runsRepo.createRun({ date: "2026-10-19", status: "completed", candidatesCount: 0, picks: [] });
    expect(runsRepo.hasSentRunForDate("2026-10-19")).toBe(false);

    runsRepo.markRunSent(run.id);

    expect(runsRepo.hasSentRunForDate("2026-10-19")).toBe(true);
    expect(runsRepo.hasSentRunForDate("2026-10-20")).toBe(false);
    expect(runsRepo.getRunByDate("2026-10-19")?.sent).toBe(true);
  });

  test("failed runs keep their error", () => {
    runsRepo.createRun({ date: "2026-10-19", status: "failed", candidatesCount: 0, picks: [], error: "timeout" });

    expect(runsRepo.getLatestRun()).toMatchObject({ status: "failed", error: "timeout", picksCount: 0 });
  });

  test("lookups return the newest run first", () => {
    runsRepo.createRun({ date: "2026-10-18", status: "completed", candidatesCount: 1, picks: [] });
    runsRepo.createRun({ date: "2026-10-19", status: "failed", candidatesCount: 0, picks: [], error: "boom" });
    runsRepo.createRun({ date: "2026-10-19", status: "completed", candidatesCount: 3, picks: [] });

    expect(runsRepo.getRunByDate("2026-10-19")?.id).toBe(3);
    expect(runsRepo.getLatestRun()?.id).toBe(3);
    expect(runsRepo.getRecentRuns().map((run) => run.id)).toEqual([3, 2, 1]);
    expect(runsRepo.getRecentRuns(2).map((run) => run.id)).toEqual([3, 2]);
  });

  test("empty database", () => {
    expect(runsRepo.getLatestRun()).toBeNull();
    expect(runsRepo.getRunByDate("2026-10-19")).toBeNull();
    expect(runsRepo.getRecentRuns()).toEqual([]);
    expect(runsRepo.getPicksForRun(1)).toEqual([]);
  });

  test("deleting a run removes its picks", () => {
    const run = runsRepo.createRun({
      date: "2026-10-19",
      status: "completed",
      candidatesCount: 1,
      picks: [makeCandidate()],
    });

    getDb().prepare("DELETE FROM daily_runs WHERE id = ?").run(run.id);

    expect(runsRepo.getPicksForRun(run.id)).toEqual([]);
  });
});
