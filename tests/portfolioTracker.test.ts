import fs from "fs";
import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { PortfolioTracker } from "@/lib/ledger/portfolioTracker";
import { flowAdjustedReturn, roundTo } from "@/lib/ledger/returns";
import { fixedClock, makeTempDir, removeDir } from "./helpers";

describe("flowAdjustedReturn", () => {
  it("is zero without a usable previous value", () => {
    expect(flowAdjustedReturn(null, 100, 0)).toBe(0);
    expect(flowAdjustedReturn(0, 100, 0)).toBe(0);
  });

  it("takes deposits out of the gain", () => {
    expect(flowAdjustedReturn(1_000_000, 1_100_000, 50_000)).toBe(5);
  });

  it("adds withdrawals back", () => {
    expect(flowAdjustedReturn(1_100_000, 1_150_000, -50_000)).toBe(9.09);
  });

  it("rounds to two decimals", () => {
    expect(flowAdjustedReturn(3, 4, 0)).toBe(33.33);
    expect(roundTo(2.345, 1)).toBe(2.3);
  });

  it("rounds exact ties to the even neighbour", () => {
    expect(flowAdjustedReturn(1_000_000, 1_001_250, 0)).toBe(0.12);
    expect(flowAdjustedReturn(1_000_000, 998_750, 0)).toBe(-0.12);
    expect(roundTo(0.5, 0)).toBe(0);
    expect(roundTo(1.5, 0)).toBe(2);
    expect(roundTo(2.5, 0)).toBe(2);
  });
});

describe("PortfolioTracker", () => {
  let dir: string;
  let tracker: PortfolioTracker;

  beforeEach(() => {
    dir = makeTempDir();
    tracker = new PortfolioTracker(dir, { now: fixedClock(2024, 6, 30).now });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("starts a ledger with a zero return", async () => {
    const entry = await tracker.addEntry({ date: "2024-01-31", total_value: 1_000_000 });
    expect(entry).toEqual({
      date: "2024-01-31",
      total_value: 1_000_000,
      deposit: 0,
      withdrawal: 0,
      net_flow: 0,
      return_rate: 0,
      notes: "",
    });
  });

  it("computes each entry against the one before it", async () => {
    await tracker.addEntry({ date: "2024-01-31", total_value: 1_000_000 });
    const entry = await tracker.addEntry({ date: "2024-02-29", total_value: 1_100_000, deposit: 50_000 });
    expect(entry.net_flow).toBe(50_000);
    expect(entry.return_rate).toBe(5);
  });

  it("gives zero after a zero-valued entry", async () => {
    await tracker.addEntry({ date: "2024-01-31", total_value: 0 });
    const entry = await tracker.addEntry({ date: "2024-02-29", total_value: 500 });
    expect(entry.return_rate).toBe(0);
  });

  it("dates an entry from the clock when none is given", async () => {
    const entry = await tracker.addEntry({ total_value: 1 });
    expect(entry.date).toBe("2024-06-30");
  });

  it("rejects an invalid date or value", async () => {
    await expect(tracker.addEntry({ date: "someday", total_value: 1 })).rejects.toThrow(RangeError);
    await expect(tracker.addEntry({ total_value: Number.NaN })).rejects.toThrow(RangeError);
    await expect(tracker.listEntries()).resolves.toEqual([]);
  });

  it("rejects a non-finite deposit or withdrawal", async () => {
    await expect(tracker.addEntry({ total_value: 1, deposit: Number.NaN })).rejects.toThrow(
      "deposit must be a finite number, got NaN"
    );
    await expect(tracker.addEntry({ total_value: 1, withdrawal: Infinity })).rejects.toThrow(
      "withdrawal must be a finite number, got Infinity"
    );
    await expect(tracker.listEntries()).resolves.toEqual([]);
  });

  it("reloads a quoted note in the last column unchanged", async () => {
    await tracker.addEntry({ date: "2024-01-01", total_value: 1, notes: "bonus, reinvested" });

    expect(fs.readFileSync(tracker.filePath, "utf-8")).toBe(
      'date,total_value,deposit,withdrawal,net_flow,return_rate,notes\n2024-01-01,1,0,0,0,0,"bonus, reinvested"\n'
    );
    const entries = await new PortfolioTracker(dir).listEntries();
    expect(entries.map(e => e.notes)).toEqual(["bonus, reinvested"]);
  });

  it("persists entries across instances", async () => {
    await tracker.addEntry({ date: "2024-01-31", total_value: 1_000_000, notes: "rebalanced, topped up" });
    await tracker.addEntry({ date: "2024/02/29", total_value: 1_010_000 });

    const reopened = new PortfolioTracker(dir);
    const entries = await reopened.listEntries();
    expect(entries.map(e => e.date)).toEqual(["2024-01-31", "2024-02-29"]);
    expect(entries[0].notes).toBe("rebalanced, topped up");
    expect(entries[1].return_rate).toBe(1);
  });

  it("returns the most recent entries", async () => {
    await tracker.addEntry({ date: "2024-01-01", total_value: 1 });
    await tracker.addEntry({ date: "2024-01-02", total_value: 2 });
    await tracker.addEntry({ date: "2024-01-03", total_value: 3 });

    const recent = await tracker.recent(2);
    expect(recent.map(e => e.total_value)).toEqual([2, 3]);
    await expect(tracker.recent(0)).resolves.toEqual([]);
  });

  it("summarizes value against net money put in", async () => {
    await tracker.addEntry({ date: "2024-01-01", total_value: 1_000_000, deposit: 1_000_000 });
    await tracker.addEntry({ date: "2024-02-01", total_value: 1_100_000, deposit: 50_000 });
    const last = await tracker.addEntry({ date: "2024-03-01", total_value: 1_150_000, withdrawal: 50_000 });
    expect(last.return_rate).toBe(9.09);

    await expect(tracker.summary()).resolves.toEqual({
      current_value: 1_150_000,
      net_invested: 1_000_000,
      total_return: 150_000,
      total_return_rate: 15,
      period_days: 60,
    });
  });

  it("reports a zero rate when nothing net has been invested", async () => {
    await tracker.addEntry({ date: "2024-01-01", total_value: 500, deposit: 100, withdrawal: 100 });
    const summary = await tracker.summary();
    expect(summary?.net_invested).toBe(0);
    expect(summary?.total_return_rate).toBe(0);
  });

  it("has no summary for an empty ledger", async () => {
    await expect(tracker.summary()).resolves.toBeNull();
  });
});
