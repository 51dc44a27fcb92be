import { describe, it } from "node:test";
import assert from "node:assert";
import { historyStart, isIsoDate, toMarketDate, toMs } from "../markets/market_time";

describe("market_time", () => {
  it("toMarketDate uses the market time zone, not UTC", () => {
    const lateEvening = new Date("2026-10-19T02:30:00Z");
    assert.strictEqual(toMarketDate(lateEvening, "America/New_York"), "2026-10-18");
    assert.strictEqual(toMarketDate(lateEvening, "UTC"), "2026-10-19");
  });

  it("toMs accepts Date, epoch seconds, epoch ms and ISO strings", () => {
    assert.strictEqual(toMs(new Date("2026-10-19T00:00:00Z")), 1792368000000);
    assert.strictEqual(toMs(1792368000), 1792368000000);
    assert.strictEqual(toMs(1792368000000), 1792368000000);
    assert.strictEqual(toMs("2026-10-19T00:00:00Z"), 1792368000000);
    assert.strictEqual(toMs("garbage"), null);
    assert.strictEqual(toMs(null), null);
  });

  it("isIsoDate", () => {
    assert.strictEqual(isIsoDate("2026-10-18"), true);
    assert.strictEqual(isIsoDate("2026-13-01"), false);
    assert.strictEqual(isIsoDate("18/10/2026"), false);
  });

  it("historyStart goes back whole years", () => {
    const start = historyStart(new Date("2026-10-18T15:00:00Z"), 2);
    assert.strictEqual(start.toISOString(), "2024-10-18T15:00:00.000Z");
  });
});
