/**
 * Display rounding, ranking and the CSV export.
 */
import { describe, it, after } from "node:test";
import assert from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  formatCsv,
  formatSummary,
  rankCandidates,
  renderTable,
  round2,
  toDisplayRow,
  writeCsvToFile,
} from "../report/scan_report";
import type { ScanCandidate } from "../types";

function candidate(ticker: string, underpricing: number, overrides: Partial<ScanCandidate> = {}): ScanCandidate {
  return {
    ticker,
    spot: 123.456,
    expiry: "2026-10-23",
    metrics: { impliedMove: 0.04321, histMove: 0.05678, skew: 0.02, oiImbalance: -0.1 },
    score: { underpricing, squeeze: 0.4561, cascade: 0.5439 },
    ...overrides,
  };
}

describe("toDisplayRow", () => {
  it("rounds to 2 decimals, moves as percentages", () => {
    assert.deepStrictEqual(toDisplayRow(candidate("XYZ", 1.31407)), {
      Ticker: "XYZ",
      Spot: 123.46,
      "Implied Move %": 4.32,
      "Hist Avg Move %": 5.68,
      Underpricing: 1.31,
      "Squeeze Prob": 0.46,
      "Cascade Prob": 0.54,
    });
  });
});

describe("rankCandidates", () => {
  it("sorts descending and keeps input order for equal displayed values", () => {
    const ranked = rankCandidates([
      candidate("A", 1.1),
      candidate("B", 2.5),
      candidate("C", 1.101),
      candidate("D", 1.099),
    ]);
    assert.deepStrictEqual(ranked.map((c) => c.ticker), ["B", "A", "C", "D"]);
  });

  it("does not mutate the input", () => {
    const input = [candidate("A", 1), candidate("B", 2)];
    rankCandidates(input);
    assert.deepStrictEqual(input.map((c) => c.ticker), ["A", "B"]);
  });
});

describe("round2", () => {
  it("rounds exact half-cent ties to the even cent", () => {
    assert.strictEqual(round2(100.125), 100.12);
    assert.strictEqual(round2(100.375), 100.38);
    assert.strictEqual(round2(-0.125), -0.12);
  });

  it("rounds non-tie values to the nearest cent", () => {
    assert.strictEqual(round2(2.675), 2.67);
    assert.strictEqual(round2(1.31407), 1.31);
    assert.strictEqual(round2(0.456), 0.46);
  });
});

describe("formatCsv", () => {
  it("writes the fixed header and 2-decimal fields", () => {
    const csv = formatCsv([toDisplayRow(candidate("XYZ", 1.4))]);
    assert.strictEqual(
      csv,
      "Ticker,Spot,Implied Move %,Hist Avg Move %,Underpricing,Squeeze Prob,Cascade Prob\n" +
        "XYZ,123.46,4.32,5.68,1.40,0.46,0.54\n"
    );
  });

  it("exports an eighths-priced spot rounded half to even", () => {
    const csv = formatCsv([toDisplayRow(candidate("XYZ", 1.4, { spot: 100.125 }))]);
    assert.strictEqual(csv.split("\n")[1], "XYZ,100.12,4.32,5.68,1.40,0.46,0.54");
  });

  it("quotes tickers that contain a comma", () => {
    const csv = formatCsv([toDisplayRow(candidate("A,B", 1))]);
    assert.strictEqual(csv.split("\n")[1], '"A,B",123.46,4.32,5.68,1.00,0.46,0.54');
  });

  it("header only for an empty result", () => {
    assert.strictEqual(
      formatCsv([]),
      "Ticker,Spot,Implied Move %,Hist Avg Move %,Underpricing,Squeeze Prob,Cascade Prob\n"
    );
  });
});

describe("renderTable / formatSummary", () => {
  it("table lists the header and each ticker", () => {
    const text = renderTable([toDisplayRow(candidate("XYZ", 1.4))]);
    assert.ok(text.includes("Underpricing"));
    assert.ok(text.includes("XYZ"));
    assert.ok(text.includes("1.40"));
  });

  it("summary counts only non-zero skip reasons", () => {
    const text = formatSummary({
      universeSize: 10,
      scanned: 5,
      accepted: 1,
      skipReasons: { not_reporting: 3, no_options: 1, empty_chain: 0, no_history: 0, no_iv: 0, below_threshold: 0 },
    });
    assert.strictEqual(text, "Scanned 5 of 10 symbols, 1 qualifying.\nSkipped: not_reporting=3 no_options=1");
  });
});

describe("writeCsvToFile", () => {
  const dir = mkdtempSync(join(tmpdir(), "earnings-scan-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  it("creates the report directory and writes the CSV", () => {
    const target = join(dir, "nested");
    const path = writeCsvToFile([toDisplayRow(candidate("XYZ", 2))], target, "earnings_rankings.csv");
    assert.strictEqual(path, join(target, "earnings_rankings.csv"));
    assert.strictEqual(readFileSync(path, "utf-8").split("\n")[1], "XYZ,123.46,4.32,5.68,2.00,0.46,0.54");
  });
});
