import { writeFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import Table from "cli-table3";
import type { ScanCandidate } from "../types";
import type { ScanStats } from "../scanner/scan";

export const CSV_COLUMNS = [
  "Ticker",
  "Spot",
  "Implied Move %",
  "Hist Avg Move %",
  "Underpricing",
  "Squeeze Prob",
  "Cascade Prob",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type DisplayRow = { Ticker: string } & Record<Exclude<CsvColumn, "Ticker">, number>;

export const NO_RESULTS_MESSAGE = "No qualifying earnings opportunities found.";

/**
 * Two decimals, half-to-even on exact ties (100.125 -> 100.12). Only multiples of 1/8
 * can sit exactly halfway between cents; everything else goes through toFixed.
 */
export function round2(value: number): number {
  const cents = value * 100;
  if (Number.isInteger(value * 8) && Math.abs(cents % 1) === 0.5) {
    const lower = Math.floor(cents);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(value.toFixed(2));
}

export function toDisplayRow(c: ScanCandidate): DisplayRow {
  return {
    Ticker: c.ticker,
    Spot: round2(c.spot),
    "Implied Move %": round2(c.metrics.impliedMove * 100),
    "Hist Avg Move %": round2(c.metrics.histMove * 100),
    Underpricing: round2(c.score.underpricing),
    "Squeeze Prob": round2(c.score.squeeze),
    "Cascade Prob": round2(c.score.cascade),
  };
}

/**
 * Descending by displayed (2dp) underpricing. Array.prototype.sort is stable, so equal
 * values keep scan order.
 */
export function rankCandidates(candidates: readonly ScanCandidate[]): ScanCandidate[] {
  return [...candidates].sort((a, b) => round2(b.score.underpricing) - round2(a.score.underpricing));
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function cells(row: DisplayRow): string[] {
  return CSV_COLUMNS.map((col) => {
    const v = row[col];
    return typeof v === "number" ? v.toFixed(2) : v;
  });
}

export function formatCsv(rows: DisplayRow[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(cells(row).map(csvField).join(","));
  }
  return lines.join("\n") + "\n";
}

export function renderTable(rows: DisplayRow[]): string {
  const table = new Table({
    head: [...CSV_COLUMNS],
    style: { head: [], border: [] },
  });
  for (const row of rows) table.push(cells(row));
  return table.toString();
}

export function formatSummary(stats: ScanStats): string {
  const skipped = Object.entries(stats.skipReasons)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason}=${count}`);
  return [
    `Scanned ${stats.scanned} of ${stats.universeSize} symbols, ${stats.accepted} qualifying.`,
    `Skipped: ${skipped.length ? skipped.join(" ") : "(none)"}`,
  ].join("\n");
}

/** Write the CSV export into `dir`, creating it if needed. Returns the file path. */
export function writeCsvToFile(rows: DisplayRow[], dir: string, filename: string): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const path = join(dir, filename);
  writeFileSync(path, formatCsv(rows), "utf-8");
  return path;
}
