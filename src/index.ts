#!/usr/bin/env node
/**
 * Earnings Volatility Scanner — read-only. Ranks today's earnings reporters by how cheap
 * the front-month straddle looks against realized daily moves. No orders, no persistence.
 */

import { Command, InvalidArgumentError } from "commander";
import { loadConfig, parseConfig, type Config } from "./config/load_config";
import { loadUniverse } from "./universe/load_universe";
import { YahooMarketDataProvider } from "./market_fetcher";
import { runEarningsScan, type ScanOutcome } from "./scanner/scan";
import { FixedDelayThrottle, type Throttle } from "./scanner/throttle";
import { isIsoDate, toMarketDate } from "./markets/market_time";
import {
  toDisplayRow,
  renderTable,
  formatSummary,
  writeCsvToFile,
  NO_RESULTS_MESSAGE,
} from "./audit";
import type { MarketDataProvider } from "./types";

export interface ScanCommandOptions {
  config?: string;
  date?: string;
  minUnderpricing?: number;
  minProb?: number;
  maxSymbols?: number;
  delayMs?: number;
  csv: boolean;
}

export interface ScanCommandDeps {
  provider?: MarketDataProvider;
  throttle?: Throttle;
  now?: Date;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return n;
}

function parseDate(value: string): string {
  if (!isIsoDate(value)) {
    throw new InvalidArgumentError("Expected YYYY-MM-DD.");
  }
  return value;
}

/** Apply CLI overrides on top of the file config; the schema re-checks ranges. */
export function applyOverrides(config: Config, opts: ScanCommandOptions): Config {
  return parseConfig(
    {
      ...config,
      universe: { ...config.universe, max_symbols: opts.maxSymbols ?? config.universe.max_symbols },
      thresholds: {
        min_underpricing: opts.minUnderpricing ?? config.thresholds.min_underpricing,
        min_prob: opts.minProb ?? config.thresholds.min_prob,
      },
      provider: { ...config.provider, request_delay_ms: opts.delayMs ?? config.provider.request_delay_ms },
    },
    "command line"
  );
}

export async function runScanCommand(opts: ScanCommandOptions, deps: ScanCommandDeps = {}): Promise<ScanOutcome> {
  const config = applyOverrides(loadConfig(opts.config), opts);
  const now = deps.now ?? new Date();
  const today = opts.date ?? toMarketDate(now, config.provider.market_timezone);

  const universe = await loadUniverse(
    config.universe.path,
    config.universe.symbol_column,
    config.universe.max_symbols
  );

  const outcome = await runEarningsScan(
    universe,
    {
      today,
      now,
      max_symbols: config.universe.max_symbols,
      min_underpricing: config.thresholds.min_underpricing,
      min_prob: config.thresholds.min_prob,
      market_timezone: config.provider.market_timezone,
      history_years: config.provider.history_years,
    },
    {
      provider: deps.provider ?? new YahooMarketDataProvider(),
      throttle: deps.throttle ?? new FixedDelayThrottle(config.provider.request_delay_ms),
      onProgress: (e) => {
        if (e.outcome === "accepted") console.log(`[scan] ${e.index + 1}/${e.total} ${e.ticker} qualifies`);
      },
    }
  );

  console.log(formatSummary(outcome.stats));
  if (outcome.candidates.length === 0) {
    console.warn(NO_RESULTS_MESSAGE);
    return outcome;
  }

  const rows = outcome.candidates.map(toDisplayRow);
  console.log("\nRanked Earnings Opportunities");
  console.log(renderTable(rows));
  if (opts.csv) {
    const path = writeCsvToFile(rows, config.reporting.report_dir, config.reporting.csv_filename);
    console.log(`[report] CSV written to ${path}`);
  }
  return outcome;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("earnings-vol-scan")
    .description("Rank today's earnings reporters by implied vs. realized move");

  program
    .command("scan", { isDefault: true })
    .description("Run one earnings scan over the configured universe")
    .option("-c, --config <path>", "Config file (default: ./config.json or src/config/config.example.json)")
    .option("-d, --date <yyyy-mm-dd>", "Treat this market date as today", parseDate)
    .option("-u, --min-underpricing <ratio>", "Minimum underpricing ratio (0.5-3.0)", parseNumber)
    .option("-p, --min-prob <prob>", "Minimum squeeze / cascade probability (0.4-0.9)", parseNumber)
    .option("-n, --max-symbols <count>", "Max symbols to scan (0-500)", parseNumber)
    .option("--delay-ms <ms>", "Pause between symbols", parseNumber)
    .option("--no-csv", "Skip writing the CSV export")
    .action(async (opts: ScanCommandOptions) => {
      await runScanCommand(opts);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      console.error("[fatal]", e instanceof Error ? e.message : e);
      process.exitCode = 1;
    });
}
