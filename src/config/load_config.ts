import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const ConfigSchema = z.object({
  universe: z
    .object({
      path: z.string().optional().default("data/universe.csv"),
      symbol_column: z.string().min(1).optional().default("Symbol"),
      max_symbols: z.number().int().min(0).max(500).optional().default(200),
    })
    .optional()
    .default({ path: "data/universe.csv", symbol_column: "Symbol", max_symbols: 200 }),
  thresholds: z
    .object({
      min_underpricing: z.number().min(0.5).max(3).optional().default(1.0),
      min_prob: z.number().min(0.4).max(0.9).optional().default(0.5),
    })
    .optional()
    .default({ min_underpricing: 1.0, min_prob: 0.5 }),
  provider: z
    .object({
      /** Fixed pause between tickers; 0 disables pacing. */
      request_delay_ms: z.number().int().min(0).optional().default(300),
      history_years: z.number().positive().optional().default(2),
      market_timezone: z
        .string()
        .refine(isTimeZone, { message: "unknown IANA time zone" })
        .optional()
        .default("America/New_York"),
    })
    .optional()
    .default({ request_delay_ms: 300, history_years: 2, market_timezone: "America/New_York" }),
  reporting: z
    .object({
      report_dir: z.string().optional().default("reports"),
      csv_filename: z.string().min(1).optional().default("earnings_rankings.csv"),
    })
    .optional()
    .default({ report_dir: "reports", csv_filename: "earnings_rankings.csv" }),
});

export type Config = z.infer<typeof ConfigSchema>;

function findConfigPath(): string {
  const cwd = process.cwd();
  const candidates = [
    join(cwd, "config.json"),
    join(cwd, "src", "config", "config.json"),
    join(cwd, "src", "config", "config.example.json"),
    join(__dirname, "config.json"),
    join(__dirname, "config.example.json"),
  ];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw new Error(
    `Config file not found. Copy src/config/config.example.json to config.json (in project root or src/config). Tried: ${candidates.join(", ")}`
  );
}

/** Validate an already-parsed config object. Missing sections fall back to defaults. */
export function parseConfig(data: unknown, source = "config"): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues;
    const msg = issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Config validation failed (${source}): ${msg}`);
  }
  return result.data;
}

export function loadConfig(path?: string): Config {
  const configPath = path ?? findConfigPath();
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const raw = readFileSync(configPath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in config at ${configPath}: ${String(e)}`);
  }
  return parseConfig(data, configPath);
}
