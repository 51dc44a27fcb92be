/**
 * Market-data provider backed by Yahoo Finance (yahoo-finance2).
 * Every call is best-effort: failures come back as { ok: false, reason } without logging;
 * the scan loop decides to skip and counts the reason. No retries, no caching.
 */

import yahooFinance from "yahoo-finance2";
import { z } from "zod";
import { toMs } from "./market_time";
import type { FetchResult, MarketDataProvider, OptionContract, OptionsSnapshot } from "../types";

yahooFinance.suppressNotices(["yahooSurvey"]);

/** Raw Yahoo calls; responses are validated here rather than by the library. */
export interface YahooClient {
  calendarEvents(symbol: string): Promise<unknown>;
  options(symbol: string): Promise<unknown>;
  chart(symbol: string, period1: Date): Promise<unknown>;
}

const defaultClient: YahooClient = {
  calendarEvents: (symbol) =>
    yahooFinance.quoteSummary(symbol, { modules: ["calendarEvents"] }, { validateResult: false }),
  options: (symbol) => yahooFinance.options(symbol, {}, { validateResult: false }),
  chart: (symbol, period1) =>
    yahooFinance.chart(symbol, { period1, interval: "1d" }, { validateResult: false }),
};

const DateLike = z.union([z.date(), z.number(), z.string()]).transform((value, ctx) => {
  const ms = toMs(value);
  if (ms == null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid date" });
    return z.NEVER;
  }
  return new Date(ms);
});

const ContractSchema = z.object({
  strike: z.number(),
  lastPrice: z.number(),
  impliedVolatility: z.number().nullish(),
  openInterest: z.number().nullish(),
});

const OptionsResponseSchema = z.object({
  expirationDates: z.array(DateLike).optional().default([]),
  quote: z.object({ regularMarketPrice: z.number().nullish() }).optional(),
  options: z
    .array(
      z.object({
        expirationDate: DateLike.optional(),
        calls: z.array(ContractSchema).optional().default([]),
        puts: z.array(ContractSchema).optional().default([]),
      })
    )
    .optional()
    .default([]),
});

const CalendarResponseSchema = z.object({
  calendarEvents: z
    .object({
      earnings: z.object({ earningsDate: z.array(DateLike).optional().default([]) }).optional(),
    })
    .nullish(),
});

const ChartResponseSchema = z.object({
  quotes: z.array(z.object({ close: z.number().nullish() })).optional().default([]),
});

/** Yahoo writes share classes with a dash (BRK.B -> BRK-B). */
export function toYahooSymbol(ticker: string): string {
  return ticker.trim().toUpperCase().replace(/\./g, "-");
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function toContract(c: z.infer<typeof ContractSchema>): OptionContract {
  return {
    strike: c.strike,
    lastPrice: c.lastPrice,
    impliedVolatility: typeof c.impliedVolatility === "number" ? c.impliedVolatility : Number.NaN,
    openInterest: typeof c.openInterest === "number" ? c.openInterest : 0,
  };
}

function fail<T>(reason: string): FetchResult<T> {
  return { ok: false, reason };
}

export class YahooMarketDataProvider implements MarketDataProvider {
  constructor(private readonly client: YahooClient = defaultClient) {}

  async fetchEarningsDates(ticker: string): Promise<FetchResult<Date[]>> {
    let raw: unknown;
    try {
      raw = await this.client.calendarEvents(toYahooSymbol(ticker));
    } catch (e) {
      return fail(`calendar lookup failed: ${describeError(e)}`);
    }
    const parsed = CalendarResponseSchema.safeParse(raw);
    if (!parsed.success) return fail("malformed earnings calendar");
    const dates = parsed.data.calendarEvents?.earnings?.earningsDate ?? [];
    return { ok: true, data: dates };
  }

  async fetchOptionsSnapshot(ticker: string): Promise<FetchResult<OptionsSnapshot>> {
    let raw: unknown;
    try {
      raw = await this.client.options(toYahooSymbol(ticker));
    } catch (e) {
      return fail(`options request failed: ${describeError(e)}`);
    }
    const parsed = OptionsResponseSchema.safeParse(raw);
    if (!parsed.success) return fail("malformed options response");

    const { expirationDates, quote, options } = parsed.data;
    const chain = options[0];
    if (expirationDates.length === 0 || !chain) return fail("no listed options");
    const spot = quote?.regularMarketPrice;
    if (typeof spot !== "number" || !(spot > 0)) return fail("no spot price");

    const expiry = (chain.expirationDate ?? expirationDates[0]).toISOString().slice(0, 10);
    return {
      ok: true,
      data: {
        spot,
        expiry,
        calls: chain.calls.map(toContract),
        puts: chain.puts.map(toContract),
      },
    };
  }

  async fetchDailyCloses(ticker: string, since: Date): Promise<FetchResult<number[]>> {
    let raw: unknown;
    try {
      raw = await this.client.chart(toYahooSymbol(ticker), since);
    } catch (e) {
      return fail(`chart request failed: ${describeError(e)}`);
    }
    const parsed = ChartResponseSchema.safeParse(raw);
    if (!parsed.success) return fail("malformed chart response");
    const closes = parsed.data.quotes
      .map((q) => q.close)
      .filter((price): price is number => typeof price === "number" && Number.isFinite(price));
    if (closes.length < 2) return fail("not enough price history");
    return { ok: true, data: closes };
  }
}
