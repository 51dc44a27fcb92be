import { createReadStream, existsSync } from "fs";
import { isAbsolute, join } from "path";
import { parse } from "csv-parse";
import { z } from "zod";

const RowSchema = z.record(z.string(), z.string());

/** Resolve a configured universe path against the working directory. */
export function resolveUniversePath(path: string): string {
  return isAbsolute(path) ? path : join(process.cwd(), path);
}

/**
 * Read ticker symbols from a headered CSV, in file order.
 * Blank symbols and repeats are dropped; the list is truncated to `maxSymbols`.
 */
export async function loadUniverse(path: string, symbolColumn: string, maxSymbols: number): Promise<string[]> {
  const csvPath = resolveUniversePath(path);
  if (!existsSync(csvPath)) {
    throw new Error(`Universe file not found: ${csvPath}`);
  }

  const symbols = await new Promise<string[]>((resolve, reject) => {
    const out: string[] = [];
    const seen = new Set<string>();
    let missingColumn = false;
    createReadStream(csvPath)
      .pipe(
        parse({
          columns: true,
          skip_empty_lines: true,
          trim: true,
        })
      )
      .on("data", (row: unknown) => {
        const parsed = RowSchema.safeParse(row);
        if (!parsed.success) return;
        if (!(symbolColumn in parsed.data)) {
          missingColumn = true;
          return;
        }
        const symbol = parsed.data[symbolColumn].toUpperCase();
        if (!symbol || seen.has(symbol)) return;
        seen.add(symbol);
        out.push(symbol);
      })
      .on("error", (error: Error) => reject(error))
      .on("end", () => {
        if (missingColumn && out.length === 0) {
          reject(new Error(`Universe file ${csvPath} has no "${symbolColumn}" column`));
          return;
        }
        resolve(out);
      });
  });

  const universe = symbols.slice(0, Math.max(0, maxSymbols));
  console.log(`[universe] Loaded ${symbols.length} symbols from ${csvPath}, scanning ${universe.length}`);
  return universe;
}
