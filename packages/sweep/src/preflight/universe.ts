import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";

const RowsSchema = z.array(z.array(z.string()));

export const DEFAULT_SMOKE_SIZE = 30;

/**
 * Symbols from a universe CSV. Uses the `symbol` column when the first row names
 * one (any case), otherwise treats the file as headerless and takes column one.
 * Values are trimmed; blanks and repeats are dropped, first occurrence wins.
 */
export function parseUniverse(text: string): string[] {
  const rows = RowsSchema.parse(
    parse(text.replace(/^\uFEFF/, ""), { trim: true, skip_empty_lines: true, relax_column_count: true }),
  );
  if (rows.length === 0) return [];

  const headerIndex = rows[0].findIndex((cell) => cell.toLowerCase() === "symbol");
  const column = headerIndex >= 0 ? headerIndex : 0;
  const body = headerIndex >= 0 ? rows.slice(1) : rows;

  const seen = new Set<string>();
  for (const row of body) {
    const symbol = (row[column] ?? "").trim();
    if (symbol) seen.add(symbol);
  }
  return [...seen];
}

export function loadUniverse(filePath: string): string[] {
  return parseUniverse(fs.readFileSync(filePath, "utf8"));
}

/** First candidate path that exists, or null. */
export function resolveUniversePath(candidates: readonly string[]): string | null {
  return candidates.find((p) => fs.existsSync(p)) ?? null;
}

/**
 * Writes the first `size` symbols as a one-column CSV for quick engine runs.
 * Leaves an existing file alone; returns whether it wrote.
 */
export function writeSmokeList(symbols: readonly string[], filePath: string, size = DEFAULT_SMOKE_SIZE): boolean {
  if (fs.existsSync(filePath)) return false;
  const lines = ["symbol", ...symbols.slice(0, size)];
  fs.writeFileSync(filePath, `${lines.join("\n")}\n`, "utf8");
  return true;
}
