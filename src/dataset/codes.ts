import fs from "node:fs";
import path from "node:path";
import { ColumnNotFoundError, DatasetReadError } from "../core/errors";
import { findMarkerIndex } from "../core/marker";
import { parseCsvRows } from "./csv";

const CODE_PATTERN = /^[A-Z0-9]{2}$/;

/**
 * Trimmed, upper-cased two-character ASCII alphanumeric code, or undefined.
 * Upper-casing follows full Unicode rules, so "ß" becomes "SS".
 */
export function normalizeAirlineCode(value: string): string | undefined {
  const code = value.trim().toUpperCase();
  return CODE_PATTERN.test(code) ? code : undefined;
}

export function collectCodesFromValues(values: Iterable<string>): Set<string> {
  const codes = new Set<string>();
  for (const value of values) {
    const code = normalizeAirlineCode(value);
    if (code) {
      codes.add(code);
    }
  }
  return codes;
}

export function collectCodesFromRows(rows: readonly (readonly string[])[], marker: string, source: string): Set<string> {
  const [header, ...body] = rows;
  const index = header ? findMarkerIndex(header, marker) : -1;
  if (index < 0) {
    throw new ColumnNotFoundError(marker, source);
  }

  const values: string[] = [];
  for (const row of body) {
    if (index < row.length) {
      values.push(row[index]);
    }
  }
  return collectCodesFromValues(values);
}

/** Re-reads the dataset and returns the distinct airline codes from its marker column. */
export async function collectAirlineCodes(filePath: string, marker: string): Promise<Set<string>> {
  const absolutePath = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf-8");
  } catch (error) {
    throw new DatasetReadError(absolutePath, error);
  }
  return collectCodesFromRows(parseCsvRows(content), marker, absolutePath);
}
