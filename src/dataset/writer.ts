import fs from "node:fs";
import path from "node:path";
import { DatasetWriteError } from "../core/errors";
import { formatCsv } from "./csv";

export interface DatasetWriteSummary {
  path: string;
  columns: number;
  rows: number;
}

/** Truncates or right-pads with "" so the result is exactly `width` cells. Never aliases `row`. */
export function normalizeRow(row: readonly string[], width: number): string[] {
  if (row.length >= width) {
    return row.slice(0, width);
  }
  const padded = row.slice();
  while (padded.length < width) {
    padded.push("");
  }
  return padded;
}

export function buildDataset(header: readonly string[], rows: readonly (readonly string[])[]): string[][] {
  return [header.slice(), ...rows.map((row) => normalizeRow(row, header.length))];
}

/** Overwrites `filePath` with the header followed by every row at header width. */
export async function writeDataset(
  filePath: string,
  header: readonly string[],
  rows: readonly (readonly string[])[],
): Promise<DatasetWriteSummary> {
  const absolutePath = path.resolve(filePath);
  const content = formatCsv(buildDataset(header, rows));

  try {
    await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.promises.writeFile(absolutePath, content, "utf-8");
  } catch (error) {
    throw new DatasetWriteError(absolutePath, error);
  }

  return { path: absolutePath, columns: header.length, rows: rows.length };
}
