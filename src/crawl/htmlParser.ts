import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { isText } from "domhandler";
import type { AnyNode } from "domhandler";
import { isMarkerCell } from "../core/marker";
import { RawTable } from "../types";

const TABLE_SELECTOR = "table.wikitable";

function collectText<T extends AnyNode>($: CheerioAPI, nodes: Cheerio<T>, out: string[]): void {
  nodes.each((_, node) => {
    if (isText(node)) {
      out.push(node.data);
      return;
    }
    collectText($, $(node).contents(), out);
  });
}

/**
 * Joins every descendant text node with a space, then collapses whitespace,
 * so `<a>Air</a><sup>[1]</sup>` reads "Air [1]" rather than "Air[1]".
 */
export function extractCellText<T extends AnyNode>($: CheerioAPI, cell: Cheerio<T>): string {
  const parts: string[] = [];
  collectText($, cell.contents(), parts);
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

/**
 * Returns the first wikitable whose first row has a cell equal to `marker`
 * (trimmed, case-insensitive), or undefined when no table qualifies.
 */
export function extractMarkedTable(html: string, marker: string): RawTable | undefined {
  const $ = load(html);

  for (const table of $(TABLE_SELECTOR).toArray()) {
    const rows = $(table).find("tr");
    if (rows.length === 0) {
      continue;
    }

    const header = rows
      .first()
      .find("th, td")
      .toArray()
      .map((cell) => extractCellText($, $(cell)));
    if (!header.some((cell) => isMarkerCell(cell, marker))) {
      continue;
    }

    const data: string[][] = [];
    rows.slice(1).each((_, tr) => {
      const row = $(tr)
        .find("td")
        .toArray()
        .map((cell) => extractCellText($, $(cell)));
      if (row.length > 0) {
        data.push(row);
      }
    });

    return { header, rows: data };
  }

  return undefined;
}
