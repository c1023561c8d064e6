const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(cells: readonly string[]): string {
  // A lone empty field would otherwise serialize as a blank line.
  if (cells.length === 1 && cells[0] === "") {
    return '""';
  }
  return cells.map((cell) => escapeCsvField(cell)).join(",");
}

export function formatCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => `${formatCsvRow(row)}\n`).join("");
}

/** Tolerant reader: rows keep whatever width they were written with. */
export function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        currentCell += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      continue;
    }

    currentCell += char;
  }

  if (currentCell.length > 0 || currentRow.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}
