export function isMarkerCell(cell: string, marker: string): boolean {
  return asciiUpper(cell.trim()) === asciiUpper(marker);
}

export function findMarkerIndex(header: readonly string[], marker: string): number {
  return header.findIndex((cell) => isMarkerCell(cell, marker));
}

export function asciiUpper(value: string): string {
  return value.replace(/[a-z]/g, (char) => char.toUpperCase());
}
