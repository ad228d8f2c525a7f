/** Zero-based cell position. Rows run top to bottom, columns left to right. */
export interface Coords {
  readonly row: number;
  readonly column: number;
}

export function isOnBoard(c: Coords, size: number): boolean {
  return (
    Number.isInteger(c.row) &&
    Number.isInteger(c.column) &&
    c.row >= 0 &&
    c.row < size &&
    c.column >= 0 &&
    c.column < size
  );
}

const FIRST_COLUMN_CODE = "a".charCodeAt(0);
const LAST_COLUMN_CODE = "z".charCodeAt(0);

export function toColumnChar(column: number): string {
  return String.fromCharCode(FIRST_COLUMN_CODE + column);
}

export function parseColumnChar(char: string): number | null {
  const code = char.charCodeAt(0);
  if (char.length !== 1 || code < FIRST_COLUMN_CODE || code > LAST_COLUMN_CODE) {
    return null;
  }
  return code - FIRST_COLUMN_CODE;
}

/** Format as column letter plus one-based row, e.g. `{row: 12, column: 5}` is "f13". */
export function coordsToString(c: Coords): string {
  return `${toColumnChar(c.column)}${c.row + 1}`;
}

/**
 * Parse "f13"-style notation. Returns null for anything that is not a
 * lower-case letter followed by a positive decimal row.
 * Does not check the result against a board size.
 */
export function parseCoords(text: string): Coords | null {
  const column = text.length > 0 ? parseColumnChar(text[0]) : null;
  const rowText = text.slice(1);
  if (column === null || !/^[0-9]+$/.test(rowText)) {
    return null;
  }
  const row = parseInt(rowText, 10);
  if (row < 1) {
    return null;
  }
  return { row: row - 1, column };
}
