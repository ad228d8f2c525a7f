import { Board, StoneMatrix } from "./board";
import { Color } from "./color";
import { Coords, coordsToString, toColumnChar } from "./coords";

export const STONE_SYMBOLS: Record<Color, string> = {
  black: "●",
  white: "○",
};

const EMPTY_SYMBOL = ".";

/**
 * Render stones as a slanted rhombus, one row per line:
 *
 * ```text
 *  a  b  c 
 * 1\●  .  .\1
 *  2\.  .  .\2
 *   3\.  ○  .\3
 *      a  b  c 
 * ```
 */
export function renderStones(matrix: StoneMatrix): string {
  const size = matrix.length;
  const lines: string[] = [columnLabels(size, 0)];

  matrix.forEach((row, rowIndex) => {
    const label = String(rowIndex + 1);
    const cells = row.map((color) => (color === null ? EMPTY_SYMBOL : STONE_SYMBOLS[color]));
    lines.push(`${" ".repeat(rowIndex)}${label}\\${cells.join("  ")}\\${label}`);
  });

  lines.push(columnLabels(size, size + 1));
  return lines.join("\n");
}

export function renderBoard(board: Board): string {
  return renderStones(board.toStoneMatrix());
}

function columnLabels(size: number, indent: number): string {
  let labels = "";
  for (let column = 0; column < size; column++) {
    labels += ` ${toColumnChar(column)} `;
  }
  return " ".repeat(indent) + labels;
}

/** One-line hint for the cells a defender has to answer on, or null. */
export function describeAttackedBridges(bridges: readonly Coords[]): string | null {
  if (bridges.length === 0) {
    return null;
  }
  const noun = bridges.length === 1 ? "bridge" : "bridges";
  return `Attacked ${noun}, defend at ${bridges.map(coordsToString).join(", ")}`;
}
