import { Coords, Result, err, ok, parseCoords } from "@hexbridge/game-hex";

/** A line typed at the move prompt. */
export type PlayerCommand =
  | { kind: "move"; coords: Coords }
  | { kind: "save"; path: string }
  | { kind: "quit" }
  | { kind: "help" };

export const USAGE = [
  "Enter a move as a cell like c3, or as zero-based row,column like 2,3.",
  "  save <file>  write the game to a file",
  "  help         show this text",
  "  quit         leave without saving",
].join("\n");

const INVALID_FORMAT = "Invalid coordinates. Try something like c3 or 2,3";

/**
 * Parse one input line. Cells in a1 notation are not checked against the
 * board here: the game reports those as out of bounds. Row,column pairs
 * are range-checked since they have no other form to fall back to.
 */
export function parseCommand(line: string, boardSize: number): Result<PlayerCommand, string> {
  const text = line.trim();
  const lower = text.toLowerCase();

  if (lower === "quit" || lower === "exit") {
    return ok({ kind: "quit" });
  }
  if (lower === "help" || lower === "?") {
    return ok({ kind: "help" });
  }

  const save = /^save(?:\s+(.*))?$/i.exec(text);
  if (save) {
    const path = (save[1] ?? "").trim();
    return path === "" ? err("Usage: save <file>") : ok({ kind: "save", path });
  }

  if (text.includes(",")) {
    return parseRowColumn(text, boardSize);
  }

  const coords = text === "" ? null : parseCoords(lower);
  if (coords === null) {
    return err(text === "" ? INVALID_FORMAT : `Invalid coordinates: ${text}`);
  }
  return ok({ kind: "move", coords });
}

function parseRowColumn(text: string, boardSize: number): Result<PlayerCommand, string> {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 2) {
    return err(INVALID_FORMAT);
  }

  const numbers: number[] = [];
  for (const part of parts) {
    if (!/^[0-9]+$/.test(part)) {
      return err(`Invalid number: ${part}`);
    }
    numbers.push(parseInt(part, 10));
  }

  const [row, column] = numbers;
  if (row >= boardSize || column >= boardSize) {
    return err(`Coordinates must be in range 0 - ${boardSize - 1}`);
  }
  return ok({ kind: "move", coords: { row, column } });
}
