import { StoneMatrix } from "./board";
import { Color } from "./color";
import { LoadError, Result, err } from "./errors";
import { Game } from "./game";

/** Color codes of the stored format. */
export type ColorCode = 0 | 1 | 2;

/** JSON shape of a saved game. */
export interface StoredGame {
  size: number;
  currentPlayer: ColorCode;
  cells: ColorCode[][];
}

export function encodeColor(color: Color | null): ColorCode {
  switch (color) {
    case null:
      return 0;
    case "black":
      return 1;
    case "white":
      return 2;
  }
}

export function decodeColor(code: unknown): Color | null | undefined {
  switch (code) {
    case 0:
      return null;
    case 1:
      return "black";
    case 2:
      return "white";
    default:
      return undefined;
  }
}

export function encodeStoneMatrix(matrix: StoneMatrix): ColorCode[][] {
  return matrix.map((row) => row.map(encodeColor));
}

/**
 * Save a game. A finished game stores its winner as the current player;
 * loading detects the finished position from the stones alone.
 */
export function saveGameToJson(game: Game): StoredGame {
  const status = game.getStatus();
  const player = status.kind === "ongoing" ? status.currentPlayer : status.winner;
  return {
    size: game.board.size,
    currentPlayer: encodeColor(player),
    cells: encodeStoneMatrix(game.board.toStoneMatrix()),
  };
}

export function saveGameToString(game: Game): string {
  return JSON.stringify(saveGameToJson(game));
}

export function loadGameFromJson(value: unknown): Result<Game, LoadError> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return invalidData("Stored game must be an object");
  }
  const size = "size" in value ? value.size : undefined;
  const currentPlayer = "currentPlayer" in value ? value.currentPlayer : undefined;
  const cells = "cells" in value ? value.cells : undefined;

  if (typeof size !== "number") {
    return invalidData("Stored game has no numeric size");
  }
  if (!Array.isArray(cells)) {
    return invalidData("Stored game has no cells");
  }
  if (cells.length !== size) {
    return invalidData(`Stored game has ${cells.length} rows but size ${size}`);
  }

  const player = decodeColor(currentPlayer);
  if (player === undefined) {
    return invalidData(`Invalid color ${String(currentPlayer)}`);
  }

  const matrix: StoneMatrix = [];
  for (const row of cells) {
    if (!Array.isArray(row)) {
      return invalidData("Each row of cells must be an array");
    }
    const stones: (Color | null)[] = [];
    for (const code of row) {
      const color = decodeColor(code);
      if (color === undefined) {
        return invalidData(`Invalid color ${String(code)}`);
      }
      stones.push(color);
    }
    matrix.push(stones);
  }

  return Game.load(matrix, player);
}

export function loadGameFromString(text: string): Result<Game, LoadError> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return invalidData(`Stored game is not valid JSON: ${reason}`);
  }
  return loadGameFromJson(value);
}

function invalidData(message: string): Result<never, LoadError> {
  return err({ kind: "InvalidData", message });
}

export function decodeStoneMatrix(cells: ColorCode[][]): StoneMatrix {
  return cells.map((row) => row.map((code) => decodeColor(code) ?? null));
}
