import { Action, GameState } from "@hexbridge/core";
import { Coords } from "./coords";
import { HexData, toGame } from "./state";

/** A hex action: place a stone at (row, column) */
export interface PlaceAction extends Action<{ row: number; column: number }> {
  type: "place";
}

export function placeAction(c: Coords): PlaceAction {
  return { type: "place", data: { row: c.row, column: c.column } };
}

/** Type guard for PlaceAction. Bounds depend on the board and are checked by the rules. */
export function isPlaceAction(action: Action): action is PlaceAction {
  return (
    action.type === "place" &&
    Number.isInteger(action.data.row) &&
    Number.isInteger(action.data.column)
  );
}

/**
 * Get all legal actions for a player in the current state.
 * Returns empty array if it's not the player's turn or the game is terminal.
 */
export function getLegalActionsForPlayer(
  state: GameState<HexData>,
  playerId: string
): Action[] {
  if (state.data.winnerColor !== null || state.currentPlayer !== playerId) {
    return [];
  }

  // Every empty cell is a legal place action
  return toGame(state.data).board.getEmptyCells().map(placeAction);
}
