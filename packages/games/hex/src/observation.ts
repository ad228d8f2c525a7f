import { GameState, Observation } from "@hexbridge/core";
import { HexData, HexPublicData, cloneCells } from "./state";

/**
 * Hex is a complete information game, so the observation
 * is the full state for all players.
 */
export function getObservationForPlayer(
  state: GameState<HexData>,
  _playerId: string
): Observation<HexPublicData> {
  const data = state.data;

  return {
    gameId: state.gameId,
    players: [...state.players],
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber,
    publicData: {
      size: data.size,
      cells: cloneCells(data.cells),
      colors: { ...data.colors },
      activeColor: data.activeColor,
      lastMove: data.lastMove ? { ...data.lastMove } : null,
      attackedBridges: data.attackedBridges.map((c) => ({ ...c })),
      winnerColor: data.winnerColor,
    },
  };
}
