import { GameConfig, GameState, Action, Outcome, Observation } from "@hexbridge/core";
import { IGameModule } from "@hexbridge/engine";
import { HexUI } from "./ui";
import { Color } from "./color";
import { describeInvalidMove } from "./errors";
import { encodeStoneMatrix } from "./serialize";
import { HexData, HexPublicData, emptyCells, readBoardSize, toGame } from "./state";
import { isPlaceAction, getLegalActionsForPlayer } from "./actions";
import { getObservationForPlayer } from "./observation";

export const HexModule: IGameModule<HexData, HexPublicData> = {
  gameId: "hex",
  name: "Hex",
  description:
    "Connect your two sides of the board. Black connects top-bottom, White connects left-right. No draws possible.",
  minPlayers: 2,
  maxPlayers: 2,
  ui: HexUI,

  init(config: GameConfig, players: string[]): GameState<HexData> {
    if (players.length !== 2) {
      throw new Error("Hex requires exactly 2 players");
    }
    const size = readBoardSize(config);

    const colors: Record<string, Color> = {
      [players[0]]: "black",
      [players[1]]: "white",
    };

    return {
      gameId: config.gameId,
      players,
      currentPlayer: players[0],
      turnNumber: 0,
      data: {
        size,
        cells: emptyCells(size),
        colors,
        activeColor: "black",
        lastMove: null,
        attackedBridges: [],
        winnerColor: null,
      },
    };
  },

  validateAction(state: GameState<HexData>, playerId: string, action: Action): boolean {
    if (state.currentPlayer !== playerId || state.data.winnerColor !== null) {
      return false;
    }
    if (!isPlaceAction(action)) {
      return false;
    }
    // Playing on a throwaway copy checks bounds and occupancy in one go
    return toGame(state.data).play(action.data).ok;
  },

  applyAction(state: GameState<HexData>, playerId: string, action: Action): GameState<HexData> {
    if (!isPlaceAction(action)) {
      throw new Error(`Invalid action type: ${action.type}`);
    }

    const game = toGame(state.data);
    const mover = state.data.activeColor;
    const move = { row: action.data.row, column: action.data.column };
    const played = game.play(move);
    if (!played.ok) {
      throw new Error(describeInvalidMove(played.error));
    }

    const otherPlayer = state.players.find((p) => p !== playerId) ?? playerId;

    return {
      gameId: state.gameId,
      players: state.players,
      currentPlayer: otherPlayer,
      turnNumber: state.turnNumber + 1,
      data: {
        size: state.data.size,
        cells: encodeStoneMatrix(game.board.toStoneMatrix()),
        colors: { ...state.data.colors },
        // stays on the winner once the game is over
        activeColor: game.getCurrentPlayer() ?? mover,
        lastMove: move,
        attackedBridges: game.board.findAttackedBridges(move),
        winnerColor: game.getWinner(),
      },
    };
  },

  isTerminal(state: GameState<HexData>): boolean {
    return state.data.winnerColor !== null;
  },

  getOutcome(state: GameState<HexData>): Outcome {
    const { winnerColor, colors } = state.data;

    if (winnerColor !== null) {
      // Find the player who owns the winning color
      const winnerPlayer =
        Object.entries(colors).find(([_, color]) => color === winnerColor)?.[0] ?? null;

      const scores: Record<string, number> = {};
      for (const player of state.players) {
        scores[player] = player === winnerPlayer ? 1 : 0;
      }

      return {
        winner: winnerPlayer,
        draw: false,
        scores,
        reason: "connected",
      };
    }

    // Game still in progress (no draws possible in Hex)
    return {
      winner: null,
      draw: false,
      scores: {},
      reason: "game_in_progress",
    };
  },

  getObservation(state: GameState<HexData>, playerId: string): Observation<HexPublicData> {
    return getObservationForPlayer(state, playerId);
  },

  getLegalActions(state: GameState<HexData>, playerId: string): Action[] {
    return getLegalActionsForPlayer(state, playerId);
  },
};
