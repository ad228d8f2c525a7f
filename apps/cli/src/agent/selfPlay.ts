import { Action, GameConfig, Outcome, SeededRandom } from "@hexbridge/core";
import { IGameModule } from "@hexbridge/engine";

export interface SelfPlayResult {
  outcome: Outcome;
  /** Moves in the module's notation */
  moves: string[];
}

const DEFAULT_TURN_LIMIT = 10_000;

/**
 * Play one game between random agents through the module contract.
 * Every move is validated before it is applied.
 */
export function playRandomGame(
  gameModule: IGameModule,
  config: GameConfig,
  random: SeededRandom,
  turnLimit = DEFAULT_TURN_LIMIT
): SelfPlayResult {
  const players = Array.from({ length: gameModule.minPlayers }, (_, i) => `agent-${i + 1}`);
  let state = gameModule.init(config, players);
  const moves: string[] = [];

  while (!gameModule.isTerminal(state)) {
    if (moves.length >= turnLimit) {
      throw new Error(`${gameModule.name} did not finish within ${turnLimit} turns`);
    }
    const player = state.currentPlayer;
    const action: Action = random.pick(gameModule.getLegalActions(state, player));
    if (!gameModule.validateAction(state, player, action)) {
      throw new Error(`${gameModule.name} offered an invalid action ${action.type} on turn ${state.turnNumber}`);
    }
    state = gameModule.applyAction(state, player, action);
    moves.push(gameModule.ui ? gameModule.ui.formatAction(action) : action.type);
  }

  return { outcome: gameModule.getOutcome(state), moves };
}
