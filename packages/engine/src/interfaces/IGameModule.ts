import { GameConfig, GameState, Action, Outcome, Observation } from "@hexbridge/core";

// ---------------------------------------------------------------------------
// Game UI Specification: shipped by each game module for rendering
// ---------------------------------------------------------------------------

export interface PieceDisplay {
  /** Unicode or ASCII character (e.g. "●") */
  symbol: string;
  /** Short text label (e.g. "B") */
  label: string;
}

/**
 * UI specification that each game module can provide so that a terminal
 * front end can render any game without per-game logic.
 */
export interface GameUISpec<TPublic = Record<string, unknown>> {
  /** Player role labels in seat order (e.g. ["Black", "White"]) */
  playerLabels: string[];

  /** Map of piece identifiers to display info */
  pieces: Record<string, PieceDisplay>;

  /** Hint text shown to the current player (e.g. "Enter a cell like c3") */
  inputHint: string;

  /** Max possible turns, or null if unbounded. */
  maxTurns(publicData: TPublic): number | null;

  /** Render the board as plain text from publicData. */
  renderBoard(publicData: TPublic): string;

  /** Render a one-line status string, or null if nothing special. */
  renderStatus(publicData: TPublic): string | null;

  /** Parse raw user input into an Action, or return null if invalid. */
  parseInput(raw: string, publicData: TPublic): Action | null;

  /** Format an Action for move history (e.g. "c3"). */
  formatAction(action: Action): string;

  /** Get the display label for a player. */
  getPlayerLabel(playerId: string, publicData: TPublic): string;
}

// ---------------------------------------------------------------------------
// Game module contract
// ---------------------------------------------------------------------------

/**
 * Functions every game module implements.
 *
 * Every function must be deterministic given the same inputs, and must not
 * mutate the state it is given.
 */
export interface IGameModule<TData = unknown, TPublic = Record<string, unknown>> {
  /** Unique identifier for this game (e.g. "hex") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  /** Short description of the game */
  readonly description: string;

  readonly minPlayers: number;
  readonly maxPlayers: number;

  readonly ui?: GameUISpec<TPublic>;

  /** Initialize a new game state. Throws on an unusable config or player list. */
  init(config: GameConfig, players: string[]): GameState<TData>;

  /** Check if an action is valid in the current state */
  validateAction(state: GameState<TData>, playerId: string, action: Action): boolean;

  /** Apply a validated action and return the new state */
  applyAction(state: GameState<TData>, playerId: string, action: Action): GameState<TData>;

  isTerminal(state: GameState<TData>): boolean;

  getOutcome(state: GameState<TData>): Outcome;

  /** Get the observable state for a specific player */
  getObservation(state: GameState<TData>, playerId: string): Observation<TPublic>;

  getLegalActions(state: GameState<TData>, playerId: string): Action[];
}
