export interface GameConfig {
  gameId: string;
  version: string;
  settings?: Record<string, unknown>;
}

/**
 * Snapshot of a match. `TData` is the game-specific payload; modules keep it
 * JSON-safe so a state can be stored and reloaded as-is.
 */
export interface GameState<TData = Record<string, unknown>> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  data: TData;
}

export interface Action<TData = Record<string, unknown>> {
  type: string;
  data: TData;
}

export interface Outcome {
  winner: string | null;
  draw: boolean;
  scores: Record<string, number>;
  reason: string;
}

export interface Observation<TPublic = Record<string, unknown>> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  publicData: TPublic;
  privateData?: Record<string, unknown>;
}
