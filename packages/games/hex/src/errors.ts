import { Coords, coordsToString } from "./coords";

/**
 * Outcome of a fallible operation. Rule violations are returned, never
 * thrown; thrown errors are reserved for broken internal invariants.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type InvalidMove =
  | { readonly kind: "GameOver" }
  | { readonly kind: "OutOfBounds"; readonly coords: Coords }
  | { readonly kind: "CellOccupied"; readonly coords: Coords };

export type InvalidBoard =
  | {
      readonly kind: "SizeOutOfBounds";
      readonly size: number;
      readonly min: number;
      readonly max: number;
    }
  | { readonly kind: "NotSquare"; readonly size: number; readonly rowIndex: number }
  | { readonly kind: "NoCurrentPlayer" };

/** Stored data that could not be decoded into a game at all. */
export interface InvalidData {
  readonly kind: "InvalidData";
  readonly message: string;
}

export type LoadError = InvalidBoard | InvalidData;

export function describeInvalidMove(error: InvalidMove): string {
  switch (error.kind) {
    case "GameOver":
      return "Game has ended";
    case "OutOfBounds":
      return `Coordinates ${coordsToString(error.coords)} are out of bounds`;
    case "CellOccupied":
      return `Cell ${coordsToString(error.coords)} is already occupied`;
  }
}

export function describeLoadError(error: LoadError): string {
  switch (error.kind) {
    case "SizeOutOfBounds":
      return `Board size must be between ${error.min} and ${error.max}. Found ${error.size}`;
    case "NotSquare":
      return `Length of row ${error.rowIndex} does not match board size ${error.size}`;
    case "NoCurrentPlayer":
      return "Current player is missing";
    case "InvalidData":
      return error.message;
  }
}

/** Thrown when an internal contract is broken, i.e. a bug in this package. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
