import { Board, StoneMatrix } from "./board";
import { COLORS, Color, opponentColor } from "./color";
import { Coords } from "./coords";
import { getEdgesOfColor } from "./edges";
import { InvalidBoard, InvalidMove, Result, err, ok } from "./errors";

export type Status =
  | { readonly kind: "ongoing"; readonly currentPlayer: Color }
  | { readonly kind: "finished"; readonly winner: Color };

/**
 * Turn sequencing on top of a {@link Board}. Black moves first; the game ends
 * as soon as the mover's two edges are connected.
 */
export class Game {
  private constructor(
    readonly board: Board,
    private status: Status
  ) {}

  /** New empty game. Throws for an unsupported size, like `new Board`. */
  static create(size: number): Game {
    return new Game(new Board(size), { kind: "ongoing", currentPlayer: "black" });
  }

  /**
   * Resume from a stone layout. A position where one side has already
   * connected its edges loads as finished, whoever is named to move.
   */
  static load(
    matrix: StoneMatrix,
    currentPlayer: Color | null
  ): Result<Game, InvalidBoard> {
    const loaded = Board.fromStoneMatrix(matrix);
    if (!loaded.ok) {
      return loaded;
    }
    if (currentPlayer === null) {
      return err({ kind: "NoCurrentPlayer" });
    }

    const board = loaded.value;
    const winner = COLORS.find((color) => hasConnected(board, color));
    return ok(
      new Game(
        board,
        winner ? { kind: "finished", winner } : { kind: "ongoing", currentPlayer }
      )
    );
  }

  getStatus(): Status {
    return this.status;
  }

  /** The player to move, or null once the game is over. */
  getCurrentPlayer(): Color | null {
    return this.status.kind === "ongoing" ? this.status.currentPlayer : null;
  }

  getWinner(): Color | null {
    return this.status.kind === "finished" ? this.status.winner : null;
  }

  isFinished(): boolean {
    return this.status.kind === "finished";
  }

  play(c: Coords): Result<void, InvalidMove> {
    if (this.status.kind === "finished") {
      return err({ kind: "GameOver" });
    }

    const mover = this.status.currentPlayer;
    const played = this.board.play(c, mover);
    if (!played.ok) {
      return played;
    }

    this.status = hasConnected(this.board, mover)
      ? { kind: "finished", winner: mover }
      : { kind: "ongoing", currentPlayer: opponentColor(mover) };
    return ok(undefined);
  }
}

function hasConnected(board: Board, color: Color): boolean {
  const [from, to] = getEdgesOfColor(color);
  return board.isInSameSet(from, to);
}
