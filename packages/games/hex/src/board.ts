import { Color } from "./color";
import { Coords, isOnBoard } from "./coords";
import { CoordsOrEdge } from "./edges";
import { InvalidBoard, InvalidMove, Result, err, ok } from "./errors";
import { findAttackedBridges } from "./attackedBridges";
import { HexCells, Index, MAX_BOARD_SIZE, MIN_BOARD_SIZE, setEdgeColors } from "./hexCells";
import { getNeighbors } from "./neighbors";
import { UnionFind, compareNumbers } from "./unionFind";

/** Row-major stone layout, `null` for an empty cell. */
export type StoneMatrix = (Color | null)[][];

export { MIN_BOARD_SIZE, MAX_BOARD_SIZE };

export class Board {
  private readonly cells: HexCells;
  private readonly groups: UnionFind<Index>;

  /** Throws for a size outside `MIN_BOARD_SIZE..MAX_BOARD_SIZE`; use {@link Board.create} for untrusted input. */
  constructor(size: number) {
    this.cells = new HexCells(size);
    this.groups = new UnionFind(this.cells, compareNumbers);
    setEdgeColors(this.cells);
  }

  static create(size: number): Result<Board, InvalidBoard> {
    const sizeError = checkBoardSize(size);
    return sizeError ? err(sizeError) : ok(new Board(size));
  }

  /**
   * Build a board by replaying every stone of `matrix` in row-major order,
   * so the connectivity matches a game that played those moves.
   */
  static fromStoneMatrix(matrix: StoneMatrix): Result<Board, InvalidBoard> {
    const size = matrix.length;
    const sizeError = checkBoardSize(size);
    if (sizeError) {
      return err(sizeError);
    }

    const rowIndex = matrix.findIndex((row) => row.length !== size);
    if (rowIndex !== -1) {
      return err({ kind: "NotSquare", size, rowIndex });
    }

    const board = new Board(size);
    for (let row = 0; row < size; row++) {
      for (let column = 0; column < size; column++) {
        const color = matrix[row][column];
        if (color !== null) {
          const played = board.play({ row, column }, color);
          if (!played.ok) {
            // unreachable: a square matrix holds one stone per in-bounds cell
            throw new Error(`Replaying stone matrix failed at ${row},${column}`);
          }
        }
      }
    }
    return ok(board);
  }

  get size(): number {
    return this.cells.size;
  }

  getColor(c: Coords): Color | null {
    return this.cells.getColorAtCoords(c);
  }

  play(c: Coords, color: Color): Result<void, InvalidMove> {
    if (!isOnBoard(c, this.size)) {
      return err({ kind: "OutOfBounds", coords: c });
    }

    const index = this.cells.indexFromCoords(c);
    if (this.cells.getColorAtIndex(index) !== null) {
      return err({ kind: "CellOccupied", coords: c });
    }

    this.cells.setColorAtIndex(index, color);

    // If neighbor k was merged, neighbor k+1 touches both k and the new stone,
    // so any group it belongs to is already joined through k.
    let skipNext = false;
    for (const neighbor of getNeighbors(this.cells, index)) {
      if (skipNext) {
        skipNext = false;
        continue;
      }
      if (this.cells.getColorAtIndex(neighbor) === color) {
        this.groups.merge(index, neighbor);
        skipNext = true;
      }
    }

    return ok(undefined);
  }

  /** True when a chain of like-colored stones links `a` and `b`. Edges count as stones of their owner. */
  isInSameSet(a: CoordsOrEdge, b: CoordsOrEdge): boolean {
    return this.groups.isInSameSet(
      this.cells.indexFromCoordsOrEdge(a),
      this.cells.indexFromCoordsOrEdge(b)
    );
  }

  getEmptyCells(): Coords[] {
    const empty: Coords[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let column = 0; column < this.size; column++) {
        if (this.getColor({ row, column }) === null) {
          empty.push({ row, column });
        }
      }
    }
    return empty;
  }

  /** See {@link findAttackedBridges}. Empty for an empty cell. */
  findAttackedBridges(c: Coords): Coords[] {
    return findAttackedBridges(this.cells, c);
  }

  toStoneMatrix(): StoneMatrix {
    return Array.from({ length: this.size }, (_, row) =>
      Array.from({ length: this.size }, (_, column) => this.getColor({ row, column }))
    );
  }
}

function checkBoardSize(size: number): InvalidBoard | null {
  if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
    return { kind: "SizeOutOfBounds", size, min: MIN_BOARD_SIZE, max: MAX_BOARD_SIZE };
  }
  return null;
}
