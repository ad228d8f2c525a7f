import { Color } from "./color";
import { Coords, coordsToString, isOnBoard } from "./coords";
import { CoordsOrEdge, Edge, EDGES, getColorOfEdge, isEdge } from "./edges";
import { InvariantError } from "./errors";
import { ParentStore } from "./unionFind";

/**
 * Internal position in {@link HexCells}: `row * size + column` for cells,
 * followed by the edges in {@link EDGES} order. Never exposed outside the
 * package; callers see `Coords` or `Edge`.
 */
export type Index = number;

export const MIN_BOARD_SIZE = 2;
export const MAX_BOARD_SIZE = 19;

interface HexCell {
  color: Color | null;
  parent: Index | null;
}

/**
 * Flat storage of every cell plus the four virtual edge cells. Also serves as
 * the parent store of the board's union-find.
 */
export class HexCells implements ParentStore<Index> {
  readonly size: number;
  private readonly cells: HexCell[];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
      throw new InvariantError(
        `Board size must be an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}, got ${size}`
      );
    }
    this.size = size;
    this.cells = Array.from({ length: size * size + EDGES.length }, () => ({
      color: null,
      parent: null,
    }));
  }

  /** Number of slots, normal cells and edges together. */
  get length(): number {
    return this.cells.length;
  }

  /** First edge index; every index below it is a normal cell. */
  get firstEdgeIndex(): Index {
    return this.size * this.size;
  }

  indexFromCoords(c: Coords): Index {
    if (!isOnBoard(c, this.size)) {
      throw new InvariantError(
        `Coords ${coordsToString(c)} out of bounds for board size ${this.size}`
      );
    }
    return c.row * this.size + c.column;
  }

  indexFromEdge(edge: Edge): Index {
    return this.firstEdgeIndex + EDGES.indexOf(edge);
  }

  indexFromCoordsOrEdge(value: CoordsOrEdge): Index {
    return isEdge(value) ? this.indexFromEdge(value) : this.indexFromCoords(value);
  }

  decodeIndex(index: Index): CoordsOrEdge {
    this.checkIndex(index);
    if (index < this.firstEdgeIndex) {
      return {
        row: Math.floor(index / this.size),
        column: index % this.size,
      };
    }
    return EDGES[index - this.firstEdgeIndex];
  }

  coordsFromIndex(index: Index): Coords {
    const decoded = this.decodeIndex(index);
    if (isEdge(decoded)) {
      throw new InvariantError(`Index ${index} is the ${decoded} edge, not a cell`);
    }
    return decoded;
  }

  getColorAtIndex(index: Index): Color | null {
    return this.slot(index).color;
  }

  setColorAtIndex(index: Index, color: Color): void {
    this.slot(index).color = color;
  }

  getColorAtCoords(c: Coords): Color | null {
    return this.getColorAtIndex(this.indexFromCoords(c));
  }

  setColorAtCoords(c: Coords, color: Color): void {
    this.setColorAtIndex(this.indexFromCoords(c), color);
  }

  getParent(index: Index): Index | null {
    return this.slot(index).parent;
  }

  setParent(index: Index, parent: Index): void {
    this.checkIndex(parent);
    this.slot(index).parent = parent;
  }

  private slot(index: Index): HexCell {
    this.checkIndex(index);
    return this.cells[index];
  }

  private checkIndex(index: Index): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.cells.length) {
      throw new InvariantError(`Index ${index} outside 0..${this.cells.length - 1}`);
    }
  }
}

/** Color the four edges with their owners' colors. */
export function setEdgeColors(cells: HexCells): void {
  for (const edge of EDGES) {
    cells.setColorAtIndex(cells.indexFromEdge(edge), getColorOfEdge(edge));
  }
}
