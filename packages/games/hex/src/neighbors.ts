import { InvariantError } from "./errors";
import { HexCells, Index } from "./hexCells";

/**
 * Neighbors of a cell in clockwise order starting on the left:
 * left, top-left, top-right, right, bottom-right, bottom-left.
 *
 * Off-board neighbors on the four straight sides are replaced by the matching
 * edge. Top-right and bottom-left have no edge to stand in for them at the
 * obtuse corners, so they are left out there; a cell has 4 to 6 neighbors.
 */
export function* getNeighbors(cells: HexCells, index: Index): Generator<Index, void, undefined> {
  if (!Number.isInteger(index) || index < 0 || index >= cells.firstEdgeIndex) {
    throw new InvariantError(`Index ${index} is not a cell`);
  }

  const size = cells.size;
  const column = index % size;
  const isTopRow = index < size;
  const isBottomRow = index >= size * (size - 1);
  const isLeftColumn = column === 0;
  const isRightColumn = column === size - 1;

  yield isLeftColumn ? cells.indexFromEdge("left") : index - 1;
  yield isTopRow ? cells.indexFromEdge("top") : index - size;
  if (!isTopRow && !isRightColumn) {
    yield index - size + 1;
  }
  yield isRightColumn ? cells.indexFromEdge("right") : index + 1;
  yield isBottomRow ? cells.indexFromEdge("bottom") : index + size;
  if (!isBottomRow && !isLeftColumn) {
    yield index + size - 1;
  }
}
