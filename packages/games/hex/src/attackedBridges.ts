import { opponentColor } from "./color";
import { Coords } from "./coords";
import { HexCells } from "./hexCells";
import { getNeighbors } from "./neighbors";

/** How much of the pattern [defender, empty, defender] has been matched so far. */
type MatchState = "found0" | "found1" | "found2";

/**
 * Find the bridges that the stone at `coords` attacks.
 *
 * A bridge is two defender stones (or a stone and the defender's own edge)
 * sharing two empty neighbors. A stone placed on one of those neighbors
 * attacks it; the returned coords are the other neighbor, where the defender
 * has to answer. Results follow the clockwise neighbor order and may share a
 * stone between two bridges.
 */
export function findAttackedBridges(cells: HexCells, coords: Coords): Coords[] {
  const center = cells.indexFromCoords(coords);
  const attacker = cells.getColorAtIndex(center);
  if (attacker === null) {
    return [];
  }
  const searchColor = opponentColor(attacker);

  // Repeat the first two neighbors so a bridge spanning last -> first is seen.
  const neighbors = [...getNeighbors(cells, center)];
  const ring = [...neighbors, neighbors[0], neighbors[1]];

  const result: Coords[] = [];
  let state: MatchState = "found0";

  for (let i = 0; i < ring.length; i++) {
    const color = cells.getColorAtIndex(ring[i]);
    switch (state) {
      case "found0":
        if (color === searchColor) {
          state = "found1";
        }
        break;
      case "found1":
        if (color === null) {
          state = "found2";
        } else if (color !== searchColor) {
          state = "found0";
        }
        // a second defender stone may start the next match: stay in found1
        break;
      case "found2":
        if (color === searchColor) {
          result.push(cells.coordsFromIndex(ring[i - 1]));
          // the closing stone can open an overlapping bridge
          state = "found1";
        } else {
          state = "found0";
        }
        break;
    }
  }

  return result;
}
