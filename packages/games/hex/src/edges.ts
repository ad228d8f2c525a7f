import { Color } from "./color";
import { Coords } from "./coords";

/**
 * The four board edges. Top and bottom belong to Black, left and right to White.
 * The declaration order is also the storage order after the normal cells.
 */
export type Edge = "left" | "top" | "right" | "bottom";

export const EDGES: readonly Edge[] = ["left", "top", "right", "bottom"];

/** Either a cell or an edge, e.g. a neighbor of a boundary cell. */
export type CoordsOrEdge = Coords | Edge;

export function isEdge(value: CoordsOrEdge): value is Edge {
  return typeof value === "string";
}

export function getEdgesOfColor(color: Color): [Edge, Edge] {
  return color === "black" ? ["top", "bottom"] : ["left", "right"];
}

export function getColorOfEdge(edge: Edge): Color {
  return edge === "top" || edge === "bottom" ? "black" : "white";
}
