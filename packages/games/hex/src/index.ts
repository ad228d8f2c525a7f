export { HexModule } from "./rules";
export { HexUI } from "./ui";
export type { HexData, HexPublicData } from "./state";
export { DEFAULT_BOARD_SIZE } from "./state";
export type { PlaceAction } from "./actions";
export { isPlaceAction, placeAction } from "./actions";

export { Board, MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "./board";
export type { StoneMatrix } from "./board";
export { Game } from "./game";
export type { Status } from "./game";
export { opponentColor, COLORS } from "./color";
export type { Color } from "./color";
export { coordsToString, isOnBoard, parseCoords } from "./coords";
export type { Coords } from "./coords";
export { EDGES, getEdgesOfColor } from "./edges";
export type { Edge, CoordsOrEdge } from "./edges";
export { describeInvalidMove, describeLoadError, err, ok, InvariantError } from "./errors";
export type { Result, InvalidMove, InvalidBoard, InvalidData, LoadError } from "./errors";
export { describeAttackedBridges, renderBoard, renderStones, STONE_SYMBOLS } from "./format";
export {
  saveGameToJson,
  saveGameToString,
  loadGameFromJson,
  loadGameFromString,
} from "./serialize";
export type { StoredGame, ColorCode } from "./serialize";
