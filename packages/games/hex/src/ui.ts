import { Action } from "@hexbridge/core";
import { GameUISpec } from "@hexbridge/engine";
import { Color } from "./color";
import { coordsToString, isOnBoard, parseCoords } from "./coords";
import { STONE_SYMBOLS, describeAttackedBridges, renderStones } from "./format";
import { decodeStoneMatrix } from "./serialize";
import { HexPublicData } from "./state";
import { isPlaceAction, placeAction } from "./actions";

const COLOR_LABELS: Record<Color, string> = {
  black: "Black (↕)",
  white: "White (↔)",
};

export const HexUI: GameUISpec<HexPublicData> = {
  playerLabels: [COLOR_LABELS.black, COLOR_LABELS.white],

  pieces: {
    black: { symbol: STONE_SYMBOLS.black, label: "B" },
    white: { symbol: STONE_SYMBOLS.white, label: "W" },
  },

  inputHint: "Enter a cell (e.g. c3)",

  maxTurns(publicData: HexPublicData): number {
    return publicData.size * publicData.size;
  },

  renderBoard(publicData: HexPublicData): string {
    return renderStones(decodeStoneMatrix(publicData.cells));
  },

  renderStatus(publicData: HexPublicData): string | null {
    if (publicData.winnerColor !== null) {
      return `${COLOR_LABELS[publicData.winnerColor]} connected`;
    }
    return describeAttackedBridges(publicData.attackedBridges);
  },

  parseInput(raw: string, publicData: HexPublicData): Action | null {
    const parsed = parseCoords(raw.trim().toLowerCase());
    if (parsed === null || !isOnBoard(parsed, publicData.size)) {
      return null;
    }
    return placeAction(parsed);
  },

  formatAction(action: Action): string {
    if (isPlaceAction(action)) {
      return coordsToString(action.data);
    }
    return action.type;
  },

  getPlayerLabel(playerId: string, publicData: HexPublicData): string {
    const color = publicData.colors[playerId];
    return color ? COLOR_LABELS[color] : "?";
  },
};
