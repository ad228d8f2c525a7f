/** Stone colors. Black connects top and bottom, White connects left and right. */
export type Color = "black" | "white";

export const COLORS: readonly Color[] = ["black", "white"];

export function opponentColor(color: Color): Color {
  return color === "black" ? "white" : "black";
}
