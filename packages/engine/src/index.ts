export { GameRegistry } from "./GameRegistry";
export type { IGameModule, GameUISpec, PieceDisplay } from "./interfaces/IGameModule";
