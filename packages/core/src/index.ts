export * from "./types/game";
export { SeededRandom } from "./libs/SeededRandom";
