import { GameRegistry } from "@hexbridge/engine";
import { HexModule } from "@hexbridge/game-hex";

export function createRegistry(): GameRegistry {
  const registry = new GameRegistry();
  registry.register(HexModule);
  return registry;
}
