export * from "./engine";
export { type EngineConfig, loadConfig } from "./config";
export { Rng } from "./core/rng";
export {
  configureEngine,
  defaultArena,
  getEngineConfig,
  type Operand,
  scalar,
  topologicalOrder,
  Value,
} from "./frontend";
export { linearDecay, type LinearDecayOptions, SGD, type SGDOptions } from "./optim";
export {
  linspace,
  makeMoons,
  type MoonsDataset,
  type MoonsOptions,
  type Point,
  shuffleTogether,
} from "./data/moons";
export * as nn from "./nn";
