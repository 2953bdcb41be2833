import { defaultCapacity, type EngineConfig, loadConfig } from "./config";
import { Arena } from "./engine/arena";
import { ModeLockedError } from "./engine/engine-errors";

let config: EngineConfig | null = null;
let arena: Arena | null = null;

const CONFIG_KEYS: ReadonlyArray<keyof EngineConfig> = ["mode", "capacity", "debug", "trace"];

export function getEngineConfig(): EngineConfig {
  if (!config) config = loadConfig();
  return { ...config };
}

/**
 * Override the configuration of the default arena. Configuration, the
 * sharing mode in particular, is fixed once the default arena exists.
 */
export function configureEngine(overrides: Partial<EngineConfig>): EngineConfig {
  const current = getEngineConfig();
  if (arena) {
    const changed = CONFIG_KEYS.filter(
      (key) => overrides[key] !== undefined && overrides[key] !== current[key],
    );
    if (changed.length > 0) {
      throw new ModeLockedError(
        `Default arena already exists (${current.mode} mode); cannot change ${changed.join(", ")}`,
      );
    }
    return current;
  }
  const mode = overrides.mode ?? current.mode;
  const capacity =
    overrides.capacity ??
    (mode === current.mode ? current.capacity : defaultCapacity(mode));
  config = { ...current, ...overrides, mode, capacity };
  return { ...config };
}

export function defaultArena(): Arena {
  if (!arena) {
    const { mode, capacity, debug, trace } = getEngineConfig();
    arena = new Arena({ mode, capacity, debug, trace });
  }
  return arena;
}

/** Drop the default arena and configuration (tests). */
export function _debug_resetDefaultArena(): void {
  arena = null;
  config = null;
}
