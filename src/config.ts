import type { SharingMode } from "./engine/node-store";

export interface EngineConfig {
  mode: SharingMode;
  /** Initial node capacity in exclusive mode, fixed capacity in shared mode. */
  capacity: number;
  debug: boolean;
  trace: boolean;
}

export const DEFAULT_EXCLUSIVE_CAPACITY = 4096;
export const DEFAULT_SHARED_CAPACITY = 1 << 20;

type Env = Record<string, string | undefined>;

function parseMode(raw: string | undefined): SharingMode {
  if (raw === undefined || raw === "" || raw === "exclusive") return "exclusive";
  if (raw === "shared") return "shared";
  throw new Error(
    `MICRODIFF_MODE must be "exclusive" or "shared", got "${raw}"`,
  );
}

function parseCapacity(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`MICRODIFF_CAPACITY must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function defaultCapacity(mode: SharingMode): number {
  return mode === "shared" ? DEFAULT_SHARED_CAPACITY : DEFAULT_EXCLUSIVE_CAPACITY;
}

export function loadConfig(
  env: Env = typeof process !== "undefined" ? process.env : {},
): EngineConfig {
  const mode = parseMode(env.MICRODIFF_MODE);
  return {
    mode,
    capacity: parseCapacity(env.MICRODIFF_CAPACITY, defaultCapacity(mode)),
    debug: env.MICRODIFF_DEBUG === "1",
    trace: env.MICRODIFF_TRACE === "1",
  };
}
