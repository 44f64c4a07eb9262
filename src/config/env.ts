import "dotenv/config";
import type { Config, LogFormat, LogLevel } from "./types.js";
import { DEFAULT_DAMAGE_CEILING } from "../combat/damage.js";
import { DEFAULT_MAX_NOUN_DISTANCE } from "../nouns/nounCorrector.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optAny(names: string[]): string | undefined {
  for (const name of names) {
    const v = opt(name);
    if (v) return v;
  }
  return undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((a) => a === v);
  if (match !== undefined) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

// Deprecated keys: keep list, warn once if present
const DEPRECATED: Record<string, string> = {
  DB_PATH: "Use DATA_DB_PATH.",
};

let deprecatedEnvWarned = false;

function warnDeprecatedEnv(): void {
  if (deprecatedEnvWarned) return;
  deprecatedEnvWarned = true;
  for (const [key, msg] of Object.entries(DEPRECATED)) {
    if (process.env[key] != null) {
      console.warn(`[config] DEPRECATED env var detected: ${key}. ${msg}`);
    }
  }
}

export function loadConfig(): Config {
  warnDeprecatedEnv();

  const pollMs = optInt("TRACKER_POLL_MS", 250);
  if (pollMs < 0) throw new Error(`TRACKER_POLL_MS must be >= 0, got ${pollMs}`);

  const maxNounDistance = optInt("NOUN_MAX_DISTANCE", DEFAULT_MAX_NOUN_DISTANCE);
  if (maxNounDistance < 1) throw new Error(`NOUN_MAX_DISTANCE must be >= 1, got ${maxNounDistance}`);

  const cfg: Config = {
    db: {
      path: optAny(["DATA_DB_PATH", "DB_PATH"]) ?? "./data/stats.sqlite",
    },

    data: {
      root: opt("DATA_ROOT") ?? "./data",
    },

    tracker: {
      pollMs,
      damageCeiling: optInt("DAMAGE_CEILING", DEFAULT_DAMAGE_CEILING),
      maxNounDistance,
    },

    capture: {
      command: opt("CAPTURE_COMMAND"),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = {
    DATA_DB_PATH: cfg.db.path,
    DATA_ROOT: cfg.data.root,
    TRACKER_POLL_MS: cfg.tracker.pollMs,
    DAMAGE_CEILING: cfg.tracker.damageCeiling,
    NOUN_MAX_DISTANCE: cfg.tracker.maxNounDistance,
    CAPTURE_COMMAND: cfg.capture.command ?? "",
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  };

  console.log("=== TRACKER CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("===============================");
}

export const cfg = loadConfig();
