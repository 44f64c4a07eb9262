import fs from "node:fs";
import { resolveDataFile } from "../dataPaths.js";
import { isRecord } from "../utils/guards.js";

export const PLAYER_CLASSES = ["warrior", "wizard", "cleric"] as const;
export type PlayerClass = (typeof PLAYER_CLASSES)[number];

export const STAT_KEYS = ["hp", "mp", "strength", "defense", "agility", "intelligence", "wisdom", "luck"] as const;
export type StatKey = (typeof STAT_KEYS)[number];
export type Stats = Record<StatKey, number>;

// hp/mp are pools, not trainable stats.
export const BOOSTABLE_STATS = ["strength", "defense", "agility", "intelligence", "wisdom", "luck"] as const;
export const MAX_BOOST_POINTS = 6;
export const MAX_LEVEL = 10;

export const GEAR = {
  head: {
    dented_helm: { defense: 3 },
    mage_hat: { defense: 1, intelligence: 1, wisdom: 2 },
  },
  body: {
    leather_armor: { defense: 3 },
    tattered_cloak: { defense: 1, wisdom: 1 },
  },
  mainhand: {
    tenderizer: { strength: 8 },
    crooked_wand: { strength: 1, intelligence: 5 },
  },
  offhand: {
    studded_shield: { defense: 3, wisdom: 1 },
    bone_bracelet: { strength: 1, defense: 1, agility: 1, intelligence: 1, wisdom: 1, luck: 1 },
  },
} as const satisfies Record<string, Record<string, Partial<Stats>>>;

export type GearSlot = keyof typeof GEAR;
export const GEAR_SLOTS: readonly GearSlot[] = ["head", "body", "mainhand", "offhand"];

export type Gear = { [S in GearSlot]: keyof (typeof GEAR)[S] };

export type Player = {
  id: number | null; // players.id once persisted
  playerClass: PlayerClass;
  level: number;
  gear: Gear;
  boosts: Stats;
  stats: Stats; // base(class, level) + gear + boosts
};

// Column names used by the class table file.
const TABLE_KEYS: Record<StatKey, string> = {
  hp: "hp",
  mp: "mp",
  strength: "str",
  defense: "def",
  agility: "agi",
  intelligence: "int",
  wisdom: "wis",
  luck: "lck",
};

export type ClassStatsTable = Record<PlayerClass, Record<StatKey, number[]>>;

let classStatsCache: ClassStatsTable | null = null;

export function isPlayerClass(value: string): value is PlayerClass {
  return PLAYER_CLASSES.some((c) => c === value);
}

export function isGearName<S extends GearSlot>(slot: S, name: string): name is Extract<keyof (typeof GEAR)[S], string> {
  return Object.prototype.hasOwnProperty.call(GEAR[slot], name);
}

export function emptyStats(): Stats {
  return { hp: 0, mp: 0, strength: 0, defense: 0, agility: 0, intelligence: 0, wisdom: 0, luck: 0 };
}

export function addStats(a: Stats, b: Partial<Stats>): Stats {
  const out = { ...a };
  for (const key of STAT_KEYS) {
    out[key] += b[key] ?? 0;
  }
  return out;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === "number");
}

/**
 * Load base stats per class and level from classStats.json under DATA_ROOT.
 * Hard fails on a malformed table: every class needs every stat for levels 0..10.
 */
export function loadClassStats(filePath?: string): ClassStatsTable {
  if (!filePath && classStatsCache) return classStatsCache;

  const resolved = filePath ?? resolveDataFile("classStats.json");
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
  if (!isRecord(raw)) throw new Error(`Class stats table is not an object: ${resolved}`);

  const readClass = (cls: PlayerClass): Record<StatKey, number[]> => {
    const classRow = raw[cls];
    if (!isRecord(classRow)) throw new Error(`Class stats missing class "${cls}"`);

    const read = (key: StatKey): number[] => {
      const values = classRow[TABLE_KEYS[key]];
      if (!isNumberArray(values) || values.length !== MAX_LEVEL + 1) {
        throw new Error(`Class stats for ${cls}.${TABLE_KEYS[key]} must list ${MAX_LEVEL + 1} numbers`);
      }
      return values;
    };

    return {
      hp: read("hp"),
      mp: read("mp"),
      strength: read("strength"),
      defense: read("defense"),
      agility: read("agility"),
      intelligence: read("intelligence"),
      wisdom: read("wisdom"),
      luck: read("luck"),
    };
  };

  const table: ClassStatsTable = {
    warrior: readClass("warrior"),
    wizard: readClass("wizard"),
    cleric: readClass("cleric"),
  };
  if (!filePath) classStatsCache = table;
  return table;
}

export function baseStats(playerClass: PlayerClass, level: number, table: ClassStatsTable = loadClassStats()): Stats {
  if (!Number.isInteger(level) || level < 1 || level > MAX_LEVEL) {
    throw new Error(`Invalid level ${level} (expected 1-${MAX_LEVEL})`);
  }
  const stats = emptyStats();
  for (const key of STAT_KEYS) {
    stats[key] = table[playerClass][key][level];
  }
  return stats;
}

export function gearStats(gear: Gear): Stats {
  let stats = emptyStats();
  stats = addStats(stats, GEAR.head[gear.head]);
  stats = addStats(stats, GEAR.body[gear.body]);
  stats = addStats(stats, GEAR.mainhand[gear.mainhand]);
  stats = addStats(stats, GEAR.offhand[gear.offhand]);
  return stats;
}

export function validateBoosts(boosts: Stats): void {
  if (boosts.hp !== 0 || boosts.mp !== 0) {
    throw new Error("hp/mp cannot be boosted");
  }
  let total = 0;
  for (const key of BOOSTABLE_STATS) {
    const n = boosts[key];
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid ${key} boost: ${n}`);
    total += n;
  }
  if (total > MAX_BOOST_POINTS) {
    throw new Error(`thats too many boosts! (${total} > ${MAX_BOOST_POINTS})`);
  }
}

export function createPlayer(
  opts: {
    id?: number | null;
    playerClass: PlayerClass;
    level: number;
    gear: Gear;
    boosts?: Partial<Stats>;
  },
  table?: ClassStatsTable
): Player {
  const boosts = addStats(emptyStats(), opts.boosts ?? {});
  validateBoosts(boosts);

  const stats = addStats(addStats(baseStats(opts.playerClass, opts.level, table), gearStats(opts.gear)), boosts);
  return {
    id: opts.id ?? null,
    playerClass: opts.playerClass,
    level: opts.level,
    gear: { ...opts.gear },
    boosts,
    stats,
  };
}

/** Stats in column order, e.g. for the space-separated boosts column. */
export function statsToList(stats: Stats): number[] {
  return STAT_KEYS.map((key) => stats[key]);
}

export function statsFromList(values: readonly number[]): Stats {
  if (values.length !== STAT_KEYS.length || values.some((n) => !Number.isInteger(n))) {
    throw new Error(`Expected ${STAT_KEYS.length} integer stats, got [${values.join(", ")}]`);
  }
  const stats = emptyStats();
  STAT_KEYS.forEach((key, i) => {
    stats[key] = values[i];
  });
  return stats;
}
