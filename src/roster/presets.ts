import fs from "node:fs";
import yaml from "yaml";
import { resolveDataFile } from "../dataPaths.js";
import { isRecord } from "../utils/guards.js";
import {
  BOOSTABLE_STATS,
  createPlayer,
  isGearName,
  isPlayerClass,
  type Gear,
  type Player,
  type Stats,
} from "./player.js";

export type PlayerPreset = {
  name: string; // alias stored in players.name, e.g. "wr.str"
  player: Player;
};

function readString(value: unknown, what: string): string {
  if (typeof value !== "string" || !value.trim()) throw new Error(`Preset ${what} must be a non-empty string`);
  return value.trim();
}

function readGear(name: string, raw: unknown): Gear {
  if (!isRecord(raw)) throw new Error(`Preset ${name} missing gear`);
  const head = readString(raw.head, `${name} gear.head`);
  const body = readString(raw.body, `${name} gear.body`);
  const mainhand = readString(raw.mainhand, `${name} gear.mainhand`);
  const offhand = readString(raw.offhand, `${name} gear.offhand`);
  if (!isGearName("head", head)) throw new Error(`Preset ${name}: unknown head gear "${head}"`);
  if (!isGearName("body", body)) throw new Error(`Preset ${name}: unknown body gear "${body}"`);
  if (!isGearName("mainhand", mainhand)) throw new Error(`Preset ${name}: unknown mainhand gear "${mainhand}"`);
  if (!isGearName("offhand", offhand)) throw new Error(`Preset ${name}: unknown offhand gear "${offhand}"`);
  return { head, body, mainhand, offhand };
}

function readBoosts(name: string, raw: unknown): Partial<Stats> {
  const boosts: Partial<Stats> = {};
  if (raw == null) return boosts;
  if (!isRecord(raw)) throw new Error(`Preset ${name}: boosts must be a mapping`);
  for (const [key, value] of Object.entries(raw)) {
    const stat = BOOSTABLE_STATS.find((s) => s === key);
    if (!stat) throw new Error(`Preset ${name}: cannot boost "${key}"`);
    if (typeof value !== "number") throw new Error(`Preset ${name}: boost ${key} must be a number`);
    boosts[stat] = value;
  }
  return boosts;
}

/**
 * Load preset player builds from presets.yml under DATA_ROOT.
 * Hard fails on schema errors.
 */
export function loadPresets(filePath?: string): PlayerPreset[] {
  const resolved = filePath ?? resolveDataFile("presets.yml");
  if (!fs.existsSync(resolved)) {
    throw new Error(`Presets file not found: ${resolved}`);
  }

  const doc: unknown = yaml.parse(fs.readFileSync(resolved, "utf8"));
  if (typeof doc !== "object" || doc === null || !("presets" in doc) || !Array.isArray(doc.presets)) {
    throw new Error(`Presets file has no presets list: ${resolved}`);
  }

  const seen = new Set<string>();
  const presets: PlayerPreset[] = [];
  const entries: unknown[] = doc.presets;
  for (const entry of entries) {
    if (!isRecord(entry)) throw new Error(`Preset entries must be mappings: ${resolved}`);
    const name = readString(entry.name, "name");
    if (seen.has(name)) throw new Error(`Duplicate preset: ${name}`);
    seen.add(name);

    const cls = readString(entry.class, `${name} class`);
    if (!isPlayerClass(cls)) throw new Error(`Preset ${name}: unknown class "${cls}"`);
    if (typeof entry.level !== "number") throw new Error(`Preset ${name}: level must be a number`);

    presets.push({
      name,
      player: createPlayer({
        playerClass: cls,
        level: entry.level,
        gear: readGear(name, entry.gear),
        boosts: readBoosts(name, entry.boosts),
      }),
    });
  }
  return presets;
}
