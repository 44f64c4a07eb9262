import * as readline from "readline/promises";
import { stdin as input, stdout as output } from "process";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import { cfg } from "../config/env.js";
import { closeAllStatsDbs, getStatsDb } from "../db.js";
import {
  BOOSTABLE_STATS,
  createPlayer,
  GEAR,
  GEAR_SLOTS,
  isGearName,
  isPlayerClass,
  MAX_BOOST_POINTS,
  MAX_LEVEL,
  PLAYER_CLASSES,
  type Gear,
  type Stats,
} from "../roster/player.js";
import { loadPresets } from "../roster/presets.js";
import {
  deleteMonster,
  deletePlayer,
  mergeMonsters,
  mergePlayers,
  renameMonster,
  renamePlayer,
  type MaintenanceResult,
} from "../stats/maintenance.js";
import { insertPlayer, playerExists } from "../stats/players.js";

/**
 * Create and maintain the stats database.
 *
 * Usage:
 *   npx tsx src/tools/modify.ts create
 *   npx tsx src/tools/modify.ts create-presets
 *   npx tsx src/tools/modify.ts add-player
 *   npx tsx src/tools/modify.ts rename-player <source> <dest> [--yes]
 *   npx tsx src/tools/modify.ts merge-players <source> <dest> [--yes]
 *   npx tsx src/tools/modify.ts delete-player <name> [--yes]
 *   npx tsx src/tools/modify.ts rename-monster <source> <dest> [--yes]
 *   npx tsx src/tools/modify.ts merge-monsters <source> <dest> [--yes]
 *   npx tsx src/tools/modify.ts delete-monster <name> [--yes]
 */

const COMMANDS = [
  "create",
  "create-presets",
  "add-player",
  "rename-player",
  "merge-players",
  "delete-player",
  "rename-monster",
  "merge-monsters",
  "delete-monster",
] as const;

function usage(): never {
  console.error("must provide a subcommand");
  for (const cmd of COMMANDS) console.error(`  ${cmd}`);
  process.exit(1);
}

async function confirm(rl: readline.Interface, question: string, yes: boolean): Promise<boolean> {
  if (yes) return true;
  const answer = await rl.question(`${question} (y/N): `);
  return answer.trim().toLowerCase().startsWith("y");
}

function report(result: MaintenanceResult): void {
  if (result.success) {
    console.log("done.");
  } else {
    console.error(result.error ?? "failed");
    process.exitCode = 1;
  }
}

async function pick(rl: readline.Interface, label: string, options: readonly string[]): Promise<string> {
  console.log(`--- ${label} options ---`);
  for (const option of options) console.log(`  ${option}`);
  return (await rl.question(`${label}: `)).trim();
}

async function addPlayer(db: Database.Database, rl: readline.Interface): Promise<void> {
  const name = (await rl.question("player alias/name (e.g. wr.str): ")).trim();
  if (!name) throw new Error("alias is required");
  if (playerExists(db, name)) {
    console.log("alias already exists");
    return;
  }

  const cls = await pick(rl, "class", PLAYER_CLASSES);
  if (!isPlayerClass(cls)) throw new Error(`unknown class: ${cls}`);

  const level = Number(await rl.question(`level (1-${MAX_LEVEL}): `));

  const head = await pick(rl, "head", Object.keys(GEAR.head));
  const body = await pick(rl, "body", Object.keys(GEAR.body));
  const mainhand = await pick(rl, "mainhand", Object.keys(GEAR.mainhand));
  const offhand = await pick(rl, "offhand", Object.keys(GEAR.offhand));
  if (!isGearName("head", head)) throw new Error(`unknown head gear: ${head}`);
  if (!isGearName("body", body)) throw new Error(`unknown body gear: ${body}`);
  if (!isGearName("mainhand", mainhand)) throw new Error(`unknown mainhand gear: ${mainhand}`);
  if (!isGearName("offhand", offhand)) throw new Error(`unknown offhand gear: ${offhand}`);
  const gear: Gear = { head, body, mainhand, offhand };

  const boosts: Partial<Stats> = {};
  for (const stat of BOOSTABLE_STATS) {
    boosts[stat] = Number(await rl.question(`${stat} boosts (0-${MAX_BOOST_POINTS}): `));
  }

  const player = createPlayer({ playerClass: cls, level, gear, boosts });
  const id = insertPlayer(db, name, player);
  console.log(`added player ${name} (#${id}) with ${GEAR_SLOTS.map((slot) => gear[slot]).join(", ")}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const yes = args.includes("--yes");
  const [command, a, b] = args.filter((arg) => arg !== "--yes");
  if (!command) usage();

  const db = getStatsDb(cfg.db.path);
  const rl = readline.createInterface({ input, output });

  try {
    switch (command) {
      case "create":
        console.log(`database ready at ${cfg.db.path}`);
        break;

      case "create-presets":
        for (const preset of loadPresets()) {
          if (playerExists(db, preset.name)) continue;
          insertPlayer(db, preset.name, preset.player);
          console.log(`added preset ${preset.name}`);
        }
        break;

      case "add-player":
        await addPlayer(db, rl);
        break;

      case "rename-player":
        if (!a || !b) usage();
        if (await confirm(rl, `confirm renaming ${a} to ${b}`, yes)) report(renamePlayer(db, a, b));
        break;

      case "merge-players":
        if (!a || !b) usage();
        console.log("you cannot undo this action!");
        if (await confirm(rl, `confirm merging player ${a} into ${b}`, yes)) report(mergePlayers(db, a, b));
        break;

      case "delete-player":
        if (!a) usage();
        console.log("you cannot undo this action!");
        if (await confirm(rl, `confirm deleting player ${a}`, yes)) report(deletePlayer(db, a));
        break;

      case "rename-monster":
        if (!a || !b) usage();
        if (await confirm(rl, `confirm renaming "${a}" to "${b}"`, yes)) report(renameMonster(db, a, b));
        break;

      case "merge-monsters":
        if (!a || !b) usage();
        console.log("you cannot undo this action!");
        if (await confirm(rl, `confirm merging monster "${a}" into "${b}"`, yes)) report(mergeMonsters(db, a, b));
        break;

      case "delete-monster":
        if (!a) usage();
        console.log("you cannot undo this action!");
        if (await confirm(rl, `confirm deleting monster "${a}"`, yes)) report(deleteMonster(db, a));
        break;

      default:
        usage();
    }
  } finally {
    rl.close();
    closeAllStatsDbs();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    console.error("ERROR:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
