import { fileURLToPath } from "node:url";
import { cfg } from "../config/env.js";
import { closeAllStatsDbs, getStatsDb } from "../db.js";
import {
  encounterDetail,
  listEncounters,
  listMonsters,
  listPlayers,
  monsterHitSummary,
  playerHitSummary,
  type AbilityHitSummary,
} from "../stats/queries.js";

/**
 * Query recorded combat statistics.
 *
 * Usage:
 *   npx tsx src/tools/stats.ts players [--name <alias>]
 *   npx tsx src/tools/stats.ts monsters
 *   npx tsx src/tools/stats.ts player-hit <player> <monster>
 *   npx tsx src/tools/stats.ts monster-hit <monster> <player>
 *   npx tsx src/tools/stats.ts encounter [id]
 */

const COMMANDS = ["players", "monsters", "player-hit", "monster-hit", "encounter"] as const;

function usage(): never {
  console.error("must provide a subcommand");
  for (const cmd of COMMANDS) console.error(`  ${cmd}`);
  process.exit(1);
}

function formatHits(summary: AbilityHitSummary): string {
  const base = `${summary.ability} - n=${summary.count} avg=${summary.mean.toFixed(2)} std=${summary.std.toFixed(2)}`;
  return summary.oneShotPct === null ? base : `${base} (${summary.oneShotPct.toFixed(2)}% one-shot)`;
}

function center(text: string, width: number): string {
  const pad = Math.max(0, width - text.length);
  const left = Math.floor(pad / 2);
  return " ".repeat(left) + text + " ".repeat(pad - left);
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);
  const db = getStatsDb(cfg.db.path);

  switch (command) {
    case "players": {
      const nameIdx = rest.indexOf("--name");
      const name = nameIdx >= 0 ? rest[nameIdx + 1] : undefined;
      for (const p of listPlayers(db, name)) {
        console.log(`-- ${p.name} Lv ${p.level} ${p.class} --`);
        console.log(`   str: ${p.strength}`);
        console.log(`   def: ${p.defense}`);
        console.log(`   agi: ${p.agility}`);
        console.log(`   int: ${p.intelligence}`);
        console.log(`   wis: ${p.wisdom}`);
        console.log(`   lck: ${p.luck}`);
      }
      break;
    }

    case "monsters":
      for (const name of listMonsters(db)) console.log(name);
      break;

    case "player-hit": {
      const [player, monster] = rest;
      if (!player || !monster) usage();
      for (const summary of playerHitSummary(db, player, monster)) console.log(formatHits(summary));
      break;
    }

    case "monster-hit": {
      const [monster, player] = rest;
      if (!monster || !player) usage();
      for (const summary of monsterHitSummary(db, monster, player)) console.log(formatHits(summary));
      break;
    }

    case "encounter": {
      if (rest[0] === undefined) {
        for (const e of listEncounters(db)) {
          console.log(`${String(e.id).padStart(3)} - ${e.players}v${e.monsters} ${e.exp} exp, ${e.gold} gold`);
        }
        break;
      }

      const id = Number(rest[0]);
      if (!Number.isInteger(id)) throw new Error(`Invalid encounter id: ${rest[0]}`);
      const detail = encounterDetail(db, id);
      if (!detail) throw new Error(`No such encounter: ${id}`);

      console.log(`encounter ${detail.id} -- ${detail.players.length}v${detail.monsters.length}`);
      console.log(`monsters: ${detail.monsters.join(", ")}`);
      console.log("        player        damage dealt    damage taken");
      console.log("        ------        ------------    ------------");
      for (const p of detail.players) {
        const name = `${p.username} (${p.playerName ?? "?"})`;
        console.log(`${center(name, 22)} ${center(String(p.dealt), 12)}    ${center(String(p.taken), 12)}`);
      }
      break;
    }

    default:
      usage();
  }

  closeAllStatsDbs();
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    console.error("ERROR:", err instanceof Error ? err.message : err);
    closeAllStatsDbs();
    process.exit(1);
  });
}
