import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { cfg, printConfigSnapshot } from "../config/env.js";
import { CombatTracker } from "../combat/combatTracker.js";
import { describeEvent } from "../combat/events.js";
import { closeAllStatsDbs, getStatsDb } from "../db.js";
import { commandCapture, replayCapture, splitCaptures, TextSource, type CaptureFn } from "../ocr/textSource.js";
import { loadPlayer } from "../stats/players.js";
import { listMonsters } from "../stats/queries.js";
import { StatsStore } from "../stats/statsStore.js";
import { TrackerSession } from "../tracker/session.js";
import { log } from "../utils/logger.js";

/**
 * Track a play session and record every hit.
 *
 * Usage:
 *   npx tsx src/tools/track.ts <username=preset>... [--replay <file>] [--capture-cmd <cmd>] [--show-config]
 *
 * Without --replay or a capture command, captures are read from stdin.
 * Replay files and stdin hold one capture per block, blocks separated by a blank line.
 */

const bootLog = log.withScope("boot");

type TrackArgs = {
  players: Array<{ username: string; preset: string }>;
  replayFile: string | null;
  captureCommand: string | null;
  showConfig: boolean;
};

function parseArgs(): TrackArgs {
  const args = process.argv.slice(2);
  const players: TrackArgs["players"] = [];
  let replayFile: string | null = null;
  let captureCommand: string | null = cfg.capture.command ?? null;
  let showConfig = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--replay" && args[i + 1]) {
      replayFile = args[i + 1];
      i++;
    } else if (args[i] === "--capture-cmd" && args[i + 1]) {
      captureCommand = args[i + 1];
      i++;
    } else if (args[i] === "--show-config") {
      showConfig = true;
    } else {
      const [username, preset] = args[i].split("=");
      if (!username || !preset) {
        throw new Error(`Expected <username=preset>, got "${args[i]}"`);
      }
      players.push({ username: username.trim().toLowerCase(), preset: preset.trim() });
    }
  }

  return { players, replayFile, captureCommand, showConfig };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function main(): Promise<void> {
  const { players, replayFile, captureCommand, showConfig } = parseArgs();
  if (showConfig) printConfigSnapshot(cfg);

  if (players.length === 0) {
    console.error("Usage: track <username=preset>... [--replay <file>] [--capture-cmd <cmd>]");
    process.exit(1);
  }

  const db = getStatsDb(cfg.db.path);
  const store = new StatsStore(db);
  store.populateMonstersCache();

  const tracker = new CombatTracker({
    sink: store,
    damageCeiling: cfg.tracker.damageCeiling,
    maxNounDistance: cfg.tracker.maxNounDistance,
  });
  tracker.registerNouns(listMonsters(db));
  for (const { username, preset } of players) {
    tracker.registerPlayer(username, loadPlayer(db, preset));
    bootLog.info(`registered ${username} as ${preset}`);
  }

  let captures: string[] | null = null;
  let capture: CaptureFn;
  if (replayFile) {
    captures = splitCaptures(fs.readFileSync(replayFile, "utf8"));
    capture = replayCapture(captures);
  } else if (captureCommand) {
    capture = commandCapture(captureCommand);
  } else {
    captures = splitCaptures(await readStdin());
    capture = replayCapture(captures);
  }

  const source = new TextSource(capture);
  const session = new TrackerSession({
    tracker,
    store,
    source,
    pollMs: cfg.tracker.pollMs,
    onEvent: (event) => console.log(describeEvent(event)),
  });

  if (captures) {
    for (let i = 0; i < captures.length; i++) {
      await session.pollOnce();
    }
  } else {
    const controller = new AbortController();
    process.once("SIGINT", () => {
      console.log("  exiting");
      controller.abort();
    });
    await session.run(controller.signal);
  }

  const summary = session.summary();
  console.log(`elapsed - ${summary.elapsed}`);
  console.log(`exp     - ${summary.exp}`);
  console.log(`gold    - ${summary.gold}`);
  console.log(`exp/hr  - ${summary.expPerHour}`);
  console.log(`gld/hr  - ${summary.goldPerHour}`);

  closeAllStatsDbs();
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    console.error("ERROR:", err instanceof Error ? err.message : err);
    closeAllStatsDbs();
    process.exit(1);
  });
}
