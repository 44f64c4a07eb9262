import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type Database from "better-sqlite3";
import { closeAllStatsDbs, getStatsDb } from "../../db.js";

const tempDirs: string[] = [];

export function openTempDb(): Database.Database {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "combat-stats-"));
  tempDirs.push(dir);
  return getStatsDb(path.join(dir, "stats.sqlite"));
}

export function cleanupTempDbs(): void {
  closeAllStatsDbs();
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
}
