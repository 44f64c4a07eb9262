import type Database from "better-sqlite3";
import type { Player } from "../roster/player.js";

export type EncounterUpdate = {
  gold?: number;
  exp?: number;
  endedAtMs?: number;
};

export function createEncounter(db: Database.Database, nowMs: number): number {
  const info = db.prepare("INSERT INTO encounters (started_at_ms) VALUES (?)").run(nowMs);
  return Number(info.lastInsertRowid);
}

/** Attach the current roster (username -> player build) to an encounter. */
export function addEncounterPlayers(db: Database.Database, encounterId: number, roster: ReadonlyMap<string, Player>): void {
  const insert = db.prepare("INSERT INTO encounter_players (encounter, username, player) VALUES (?, ?, ?)");
  const insertAll = db.transaction(() => {
    for (const [username, player] of roster) {
      insert.run(encounterId, username, player.id);
    }
  });
  insertAll();
}

export function addEncounterMonster(db: Database.Database, encounterId: number, monsterId: number): void {
  db.prepare("INSERT INTO encounter_monsters (encounter, monster) VALUES (?, ?)").run(encounterId, monsterId);
}

export function addEncounterItem(db: Database.Database, encounterId: number, item: string): void {
  db.prepare("INSERT INTO encounter_items (encounter, item) VALUES (?, ?)").run(encounterId, item);
}

// Only the fields present in the update are written.
export function updateEncounter(db: Database.Database, encounterId: number, update: EncounterUpdate): void {
  if (update.gold !== undefined) {
    db.prepare("UPDATE encounters SET gold = ? WHERE id = ?").run(update.gold, encounterId);
  }
  if (update.exp !== undefined) {
    db.prepare("UPDATE encounters SET exp = ? WHERE id = ?").run(update.exp, encounterId);
  }
  if (update.endedAtMs !== undefined) {
    db.prepare("UPDATE encounters SET ended_at_ms = ? WHERE id = ?").run(update.endedAtMs, encounterId);
  }
}
