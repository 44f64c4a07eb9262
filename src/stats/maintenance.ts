import type Database from "better-sqlite3";
import { log } from "../utils/logger.js";

const statsLog = log.withScope("stats");

export type MaintenanceResult = { success: boolean; error?: string };

type IdRow = { id: number };

function findId(db: Database.Database, table: "players" | "monsters", name: string): number | null {
  const row = db.prepare<[string], IdRow>(`SELECT id FROM ${table} WHERE name = ?`).get(name);
  return row ? row.id : null;
}

export function renamePlayer(db: Database.Database, source: string, dest: string): MaintenanceResult {
  if (findId(db, "players", source) === null) {
    return { success: false, error: `no such player: "${source}"` };
  }
  if (findId(db, "players", dest) !== null) {
    return { success: false, error: `player "${dest}" already exists. Did you mean merge-players?` };
  }
  db.prepare("UPDATE players SET name = ? WHERE name = ?").run(dest, source);
  statsLog.info(`renamed player ${source} -> ${dest}`);
  return { success: true };
}

/** Re-point every hit and encounter row from source to dest, then drop source. */
export function mergePlayers(db: Database.Database, source: string, dest: string): MaintenanceResult {
  const oldId = findId(db, "players", source);
  if (oldId === null) return { success: false, error: `no such player: "${source}"` };
  const newId = findId(db, "players", dest);
  if (newId === null) return { success: false, error: `no such player: "${dest}". Did you mean rename-player?` };
  if (oldId === newId) return { success: false, error: `cannot merge player "${source}" into itself` };

  const merge = db.transaction(() => {
    db.prepare("UPDATE player_hit_monster SET player = ? WHERE player = ?").run(newId, oldId);
    db.prepare("UPDATE monster_hit_player SET player = ? WHERE player = ?").run(newId, oldId);
    db.prepare("UPDATE encounter_players SET player = ? WHERE player = ?").run(newId, oldId);
    db.prepare("DELETE FROM players WHERE id = ?").run(oldId);
  });
  merge();
  statsLog.info(`merged player ${source} (#${oldId}) into ${dest} (#${newId})`);
  return { success: true };
}

export function deletePlayer(db: Database.Database, name: string): MaintenanceResult {
  const id = findId(db, "players", name);
  if (id === null) return { success: false, error: `no such player: "${name}"` };

  const remove = db.transaction(() => {
    db.prepare("DELETE FROM player_hit_monster WHERE player = ?").run(id);
    db.prepare("DELETE FROM monster_hit_player WHERE player = ?").run(id);
    // Encounters keep the username that played, without the build.
    db.prepare("UPDATE encounter_players SET player = NULL WHERE player = ?").run(id);
    db.prepare("DELETE FROM players WHERE id = ?").run(id);
  });
  remove();
  statsLog.info(`deleted player ${name} (#${id})`);
  return { success: true };
}

export function renameMonster(db: Database.Database, source: string, dest: string): MaintenanceResult {
  if (findId(db, "monsters", source) === null) {
    return { success: false, error: `no such monster: "${source}"` };
  }
  if (findId(db, "monsters", dest) !== null) {
    return { success: false, error: `monster "${dest}" already exists. Did you mean merge-monsters?` };
  }
  db.prepare("UPDATE monsters SET name = ? WHERE name = ?").run(dest, source);
  statsLog.info(`renamed monster ${source} -> ${dest}`);
  return { success: true };
}

export function mergeMonsters(db: Database.Database, source: string, dest: string): MaintenanceResult {
  const oldId = findId(db, "monsters", source);
  if (oldId === null) return { success: false, error: `no such monster: "${source}"` };
  const newId = findId(db, "monsters", dest);
  if (newId === null) return { success: false, error: `no such monster: "${dest}". Did you mean rename-monster?` };
  if (oldId === newId) return { success: false, error: `cannot merge monster "${source}" into itself` };

  const merge = db.transaction(() => {
    db.prepare("UPDATE player_hit_monster SET monster = ? WHERE monster = ?").run(newId, oldId);
    db.prepare("UPDATE monster_hit_player SET monster = ? WHERE monster = ?").run(newId, oldId);
    db.prepare("UPDATE encounter_monsters SET monster = ? WHERE monster = ?").run(newId, oldId);
    db.prepare("DELETE FROM monsters WHERE id = ?").run(oldId);
  });
  merge();
  statsLog.info(`merged monster ${source} (#${oldId}) into ${dest} (#${newId})`);
  return { success: true };
}

export function deleteMonster(db: Database.Database, name: string): MaintenanceResult {
  const id = findId(db, "monsters", name);
  if (id === null) return { success: false, error: `no such monster: "${name}"` };

  const remove = db.transaction(() => {
    db.prepare("DELETE FROM player_hit_monster WHERE monster = ?").run(id);
    db.prepare("DELETE FROM monster_hit_player WHERE monster = ?").run(id);
    db.prepare("DELETE FROM encounter_monsters WHERE monster = ?").run(id);
    db.prepare("DELETE FROM monsters WHERE id = ?").run(id);
  });
  remove();
  statsLog.info(`deleted monster ${name} (#${id})`);
  return { success: true };
}
