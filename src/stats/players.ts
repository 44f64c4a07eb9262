import type Database from "better-sqlite3";
import {
  createPlayer,
  isGearName,
  isPlayerClass,
  statsFromList,
  statsToList,
  type Player,
} from "../roster/player.js";

export type PlayerRow = {
  id: number;
  name: string;
  level: number;
  class: string;
  hgear: string;
  bgear: string;
  mgear: string;
  ogear: string;
  boosts: string;
  hp: number;
  mp: number;
  strength: number;
  defense: number;
  agility: number;
  intelligence: number;
  wisdom: number;
  luck: number;
};

export function playerExists(db: Database.Database, name: string): boolean {
  return db.prepare<[string], { id: number }>("SELECT id FROM players WHERE name = ?").get(name) !== undefined;
}

export function listPlayerNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM players ORDER BY id")
    .all()
    .map((row) => row.name);
}

/**
 * Store a player build under an alias. Effective stats are denormalized into
 * the row so queries never need the class tables.
 */
export function insertPlayer(db: Database.Database, name: string, player: Player): number {
  const [hp, mp, strength, defense, agility, intelligence, wisdom, luck] = statsToList(player.stats);
  const info = db
    .prepare(
      `INSERT INTO players
         (name, level, class, hgear, bgear, mgear, ogear, boosts,
          hp, mp, strength, defense, agility, intelligence, wisdom, luck)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      name,
      player.level,
      player.playerClass,
      player.gear.head,
      player.gear.body,
      player.gear.mainhand,
      player.gear.offhand,
      statsToList(player.boosts).join(" "),
      hp,
      mp,
      strength,
      defense,
      agility,
      intelligence,
      wisdom,
      luck
    );
  return Number(info.lastInsertRowid);
}

/**
 * Rebuild a Player from its stored build. Throws unless exactly one row matches
 * or when the stored build no longer validates.
 */
export function loadPlayer(db: Database.Database, name: string): Player {
  const rows = db.prepare<[string], PlayerRow>("SELECT * FROM players WHERE name = ?").all(name);
  if (rows.length !== 1) {
    throw new Error(`invalid player: ${name}`);
  }
  const row = rows[0];

  if (!isPlayerClass(row.class)) throw new Error(`Player ${name} has unknown class "${row.class}"`);
  if (!isGearName("head", row.hgear)) throw new Error(`Player ${name} has unknown head gear "${row.hgear}"`);
  if (!isGearName("body", row.bgear)) throw new Error(`Player ${name} has unknown body gear "${row.bgear}"`);
  if (!isGearName("mainhand", row.mgear)) throw new Error(`Player ${name} has unknown mainhand gear "${row.mgear}"`);
  if (!isGearName("offhand", row.ogear)) throw new Error(`Player ${name} has unknown offhand gear "${row.ogear}"`);

  const boosts = statsFromList(row.boosts.trim().split(/\s+/).map((n) => Number(n)));

  return createPlayer({
    id: row.id,
    playerClass: row.class,
    level: row.level,
    gear: { head: row.hgear, body: row.bgear, mainhand: row.mgear, offhand: row.ogear },
    boosts,
  });
}
