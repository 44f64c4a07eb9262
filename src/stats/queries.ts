import type Database from "better-sqlite3";

/** Max HP of monsters whose stats are known; used for one-shot odds. */
export const MONSTER_HP_LOOKUP: Readonly<Record<string, number>> = {
  lizard: 15,
  "goblin archer": 32,
  "goblin grunt": 35,
  "goblin warrior": 39,
  "cave bat": 28,
};

export type PlayerSummaryRow = {
  name: string;
  class: string;
  level: number;
  strength: number;
  defense: number;
  agility: number;
  intelligence: number;
  wisdom: number;
  luck: number;
};

export type AbilityHitSummary = {
  ability: string;
  count: number;
  mean: number;
  std: number;
  /** Percentage of hits at or above the monster's max HP; null when its HP is unknown. */
  oneShotPct: number | null;
};

export type EncounterListRow = {
  id: number;
  exp: number;
  gold: number;
  items: number;
  monsters: number;
  players: number;
};

export type EncounterParticipant = {
  username: string;
  playerName: string | null;
  dealt: number;
  taken: number;
};

export type EncounterDetail = {
  id: number;
  exp: number;
  gold: number;
  startedAtMs: number;
  endedAtMs: number | null;
  monsters: string[];
  players: EncounterParticipant[];
};

type AbilityDamageRow = { ability: string; damage: number };

export function listPlayers(db: Database.Database, name?: string): PlayerSummaryRow[] {
  const columns = "name, class, level, strength, defense, agility, intelligence, wisdom, luck";
  if (name !== undefined) {
    return db.prepare<[string], PlayerSummaryRow>(`SELECT ${columns} FROM players WHERE name = ? ORDER BY id`).all(name);
  }
  return db.prepare<[], PlayerSummaryRow>(`SELECT ${columns} FROM players ORDER BY id`).all();
}

export function listMonsters(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM monsters ORDER BY id")
    .all()
    .map((row) => row.name);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, n) => sum + n, 0) / values.length;
}

// Population standard deviation.
function std(values: readonly number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, n) => sum + (n - m) ** 2, 0) / values.length);
}

function summarizeByAbility(rows: readonly AbilityDamageRow[], maxHp: number | null): AbilityHitSummary[] {
  const byAbility = new Map<string, number[]>();
  for (const row of rows) {
    const hits = byAbility.get(row.ability);
    if (hits) hits.push(row.damage);
    else byAbility.set(row.ability, [row.damage]);
  }

  return Array.from(byAbility, ([ability, hits]) => ({
    ability,
    count: hits.length,
    mean: mean(hits),
    std: std(hits),
    oneShotPct: maxHp === null ? null : (hits.filter((d) => d >= maxHp).length / hits.length) * 100,
  }));
}

export function playerHitSummary(db: Database.Database, player: string, monster: string): AbilityHitSummary[] {
  const rows = db
    .prepare<[string, string], AbilityDamageRow>(
      `SELECT h.ability, h.damage
       FROM player_hit_monster AS h
         JOIN players AS p ON h.player = p.id
         JOIN monsters AS m ON h.monster = m.id
       WHERE m.name = ? AND p.name = ?
       ORDER BY h.id`
    )
    .all(monster, player);
  return summarizeByAbility(rows, MONSTER_HP_LOOKUP[monster] ?? null);
}

export function monsterHitSummary(db: Database.Database, monster: string, player: string): AbilityHitSummary[] {
  const rows = db
    .prepare<[string, string], AbilityDamageRow>(
      `SELECT h.ability, h.damage
       FROM monster_hit_player AS h
         JOIN players AS p ON h.player = p.id
         JOIN monsters AS m ON h.monster = m.id
       WHERE m.name = ? AND p.name = ?
       ORDER BY h.id`
    )
    .all(monster, player);
  return summarizeByAbility(rows, null);
}

export function listEncounters(db: Database.Database): EncounterListRow[] {
  return db
    .prepare<[], EncounterListRow>(
      `SELECT
         c.id,
         COALESCE(c.exp, 0) AS exp,
         COALESCE(c.gold, 0) AS gold,
         (SELECT COUNT(*) FROM encounter_items AS i WHERE i.encounter = c.id) AS items,
         (SELECT COUNT(*) FROM encounter_monsters AS m WHERE m.encounter = c.id) AS monsters,
         (SELECT COUNT(*) FROM encounter_players AS p WHERE p.encounter = c.id) AS players
       FROM encounters AS c
       ORDER BY c.id`
    )
    .all();
}

/** Returns null when no encounter has the given id. */
export function encounterDetail(db: Database.Database, encounterId: number): EncounterDetail | null {
  const row = db
    .prepare<[number], { exp: number; gold: number; started_at_ms: number; ended_at_ms: number | null }>(
      "SELECT COALESCE(exp, 0) AS exp, COALESCE(gold, 0) AS gold, started_at_ms, ended_at_ms FROM encounters WHERE id = ?"
    )
    .get(encounterId);
  if (!row) return null;

  const monsters = db
    .prepare<[number], { name: string }>(
      `SELECT m.name
       FROM encounter_monsters AS em
         JOIN monsters AS m ON em.monster = m.id
       WHERE em.encounter = ?
       ORDER BY em.rowid`
    )
    .all(encounterId)
    .map((m) => m.name);

  const players = db
    .prepare<[number, number, number], EncounterParticipant>(
      `SELECT
         ep.username,
         p.name AS playerName,
         (SELECT COALESCE(SUM(h.damage), 0) FROM player_hit_monster AS h
           WHERE h.encounter = ? AND h.player = ep.player) AS dealt,
         (SELECT COALESCE(SUM(h.damage), 0) FROM monster_hit_player AS h
           WHERE h.encounter = ? AND h.player = ep.player) AS taken
       FROM encounter_players AS ep
         LEFT JOIN players AS p ON ep.player = p.id
       WHERE ep.encounter = ?
       ORDER BY ep.rowid`
    )
    .all(encounterId, encounterId, encounterId);

  return {
    id: encounterId,
    exp: row.exp,
    gold: row.gold,
    startedAtMs: row.started_at_ms,
    endedAtMs: row.ended_at_ms,
    monsters,
    players,
  };
}
