import type Database from "better-sqlite3";
import type { CombatSink, MonsterHitRecord, PlayerHitRecord } from "../combat/combatTracker.js";
import { log } from "../utils/logger.js";

const statsLog = log.withScope("stats");

type MonsterRow = { id: number; name: string };

/**
 * SQLite-backed sink for the combat tracker.
 *
 * Monster ids are cached in-process once resolved; a name seen for the first
 * time is inserted. Hits are stamped with the active encounter, if any.
 */
export class StatsStore implements CombatSink {
  private readonly monstersCache = new Map<string, number>();
  private activeEncounterId: number | null = null;

  constructor(readonly db: Database.Database) {}

  get encounterId(): number | null {
    return this.activeEncounterId;
  }

  setActiveEncounter(encounterId: number | null): void {
    this.activeEncounterId = encounterId;
  }

  populateMonstersCache(): void {
    const rows = this.db.prepare<[], MonsterRow>("SELECT id, name FROM monsters").all();
    for (const row of rows) {
      this.monstersCache.set(row.name, row.id);
    }
    statsLog.debug(`cached ${rows.length} monsters`);
  }

  resolveMonsterId(name: string): number {
    const cached = this.monstersCache.get(name);
    if (cached !== undefined) return cached;

    const existing = this.db.prepare<[string], MonsterRow>("SELECT id, name FROM monsters WHERE name = ?").get(name);
    const id = existing
      ? existing.id
      : Number(this.db.prepare("INSERT INTO monsters (name) VALUES (?)").run(name).lastInsertRowid);

    if (!existing) statsLog.debug(`new monster "${name}" -> #${id}`);
    this.monstersCache.set(name, id);
    return id;
  }

  monsterExists(name: string): boolean {
    return this.db.prepare<[string], MonsterRow>("SELECT id, name FROM monsters WHERE name = ?").get(name) !== undefined;
  }

  recordPlayerHit(hit: PlayerHitRecord): number {
    const info = this.db
      .prepare(
        "INSERT INTO player_hit_monster (player, encounter, monster, ability, damage, monster_index) VALUES (?, ?, ?, ?, ?, ?)"
      )
      .run(hit.playerId, this.activeEncounterId, hit.monsterId, hit.ability, hit.damage, 0);
    return Number(info.lastInsertRowid);
  }

  recordMonsterHit(hit: MonsterHitRecord): number {
    const info = this.db
      .prepare("INSERT INTO monster_hit_player (player, encounter, monster, ability, damage) VALUES (?, ?, ?, ?, ?)")
      .run(hit.playerId, this.activeEncounterId, hit.monsterId, hit.ability, hit.damage);
    return Number(info.lastInsertRowid);
  }
}
