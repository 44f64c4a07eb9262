import { Duration } from "luxon";
import type { CombatTracker } from "../combat/combatTracker.js";
import { isHitEvent, type CombatEvent } from "../combat/events.js";
import type { TextSource } from "../ocr/textSource.js";
import { addEncounterMonster, addEncounterPlayers, createEncounter, updateEncounter } from "../stats/encounters.js";
import type { StatsStore } from "../stats/statsStore.js";
import { log } from "../utils/logger.js";

const trackerLog = log.withScope("tracker");

export type TrackerSessionOptions = {
  tracker: CombatTracker;
  store: StatsStore;
  source: TextSource;
  pollMs?: number;
  onEvent?: (event: CombatEvent) => void;
  now?: () => number;
};

export type SessionSummary = {
  elapsedMs: number;
  elapsed: string; // h:mm:ss
  gold: number;
  exp: number;
  goldPerHour: number;
  expPerHour: number;
};

type OpenEncounter = {
  id: number;
  gold: number;
  exp: number;
  monsters: Set<string>;
};

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Feeds captured lines through a CombatTracker and keeps encounter rows in
 * step with the battle flow.
 *
 * An encounter opens on "enemies approach" and stays current until the next
 * one opens: gold and experience announced after the battle still land on it.
 */
export class TrackerSession {
  private readonly tracker: CombatTracker;
  private readonly store: StatsStore;
  private readonly source: TextSource;
  private readonly pollMs: number;
  private readonly onEvent?: (event: CombatEvent) => void;
  private readonly now: () => number;
  private startedAtMs: number;
  private encounter: OpenEncounter | null = null;

  constructor(opts: TrackerSessionOptions) {
    this.tracker = opts.tracker;
    this.store = opts.store;
    this.source = opts.source;
    this.pollMs = opts.pollMs ?? 250;
    this.onEvent = opts.onEvent;
    this.now = opts.now ?? Date.now;
    this.startedAtMs = this.now();
  }

  get encounterId(): number | null {
    return this.encounter ? this.encounter.id : null;
  }

  /** Process one line. Errors from classification or persistence propagate. */
  handleLine(line: string): CombatEvent | null {
    const before = this.tracker.phase;
    const event = this.tracker.processLine(line);

    if (event) this.track(event);

    if (before !== "idle" && this.tracker.phase === "idle" && this.encounter) {
      updateEncounter(this.store.db, this.encounter.id, { endedAtMs: this.now() });
      trackerLog.debug(`encounter #${this.encounter.id} ended`);
    }

    if (event && this.onEvent) this.onEvent(event);
    return event;
  }

  /** One capture: every new line is processed; a failing line is logged and skipped. */
  async pollOnce(): Promise<CombatEvent[]> {
    const events: CombatEvent[] = [];
    for (const line of await this.source.poll()) {
      try {
        const event = this.handleLine(line);
        if (event) events.push(event);
      } catch (err) {
        trackerLog.error(`error on line "${line}": ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return events;
  }

  async run(signal: AbortSignal): Promise<void> {
    trackerLog.info(`tracking every ${this.pollMs}ms`);
    while (!signal.aborted) {
      try {
        await this.pollOnce();
      } catch (err) {
        trackerLog.error(`capture failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      await sleep(this.pollMs, signal);
    }
    trackerLog.info("tracking stopped");
  }

  summary(): SessionSummary {
    const elapsedMs = Math.max(0, this.now() - this.startedAtMs);
    const hours = elapsedMs / 3_600_000;
    const gold = this.tracker.goldTotal;
    const exp = this.tracker.expTotal;
    return {
      elapsedMs,
      elapsed: Duration.fromMillis(elapsedMs).toFormat("h:mm:ss"),
      gold,
      exp,
      goldPerHour: hours > 0 ? Math.floor(gold / hours) : 0,
      expPerHour: hours > 0 ? Math.floor(exp / hours) : 0,
    };
  }

  reset(): void {
    this.tracker.resetTotals();
    this.startedAtMs = this.now();
  }

  private track(event: CombatEvent): void {
    if (event.kind === "enemies-approach") {
      this.openEncounter();
      return;
    }

    if (!this.encounter) return;
    const encounter = this.encounter;

    if (isHitEvent(event)) {
      const monster = event.kind === "player-hit-monster" ? event.target : event.source;
      if (!encounter.monsters.has(monster)) {
        encounter.monsters.add(monster);
        addEncounterMonster(this.store.db, encounter.id, this.store.resolveMonsterId(monster));
      }
    } else if (event.kind === "gold-found") {
      encounter.gold += event.amount;
      updateEncounter(this.store.db, encounter.id, { gold: encounter.gold });
    } else if (event.kind === "experience-gained") {
      encounter.exp += event.amount;
      updateEncounter(this.store.db, encounter.id, { exp: encounter.exp });
    }
  }

  private openEncounter(): void {
    const id = createEncounter(this.store.db, this.now());
    addEncounterPlayers(this.store.db, id, this.tracker.roster);
    this.store.setActiveEncounter(id);
    this.encounter = { id, gold: 0, exp: 0, monsters: new Set() };
    trackerLog.debug(`encounter #${id} opened with ${this.tracker.roster.size} players`);
  }
}
