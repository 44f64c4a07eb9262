import { log } from "../utils/logger.js";
import { NounCorrector, DEFAULT_MAX_NOUN_DISTANCE } from "../nouns/nounCorrector.js";
import type { Player } from "../roster/player.js";
import { classifyLine, type ClassifiedLine } from "./lineClassifier.js";
import { normalizeDamage, DEFAULT_DAMAGE_CEILING } from "./damage.js";
import {
  createBattleState,
  inPhaseGroup,
  isMonsterAttacking,
  isMulti,
  isPlayerAttacking,
  type BattlePhase,
  type BattleState,
  type PhaseGroup,
} from "./battleState.js";
import {
  enemiesApproach,
  experienceGained,
  goldFound,
  monsterHitPlayer,
  playerHitMonster,
  recovery,
  type CombatEvent,
} from "./events.js";

const combatLog = log.withScope("combat");

export type PlayerHitRecord = {
  playerId: number | null;
  monsterId: number;
  ability: string;
  damage: number;
};

export type MonsterHitRecord = {
  monsterId: number;
  playerId: number | null;
  ability: string;
  damage: number;
};

/**
 * Where hits are persisted. Calls are synchronous: a hit is only considered
 * emitted once the sink has handed back its row id. Errors propagate to the
 * caller of processLine.
 */
export interface CombatSink {
  resolveMonsterId(name: string): number;
  recordPlayerHit(hit: PlayerHitRecord): number;
  recordMonsterHit(hit: MonsterHitRecord): number;
}

export type CombatTrackerOptions = {
  sink: CombatSink;
  damageCeiling?: number;
  maxNounDistance?: number;
  /** Starting state, mainly for tests. Defaults to idle with zero totals. */
  state?: BattleState;
};

/**
 * Turns classified battle narration into combat events.
 *
 * One tracker owns one BattleState; lines must be fed strictly in order.
 * Inconsistent input never stops processing: the in-flight action is dropped
 * and the tracker carries on from a safe phase.
 */
export class CombatTracker {
  readonly nouns: NounCorrector;
  private readonly players = new Map<string, Player>();
  private readonly state: BattleState;
  private readonly sink: CombatSink;
  private readonly damageCeiling: number;

  constructor(opts: CombatTrackerOptions) {
    this.sink = opts.sink;
    this.damageCeiling = opts.damageCeiling ?? DEFAULT_DAMAGE_CEILING;
    this.nouns = new NounCorrector(opts.maxNounDistance ?? DEFAULT_MAX_NOUN_DISTANCE);
    this.state = opts.state ?? createBattleState();
  }

  /** Registered players by username. Add players through registerPlayer. */
  get roster(): ReadonlyMap<string, Player> {
    return this.players;
  }

  get phase(): BattlePhase {
    return this.state.phase;
  }

  get goldTotal(): number {
    return this.state.gold;
  }

  get expTotal(): number {
    return this.state.exp;
  }

  snapshot(): Readonly<BattleState> {
    return { ...this.state };
  }

  resetTotals(): void {
    this.state.gold = 0;
    this.state.exp = 0;
  }

  registerPlayer(username: string, player: Player): void {
    this.players.set(username, player);
    this.nouns.addNouns([username]);
  }

  removePlayers(): void {
    this.nouns.removeNouns(this.players.keys());
    this.players.clear();
  }

  registerNouns(names: Iterable<string>): void {
    this.nouns.addNouns(names);
  }

  isPlayer(name: string): boolean {
    return this.players.has(name);
  }

  /**
   * Classify one line and advance the state machine.
   * Returns the event for the line, or null when it produced none.
   */
  processLine(line: string): CombatEvent | null {
    const classified = classifyLine(line);
    if (!classified) return null;
    return this.handle(classified, line);
  }

  private handle(c: ClassifiedLine, line: string): CombatEvent | null {
    switch (c.kind) {
      case "enemies-approach":
        this.expectPhase(["idle"], c.kind);
        this.setPhase("selecting-action");
        return enemiesApproach();

      case "select-action":
        this.expectPhase(["selecting-action", "attacking"], c.kind);
        this.setPhase("selecting-action");
        return null;

      case "uses-attack":
        return this.handleUsesAttack(c.source, c.ability, c.target, line);

      case "uses-multi":
        return this.handleUsesMulti(c.source, c.ability);

      case "takes-damage":
        return this.handleTakesDamage(c.target, c.amount);

      case "recovers-mp":
        return this.handleRecovers("recover-mp", c.target, c.amount);

      case "recovers-hp":
        return this.handleRecovers("recover-hp", c.target, c.amount);

      case "name-defeated":
        // TODO: emit a monster-killed event once kills are stored per encounter
        return null;

      case "enemy-defeated":
        this.setPhase("idle");
        return null;

      case "find-gold":
        this.state.gold += c.amount;
        return goldFound(c.amount, this.state.gold);

      case "gain-exp":
        this.state.exp += c.amount;
        return experienceGained(c.amount, this.state.exp);
    }
  }

  private handleUsesAttack(rawSource: string, ability: string, rawTarget: string, line: string): null {
    this.expectPhase(["selecting-action", "attacking"], "uses-attack");
    this.state.source = this.nouns.correct(rawSource);
    this.state.target = this.nouns.correct(rawTarget);
    this.state.ability = ability;

    if (this.isPlayer(this.state.source)) {
      this.setPhase("player-attacking");
    } else if (this.isPlayer(this.state.target)) {
      this.setPhase("monster-attacking");
    } else {
      combatLog.debug(`unknown source/target in "${line}"`);
      this.clearAction();
    }
    return null;
  }

  private handleUsesMulti(rawSource: string, ability: string): null {
    this.expectPhase(["selecting-action", "attacking", "multi-attack"], "uses-multi");
    this.state.source = this.nouns.correct(rawSource);
    this.state.ability = ability;

    if (this.isPlayer(this.state.source)) {
      this.setPhase("multi-attack");
    } else {
      // Monster multi-target abilities are not tracked.
      this.clearAction();
    }
    return null;
  }

  private handleTakesDamage(rawTarget: string, amount: number): CombatEvent | null {
    this.expectPhase(["attacking", "multi-attack"], "takes-damage");
    this.state.target = this.nouns.correct(rawTarget);
    const damage = normalizeDamage(amount, this.damageCeiling);

    const { source, target, ability } = this.state;
    if (source === null || target === null || ability === null) {
      combatLog.debug(`(takes-damage) no pending action`, { source, target, ability });
      this.clearAction("selecting-action");
      return null;
    }

    if (this.state.phase === "multi-attack") {
      // Target side of a multi-target ability is only known once damage lands.
      this.setPhase(this.isPlayer(source) ? "player-attacking-multi" : "monster-attacking-multi");
    }

    let event: CombatEvent | null = null;
    if (isPlayerAttacking(this.state.phase)) {
      this.persistPlayerHit(source, ability, target, damage);
      event = playerHitMonster(source, ability, target, damage);
    } else if (isMonsterAttacking(this.state.phase)) {
      this.persistMonsterHit(source, ability, target, damage);
      event = monsterHitPlayer(source, ability, target, damage);
    } else {
      combatLog.debug(`invalid phase "${this.state.phase}" for damage`);
      this.clearAction();
    }

    // Multi-target sequences keep source/ability for the next target's line.
    // There is no end-of-sequence line, so the action stays pending until
    // something else replaces or invalidates it.
    if (!isMulti(this.state.phase)) {
      this.clearAction("selecting-action");
    }
    return event;
  }

  private handleRecovers(kind: "recover-hp" | "recover-mp", rawTarget: string, amount: number): CombatEvent | null {
    this.expectPhase(["player-attacking"], kind);
    const target = this.nouns.correct(rawTarget);
    const { source, ability } = this.state;
    this.clearAction("selecting-action");

    if (source === null || ability === null) {
      combatLog.debug(`(${kind}) no pending action for ${target}`);
      return null;
    }
    return recovery(kind, source, ability, target, amount);
  }

  private persistPlayerHit(source: string, ability: string, target: string, damage: number): void {
    const player = this.players.get(source);
    if (!player) {
      combatLog.debug(`invalid player hit: ${source}`);
      return;
    }
    const monsterId = this.sink.resolveMonsterId(target);
    const id = this.sink.recordPlayerHit({ playerId: player.id, monsterId, ability, damage });
    combatLog.trace(`recorded player hit #${id}`);
  }

  private persistMonsterHit(source: string, ability: string, target: string, damage: number): void {
    const player = this.players.get(target);
    if (!player) {
      combatLog.debug(`invalid player dmg: ${target}`);
      return;
    }
    const monsterId = this.sink.resolveMonsterId(source);
    const id = this.sink.recordMonsterHit({ monsterId, playerId: player.id, ability, damage });
    combatLog.trace(`recorded monster hit #${id}`);
  }

  private setPhase(phase: BattlePhase): void {
    combatLog.debug(`(state change) ${this.state.phase} -> ${phase}`);
    this.state.phase = phase;
  }

  private clearAction(phase: BattlePhase = "idle"): void {
    this.state.source = null;
    this.state.target = null;
    this.state.ability = null;
    this.setPhase(phase);
  }

  /** Advisory: on mismatch, drop the in-flight action and continue from idle. */
  private expectPhase(groups: PhaseGroup[], context: string): void {
    if (groups.some((group) => inPhaseGroup(this.state.phase, group))) return;
    combatLog.debug(`unexpected state (${context}): ${this.state.phase}`);
    this.clearAction();
  }
}
