/**
 * Combat events emitted by the tracker, one variant per kind.
 * Each variant carries exactly the fields its kind has.
 */

export type HitEvent = {
  readonly kind: "player-hit-monster" | "monster-hit-player";
  readonly source: string;
  readonly target: string;
  readonly ability: string;
  readonly damage: number;
};

export type RecoveryEvent = {
  readonly kind: "recover-hp" | "recover-mp";
  readonly source: string;
  readonly target: string;
  readonly ability: string;
  readonly amount: number;
};

export type LootEvent = {
  readonly kind: "gold-found" | "experience-gained";
  readonly amount: number;
  readonly total: number; // running total after this event
};

export type EnemiesApproachEvent = {
  readonly kind: "enemies-approach";
};

export type CombatEvent = HitEvent | RecoveryEvent | LootEvent | EnemiesApproachEvent;
export type CombatEventKind = CombatEvent["kind"];

export function playerHitMonster(source: string, ability: string, target: string, damage: number): HitEvent {
  return { kind: "player-hit-monster", source, ability, target, damage };
}

export function monsterHitPlayer(source: string, ability: string, target: string, damage: number): HitEvent {
  return { kind: "monster-hit-player", source, ability, target, damage };
}

export function recovery(
  kind: RecoveryEvent["kind"],
  source: string,
  ability: string,
  target: string,
  amount: number
): RecoveryEvent {
  return { kind, source, ability, target, amount };
}

export function goldFound(amount: number, total: number): LootEvent {
  return { kind: "gold-found", amount, total };
}

export function experienceGained(amount: number, total: number): LootEvent {
  return { kind: "experience-gained", amount, total };
}

export function enemiesApproach(): EnemiesApproachEvent {
  return { kind: "enemies-approach" };
}

export function isHitEvent(event: CombatEvent): event is HitEvent {
  return event.kind === "player-hit-monster" || event.kind === "monster-hit-player";
}

/**
 * Narrow an event to one kind, throwing when it is anything else.
 * For callers that know what they are holding and want a loud failure otherwise.
 */
export function expectEventKind<K extends CombatEventKind>(
  event: CombatEvent | null,
  kind: K
): CombatEvent & { kind: K } {
  if (event === null) {
    throw new Error(`Expected a ${kind} event, got none`);
  }
  if (!isEventOfKind(event, kind)) {
    throw new Error(`Expected a ${kind} event, got ${event.kind}`);
  }
  return event;
}

function isEventOfKind<K extends CombatEventKind>(
  event: CombatEvent,
  kind: K
): event is CombatEvent & { kind: K } {
  return event.kind === kind;
}

export function describeEvent(event: CombatEvent): string {
  switch (event.kind) {
    case "player-hit-monster":
    case "monster-hit-player":
      return `${event.source} used ${event.ability} on ${event.target} (${event.damage} damage)`;
    case "recover-hp":
      return `${event.source} used ${event.ability} on ${event.target} (${event.amount} hp)`;
    case "recover-mp":
      return `${event.source} used ${event.ability} on ${event.target} (${event.amount} mp)`;
    case "gold-found":
      return `you found ${event.amount} gold`;
    case "experience-gained":
      return `you gained ${event.amount} experience`;
    case "enemies-approach":
      return "enemies approach";
  }
}
