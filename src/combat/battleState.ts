export type BattlePhase =
  | "idle"
  | "selecting-action"
  | "player-attacking"
  | "player-attacking-multi"
  | "monster-attacking"
  | "monster-attacking-multi"
  | "multi-attack" // multi-target ability seen, target side not known yet
  | "player-using-item"; // reserved: item use is currently narrated like an attack

/** Phase groups used by the tracker's expectation checks. */
export type PhaseGroup = "idle" | "selecting-action" | "attacking" | "player-attacking" | "multi-attack";

export type BattleState = {
  phase: BattlePhase;
  // Pending action: set by a "uses" line, consumed by the damage line(s).
  source: string | null;
  target: string | null;
  ability: string | null;
  gold: number;
  exp: number;
};

export function createBattleState(init: Partial<BattleState> = {}): BattleState {
  return {
    phase: "idle",
    source: null,
    target: null,
    ability: null,
    gold: 0,
    exp: 0,
    ...init,
  };
}

/** Any phase where a single-target or resolved multi-target attack is in flight. */
export function isAttacking(phase: BattlePhase): boolean {
  return isPlayerAttacking(phase) || isMonsterAttacking(phase);
}

export function isPlayerAttacking(phase: BattlePhase): boolean {
  return phase === "player-attacking" || phase === "player-attacking-multi";
}

export function isMonsterAttacking(phase: BattlePhase): boolean {
  return phase === "monster-attacking" || phase === "monster-attacking-multi";
}

/** Phases that keep the pending action alive across several damage lines. */
export function isMulti(phase: BattlePhase): boolean {
  return phase === "player-attacking-multi" || phase === "monster-attacking-multi" || phase === "multi-attack";
}

export function inPhaseGroup(phase: BattlePhase, group: PhaseGroup): boolean {
  switch (group) {
    case "idle":
      return phase === "idle";
    case "selecting-action":
      return phase === "selecting-action";
    case "attacking":
      return isAttacking(phase);
    case "player-attacking":
      return isPlayerAttacking(phase);
    case "multi-attack":
      return phase === "multi-attack";
  }
}
