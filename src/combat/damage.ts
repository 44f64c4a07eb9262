import { log } from "../utils/logger.js";

const combatLog = log.withScope("combat");

/**
 * Highest damage value seen in normal play. Anything above is assumed to be a
 * 1-2 digit value with a spurious leading digit prepended by the OCR engine.
 */
export const DEFAULT_DAMAGE_CEILING = 110;

export function normalizeDamage(damage: number, ceiling: number = DEFAULT_DAMAGE_CEILING): number {
  if (damage <= ceiling) return damage;
  const corrected = damage - Math.floor(damage / 100) * 100;
  combatLog.debug(`damage ${damage} looks too high -> ${corrected}`);
  return corrected;
}
