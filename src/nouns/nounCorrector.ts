import { distance } from "fastest-levenshtein";
import { log } from "../utils/logger.js";

const nounLog = log.withScope("nouns");

/** Corrections must be strictly closer than this edit distance. */
export const DEFAULT_MAX_NOUN_DISTANCE = 4;

/**
 * Maps OCR-degraded tokens onto the closest known proper noun
 * (player usernames, monster species).
 *
 * Nouns keep insertion order, so ties resolve to the noun registered first.
 * The memo is only valid for the registry it was computed against and is
 * dropped on every registry change.
 */
export class NounCorrector {
  private readonly nouns = new Set<string>();
  private cache = new Map<string, string>();

  constructor(private readonly maxDistance: number = DEFAULT_MAX_NOUN_DISTANCE) {}

  get size(): number {
    return this.nouns.size;
  }

  has(noun: string): boolean {
    return this.nouns.has(noun);
  }

  addNouns(nouns: Iterable<string>): void {
    for (const noun of nouns) {
      this.nouns.add(noun);
    }
    this.cache = new Map();
  }

  removeNouns(nouns: Iterable<string>): void {
    for (const noun of nouns) {
      this.nouns.delete(noun);
    }
    this.cache = new Map();
  }

  correct(raw: string): string {
    const cached = this.cache.get(raw);
    if (cached !== undefined) return cached;

    if (this.nouns.has(raw)) {
      this.cache.set(raw, raw);
      return raw;
    }

    let best = raw;
    let bestDistance = this.maxDistance;
    for (const noun of this.nouns) {
      const d = distance(raw, noun);
      if (d < bestDistance) {
        bestDistance = d;
        best = noun;
      }
    }

    this.cache.set(raw, best);
    if (best !== raw) {
      nounLog.debug(`corrected "${raw}" to "${best}"`);
    }
    return best;
  }
}
