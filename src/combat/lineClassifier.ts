import { parseOcrInt } from "../ocr/parseOcrInt.js";

/**
 * Battle narration templates, in match priority order.
 *
 * Lines arrive lower-cased and ASCII-only. Templates anchor at the start of the
 * line only; OCR often leaves junk after the final period.
 */

// Name = anything but a dash, followed by an optional "-2", "-3"... instance
// suffix which is dropped. Used for both monster and player names.
const NAME = "([^-]+)(?:-+.+)?";

export type ClassifiedLine =
  | { kind: "enemies-approach" }
  | { kind: "select-action" }
  | { kind: "uses-attack"; source: string; ability: string; target: string }
  | { kind: "uses-multi"; source: string; ability: string }
  | { kind: "takes-damage"; target: string; amount: number }
  | { kind: "recovers-mp"; target: string; amount: number }
  | { kind: "recovers-hp"; target: string; amount: number }
  | { kind: "name-defeated"; name: string }
  | { kind: "enemy-defeated" }
  | { kind: "find-gold"; amount: number }
  | { kind: "gain-exp"; amount: number };

export type LineKind = ClassifiedLine["kind"];

type LineTemplate = {
  kind: LineKind;
  pattern: RegExp;
  extract: (m: RegExpExecArray) => ClassifiedLine;
};

// `.*`-style groups instead of `\d+` for numbers: the OCR engine returns
// letters for digits often enough that the integer parser has to see them.
export const LINE_TEMPLATES: readonly LineTemplate[] = [
  {
    kind: "enemies-approach",
    pattern: /^(an enemy|enemies) approach(es)?./,
    extract: () => ({ kind: "enemies-approach" }),
  },
  {
    kind: "select-action",
    pattern: /^select an action./,
    extract: () => ({ kind: "select-action" }),
  },
  {
    kind: "uses-attack",
    pattern: new RegExp(`^${NAME} uses (.+) on ${NAME}\\.`),
    extract: (m) => ({ kind: "uses-attack", source: m[1], ability: m[2], target: m[3] }),
  },
  {
    kind: "uses-multi",
    pattern: new RegExp(`^${NAME} uses (.+)\\.`),
    extract: (m) => ({ kind: "uses-multi", source: m[1], ability: m[2] }),
  },
  {
    kind: "takes-damage",
    pattern: new RegExp(`^${NAME} takes (.+) damage.`),
    extract: (m) => ({ kind: "takes-damage", target: m[1], amount: parseOcrInt(m[2]) }),
  },
  {
    kind: "recovers-mp",
    pattern: new RegExp(`^${NAME} recovers (.+) mp\\.`),
    extract: (m) => ({ kind: "recovers-mp", target: m[1], amount: parseOcrInt(m[2]) }),
  },
  {
    kind: "recovers-hp",
    pattern: new RegExp(`^${NAME} recovers (.+) hp\\.`),
    extract: (m) => ({ kind: "recovers-hp", target: m[1], amount: parseOcrInt(m[2]) }),
  },
  {
    kind: "name-defeated",
    pattern: new RegExp(`^${NAME} is defeated\\.`),
    extract: (m) => ({ kind: "name-defeated", name: m[1] }),
  },
  {
    kind: "enemy-defeated",
    pattern: /^the enemy is defeated!/,
    extract: () => ({ kind: "enemy-defeated" }),
  },
  {
    // First letter of "you" is unreliable.
    kind: "find-gold",
    pattern: /^.ou find (.+) gold./,
    extract: (m) => ({ kind: "find-gold", amount: parseOcrInt(m[1]) }),
  },
  {
    kind: "gain-exp",
    pattern: /^.ou gain (.+) experience./,
    extract: (m) => ({ kind: "gain-exp", amount: parseOcrInt(m[1]) }),
  },
];

/**
 * First matching template wins. Returns null for lines that match nothing.
 * Throws OcrNumberError when a template matches but its number is unreadable.
 */
export function classifyLine(line: string): ClassifiedLine | null {
  for (const template of LINE_TEMPLATES) {
    const m = template.pattern.exec(line);
    if (m) return template.extract(m);
  }
  return null;
}
