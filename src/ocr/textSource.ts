import { exec } from "node:child_process";
import { log } from "../utils/logger.js";

const ocrLog = log.withScope("ocr");

/** Returns the raw recognised text of one screen capture. */
export type CaptureFn = () => Promise<string>;

// Matched against the trimmed line before lower-casing.
export const IGNORE_PATTERN = /^(meal\)|Sa 0\))/;
export const MIN_LINE_LENGTH = 6;

const PUNCTUATION: Record<string, string> = {
  "\u2018": "'",
  "\u2019": "'",
  "\u201c": '"',
  "\u201d": '"',
  "\u2013": "-",
  "\u2014": "-",
  "\u2026": "...",
  "\u00a0": " ",
};

/** Fold recognised text to plain ASCII. */
export function toAscii(text: string): string {
  return text
    .replace(/[\u2018\u2019\u201c\u201d\u2013\u2014\u2026\u00a0]/g, (ch) => PUNCTUATION[ch] ?? "")
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\x00-\x7f]/g, "");
}

export function splitLines(text: string): string[] {
  const lines: string[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line.length < MIN_LINE_LENGTH || IGNORE_PATTERN.test(line)) continue;
    lines.push(line.toLowerCase());
  }
  return lines;
}

/**
 * Turns successive screen captures into a stream of new narration lines.
 *
 * A capture identical to the previous one yields nothing, and a line equal to
 * the previously yielded line is skipped, even across captures.
 */
export class TextSource {
  private previousText: string | null = null;
  private previousLine: string | null = null;

  constructor(private readonly capture: CaptureFn) {}

  async poll(): Promise<string[]> {
    const text = toAscii(await this.capture()).trim();
    if (text === this.previousText) return [];
    this.previousText = text;

    const fresh: string[] = [];
    for (const line of splitLines(text)) {
      if (line === this.previousLine) continue;
      this.previousLine = line;
      ocrLog.debug(line);
      fresh.push(line);
    }
    return fresh;
  }

  async *lines(): AsyncGenerator<string, void, undefined> {
    for (const line of await this.poll()) {
      yield line;
    }
  }
}

/** Replays a fixed list of captures, then keeps returning empty text. */
export function replayCapture(captures: readonly string[]): CaptureFn {
  let index = 0;
  return async () => {
    if (index >= captures.length) return "";
    return captures[index++];
  };
}

/** Split a recorded capture log into captures; blocks are separated by a blank line. */
export function splitCaptures(text: string): string[] {
  return text
    .split(/\r?\n\s*\r?\n/)
    .map((block) => block.trim())
    .filter(Boolean);
}

/** Runs an external OCR command per capture and returns its stdout. */
export function commandCapture(command: string, timeoutMs = 10_000): CaptureFn {
  return () =>
    new Promise((resolve, reject) => {
      exec(command, { timeout: timeoutMs }, (err, stdout, stderr) => {
        if (err) {
          reject(new Error(`capture command failed: ${stderr.trim() || err.message}`));
        } else {
          resolve(stdout);
        }
      });
    });
}
