// Letters the OCR engine commonly returns in place of digits.
const DIGIT_LOOKALIKES: Record<string, string> = {
  o: "0",
  l: "1",
  i: "1",
  s: "5",
  "&": "8",
  y: "7",
  "?": "7",
};

const INTEGER_RE = /^[+-]?\d+$/;

export class OcrNumberError extends Error {
  constructor(readonly token: string) {
    super(`Unparseable number from OCR: "${token}"`);
    this.name = "OcrNumberError";
  }
}

/**
 * Parse an integer field out of recognised text.
 * Never guesses: anything that is not digits after look-alike translation throws.
 */
export function parseOcrInt(token: string): number {
  // Consistent misread of one specific UI value.
  if (token === "psu") return 20;

  const translated = Array.from(token, (ch) => DIGIT_LOOKALIKES[ch] ?? ch).join("").trim();
  if (!INTEGER_RE.test(translated)) {
    throw new OcrNumberError(token);
  }
  const n = Number.parseInt(translated, 10);
  // Past 2^53 the value would be rounded.
  if (!Number.isSafeInteger(n)) {
    throw new OcrNumberError(token);
  }
  return n;
}
