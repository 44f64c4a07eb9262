import { expect, test } from "vitest";
import { replayCapture, splitCaptures, splitLines, TextSource, toAscii } from "../../ocr/textSource.js";

test("short lines and known OCR noise are dropped, the rest lower-cased", () => {
  const text = "Select an action.\n\n  Hi\nmeal) thing here\nAlice takes 12 damage.";
  expect(splitLines(text)).toEqual(["select an action.", "alice takes 12 damage."]);
});

test("the ignore pattern is case-sensitive and checked before lower-casing", () => {
  expect(splitLines("Sa 0) extra\nsa 0) extra")).toEqual(["sa 0) extra"]);
});

test("text is folded to ASCII", () => {
  expect(toAscii("Café’s “loot” — done…")).toBe(`Cafe's "loot" - done...`);
});

test("repeated captures and repeated lines are yielded once", async () => {
  const source = new TextSource(
    replayCapture([
      "Enemies approach.\nSelect an action.",
      "Enemies approach.\nSelect an action.",
      "Select an action.\nAlice uses heal on alice.",
    ])
  );

  expect(await source.poll()).toEqual(["enemies approach.", "select an action."]);
  expect(await source.poll()).toEqual([]);
  expect(await source.poll()).toEqual(["alice uses heal on alice."]);
  expect(await source.poll()).toEqual([]);
});

test("lines() yields one capture's new lines", async () => {
  const source = new TextSource(replayCapture(["You find 5 gold.\nYou gain 3 experience."]));
  const lines: string[] = [];
  for await (const line of source.lines()) lines.push(line);
  expect(lines).toEqual(["you find 5 gold.", "you gain 3 experience."]);
});

test("capture logs split on blank lines", () => {
  expect(splitCaptures("a\nb\n\n\nc\n")).toEqual(["a\nb", "c"]);
  expect(splitCaptures("\n\n")).toEqual([]);
});
