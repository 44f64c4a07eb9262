import { afterEach, expect, test, vi } from "vitest";
import { DEFAULT_MAX_NOUN_DISTANCE, NounCorrector } from "../../nouns/nounCorrector.js";
import { log } from "../../utils/logger.js";

function corrector(nouns: string[], maxDistance?: number): NounCorrector {
  const c = new NounCorrector(maxDistance);
  c.addNouns(nouns);
  return c;
}

afterEach(() => {
  vi.restoreAllMocks();
});

test("known nouns are returned unchanged", () => {
  const c = corrector(["alice", "goblin grunt", "cave bat"]);
  for (const noun of ["alice", "goblin grunt", "cave bat"]) {
    expect(c.correct(noun)).toBe(noun);
  }
});

test("near misses snap to the closest noun", () => {
  const c = corrector(["alice", "goblin grunt"]);
  expect(c.correct("a1ice")).toBe("alice");
  expect(c.correct("gobiin grunt")).toBe("goblin grunt");
});

test("distance 3 is accepted, distance 4 is not", () => {
  expect(DEFAULT_MAX_NOUN_DISTANCE).toBe(4);
  const c = corrector(["abcdef"]);
  expect(c.correct("abcxyz")).toBe("abcdef");
  expect(c.correct("abwxyz")).toBe("abwxyz");
});

test("ties go to the noun registered first", () => {
  expect(corrector(["bob", "rob"]).correct("cob")).toBe("bob");
  expect(corrector(["rob", "bob"]).correct("cob")).toBe("rob");
});

test("correct is idempotent", () => {
  const c = corrector(["alice", "goblin archer", "goblin grunt"]);
  for (const raw of ["a1ice", "goblin archr", "zzzzzzzz", "goblin grunt"]) {
    const once = c.correct(raw);
    expect(c.correct(once)).toBe(once);
  }
});

test("adding nouns drops memoised results", () => {
  const c = corrector(["alice"]);
  expect(c.correct("bob")).toBe("bob");
  c.addNouns(["rob"]);
  expect(c.correct("bob")).toBe("rob");
  expect(c.size).toBe(2);
});

test("removed nouns are no longer corrected to", () => {
  const c = corrector(["alice", "rob"]);
  expect(c.correct("bob")).toBe("rob");
  c.removeNouns(["rob"]);
  expect(c.has("rob")).toBe(false);
  expect(c.correct("bob")).toBe("bob");
});

test("threshold is configurable", () => {
  const c = corrector(["alice"], 2);
  expect(c.correct("a1ice")).toBe("alice");
  expect(c.correct("a11ce")).toBe("a11ce");
});

test("a correction logs what was replaced", () => {
  const c = corrector(["alice"]);
  const debug = vi.spyOn(log, "debug");

  expect(c.correct("alice")).toBe("alice");
  expect(debug).not.toHaveBeenCalled();

  expect(c.correct("a1ice")).toBe("alice");
  expect(debug).toHaveBeenCalledWith('corrected "a1ice" to "alice"', "nouns", undefined);
});
