import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import {
  baseStats,
  createPlayer,
  gearStats,
  loadClassStats,
  statsFromList,
  statsToList,
} from "../../roster/player.js";
import { loadPresets } from "../../roster/presets.js";

const tempDirs: string[] = [];

function writeTemp(name: string, content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "combat-roster-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content, "utf8");
  return filePath;
}

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

const WARRIOR_GEAR = {
  head: "dented_helm",
  body: "leather_armor",
  mainhand: "tenderizer",
  offhand: "studded_shield",
} as const;

test("base stats come from the class table", () => {
  expect(baseStats("warrior", 10)).toEqual({
    hp: 79,
    mp: 0,
    strength: 40,
    defense: 31,
    agility: 22,
    intelligence: 16,
    wisdom: 20,
    luck: 24,
  });
  expect(baseStats("wizard", 1).mp).toBe(19);
});

test("levels outside 1-10 are rejected", () => {
  expect(() => baseStats("cleric", 0)).toThrow("Invalid level 0 (expected 1-10)");
  expect(() => baseStats("cleric", 11)).toThrow("Invalid level 11 (expected 1-10)");
});

test("gear bonuses add up per slot", () => {
  expect(gearStats(WARRIOR_GEAR)).toEqual({
    hp: 0,
    mp: 0,
    strength: 8,
    defense: 9,
    agility: 0,
    intelligence: 0,
    wisdom: 1,
    luck: 0,
  });
});

test("effective stats are base plus gear plus boosts", () => {
  const player = createPlayer({ playerClass: "warrior", level: 10, gear: WARRIOR_GEAR, boosts: { strength: 6 } });
  expect(player.id).toBeNull();
  expect(statsToList(player.stats)).toEqual([79, 0, 54, 40, 22, 16, 21, 24]);
  expect(statsToList(player.boosts)).toEqual([0, 0, 6, 0, 0, 0, 0, 0]);
});

test("more than six boost points is refused", () => {
  expect(() =>
    createPlayer({ playerClass: "warrior", level: 5, gear: WARRIOR_GEAR, boosts: { strength: 4, luck: 3 } })
  ).toThrow("thats too many boosts! (7 > 6)");
});

test("stats list conversion checks its length", () => {
  expect(statsFromList([1, 2, 3, 4, 5, 6, 7, 8]).luck).toBe(8);
  expect(() => statsFromList([1, 2, 3])).toThrow("Expected 8 integer stats, got [1, 2, 3]");
});

test("a class table missing a stat is rejected", () => {
  const filePath = writeTemp("classStats.json", JSON.stringify({ warrior: { hp: [0] } }));
  expect(() => loadClassStats(filePath)).toThrow("Class stats for warrior.hp must list 11 numbers");
});

test("bundled presets load with their boosts", () => {
  const presets = loadPresets();
  expect(presets.map((p) => p.name)).toEqual(["wr.str", "wr.def", "wz.int"]);

  const wizard = presets[2].player;
  expect(wizard.playerClass).toBe("wizard");
  expect(statsToList(wizard.stats)).toEqual([48, 75, 19, 25, 32, 55, 40, 28]);
});

test("duplicate preset names are rejected", () => {
  const entry = `  - name: twin
    class: cleric
    level: 1
    gear: { head: mage_hat, body: tattered_cloak, mainhand: crooked_wand, offhand: bone_bracelet }
`;
  const filePath = writeTemp("presets.yml", `version: 1\npresets:\n${entry}${entry}`);
  expect(() => loadPresets(filePath)).toThrow("Duplicate preset: twin");
});

test("unknown gear in a preset is rejected", () => {
  const filePath = writeTemp(
    "presets.yml",
    `presets:
  - name: odd
    class: warrior
    level: 3
    gear: { head: crown, body: leather_armor, mainhand: tenderizer, offhand: studded_shield }
`
  );
  expect(() => loadPresets(filePath)).toThrow('Preset odd: unknown head gear "crown"');
});
