import { afterEach, expect, test } from "vitest";
import { createPlayer } from "../../roster/player.js";
import { addEncounterItem, addEncounterMonster, addEncounterPlayers, createEncounter, updateEncounter } from "../../stats/encounters.js";
import {
  deleteMonster,
  deletePlayer,
  mergeMonsters,
  mergePlayers,
  renameMonster,
  renamePlayer,
} from "../../stats/maintenance.js";
import { insertPlayer, listPlayerNames, playerExists } from "../../stats/players.js";
import {
  encounterDetail,
  listEncounters,
  listMonsters,
  listPlayers,
  monsterHitSummary,
  playerHitSummary,
} from "../../stats/queries.js";
import { StatsStore } from "../../stats/statsStore.js";
import { cleanupTempDbs, openTempDb } from "../helpers/tempDb.js";

afterEach(() => {
  cleanupTempDbs();
});

const WARRIOR = createPlayer({
  playerClass: "warrior",
  level: 10,
  gear: { head: "dented_helm", body: "leather_armor", mainhand: "tenderizer", offhand: "studded_shield" },
  boosts: { strength: 6 },
});

const WIZARD = createPlayer({
  playerClass: "wizard",
  level: 10,
  gear: { head: "mage_hat", body: "tattered_cloak", mainhand: "crooked_wand", offhand: "bone_bracelet" },
  boosts: { intelligence: 6 },
});

function seed() {
  const db = openTempDb();
  const store = new StatsStore(db);
  const strId = insertPlayer(db, "wr.str", WARRIOR);
  const intId = insertPlayer(db, "wz.int", WIZARD);
  const grunt = store.resolveMonsterId("goblin grunt");
  const lizard = store.resolveMonsterId("lizard");
  const slime = store.resolveMonsterId("slime");

  const encounterId = createEncounter(db, 5000);
  addEncounterPlayers(
    db,
    encounterId,
    new Map([
      ["alice", { ...WARRIOR, id: strId }],
      ["bob", { ...WIZARD, id: intId }],
    ])
  );
  addEncounterMonster(db, encounterId, grunt);
  addEncounterItem(db, encounterId, "potion");
  updateEncounter(db, encounterId, { gold: 30, exp: 12, endedAtMs: 9000 });
  store.setActiveEncounter(encounterId);

  const dealt: Array<[number, number, string, number]> = [
    [strId, grunt, "bash", 30],
    [strId, grunt, "bash", 40],
    [strId, grunt, "bash", 35],
    [strId, grunt, "smash", 20],
    [strId, lizard, "bash", 15],
    [intId, lizard, "bash", 10],
    [intId, slime, "zap", 12],
  ];
  for (const [playerId, monsterId, ability, damage] of dealt) {
    store.recordPlayerHit({ playerId, monsterId, ability, damage });
  }

  const taken: Array<[number, number, string, number]> = [
    [grunt, strId, "claw", 4],
    [grunt, strId, "claw", 6],
    [grunt, strId, "bite", 5],
    [slime, intId, "ooze", 2],
  ];
  for (const [monsterId, playerId, ability, damage] of taken) {
    store.recordMonsterHit({ monsterId, playerId, ability, damage });
  }

  return { db, encounterId };
}

test("players and monsters are listed in creation order", () => {
  const { db } = seed();
  expect(listPlayers(db)).toEqual([
    { name: "wr.str", class: "warrior", level: 10, strength: 54, defense: 40, agility: 22, intelligence: 16, wisdom: 21, luck: 24 },
    { name: "wz.int", class: "wizard", level: 10, strength: 19, defense: 25, agility: 32, intelligence: 55, wisdom: 40, luck: 28 },
  ]);
  expect(listPlayers(db, "wz.int").map((p) => p.name)).toEqual(["wz.int"]);
  expect(listMonsters(db)).toEqual(["goblin grunt", "lizard", "slime"]);
});

test("player hit summary groups by ability with one-shot odds", () => {
  const { db } = seed();
  const [bash, smash] = playerHitSummary(db, "wr.str", "goblin grunt");

  expect(bash.ability).toBe("bash");
  expect(bash.count).toBe(3);
  expect(bash.mean).toBe(35);
  expect(bash.std).toBeCloseTo(4.0825, 4);
  expect(bash.oneShotPct).toBeCloseTo(66.6667, 4);

  expect(smash).toEqual({ ability: "smash", count: 1, mean: 20, std: 0, oneShotPct: 0 });
});

test("one-shot odds are omitted for monsters of unknown HP", () => {
  const { db } = seed();
  expect(playerHitSummary(db, "wz.int", "slime")).toEqual([
    { ability: "zap", count: 1, mean: 12, std: 0, oneShotPct: null },
  ]);
});

test("monster hit summary", () => {
  const { db } = seed();
  expect(monsterHitSummary(db, "goblin grunt", "wr.str")).toEqual([
    { ability: "claw", count: 2, mean: 5, std: 1, oneShotPct: null },
    { ability: "bite", count: 1, mean: 5, std: 0, oneShotPct: null },
  ]);
  expect(monsterHitSummary(db, "goblin grunt", "wz.int")).toEqual([]);
});

test("encounter list counts participants and items", () => {
  const { db } = seed();
  createEncounter(db, 10_000);
  expect(listEncounters(db)).toEqual([
    { id: 1, exp: 12, gold: 30, items: 1, monsters: 1, players: 2 },
    { id: 2, exp: 0, gold: 0, items: 0, monsters: 0, players: 0 },
  ]);
});

test("encounter detail sums damage per username", () => {
  const { db, encounterId } = seed();
  expect(encounterDetail(db, encounterId)).toEqual({
    id: encounterId,
    exp: 12,
    gold: 30,
    startedAtMs: 5000,
    endedAtMs: 9000,
    monsters: ["goblin grunt"],
    players: [
      { username: "alice", playerName: "wr.str", dealt: 140, taken: 15 },
      { username: "bob", playerName: "wz.int", dealt: 22, taken: 2 },
    ],
  });
  expect(encounterDetail(db, 99)).toBeNull();
});

test("renaming a player keeps its hits", () => {
  const { db } = seed();
  expect(renamePlayer(db, "wr.str", "wr.strong")).toEqual({ success: true });
  expect(listPlayerNames(db)).toEqual(["wr.strong", "wz.int"]);
  expect(playerHitSummary(db, "wr.strong", "lizard").map((s) => s.count)).toEqual([1]);
});

test("renaming refuses unknown sources and taken names", () => {
  const { db } = seed();
  expect(renamePlayer(db, "ghost", "wr.x")).toEqual({ success: false, error: 'no such player: "ghost"' });
  expect(renamePlayer(db, "wr.str", "wz.int")).toEqual({
    success: false,
    error: 'player "wz.int" already exists. Did you mean merge-players?',
  });
  expect(renameMonster(db, "slime", "lizard")).toEqual({
    success: false,
    error: 'monster "lizard" already exists. Did you mean merge-monsters?',
  });
});

test("merging players moves hits and encounter rows to the destination", () => {
  const { db, encounterId } = seed();
  expect(mergePlayers(db, "wz.int", "wr.str")).toEqual({ success: true });
  expect(playerExists(db, "wz.int")).toBe(false);

  const [bash] = playerHitSummary(db, "wr.str", "lizard");
  expect(bash).toMatchObject({ ability: "bash", count: 2, mean: 12.5 });

  const detail = encounterDetail(db, encounterId);
  expect(detail?.players.map((p) => p.playerName)).toEqual(["wr.str", "wr.str"]);
});

test("merging refuses a missing destination and self-merges", () => {
  const { db } = seed();
  expect(mergePlayers(db, "wz.int", "nobody")).toEqual({
    success: false,
    error: 'no such player: "nobody". Did you mean rename-player?',
  });
  expect(mergePlayers(db, "wz.int", "wz.int")).toEqual({
    success: false,
    error: 'cannot merge player "wz.int" into itself',
  });
  expect(mergeMonsters(db, "ghoul", "lizard")).toEqual({ success: false, error: 'no such monster: "ghoul"' });
});

test("deleting a player removes its hits but keeps the encounter username", () => {
  const { db, encounterId } = seed();
  expect(deletePlayer(db, "wz.int")).toEqual({ success: true });
  expect(listPlayerNames(db)).toEqual(["wr.str"]);
  expect(db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM player_hit_monster").get()).toEqual({ n: 5 });

  const detail = encounterDetail(db, encounterId);
  expect(detail?.players[1]).toEqual({ username: "bob", playerName: null, dealt: 0, taken: 0 });
  expect(deletePlayer(db, "wz.int")).toEqual({ success: false, error: 'no such player: "wz.int"' });
});

test("merging monsters folds their hits together", () => {
  const { db } = seed();
  expect(mergeMonsters(db, "lizard", "goblin grunt")).toEqual({ success: true });
  expect(listMonsters(db)).toEqual(["goblin grunt", "slime"]);

  const [bash] = playerHitSummary(db, "wr.str", "goblin grunt");
  expect(bash).toMatchObject({ ability: "bash", count: 4, mean: 30 });
});

test("deleting a monster removes its hits and encounter links", () => {
  const { db, encounterId } = seed();
  expect(deleteMonster(db, "goblin grunt")).toEqual({ success: true });
  expect(renameMonster(db, "slime", "green slime")).toEqual({ success: true });
  expect(listMonsters(db)).toEqual(["lizard", "green slime"]);

  const detail = encounterDetail(db, encounterId);
  expect(detail?.monsters).toEqual([]);
  expect(detail?.players).toEqual([
    { username: "alice", playerName: "wr.str", dealt: 15, taken: 0 },
    { username: "bob", playerName: "wz.int", dealt: 22, taken: 2 },
  ]);
});
