import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../app";
import { resetContentCache } from "../routes/definitions-helpers";

const SCORES = { Might: 10, Agility: 14, Endurance: 13, Intellect: 15, Wisdom: 12, Charisma: 8 };

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  resetContentCache();
  server = createApp().listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}/api`;
});

afterAll(
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    })
);

async function call(method: string, route: string, body?: unknown) {
  const res = await fetch(`${baseUrl}${route}`, {
    method,
    headers: body === undefined ? undefined : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const text = await res.text();
  return { status: res.status, body: text ? JSON.parse(text) : null };
}

/** Elf / Sylari / Scholar / Mystic / Drifter, ready to level. */
async function createMystic(): Promise<string> {
  const created = await call("POST", "/characters", { name: "Ilya" });
  const id: string = created.body.id;
  await call("PUT", `/characters/${id}/ability-scores`, { scores: SCORES });
  await call("PUT", `/characters/${id}/race`, { raceId: "elf" });
  await call("PUT", `/characters/${id}/ancestry`, { ancestryId: "sylari" });
  await call("PUT", `/characters/${id}/profession`, { professionId: "scholar" });
  await call("POST", `/characters/${id}/choices`, { choiceType: "skill", selections: ["Arcana", "History"] });
  await call("PUT", `/characters/${id}/path`, { pathId: "mystic" });
  await call("PUT", `/characters/${id}/background`, { backgroundId: "drifter" });
  return id;
}

const MYSTIC_LEVEL_TWO = {
  hpRoll: 3,
  talents: [
    { talentId: "arcane-focus", desiredNewRank: 1 },
    { talentId: "arcane-focus", desiredNewRank: 2 },
    { talentId: "mystic-ward", desiredNewRank: 1 },
  ],
};

describe("health and definitions", () => {
  it("reports health", async () => {
    expect(await call("GET", "/health")).toEqual({ status: 200, body: { status: "ok" } });
  });

  it("lists catalog summaries", async () => {
    const { status, body } = await call("GET", "/definitions");
    expect(status).toBe(200);
    expect(body.ruleset.key).toBe("core");
    expect(body.races.map((r: { id: string }) => r.id)).toEqual(["elf", "human", "dwarf", "tauran"]);
    expect(body.ancestries[0]).toEqual({
      id: "sylari",
      name: "Sylari",
      description: "Wood elves who keep the groves of the western wilds.",
      parentId: "elf",
    });
  });

  it("returns single entries", async () => {
    const { status, body } = await call("GET", "/definitions/path/mystic");
    expect(status).toBe(200);
    expect(body.name).toBe("Mystic");
    expect(body.spellcasting).toBe(true);
  });

  it("answers 404 for unknown kinds and ids", async () => {
    const kind = await call("GET", "/definitions/spell");
    expect(kind.status).toBe(404);
    expect(kind.body.error).toBe("Unknown definition kind: spell");

    const entry = await call("GET", "/definitions/race/orc");
    expect(entry.status).toBe(404);
    expect(entry.body).toMatchObject({ error: "Unknown race: orc", code: "NotFound" });
  });
});

describe("POST /api/validation/ability-scores", () => {
  it("returns warnings for valid scores", async () => {
    const { status, body } = await call("POST", "/validation/ability-scores", {
      scores: { ...SCORES, Might: 2 },
    });
    expect(status).toBe(200);
    expect(body).toEqual({ valid: true, errors: [], warnings: ["Might is unusually low (2)"], codes: [] });
  });

  it("returns errors for invalid scores", async () => {
    const { body } = await call("POST", "/validation/ability-scores", { scores: { ...SCORES, Might: 25 } });
    expect(body.valid).toBe(false);
    expect(body.errors).toEqual(["Might cannot exceed 20 (got 25)"]);
  });

  it("rejects unknown methods", async () => {
    const { status, body } = await call("POST", "/validation/ability-scores", { scores: SCORES, method: "dice" });
    expect(status).toBe(400);
    expect(body.error).toBe("Unknown ability score method: dice");
  });
});

describe("character builder sessions", () => {
  it("walks a character through every step", async () => {
    const created = await call("POST", "/characters", { name: "  Ilya " });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ step: "ability_scores", complete: false, pendingChoices: [] });
    expect(created.body.character.name).toBe("Ilya");
    const id: string = created.body.id;

    const early = await call("PUT", `/characters/${id}/race`, { raceId: "elf" });
    expect(early.status).toBe(400);
    expect(early.body).toMatchObject({ code: "StepOutOfOrder", error: "Cannot choose Race before Ability Scores" });

    const scores = await call("PUT", `/characters/${id}/ability-scores`, { scores: SCORES, method: "manual" });
    expect(scores.body.step).toBe("race");
    expect(scores.body.validation.valid).toBe(true);

    await call("PUT", `/characters/${id}/race`, { raceId: "elf" });
    await call("PUT", `/characters/${id}/ancestry`, { ancestryId: "sylari" });
    const profession = await call("PUT", `/characters/${id}/profession`, { professionId: "scholar" });
    expect(profession.body.step).toBe("path");
    expect(profession.body.pendingChoices).toHaveLength(1);
    expect(profession.body.pendingChoices[0]).toMatchObject({ choiceType: "skill", count: 2 });

    const resolved = await call("POST", `/characters/${id}/choices`, {
      choiceType: "skill",
      selections: ["Arcana", "History"],
    });
    expect(resolved.body.pendingChoices).toEqual([]);

    const paths = await call("GET", `/characters/${id}/paths`);
    const byId = new Map<string, { prerequisitesMet: boolean; requirement: string }>(
      paths.body.map((p: { id: string; prerequisitesMet: boolean; requirement: string }) => [p.id, p])
    );
    expect(byId.get("mystic")?.prerequisitesMet).toBe(true);
    expect(byId.get("defense")?.prerequisitesMet).toBe(false);
    expect(byId.get("defense")?.requirement).toBe("Need Endurance 15+ and one of [Might, Agility] 13+");

    const refused = await call("PUT", `/characters/${id}/path`, { pathId: "defense" });
    expect(refused.status).toBe(400);
    expect(refused.body.code).toBe("PrerequisitesNotMet");

    await call("PUT", `/characters/${id}/path`, { pathId: "mystic" });
    const done = await call("PUT", `/characters/${id}/background`, { backgroundId: "drifter" });
    expect(done.body).toMatchObject({ step: "complete", complete: true, levelled: false });
    expect(done.body.character).toMatchObject({
      race: "Elf",
      ancestry: "Sylari",
      profession: "Scholar",
      primaryPath: "Mystic",
      background: "Drifter",
    });
    expect(done.body.character.abilities.Intellect.total).toBe(16);

    const validation = await call("GET", `/characters/${id}/validation`);
    expect(validation.body).toEqual({ valid: true, errors: [], warnings: [], codes: [] });
  });

  it("reports rule errors with their code", async () => {
    const { body } = await call("POST", "/characters", {});
    const id: string = body.id;
    await call("PUT", `/characters/${id}/ability-scores`, { scores: SCORES });
    await call("PUT", `/characters/${id}/race`, { raceId: "elf" });
    await call("PUT", `/characters/${id}/ancestry`, { ancestryId: "sylari" });

    const duty = await call("PUT", `/characters/${id}/profession`, { professionId: "warrior" });
    expect(duty.status).toBe(400);
    expect(duty.body).toMatchObject({ code: "DutyRequired", error: "Profession Warrior requires a duty choice" });

    const choice = await call("POST", `/characters/${id}/choices`, { choiceType: "language", selections: ["Goblin"] });
    expect(choice.status).toBe(400);
    expect(choice.body).toMatchObject({ code: "NoPendingChoice", error: "No pending choice of type 'language'" });

    const missing = await call("PUT", `/characters/${id}/profession`, {});
    expect(missing.status).toBe(400);
    expect(missing.body.error).toBe("professionId is required");
  });

  it("refuses to level an unfinished character", async () => {
    const { body } = await call("POST", "/characters", {});
    const outcome = await call("POST", `/characters/${body.id}/level-up`, {});
    expect(outcome.status).toBe(400);
    expect(outcome.body).toMatchObject({ code: "StepOutOfOrder", error: "Finish character creation first" });
  });

  it("answers 404 for unknown sessions", async () => {
    expect(await call("GET", "/characters/missing")).toEqual({ status: 404, body: { error: "not found" } });
  });
});

describe("levelling through the API", () => {
  it("offers level-up options", async () => {
    const id = await createMystic();
    const { status, body } = await call("GET", `/characters/${id}/level-up`);
    expect(status).toBe(200);
    expect(body).toMatchObject({
      currentLevel: 1,
      targetLevel: 2,
      talentPoints: 8,
      advancementPoints: 3,
      minPrimaryPathPoints: 4,
      spellcraftingPoints: 5,
    });
  });

  it("answers 422 with every failure", async () => {
    const id = await createMystic();
    const { status, body } = await call("POST", `/characters/${id}/level-up`, {
      talents: [{ talentId: "arcane-focus", desiredNewRank: 1 }],
    });
    expect(status).toBe(422);
    expect(body).toEqual({
      error: "Must spend at least 4 TP in primary path (spent 1)",
      errors: ["Must spend at least 4 TP in primary path (spent 1)"],
      warnings: [],
      codes: ["BudgetExceeded"],
    });
  });

  it("rejects an ability increase with non-numeric points", async () => {
    const id = await createMystic();
    const { status, body } = await call("POST", `/characters/${id}/level-up`, {
      ...MYSTIC_LEVEL_TWO,
      abilityIncrease: { Might: "2" },
    });
    expect(status).toBe(422);
    expect(body.errors).toEqual(["Level 2 does not grant ability increase"]);
    expect(body.codes).toEqual(["InvalidAbilityIncrease"]);

    const sheet = await call("GET", `/characters/${id}`);
    expect(sheet.body.character.level).toBe(1);
  });

  it("answers 400 when the ability increase is not an object", async () => {
    const id = await createMystic();
    const { status, body } = await call("POST", `/characters/${id}/level-up`, {
      ...MYSTIC_LEVEL_TWO,
      abilityIncrease: "Might",
    });
    expect(status).toBe(400);
    expect(body.error).toBe("abilityIncrease must be an object of ability to points");
  });

  it("applies a level-up and closes the builder", async () => {
    const id = await createMystic();
    const { status, body } = await call("POST", `/characters/${id}/level-up`, MYSTIC_LEVEL_TWO);
    expect(status).toBe(200);
    expect(body.levelled).toBe(true);
    expect(body.character.level).toBe(2);
    expect(body.character.talents.map((t: { talentId: string; rank: number }) => [t.talentId, t.rank])).toEqual([
      ["arcane-focus", 2],
      ["mystic-ward", 1],
    ]);
    expect(body.character.combat.health).toEqual({ current: 11, max: 11 });
    expect(body.character.combat.spellcrafting).toEqual({ craftingPoints: 5, castingPointsMax: 5 });

    const rebuild = await call("PUT", `/characters/${id}/race`, { raceId: "elf" });
    expect(rebuild.status).toBe(400);
    expect(rebuild.body.error).toBe("Character creation is closed once the character has advanced");
  });

  it("awards experience", async () => {
    const id = await createMystic();
    await call("POST", `/characters/${id}/level-up`, MYSTIC_LEVEL_TWO);
    const { status, body } = await call("POST", `/characters/${id}/experience`, { amount: 500 });
    expect(status).toBe(200);
    expect(body.character.totalExperience).toBe(500);
    expect(body.progress).toMatchObject({
      level: 2,
      xp: 500,
      xpForNextLevel: 900,
      xpNeeded: 400,
      talentPointsPerLevel: 8,
      advancementPointsPerLevel: 3,
      primaryPath: "Mystic",
    });

    const bad = await call("POST", `/characters/${id}/experience`, { amount: 1.5 });
    expect(bad.status).toBe(400);
    expect(bad.body.error).toBe("Experience award must be a non-negative integer (got 1.5)");
  });

  it("deletes sessions", async () => {
    const id = await createMystic();
    expect((await call("DELETE", `/characters/${id}`)).status).toBe(204);
    expect((await call("GET", `/characters/${id}`)).status).toBe(404);
  });
});
