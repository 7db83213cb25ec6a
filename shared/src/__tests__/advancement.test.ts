import { describe, expect, it } from "vitest";
import { AdvancementEngine } from "../rules/advancement";
import type { LevelUpRequest } from "../rules/advancement";
import { CharacterBuilder } from "../rules/builder";
import type { CharacterSheet } from "../rules/character";
import { cloneCharacter } from "../rules/character";
import { talentCostBetween } from "../rules/entries";
import { DEFAULT_PROGRESSION_RULES } from "../rules/progression";
import { createTestCatalog, SCHOLAR_SCORES } from "../test-utils/catalog";

const catalog = createTestCatalog();
const engine = new AdvancementEngine(catalog);

/**
 * Elf / Sylari / Scholar / Skirmisher / Drifter. Agility 14 gives a +2
 * talent attribute, so 7 TP per level with a 4 TP primary minimum.
 */
function buildSkirmisher(level = 1): CharacterSheet {
  const builder = new CharacterBuilder(catalog, { characterName: "Vess" });
  builder.setAbilityScores({ Might: 10, Agility: 12, Endurance: 13, Intellect: 12, Wisdom: 12, Charisma: 8 });
  builder.setRace("elf");
  builder.setAncestry("sylari");
  builder.setProfession("scholar");
  builder.resolveChoice("skill", ["Arcana", "History"]);
  builder.setPath("skirmisher");
  builder.setBackground("drifter");
  const character = builder.getCharacter();
  character.level = level;
  return character;
}

function buildMystic(): CharacterSheet {
  const builder = new CharacterBuilder(catalog);
  builder.setAbilityScores({ ...SCHOLAR_SCORES });
  builder.setRace("elf");
  builder.setAncestry("sylari");
  builder.setProfession("scholar");
  builder.resolveChoice("skill", ["Arcana", "History"]);
  builder.setPath("mystic");
  return builder.getCharacter();
}

const request = (overrides: Partial<LevelUpRequest> = {}): LevelUpRequest => ({
  talents: [],
  advancements: [],
  ...overrides,
});

describe("getLevelUpOptions", () => {
  it("computes point budgets and level flags", () => {
    const options = engine.getLevelUpOptions(buildSkirmisher());
    expect(options).toMatchObject({
      currentLevel: 1,
      targetLevel: 2,
      talentPoints: 7,
      advancementPoints: 2,
      minPrimaryPathPoints: 4,
      grantsAbilityIncrease: false,
      grantsExtraAttack: false,
      spellcraftingPoints: 0,
      currentTalents: {},
    });
    expect(options.trainedSkills).toEqual(["Arcana", "History", "Perception", "Survival"]);
  });

  it("explains which talents are out of reach", () => {
    const { availableTalents } = engine.getLevelUpOptions(buildSkirmisher());
    const byId = new Map(availableTalents.map((t) => [t.talentId, t]));
    expect(byId.get("arcane-focus")).toEqual({
      talentId: "arcane-focus",
      name: "Arcane Focus",
      pathId: "mystic",
      nextRank: 1,
      cost: 1,
      prerequisitesMet: false,
      reasons: ["Need Intellect 13+, have 12"],
    });
    expect(byId.get("archmage")?.reasons).toEqual(["Requires all other mystic talents"]);
    expect(byId.get("quick-step")?.prerequisitesMet).toBe(true);
  });

  it("grants spellcrafting points to casters", () => {
    const options = engine.getLevelUpOptions(buildMystic());
    expect(options.talentPoints).toBe(8);
    expect(options.spellcraftingPoints).toBe(5);
    expect(options.castingPointsIncrease).toBe(5);
  });
});

describe("levelUp: validation", () => {
  it("requires primary path spending and the level 4 ability increase", () => {
    const character = buildSkirmisher(3);
    const outcome = engine.levelUp(
      character,
      request({
        talents: [
          { talentId: "shield-wall", desiredNewRank: 1 },
          { talentId: "shield-wall", desiredNewRank: 2 },
        ],
      })
    );

    expect(outcome.success).toBe(false);
    expect(outcome.character).toBe(character);
    expect(outcome.validation.errors).toEqual([
      "Must spend at least 4 TP in primary path (spent 0)",
      "Level 4 requires an ability increase choice",
    ]);
    expect(outcome.validation.codes).toEqual(["BudgetExceeded", "InvalidAbilityIncrease"]);
  });

  it("leaves the character untouched when talents overspend", () => {
    const character = buildSkirmisher();
    const before = structuredClone(character);
    const outcome = engine.levelUp(
      character,
      request({
        talents: [
          { talentId: "quick-step", desiredNewRank: 1 },
          { talentId: "quick-step", desiredNewRank: 2 },
          { talentId: "quick-step", desiredNewRank: 3 },
          { talentId: "toughness", desiredNewRank: 1 },
          { talentId: "toughness", desiredNewRank: 2 },
        ],
      })
    );

    expect(outcome.success).toBe(false);
    expect(outcome.validation.errors).toContain("Spent 9 TP but only have 7");
    expect(outcome.validation.codes).toContain("BudgetExceeded");
    expect(character).toEqual(before);
  });

  it("rejects retraining a skill but allows raising its rank", () => {
    const character = buildSkirmisher();
    const retrain = engine.validateLevelUp(character, request({ advancements: [{ choiceType: "train_skill", target: "Perception" }] }));
    expect(retrain.errors).toEqual(["Already trained in Perception"]);
    expect(retrain.codes).toEqual(["AlreadyPossessed"]);

    const before = character.skills.Perception.total;
    const outcome = engine.levelUp(character, request({ advancements: [{ choiceType: "skill_rank", target: "Perception" }] }));
    expect(outcome.success).toBe(true);
    expect(outcome.character.skills.Perception.total).toBe(before + 1);
  });

  it("collects every failure", () => {
    const validation = engine.validateLevelUp(
      buildSkirmisher(),
      request({
        targetLevel: 5,
        hpRoll: 0,
        talents: [{ talentId: "quick-step", desiredNewRank: 2 }],
        advancements: [{ choiceType: "inherit_gold", target: "" }],
      })
    );
    expect(validation.errors).toEqual([
      "Target level must be 2 (got 5)",
      "HP roll must be a positive integer",
      "Quick Step: Rank 2 requires rank 1 first",
      "Must spend at least 4 TP in primary path (spent 0)",
      "Spent 5 AP but only have 2",
    ]);
  });

  it("enforces the talent budget and pools", () => {
    const character = buildSkirmisher();
    const overspent = engine.validateLevelUp(
      character,
      request({
        talents: [
          { talentId: "quick-step", desiredNewRank: 1 },
          { talentId: "quick-step", desiredNewRank: 2 },
          { talentId: "quick-step", desiredNewRank: 3 },
          { talentId: "toughness", desiredNewRank: 1 },
          { talentId: "toughness", desiredNewRank: 2 },
        ],
      })
    );
    expect(overspent.errors).toEqual(["Spent 9 TP but only have 7"]);

    const wrongPool = engine.validateLevelUp(
      character,
      request({ talents: [{ talentId: "quick-step", desiredNewRank: 1, pathId: "mystic" }] })
    );
    expect(wrongPool.errors).toEqual([
      "Quick Step belongs to skirmisher talents, not mystic",
      "Must spend at least 4 TP in primary path (spent 1)",
    ]);
  });

  it("checks talent choices", () => {
    const character = buildSkirmisher();
    const missing = engine.validateLevelUp(character, request({ talents: [{ talentId: "weapon-focus", desiredNewRank: 1 }] }));
    expect(missing.errors).toContain("Weapon Focus requires a choice of weapon");

    const invalid = engine.validateLevelUp(
      character,
      request({ talents: [{ talentId: "weapon-focus", desiredNewRank: 1, choiceData: "Spear" }] })
    );
    expect(invalid.errors).toContain("Invalid choice 'Spear' for Weapon Focus. Options: Sword, Axe, Bow");
  });
});

describe("levelUp: application", () => {
  it("applies talents, the ability increase and hit points", () => {
    const character = buildSkirmisher(3);
    const snapshot = cloneCharacter(character);
    const outcome = engine.levelUp(
      character,
      request({
        talents: [
          { talentId: "quick-step", desiredNewRank: 1 },
          { talentId: "quick-step", desiredNewRank: 2 },
          { talentId: "quick-step", desiredNewRank: 3 },
        ],
        abilityIncrease: { Agility: 1, Endurance: 1 },
        hpRoll: 4,
      })
    );

    expect(outcome.success).toBe(true);
    const next = outcome.character;
    expect(next.level).toBe(4);
    expect(next.talents).toEqual([{ talentId: "quick-step", name: "Quick Step", rank: 3, pathId: "skirmisher", choiceData: undefined }]);
    expect(next.abilityScores.Agility.total).toBe(15);
    expect(next.abilityScores.Endurance.total).toBe(14);
    expect(next.health).toEqual({ current: 14, max: 14, baseHp: 6, levelBonus: 6 });
    expect(character).toEqual(snapshot);
  });

  it("stores a talent choice", () => {
    const outcome = engine.levelUp(
      buildSkirmisher(),
      request({
        talents: [
          { talentId: "weapon-focus", desiredNewRank: 1, choiceData: "Sword" },
          { talentId: "quick-step", desiredNewRank: 1 },
          { talentId: "quick-step", desiredNewRank: 2 },
          { talentId: "quick-step", desiredNewRank: 3 },
        ],
      })
    );
    expect(outcome.validation.errors).toEqual([]);
    expect(outcome.character.talents[0]).toEqual({
      talentId: "weapon-focus",
      name: "Weapon Focus",
      rank: 1,
      pathId: undefined,
      choiceData: "Sword",
    });
  });

  it("grants Extra Attack at level 3 with average hit points", () => {
    const outcome = engine.levelUp(buildSkirmisher(2), request());
    expect(outcome.success).toBe(true);
    expect(outcome.character.features).toContainEqual({
      name: "Extra Attack (3)",
      text: "You can attack twice when you take the Attack action (gained at level 3).",
      source: "Level Up",
    });
    expect(outcome.character.health.max).toBe(13);
  });

  it("adds spellcrafting points for casters", () => {
    const outcome = engine.levelUp(buildMystic(), request());
    expect(outcome.character.spellcrafting).toEqual({ craftingPoints: 5, castingPointsMax: 5 });
  });

  it("pays out inherited gold", () => {
    const generous = new AdvancementEngine(catalog, { ...DEFAULT_PROGRESSION_RULES, minAdvancementPoints: 5 });
    const outcome = generous.levelUp(buildSkirmisher(), request({ advancements: [{ choiceType: "inherit_gold", target: "" }] }));
    expect(outcome.success).toBe(true);
    expect(outcome.character.gold).toBe(50);
  });
});

describe("levelUpMultiple", () => {
  it("applies one request per level", () => {
    const outcome = engine.levelUpMultiple(buildSkirmisher(), [request(), request()]);
    expect(outcome.success).toBe(true);
    expect(outcome.character.level).toBe(3);
    expect(outcome.character.features.map((f) => f.name)).toContain("Extra Attack (3)");
  });

  it("returns the untouched input when any level fails", () => {
    const character = buildSkirmisher(2);
    const outcome = engine.levelUpMultiple(character, [request(), request()]);
    expect(outcome.success).toBe(false);
    expect(outcome.character).toBe(character);
    expect(outcome.validation.errors).toEqual(["Level 4 requires an ability increase choice"]);
  });
});

describe("getLevelSummary", () => {
  it("adds per-level points to the experience summary", () => {
    const summary = engine.getLevelSummary(buildSkirmisher());
    expect(summary).toMatchObject({
      level: 1,
      xp: 0,
      xpForNextLevel: 300,
      xpNeeded: 300,
      talentPointsPerLevel: 7,
      advancementPointsPerLevel: 2,
      primaryPath: "Skirmisher",
    });
  });
});

describe("talentCostBetween", () => {
  it("charges R(R+1)/2 for ranks 1 through R", () => {
    for (const rank of [1, 2, 3, 4, 5]) {
      expect(talentCostBetween(0, rank)).toBe((rank * (rank + 1)) / 2);
    }
  });

  it("charges only the ranks above the current one", () => {
    expect(talentCostBetween(1, 3)).toBe(5);
    expect(talentCostBetween(2, 2)).toBe(0);
  });
});
