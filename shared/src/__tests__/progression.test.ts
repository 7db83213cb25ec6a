import { describe, expect, it } from "vitest";
import { createCharacter } from "../rules/character";
import { RulesError } from "../rules/errors";
import { awardExperience, getLevelSummary, levelForXp, xpForLevel, xpToNextLevel } from "../rules/progression";

describe("experience table", () => {
  it("maps levels to cumulative thresholds", () => {
    expect(xpForLevel(1)).toBe(0);
    expect(xpForLevel(2)).toBe(300);
    expect(xpForLevel(5)).toBe(7000);
    expect(xpForLevel(20)).toBe(400000);
    expect(xpForLevel(21)).toBe(443000);
  });

  it("maps experience back to a level", () => {
    expect(levelForXp(0)).toBe(1);
    expect(levelForXp(299)).toBe(1);
    expect(levelForXp(300)).toBe(2);
    expect(levelForXp(48999)).toBe(8);
    expect(levelForXp(400000)).toBe(20);
    expect(levelForXp(443000)).toBe(21);
  });

  it("reports the step to the next level", () => {
    expect(xpToNextLevel(1)).toBe(300);
    expect(xpToNextLevel(4)).toBe(4000);
    expect(xpToNextLevel(25)).toBe(43000);
  });
});

describe("awardExperience", () => {
  it("adds experience without levelling", () => {
    const character = createCharacter("Test");
    const next = awardExperience(character, 350);
    expect(next.totalExperience).toBe(350);
    expect(next.level).toBe(1);
    expect(character.totalExperience).toBe(0);
  });

  it("rejects negative or fractional awards", () => {
    expect(() => awardExperience(createCharacter(), -5)).toThrow(RulesError);
    expect(() => awardExperience(createCharacter(), 1.5)).toThrow(
      "Experience award must be a non-negative integer (got 1.5)"
    );
  });
});

describe("getLevelSummary", () => {
  it("reports progress toward the next level", () => {
    const character = createCharacter();
    character.level = 2;
    character.totalExperience = 1000;
    expect(getLevelSummary(character)).toEqual({
      level: 2,
      xp: 1000,
      xpForCurrentLevel: 300,
      xpForNextLevel: 900,
      xpNeeded: 0,
      xpProgress: 700,
      xpRequired: 600,
      earnedLevel: 3,
      primaryPath: null,
    });
  });
});
