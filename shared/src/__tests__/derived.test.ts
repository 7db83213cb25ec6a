import { describe, expect, it } from "vitest";
import { abilityModifier, linkedAbility, SKILL_NAMES } from "../rules/abilities";
import { createCharacter, toCharacterRecord, trainSkill } from "../rules/character";
import { lifePointsFor, recalculateAll } from "../rules/derived";

describe("abilityModifier", () => {
  it("floors half the distance from 10", () => {
    expect(abilityModifier(10)).toBe(0);
    expect(abilityModifier(11)).toBe(0);
    expect(abilityModifier(15)).toBe(2);
    expect(abilityModifier(8)).toBe(-1);
    expect(abilityModifier(9)).toBe(-1);
    expect(abilityModifier(1)).toBe(-5);
  });

  it("links every skill to an ability", () => {
    expect(SKILL_NAMES).toHaveLength(21);
    expect(linkedAbility("Perception")).toBe("Wisdom");
    expect(linkedAbility("Athletics")).toBe("Might");
  });
});

describe("recalculateAll", () => {
  it("derives totals from roll, race and misc", () => {
    const character = createCharacter("Test");
    character.abilityScores.Agility = { ...character.abilityScores.Agility, roll: 14, race: 2, misc: 1 };
    const next = recalculateAll(character);

    expect(next.abilityScores.Agility.total).toBe(17);
    expect(next.abilityScores.Agility.modifier).toBe(3);
    expect(next.abilityScores.Agility.savingThrow).toBe(3);
    expect(next.initiative).toBe(3);
    expect(next.defense.total).toBe(12);
    expect(next.attackRanged.total).toBe(3);
    // input untouched
    expect(character.abilityScores.Agility.total).toBe(10);
  });

  it("is idempotent", () => {
    const character = createCharacter();
    character.abilityScores.Wisdom.roll = 15;
    trainSkill(character, "Perception");
    const once = recalculateAll(character);
    expect(recalculateAll(once)).toEqual(once);
  });

  it("feeds skill totals into passive scores", () => {
    const character = createCharacter();
    character.abilityScores.Wisdom.roll = 14;
    trainSkill(character, "Perception");
    character.skills.Perception.misc = 1;
    const next = recalculateAll(character);

    expect(next.skills.Perception.total).toBe(4);
    expect(next.passivePerception.total).toBe(14);
    expect(next.passiveInsight.total).toBe(12);
  });

  it("computes health only once base hit points are set", () => {
    const character = createCharacter();
    character.abilityScores.Endurance.roll = 14;
    expect(recalculateAll(character).health.max).toBe(0);

    character.health.baseHp = 6;
    character.health.levelBonus = 3;
    const next = recalculateAll(character);
    expect(next.health.max).toBe(11);
    expect(next.health.current).toBe(11);
  });

  it("clamps current health to max", () => {
    const character = createCharacter();
    character.health = { current: 40, max: 40, baseHp: 8, levelBonus: 0 };
    expect(recalculateAll(character).health).toEqual({ current: 8, max: 8, baseHp: 8, levelBonus: 0 });
  });
});

describe("lifePointsFor", () => {
  it("rounds odd Endurance down to the even step", () => {
    expect(lifePointsFor(13)).toBe(12);
    expect(lifePointsFor(16)).toBe(16);
    expect(lifePointsFor(1)).toBe(1);
  });
});

describe("toCharacterRecord", () => {
  it("reports unset selections as null", () => {
    const record = toCharacterRecord(recalculateAll(createCharacter("Nim")));
    expect(record.name).toBe("Nim");
    expect(record.race).toBeNull();
    expect(record.primaryPath).toBeNull();
    expect(record.combat.health).toEqual({ current: 0, max: 0 });
    expect(record.combat.lifePoints).toEqual({ current: 10, max: 10 });
  });
});
