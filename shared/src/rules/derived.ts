/**
 * Derived-stat recalculation.
 *
 * Every derived value is a function of the sheet's core fields, so running
 * this twice in a row yields the same sheet.
 */

import { ABILITY_NAMES, SKILL_NAMES, abilityModifier, linkedAbility } from "./abilities";
import type { AbilityScore, CharacterSheet, PassiveStat } from "./character";
import { cloneCharacter } from "./character";

export function refreshAbility(score: AbilityScore): void {
  score.total = score.roll + score.race + score.misc;
  score.modifier = abilityModifier(score.total);
  score.savingThrow = score.modifier;
}

const refreshPassive = (stat: PassiveStat, skillTotal: number): void => {
  stat.skill = skillTotal;
  stat.total = stat.base + stat.skill + stat.misc;
};

/** Life points follow the Endurance table, which rounds odd scores down. */
export const lifePointsFor = (enduranceTotal: number): number => Math.max(1, Math.floor(enduranceTotal / 2) * 2);

/** Recalculate in place. Callers own the sheet they pass. */
export function recalculateInPlace(character: CharacterSheet): void {
  const abilities = character.abilityScores;
  for (const ability of ABILITY_NAMES) {
    refreshAbility(abilities[ability]);
  }

  for (const skill of SKILL_NAMES) {
    const entry = character.skills[skill];
    entry.modifier = abilities[linkedAbility(skill)].modifier;
    entry.total = entry.modifier + entry.rank + entry.misc;
  }

  const { attackMelee, attackRanged, defense } = character;
  attackMelee.attr = abilities.Might.modifier;
  attackMelee.total = attackMelee.attr + attackMelee.misc;
  attackRanged.attr = abilities.Agility.modifier;
  attackRanged.total = attackRanged.attr + attackRanged.misc;

  defense.agility = abilities.Agility.modifier;
  defense.total = defense.base + defense.agility + defense.shield + defense.misc;

  character.initiative = abilities.Agility.modifier;

  refreshPassive(character.passivePerception, character.skills.Perception.total);
  refreshPassive(character.passiveInsight, character.skills.Insight.total);

  const lifePoints = lifePointsFor(abilities.Endurance.total);
  character.lifePoints = { current: lifePoints, max: lifePoints };

  const health = character.health;
  if (health.baseHp > 0) {
    health.max = health.baseHp + abilities.Endurance.modifier + health.levelBonus;
    if (health.current > health.max || health.current <= 0) {
      health.current = health.max;
    }
  }
}

export function recalculateAll(character: CharacterSheet): CharacterSheet {
  const next = cloneCharacter(character);
  recalculateInPlace(next);
  return next;
}
