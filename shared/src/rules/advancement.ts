/**
 * Advancement Engine
 *
 * Level-up planning, validation and application. A level-up is checked as a
 * whole and either applied in full or rejected with every collected error;
 * rule failures come back as results, never as exceptions.
 */

import { isAbilityName, isSkillName } from "./abilities";
import type { PathEntry, RulesCatalog } from "./catalog";
import { listEntries } from "./catalog";
import type { CharacterSheet } from "./character";
import { abilityTotals, addUnique, cloneCharacter, ownedTalentRanks, trainSkill, trainedSkills } from "./character";
import { recalculateInPlace } from "./derived";
import { applyTalentRank, checkTalentPrerequisites, talentRankCost } from "./entries";
import type { LevelSummary, ProgressionRules } from "./progression";
import { DEFAULT_PROGRESSION_RULES, getLevelSummary as baseLevelSummary } from "./progression";
import type {
  AbilityIncrease,
  AdvancementPlan,
  AdvancementPurchaseRequest,
  TalentBudget,
  TalentPurchasePlan,
  TalentPurchaseRequest,
  ValidationResult,
} from "./validation";
import {
  invalidResult,
  mergeResults,
  validResult,
  validateAbilityIncrease,
  validateAdvancementPurchases,
  validateTalentPurchases,
} from "./validation";

// ═══════════════════════════════════════════════════════════════════════════
// BUDGETS
// ═══════════════════════════════════════════════════════════════════════════

const primaryPathOf = (catalog: RulesCatalog, character: CharacterSheet): PathEntry | undefined => {
  const pathId = character.origin.primaryPath?.id;
  return pathId ? catalog.paths.get(pathId) : undefined;
};

/**
 * Talent points for one level: the primary path's talent attribute modifier
 * plus the base allowance. Shared by level-ups and the starting purchase.
 */
export function computeTalentBudget(
  catalog: RulesCatalog,
  character: CharacterSheet,
  rules: ProgressionRules = DEFAULT_PROGRESSION_RULES
): Omit<TalentBudget, "level"> {
  const path = primaryPathOf(catalog, character);
  const attribute = path?.talentPointsAttribute;
  const talentPoints = rules.baseTalentPoints + (attribute ? character.abilityScores[attribute].modifier : 0);
  return {
    talentPoints,
    minPrimaryPathPoints: path ? Math.min(rules.minPrimaryPathPoints, talentPoints) : 0,
    primaryPathId: path?.id,
  };
}

export const computeAdvancementPoints = (
  character: CharacterSheet,
  rules: ProgressionRules = DEFAULT_PROGRESSION_RULES
): number => Math.max(rules.minAdvancementPoints, character.abilityScores.Intellect.modifier);

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface AvailableTalent {
  talentId: string;
  name: string;
  pathId?: string;
  nextRank: number;
  cost: number;
  prerequisitesMet: boolean;
  reasons: string[];
}

export interface LevelUpOptions {
  currentLevel: number;
  targetLevel: number;
  talentPoints: number;
  advancementPoints: number;
  minPrimaryPathPoints: number;
  grantsAbilityIncrease: boolean;
  grantsExtraAttack: boolean;
  spellcraftingPoints: number;
  castingPointsIncrease: number;
  currentTalents: Record<string, number>;
  trainedSkills: string[];
  availableTalents: AvailableTalent[];
}

export interface LevelUpRequest {
  targetLevel?: number;
  talents: TalentPurchaseRequest[];
  advancements: AdvancementPurchaseRequest[];
  abilityIncrease?: AbilityIncrease;
  hpRoll?: number;
}

export interface LevelUpResult {
  success: boolean;
  character: CharacterSheet;
  validation: ValidationResult;
}

export interface ProgressSummary extends LevelSummary {
  talentPointsPerLevel: number;
  advancementPointsPerLevel: number;
}

interface LevelUpPlan {
  options: LevelUpOptions;
  result: ValidationResult;
  talents: TalentPurchasePlan;
  advancements: AdvancementPlan;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════

export class AdvancementEngine {
  constructor(
    private readonly catalog: RulesCatalog,
    private readonly rules: ProgressionRules = DEFAULT_PROGRESSION_RULES
  ) {}

  getLevelUpOptions(character: CharacterSheet, targetLevel = character.level + 1): LevelUpOptions {
    const budget = computeTalentBudget(this.catalog, character, this.rules);
    const path = primaryPathOf(this.catalog, character);
    const spellcrafting = path?.spellcasting ? character.abilityScores.Intellect.modifier + targetLevel : 0;
    const owned = ownedTalentRanks(character);
    const totals = abilityTotals(character);

    const availableTalents = listEntries(this.catalog, "talent")
      .filter((talent) => (owned.get(talent.id) ?? 0) < talent.maxRank)
      .map((talent): AvailableTalent => {
        const nextRank = (owned.get(talent.id) ?? 0) + 1;
        const outcome = checkTalentPrerequisites(
          talent,
          { totals, level: targetLevel, ownedRanks: owned, targetRank: nextRank },
          this.catalog
        );
        return {
          talentId: talent.id,
          name: talent.name,
          pathId: talent.pathId,
          nextRank,
          cost: talentRankCost(nextRank),
          prerequisitesMet: outcome.met,
          reasons: outcome.reasons,
        };
      });

    return {
      currentLevel: character.level,
      targetLevel,
      talentPoints: budget.talentPoints,
      advancementPoints: computeAdvancementPoints(character, this.rules),
      minPrimaryPathPoints: budget.minPrimaryPathPoints,
      grantsAbilityIncrease: this.rules.abilityIncreaseLevels.has(targetLevel),
      grantsExtraAttack: this.rules.extraAttackLevels.has(targetLevel),
      spellcraftingPoints: spellcrafting,
      castingPointsIncrease: spellcrafting,
      currentTalents: Object.fromEntries(owned),
      trainedSkills: trainedSkills(character),
      availableTalents,
    };
  }

  private plan(character: CharacterSheet, request: LevelUpRequest): LevelUpPlan {
    const expected = character.level + 1;
    const targetLevel = request.targetLevel ?? expected;
    const options = this.getLevelUpOptions(character, targetLevel);
    const results: ValidationResult[] = [];

    if (targetLevel !== expected) {
      results.push(invalidResult("InvalidInput", `Target level must be ${expected} (got ${targetLevel})`));
    }
    if (request.hpRoll !== undefined && (!Number.isInteger(request.hpRoll) || request.hpRoll < 1)) {
      results.push(invalidResult("InvalidInput", "HP roll must be a positive integer"));
    }

    const talents = validateTalentPurchases(this.catalog, character, request.talents, {
      talentPoints: options.talentPoints,
      minPrimaryPathPoints: options.minPrimaryPathPoints,
      level: targetLevel,
      primaryPathId: character.origin.primaryPath?.id,
    });
    const advancements = validateAdvancementPurchases(
      this.catalog,
      character,
      request.advancements,
      options.advancementPoints,
      this.rules.advancementCosts
    );
    results.push(
      talents.result,
      advancements.result,
      validateAbilityIncrease(request.abilityIncrease, targetLevel, options.grantsAbilityIncrease)
    );

    return { options, result: mergeResults(validResult(), ...results), talents, advancements };
  }

  validateLevelUp(character: CharacterSheet, request: LevelUpRequest): ValidationResult {
    return this.plan(character, request).result;
  }

  levelUp(character: CharacterSheet, request: LevelUpRequest): LevelUpResult {
    const { options, result, talents, advancements } = this.plan(character, request);
    if (!result.valid) {
      return { success: false, character, validation: result };
    }

    let next = cloneCharacter(character);
    next.level = options.targetLevel;

    for (const [ability, value] of Object.entries(request.abilityIncrease ?? {})) {
      if (isAbilityName(ability)) next.abilityScores[ability].misc += value;
    }
    recalculateInPlace(next);

    next = talents.purchases.reduce(
      (sheet, purchase) => applyTalentRank(sheet, purchase.talent, purchase.newRank, purchase.choiceData),
      next
    );

    for (const { choiceType, target } of advancements.purchases) {
      switch (choiceType) {
        case "skill_rank":
          if (isSkillName(target)) next.skills[target].rank += 1;
          break;
        case "train_skill":
          if (isSkillName(target)) trainSkill(next, target);
          break;
        case "inherit_gold":
          next.gold += this.rules.inheritGoldAmount;
          break;
        case "proficiency":
          addUnique(next.proficiencies, target);
          break;
        case "language":
          addUnique(next.languages, target);
          break;
      }
    }
    recalculateInPlace(next);

    const hpGain = Math.max(1, (request.hpRoll ?? this.rules.averageHpRoll) + next.abilityScores.Endurance.modifier);
    next.health.levelBonus += hpGain;

    if (options.spellcraftingPoints > 0) {
      next.spellcrafting.craftingPoints += options.spellcraftingPoints;
      next.spellcrafting.castingPointsMax += options.castingPointsIncrease;
    }

    if (options.grantsExtraAttack) {
      next.features.push({
        name: `Extra Attack (${options.targetLevel})`,
        text: `You can attack twice when you take the Attack action (gained at level ${options.targetLevel}).`,
        source: "Level Up",
      });
    }

    recalculateInPlace(next);
    next.health.current = next.health.max;
    return { success: true, character: next, validation: result };
  }

  /**
   * One request per level, in order. Stops at the first failure and returns
   * the untouched input with that level's validation.
   */
  levelUpMultiple(character: CharacterSheet, requests: readonly LevelUpRequest[]): LevelUpResult {
    let current = character;
    let validation = validResult();
    for (const request of requests) {
      const outcome = this.levelUp(current, request);
      if (!outcome.success) {
        return { success: false, character, validation: outcome.validation };
      }
      current = outcome.character;
      validation = mergeResults(validation, outcome.validation);
    }
    return { success: true, character: current, validation };
  }

  getLevelSummary(character: CharacterSheet): ProgressSummary {
    return {
      ...baseLevelSummary(character),
      talentPointsPerLevel: computeTalentBudget(this.catalog, character, this.rules).talentPoints,
      advancementPointsPerLevel: computeAdvancementPoints(character, this.rules),
    };
  }
}
