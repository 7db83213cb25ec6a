/**
 * Progression tables: experience thresholds, level features and the
 * per-level point costs used by the advancement engine.
 */

import type { CharacterSheet } from "./character";
import { cloneCharacter } from "./character";
import { RulesError } from "./errors";

// Cumulative XP required to reach each level
export const XP_TABLE: Readonly<Record<number, number>> = {
  1: 0,
  2: 300,
  3: 900,
  4: 3000,
  5: 7000,
  6: 13000,
  7: 22000,
  8: 34000,
  9: 49000,
  10: 67000,
  11: 88000,
  12: 112000,
  13: 139000,
  14: 169000,
  15: 202000,
  16: 238000,
  17: 277000,
  18: 317000,
  19: 358000,
  20: 400000,
};

export const MAX_TABLE_LEVEL = 20;
export const XP_PER_LEVEL_BEYOND_TABLE = 43000;

export type AdvancementType = "skill_rank" | "train_skill" | "inherit_gold" | "proficiency" | "language";

export const ADVANCEMENT_COSTS: Readonly<Record<AdvancementType, number>> = {
  skill_rank: 1,
  train_skill: 4,
  inherit_gold: 5,
  proficiency: 10,
  language: 10,
};

export const isAdvancementType = (value: string): value is AdvancementType =>
  Object.prototype.hasOwnProperty.call(ADVANCEMENT_COSTS, value);

export interface ProgressionRules {
  abilityIncreaseLevels: ReadonlySet<number>;
  extraAttackLevels: ReadonlySet<number>;
  baseTalentPoints: number;
  minAdvancementPoints: number;
  /** Cap on the talent points that must go to the primary path each level */
  minPrimaryPathPoints: number;
  averageHpRoll: number;
  inheritGoldAmount: number;
  advancementCosts: Readonly<Record<AdvancementType, number>>;
}

export const DEFAULT_PROGRESSION_RULES: ProgressionRules = {
  abilityIncreaseLevels: new Set([4, 8, 12, 16]),
  extraAttackLevels: new Set([3, 9]),
  baseTalentPoints: 5,
  minAdvancementPoints: 2,
  minPrimaryPathPoints: 4,
  averageHpRoll: 5,
  inheritGoldAmount: 50,
  advancementCosts: ADVANCEMENT_COSTS,
};

// ═══════════════════════════════════════════════════════════════════════════
// EXPERIENCE
// ═══════════════════════════════════════════════════════════════════════════

export function xpForLevel(level: number): number {
  if (level <= 1) return 0;
  if (level <= MAX_TABLE_LEVEL) return XP_TABLE[level] ?? 0;
  return XP_TABLE[MAX_TABLE_LEVEL] + (level - MAX_TABLE_LEVEL) * XP_PER_LEVEL_BEYOND_TABLE;
}

export const xpToNextLevel = (level: number): number => xpForLevel(Math.max(1, level) + 1) - xpForLevel(Math.max(1, level));

export function levelForXp(xp: number): number {
  const cap = XP_TABLE[MAX_TABLE_LEVEL];
  if (xp >= cap) {
    return MAX_TABLE_LEVEL + Math.floor((xp - cap) / XP_PER_LEVEL_BEYOND_TABLE);
  }
  let level = 1;
  for (let candidate = 2; candidate <= MAX_TABLE_LEVEL; candidate++) {
    if (xp < XP_TABLE[candidate]) break;
    level = candidate;
  }
  return level;
}

/** Adds experience without levelling; level-ups stay an explicit step. */
export function awardExperience(character: CharacterSheet, amount: number): CharacterSheet {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new RulesError("InvalidInput", `Experience award must be a non-negative integer (got ${amount})`);
  }
  const next = cloneCharacter(character);
  next.totalExperience += amount;
  return next;
}

export interface LevelSummary {
  level: number;
  xp: number;
  xpForCurrentLevel: number;
  xpForNextLevel: number;
  xpNeeded: number;
  xpProgress: number;
  xpRequired: number;
  /** Level the accumulated XP would support */
  earnedLevel: number;
  primaryPath: string | null;
}

export function getLevelSummary(character: CharacterSheet): LevelSummary {
  const { level, totalExperience: xp } = character;
  const xpForCurrentLevel = xpForLevel(level);
  const xpForNextLevel = xpForLevel(level + 1);
  return {
    level,
    xp,
    xpForCurrentLevel,
    xpForNextLevel,
    xpNeeded: Math.max(0, xpForNextLevel - xp),
    xpProgress: xp - xpForCurrentLevel,
    xpRequired: xpForNextLevel - xpForCurrentLevel,
    earnedLevel: levelForXp(xp),
    primaryPath: character.origin.primaryPath?.name ?? null,
  };
}
