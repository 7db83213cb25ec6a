// Types for file-based content packs (YAML/JSON). These mirror the rules
// catalog but are optimized for authoring by hand: entries are keyed by
// `key`, most fields are optional and talent ranks are a plain list.

import type { AbilityName } from "@shared/rules/abilities";

export interface ContentRuleset {
  key: string;
  name: string;
  description?: string;
}

export interface ContentFeature {
  name: string;
  description: string;
}

export interface ContentChoice {
  count: number;
  options: string[];
}

export interface ContentSkillChoice {
  count: number;
  options: string[] | "any";
}

export type ContentAbilityValues = Partial<Record<AbilityName, number>>;

export interface ContentRace {
  key: string;
  name: string;
  description?: string;
  creatureType?: string;
  size?: string;
  speed?: number;
  darkvision?: number;
  languages?: string[];
  bonusLanguageChoices?: number;
  abilityModifiers?: ContentAbilityValues;
  /** e.g. "human_core" for the +1 / +2-and-1 human choice */
  flexibleAbilityAdjustment?: string;
  skillProficiencies?: string[];
  skillBonuses?: Record<string, number>;
  skillChoices?: ContentSkillChoice;
  features?: ContentFeature[];
}

export interface ContentAncestry {
  key: string;
  raceKey: string;
  name: string;
  description?: string;
  region?: string;
  abilityModifiers?: ContentAbilityValues;
  languages?: string[];
  languageChoices?: ContentChoice;
  skillProficiencies?: string[];
  skillBonuses?: Record<string, number>;
  toolProficiencies?: string[];
  features?: ContentFeature[];
  reputation?: { region: string; value: number };
}

export interface ContentDuty {
  key: string;
  name: string;
  description?: string;
  armorProficiencies?: string[];
  weaponProficiencies?: string[];
  skillChoices?: ContentChoice;
  toolChoices?: ContentChoice;
  suggestedPaths?: string[];
  equipment?: string[];
}

export interface ContentProfession {
  key: string;
  name: string;
  description?: string;
  baseHp: number;
  feature?: ContentFeature;
  armorProficiencies?: string[];
  weaponProficiencies?: string[];
  toolProficiencies?: string[];
  skillChoices?: ContentChoice;
  toolChoices?: ContentChoice;
  suggestedPaths?: string[];
  equipment?: string[];
  duties?: ContentDuty[];
}

export interface ContentPathPrerequisites {
  primary: { attribute: AbilityName; minimum: number };
  secondary: { options: AbilityName[]; minimum: number };
}

export interface ContentPath {
  key: string;
  name: string;
  description?: string;
  role?: string;
  prerequisites?: ContentPathPrerequisites;
  primaryBonus?: ContentAbilityValues;
  talentPointsAttribute?: AbilityName;
  attackBonusMelee?: number;
  attackBonusRanged?: number;
  spellcasting?: boolean;
  features?: ContentFeature[];
}

export interface ContentPersonalityEntry {
  roll: number;
  text: string;
  morality?: number;
  reputation?: number;
}

export interface ContentPersonality {
  traits: ContentPersonalityEntry[];
  ideals: ContentPersonalityEntry[];
  bonds: ContentPersonalityEntry[];
  flaws: ContentPersonalityEntry[];
}

export interface ContentBackground {
  key: string;
  name: string;
  description?: string;
  skillProficiencies?: string[];
  toolProficiencies?: string[];
  languagesGranted?: number;
  equipment?: string[];
  feature?: ContentFeature;
  personality?: ContentPersonality;
}

export interface ContentTalentPrerequisites {
  abilities?: ContentAbilityValues;
  mode?: "and" | "or";
  /** Character level required to buy a rank, keyed by rank */
  levelByRank?: Record<string, number>;
  talents?: string[];
  allPathTalents?: boolean;
}

export interface ContentTalent {
  key: string;
  name: string;
  description?: string;
  /** Omitted for general talents */
  pathKey?: string;
  /** Rank descriptions; the list length is the max rank */
  ranks: string[];
  isPrimary?: boolean;
  isCapstone?: boolean;
  choice?: { type?: string; options?: string[] };
  weaponRequirement?: string;
  prerequisites?: ContentTalentPrerequisites;
}

export interface ContentPack {
  ruleset: ContentRuleset;
  languages?: string[];
  races: ContentRace[];
  ancestries: ContentAncestry[];
  professions: ContentProfession[];
  paths: ContentPath[];
  backgrounds: ContentBackground[];
  talents: ContentTalent[];
}
