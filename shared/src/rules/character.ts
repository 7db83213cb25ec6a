/**
 * Character Aggregate
 *
 * The in-progress (or finished) character. Engine code never mutates a sheet
 * it was handed; it works on a clone and returns it.
 */

import type { AbilityName, SkillName } from "./abilities";
import { ABILITY_NAMES, INITIAL_ABILITY_ROLL, SKILL_NAMES, abilityModifier } from "./abilities";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface AbilityScore {
  roll: number;
  race: number;
  misc: number;
  total: number;
  modifier: number;
  savingThrow: number;
}

export interface SkillEntry {
  trained: boolean;
  rank: number;
  misc: number;
  modifier: number;
  total: number;
}

export interface OwnedTalent {
  talentId: string;
  name: string;
  rank: number;
  pathId?: string;
  choiceData?: string;
}

export interface FeatureNote {
  name: string;
  text: string;
  source?: string;
}

export interface CatalogSelection {
  id: string;
  name: string;
}

export interface CharacterOrigin {
  race?: CatalogSelection;
  ancestry?: CatalogSelection;
  profession?: CatalogSelection;
  duty?: CatalogSelection;
  primaryPath?: CatalogSelection;
  background?: CatalogSelection;
}

export interface AttackModifier {
  attr: number;
  misc: number;
  total: number;
}

export interface PassiveStat {
  base: number;
  skill: number;
  misc: number;
  total: number;
}

export interface Pool {
  current: number;
  max: number;
}

export interface HealthPool extends Pool {
  /** Profession base hit points; zero until a profession is chosen */
  baseHp: number;
  /** Hit points accumulated from level-ups */
  levelBonus: number;
}

export interface Defense {
  base: number;
  agility: number;
  shield: number;
  misc: number;
  total: number;
}

export interface ScaleValue {
  value: number;
  modifier: number;
}

export interface Personality {
  traits: string;
  ideal: string;
  bond: string;
  flaw: string;
}

export interface CharacterSheet {
  name: string;
  level: number;
  totalExperience: number;
  storedAdvance: string;
  gold: number;
  origin: CharacterOrigin;
  creatureType: string;
  size: string;
  speed: number;
  darkvision: number;
  abilityScores: Record<AbilityName, AbilityScore>;
  skills: Record<SkillName, SkillEntry>;
  languages: string[];
  proficiencies: string[];
  talents: OwnedTalent[];
  features: FeatureNote[];
  defense: Defense;
  attackMelee: AttackModifier;
  attackRanged: AttackModifier;
  passivePerception: PassiveStat;
  passiveInsight: PassiveStat;
  initiative: number;
  health: HealthPool;
  lifePoints: Pool;
  armorHp: Pool;
  spellcrafting: { craftingPoints: number; castingPointsMax: number };
  personality: Personality;
  alignment: ScaleValue;
  reputation: ScaleValue;
}

export interface SheetConstants {
  defenseBase: number;
  passiveBase: number;
}

export const DEFENSE_BASE = 9;
export const PASSIVE_BASE = 10;

export const DEFAULT_SHEET_CONSTANTS: SheetConstants = {
  defenseBase: DEFENSE_BASE,
  passiveBase: PASSIVE_BASE,
};

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

const blankAbility = (): AbilityScore => {
  const modifier = abilityModifier(INITIAL_ABILITY_ROLL);
  return { roll: INITIAL_ABILITY_ROLL, race: 0, misc: 0, total: INITIAL_ABILITY_ROLL, modifier, savingThrow: modifier };
};

const blankSkill = (): SkillEntry => ({ trained: false, rank: 0, misc: 0, modifier: 0, total: 0 });

const blankAbilities = (): Record<AbilityName, AbilityScore> => ({
  Might: blankAbility(),
  Agility: blankAbility(),
  Endurance: blankAbility(),
  Intellect: blankAbility(),
  Wisdom: blankAbility(),
  Charisma: blankAbility(),
});

const blankSkills = (): Record<SkillName, SkillEntry> => ({
  Acrobatics: blankSkill(),
  "Animal Handling": blankSkill(),
  Appraisal: blankSkill(),
  Arcana: blankSkill(),
  Athletics: blankSkill(),
  Crafting: blankSkill(),
  Deception: blankSkill(),
  Diplomacy: blankSkill(),
  History: blankSkill(),
  Insight: blankSkill(),
  Intimidation: blankSkill(),
  Investigation: blankSkill(),
  Medicine: blankSkill(),
  Nature: blankSkill(),
  Perception: blankSkill(),
  Performance: blankSkill(),
  Persuasion: blankSkill(),
  "Sleight of Hand": blankSkill(),
  Stealth: blankSkill(),
  Streetwise: blankSkill(),
  Survival: blankSkill(),
});

export function createCharacter(name = "", constants: SheetConstants = DEFAULT_SHEET_CONSTANTS): CharacterSheet {
  return {
    name,
    level: 1,
    totalExperience: 0,
    storedAdvance: "",
    gold: 0,
    origin: {},
    creatureType: "",
    size: "",
    speed: 0,
    darkvision: 0,
    abilityScores: blankAbilities(),
    skills: blankSkills(),
    languages: [],
    proficiencies: [],
    talents: [],
    features: [],
    defense: { base: constants.defenseBase, agility: 0, shield: 0, misc: 0, total: constants.defenseBase },
    attackMelee: { attr: 0, misc: 0, total: 0 },
    attackRanged: { attr: 0, misc: 0, total: 0 },
    passivePerception: { base: constants.passiveBase, skill: 0, misc: 0, total: constants.passiveBase },
    passiveInsight: { base: constants.passiveBase, skill: 0, misc: 0, total: constants.passiveBase },
    initiative: 0,
    health: { current: 0, max: 0, baseHp: 0, levelBonus: 0 },
    lifePoints: { current: 0, max: 0 },
    armorHp: { current: 0, max: 0 },
    spellcrafting: { craftingPoints: 0, castingPointsMax: 0 },
    personality: { traits: "", ideal: "", bond: "", flaw: "" },
    alignment: { value: 0, modifier: 0 },
    reputation: { value: 0, modifier: 0 },
  };
}

export const cloneCharacter = (character: CharacterSheet): CharacterSheet => structuredClone(character);

// ═══════════════════════════════════════════════════════════════════════════
// IN-PLACE HELPERS (only ever called on a working clone)
// ═══════════════════════════════════════════════════════════════════════════

/** Train a skill. An already trained skill keeps its rank. */
export function trainSkill(character: CharacterSheet, skill: SkillName): void {
  const entry = character.skills[skill];
  entry.trained = true;
  if (entry.rank === 0) entry.rank = 1;
}

export function addUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

export const ownedTalentRanks = (character: CharacterSheet): Map<string, number> =>
  new Map(character.talents.map((t): [string, number] => [t.talentId, t.rank]));

export const trainedSkills = (character: CharacterSheet): SkillName[] =>
  SKILL_NAMES.filter((skill) => character.skills[skill].trained);

export function abilityTotals(character: CharacterSheet): Map<AbilityName, number> {
  return new Map(ABILITY_NAMES.map((ability): [AbilityName, number] => [ability, character.abilityScores[ability].total]));
}

// ═══════════════════════════════════════════════════════════════════════════
// FLAT RECORD
// ═══════════════════════════════════════════════════════════════════════════

export interface CharacterRecord {
  name: string;
  level: number;
  totalExperience: number;
  storedAdvance: string;
  gold: number;
  race: string | null;
  ancestry: string | null;
  profession: string | null;
  duty: string | null;
  primaryPath: string | null;
  background: string | null;
  traits: { creatureType: string; size: string; speed: number; darkvision: number };
  abilities: Record<string, AbilityScore>;
  skills: Record<string, SkillEntry>;
  languages: string[];
  proficiencies: string[];
  talents: OwnedTalent[];
  features: FeatureNote[];
  combat: {
    defense: Defense;
    attackMelee: AttackModifier;
    attackRanged: AttackModifier;
    initiative: number;
    passivePerception: PassiveStat;
    passiveInsight: PassiveStat;
    health: Pool;
    lifePoints: Pool;
    armorHp: Pool;
    spellcrafting: { craftingPoints: number; castingPointsMax: number };
  };
  personality: Personality;
  alignment: ScaleValue;
  reputation: ScaleValue;
}

/** Serialisable snapshot; selections are reported by display name. */
export function toCharacterRecord(character: CharacterSheet): CharacterRecord {
  const copy = cloneCharacter(character);
  const { origin } = copy;
  return {
    name: copy.name,
    level: copy.level,
    totalExperience: copy.totalExperience,
    storedAdvance: copy.storedAdvance,
    gold: copy.gold,
    race: origin.race?.name ?? null,
    ancestry: origin.ancestry?.name ?? null,
    profession: origin.profession?.name ?? null,
    duty: origin.duty?.name ?? null,
    primaryPath: origin.primaryPath?.name ?? null,
    background: origin.background?.name ?? null,
    traits: { creatureType: copy.creatureType, size: copy.size, speed: copy.speed, darkvision: copy.darkvision },
    abilities: copy.abilityScores,
    skills: copy.skills,
    languages: copy.languages,
    proficiencies: copy.proficiencies,
    talents: copy.talents,
    features: copy.features,
    combat: {
      defense: copy.defense,
      attackMelee: copy.attackMelee,
      attackRanged: copy.attackRanged,
      initiative: copy.initiative,
      passivePerception: copy.passivePerception,
      passiveInsight: copy.passiveInsight,
      health: { current: copy.health.current, max: copy.health.max },
      lifePoints: copy.lifePoints,
      armorHp: copy.armorHp,
      spellcrafting: copy.spellcrafting,
    },
    personality: copy.personality,
    alignment: copy.alignment,
    reputation: copy.reputation,
  };
}
