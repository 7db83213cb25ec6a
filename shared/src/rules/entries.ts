/**
 * Rules entry behaviour
 *
 * Each catalog variant knows how to apply itself to a sheet and, where it has
 * prerequisites, how to check them. Application is pure: the input sheet is
 * cloned, changed and recalculated.
 */

import type { AbilityName } from "./abilities";
import { isAbilityName, isSkillName } from "./abilities";
import type {
  AbilityModifiers,
  AncestryEntry,
  BackgroundEntry,
  DutyEntry,
  Feature,
  PathEntry,
  ProfessionEntry,
  RaceEntry,
  RulesCatalog,
  TalentEntry,
} from "./catalog";
import { talentsForPath } from "./catalog";
import type { AbilityScore, CharacterSheet } from "./character";
import { addUnique, cloneCharacter, trainSkill } from "./character";
import { recalculateInPlace } from "./derived";

// ═══════════════════════════════════════════════════════════════════════════
// SOURCE LABELS
// ═══════════════════════════════════════════════════════════════════════════

export const sourceLabel = {
  race: (race: RaceEntry) => `${race.name} Race`,
  ancestry: (ancestry: AncestryEntry) => `${ancestry.name} Ancestry`,
  profession: (profession: ProfessionEntry) => `${profession.name} Profession`,
  duty: (duty: DutyEntry) => `${duty.name} Duty`,
  path: (path: PathEntry) => `${path.name} Path`,
  background: (background: BackgroundEntry) => `${background.name} Background`,
};

// ═══════════════════════════════════════════════════════════════════════════
// SHARED MUTATORS
// ═══════════════════════════════════════════════════════════════════════════

function addAbilityModifiers(
  character: CharacterSheet,
  modifiers: AbilityModifiers,
  component: keyof Pick<AbilityScore, "race" | "misc">
): void {
  for (const [ability, value] of Object.entries(modifiers)) {
    if (isAbilityName(ability) && typeof value === "number") {
      character.abilityScores[ability][component] += value;
    }
  }
}

function trainSkills(character: CharacterSheet, skills: string[]): void {
  for (const skill of skills) {
    if (isSkillName(skill)) trainSkill(character, skill);
  }
}

function addSkillBonuses(character: CharacterSheet, bonuses: Record<string, number>): void {
  for (const [skill, bonus] of Object.entries(bonuses)) {
    if (isSkillName(skill)) character.skills[skill].misc += bonus;
  }
}

function addFeatures(character: CharacterSheet, features: Feature[], source: string): void {
  for (const feature of features) {
    character.features.push({ name: feature.name, text: feature.description, source });
  }
}

const addAll = (list: string[], values: string[]): void => values.forEach((v) => addUnique(list, v));

function withClone(character: CharacterSheet, mutate: (draft: CharacterSheet) => void): CharacterSheet {
  const draft = cloneCharacter(character);
  mutate(draft);
  recalculateInPlace(draft);
  return draft;
}

// ═══════════════════════════════════════════════════════════════════════════
// APPLY
// ═══════════════════════════════════════════════════════════════════════════

export const applyRace = (character: CharacterSheet, race: RaceEntry): CharacterSheet =>
  withClone(character, (draft) => {
    draft.origin.race = { id: race.id, name: race.name };
    draft.creatureType = race.creatureType;
    draft.size = race.size;
    draft.speed = race.speed;
    draft.darkvision = race.darkvision;
    addAll(draft.languages, race.languages);
    addAbilityModifiers(draft, race.abilityModifiers, "race");
    trainSkills(draft, race.skillProficiencies);
    addSkillBonuses(draft, race.skillBonuses);
    addFeatures(draft, race.features, sourceLabel.race(race));
  });

export const applyAncestry = (character: CharacterSheet, ancestry: AncestryEntry): CharacterSheet =>
  withClone(character, (draft) => {
    draft.origin.ancestry = { id: ancestry.id, name: ancestry.name };
    addAbilityModifiers(draft, ancestry.abilityModifiers, "race");
    addAll(draft.languages, ancestry.languages);
    trainSkills(draft, ancestry.skillProficiencies);
    addSkillBonuses(draft, ancestry.skillBonuses);
    addAll(draft.proficiencies, ancestry.toolProficiencies);
    addFeatures(draft, ancestry.features, sourceLabel.ancestry(ancestry));
    if (ancestry.reputationModifier) {
      draft.reputation.modifier += ancestry.reputationModifier.value;
    }
  });

/**
 * Base hit points are set here; the Endurance modifier is folded in by the
 * recalculation and follows later ability changes.
 */
export const applyProfession = (character: CharacterSheet, profession: ProfessionEntry, duty?: DutyEntry): CharacterSheet =>
  withClone(character, (draft) => {
    draft.origin.profession = { id: profession.id, name: profession.name };
    draft.health.baseHp = profession.baseHp;
    draft.health.current = 0;
    if (profession.feature) {
      addFeatures(draft, [profession.feature], sourceLabel.profession(profession));
    }
    addAll(draft.proficiencies, profession.armorProficiencies);
    addAll(draft.proficiencies, profession.weaponProficiencies);
    addAll(draft.proficiencies, profession.toolProficiencies);
    if (duty) {
      draft.origin.duty = { id: duty.id, name: duty.name };
      addAll(draft.proficiencies, duty.armorProficiencies);
      addAll(draft.proficiencies, duty.weaponProficiencies);
    } else {
      delete draft.origin.duty;
    }
  });

/** Only the primary path grants its ability bonus. */
export const applyPath = (character: CharacterSheet, path: PathEntry, isPrimary = true): CharacterSheet =>
  withClone(character, (draft) => {
    if (isPrimary) {
      draft.origin.primaryPath = { id: path.id, name: path.name };
      addAbilityModifiers(draft, path.primaryBonus, "misc");
    }
    draft.attackMelee.misc += path.attackBonusMelee;
    draft.attackRanged.misc += path.attackBonusRanged;
    addFeatures(draft, path.features, sourceLabel.path(path));
  });

export const applyBackground = (character: CharacterSheet, background: BackgroundEntry): CharacterSheet =>
  withClone(character, (draft) => {
    draft.origin.background = { id: background.id, name: background.name };
    trainSkills(draft, background.skillProficiencies);
    addAll(draft.proficiencies, background.toolProficiencies);
    if (background.feature) {
      addFeatures(draft, [background.feature], sourceLabel.background(background));
    }
  });

/** Set a talent to the given rank, adding it when it is not owned yet. */
export const applyTalentRank = (
  character: CharacterSheet,
  talent: TalentEntry,
  rank: number,
  choiceData?: string
): CharacterSheet =>
  withClone(character, (draft) => {
    const owned = draft.talents.find((t) => t.talentId === talent.id);
    if (owned) {
      owned.rank = rank;
      if (choiceData) owned.choiceData = choiceData;
      return;
    }
    draft.talents.push({ talentId: talent.id, name: talent.name, rank, pathId: talent.pathId, choiceData });
  });

// ═══════════════════════════════════════════════════════════════════════════
// PREREQUISITES
// ═══════════════════════════════════════════════════════════════════════════

const scoreOf = (totals: ReadonlyMap<AbilityName, number>, ability: AbilityName): number => totals.get(ability) ?? 0;

/**
 * A secondary path only needs its primary attribute; the primary path also
 * needs one of the secondary attributes.
 */
export function checkPathPrerequisites(
  path: PathEntry,
  totals: ReadonlyMap<AbilityName, number>,
  isPrimary = true
): boolean {
  const prereq = path.prerequisites;
  if (!prereq) return true;
  const primaryMet = scoreOf(totals, prereq.primary.attribute) >= prereq.primary.minimum;
  if (!isPrimary) return primaryMet;
  const secondaryMet = prereq.secondary.options.some((a) => scoreOf(totals, a) >= prereq.secondary.minimum);
  return primaryMet && secondaryMet;
}

export interface TalentCheckContext {
  totals: ReadonlyMap<AbilityName, number>;
  level: number;
  ownedRanks: ReadonlyMap<string, number>;
  targetRank: number;
}

export interface PrerequisiteOutcome {
  met: boolean;
  reasons: string[];
}

export function checkTalentPrerequisites(
  talent: TalentEntry,
  context: TalentCheckContext,
  catalog: RulesCatalog
): PrerequisiteOutcome {
  const { abilities, mode, levelByRank, requiredTalents, allPathTalents } = talent.prerequisites;
  const reasons: string[] = [];

  const abilityEntries: [AbilityName, number][] = [];
  for (const [ability, minimum] of Object.entries(abilities)) {
    if (isAbilityName(ability) && typeof minimum === "number") abilityEntries.push([ability, minimum]);
  }

  if (abilityEntries.length) {
    if (mode === "or") {
      const meetsAny = abilityEntries.some(([ability, min]) => scoreOf(context.totals, ability) >= min);
      if (!meetsAny) {
        const minimums = new Set(abilityEntries.map(([, min]) => min));
        reasons.push(
          minimums.size === 1
            ? `Need ${abilityEntries[0][1]}+ in one of: ${abilityEntries.map(([a]) => a).join(", ")}`
            : `Need one of: ${abilityEntries.map(([a, min]) => `${a} ${min}+`).join(", ")}`
        );
      }
    } else {
      for (const [ability, min] of abilityEntries) {
        const score = scoreOf(context.totals, ability);
        if (score < min) reasons.push(`Need ${ability} ${min}+, have ${score}`);
      }
    }
  }

  const requiredLevel = levelByRank[context.targetRank];
  if (requiredLevel !== undefined && context.level < requiredLevel) {
    reasons.push(`Rank ${context.targetRank} requires level ${requiredLevel}`);
  }

  for (const required of requiredTalents) {
    if (!context.ownedRanks.has(required)) reasons.push(`Requires talent: ${required}`);
  }

  if ((allPathTalents || talent.isCapstone) && talent.pathId) {
    const missing = talentsForPath(catalog, talent.pathId).filter(
      (t) => t.id !== talent.id && !context.ownedRanks.has(t.id)
    );
    if (missing.length) reasons.push(`Requires all other ${talent.pathId} talents`);
  }

  return { met: reasons.length === 0, reasons };
}

/** Buying rank N costs N talent points. */
export const talentRankCost = (rank: number): number => rank;

/** Total cost of raising a talent from one rank to another. */
export function talentCostBetween(fromRank: number, toRank: number): number {
  let cost = 0;
  for (let rank = fromRank + 1; rank <= toRank; rank++) cost += talentRankCost(rank);
  return cost;
}
