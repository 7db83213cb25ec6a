/**
 * Rules Catalog
 *
 * Immutable lookup tables for every rules entry the builder and advancement
 * engine consume. Built once from plain entry lists and passed explicitly to
 * whoever needs it.
 */

import type { AbilityName } from "./abilities";
import { DEFAULT_LANGUAGES, isSkillName } from "./abilities";
import { RulesError } from "./errors";

// ═══════════════════════════════════════════════════════════════════════════
// SHARED SHAPES
// ═══════════════════════════════════════════════════════════════════════════

export interface Feature {
  name: string;
  description: string;
}

export type AbilityModifiers = Partial<Record<AbilityName, number>>;

export interface ChoiceSpec {
  count: number;
  options: string[];
}

export interface SkillChoiceSpec {
  count: number;
  /** "any" expands to every skill when the choice is queued */
  options: string[] | "any";
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY VARIANTS
// ═══════════════════════════════════════════════════════════════════════════

export interface RaceEntry {
  kind: "race";
  id: string;
  name: string;
  description?: string;
  creatureType: string;
  size: string;
  speed: number;
  darkvision: number;
  languages: string[];
  bonusLanguageChoices: number;
  abilityModifiers: AbilityModifiers;
  flexibleAbilityAdjustment?: { type: string };
  skillProficiencies: string[];
  skillBonuses: Record<string, number>;
  skillChoices?: SkillChoiceSpec;
  features: Feature[];
}

export interface AncestryEntry {
  kind: "ancestry";
  id: string;
  name: string;
  description?: string;
  raceId: string;
  region?: string;
  abilityModifiers: AbilityModifiers;
  languages: string[];
  languageChoices?: ChoiceSpec;
  skillProficiencies: string[];
  skillBonuses: Record<string, number>;
  toolProficiencies: string[];
  features: Feature[];
  reputationModifier?: { region: string; value: number };
}

export interface DutyEntry {
  id: string;
  name: string;
  description?: string;
  armorProficiencies: string[];
  weaponProficiencies: string[];
  skillChoices?: ChoiceSpec;
  toolChoices?: ChoiceSpec;
  suggestedPaths: string[];
  equipment: string[];
}

export interface ProfessionEntry {
  kind: "profession";
  id: string;
  name: string;
  description?: string;
  baseHp: number;
  feature?: Feature;
  armorProficiencies: string[];
  weaponProficiencies: string[];
  toolProficiencies: string[];
  skillChoices?: ChoiceSpec;
  toolChoices?: ChoiceSpec;
  suggestedPaths: string[];
  equipment: string[];
  duties: DutyEntry[];
}

export interface PathPrerequisite {
  primary: { attribute: AbilityName; minimum: number };
  secondary: { options: AbilityName[]; minimum: number };
}

export interface PathEntry {
  kind: "path";
  id: string;
  name: string;
  description?: string;
  role?: string;
  prerequisites?: PathPrerequisite;
  primaryBonus: AbilityModifiers;
  talentPointsAttribute?: AbilityName;
  attackBonusMelee: number;
  attackBonusRanged: number;
  spellcasting: boolean;
  features: Feature[];
}

export interface PersonalityEntry {
  roll: number;
  text: string;
  morality: number;
  reputation: number;
}

export interface PersonalityTables {
  traits: PersonalityEntry[];
  ideals: PersonalityEntry[];
  bonds: PersonalityEntry[];
  flaws: PersonalityEntry[];
}

export interface BackgroundEntry {
  kind: "background";
  id: string;
  name: string;
  description?: string;
  skillProficiencies: string[];
  toolProficiencies: string[];
  languagesGranted: number;
  equipment: string[];
  feature?: Feature;
  personalityTables?: PersonalityTables;
}

export interface TalentPrerequisites {
  abilities: AbilityModifiers;
  mode: "and" | "or";
  /** Required character level keyed by the rank being bought */
  levelByRank: Record<number, number>;
  requiredTalents: string[];
  /** Capstone: every other talent of the same path must be owned */
  allPathTalents: boolean;
}

export interface TalentEntry {
  kind: "talent";
  id: string;
  name: string;
  description: string;
  maxRank: number;
  ranks: Record<number, string>;
  category: "general" | "path";
  pathId?: string;
  isPrimary: boolean;
  isCapstone: boolean;
  requiresChoice: boolean;
  choiceType?: string;
  choiceOptions: string[];
  weaponRequirement?: string;
  prerequisites: TalentPrerequisites;
}

export type RulesEntry =
  | RaceEntry
  | AncestryEntry
  | ProfessionEntry
  | PathEntry
  | BackgroundEntry
  | TalentEntry;

export type RulesEntryKind = RulesEntry["kind"];

export const RULES_ENTRY_KINDS: readonly RulesEntryKind[] = [
  "race",
  "ancestry",
  "profession",
  "path",
  "background",
  "talent",
];

export const isRulesEntryKind = (value: string): value is RulesEntryKind =>
  (RULES_ENTRY_KINDS as readonly string[]).includes(value);

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════

export interface RulesCatalogInput {
  languages?: readonly string[];
  races: RaceEntry[];
  ancestries: AncestryEntry[];
  professions: ProfessionEntry[];
  paths: PathEntry[];
  backgrounds: BackgroundEntry[];
  talents: TalentEntry[];
}

export interface RulesCatalog {
  readonly languages: readonly string[];
  readonly races: ReadonlyMap<string, RaceEntry>;
  readonly ancestries: ReadonlyMap<string, AncestryEntry>;
  readonly professions: ReadonlyMap<string, ProfessionEntry>;
  readonly paths: ReadonlyMap<string, PathEntry>;
  readonly backgrounds: ReadonlyMap<string, BackgroundEntry>;
  readonly talents: ReadonlyMap<string, TalentEntry>;
}

function indexById<T extends { id: string; kind: RulesEntryKind }>(entries: T[], kind: RulesEntryKind): Map<string, T> {
  const map = new Map<string, T>();
  for (const entry of entries) {
    if (map.has(entry.id)) {
      throw new RulesError("InvalidInput", `Duplicate ${kind} id: ${entry.id}`, { kind, id: entry.id });
    }
    Object.freeze(entry);
    map.set(entry.id, entry);
  }
  return map;
}

function assertDenseRanks(talent: TalentEntry): void {
  if (!Number.isInteger(talent.maxRank) || talent.maxRank < 1) {
    throw new RulesError("InvalidInput", `Talent ${talent.id} has invalid max rank ${talent.maxRank}`);
  }
  for (let rank = 1; rank <= talent.maxRank; rank++) {
    if (typeof talent.ranks[rank] !== "string") {
      throw new RulesError("InvalidInput", `Talent ${talent.id} is missing rank ${rank} of ${talent.maxRank}`, {
        talentId: talent.id,
        rank,
      });
    }
  }
  const extra = Object.keys(talent.ranks).map(Number).filter((rank) => rank < 1 || rank > talent.maxRank);
  if (extra.length) {
    throw new RulesError("InvalidInput", `Talent ${talent.id} defines ranks outside 1..${talent.maxRank}: ${extra.join(", ")}`);
  }
}

function assertKnownSkills(owner: string, skills: Iterable<string>): void {
  for (const skill of skills) {
    if (!isSkillName(skill)) {
      throw new RulesError("InvalidInput", `${owner} references unknown skill ${skill}`, { owner, skill });
    }
  }
}

const choiceSkills = (choice?: SkillChoiceSpec | ChoiceSpec): string[] =>
  !choice || choice.options === "any" ? [] : choice.options;

/**
 * Build a catalog from entry lists, enforcing cross-entry invariants.
 */
export function createRulesCatalog(input: RulesCatalogInput): RulesCatalog {
  const races = indexById(input.races, "race");
  const ancestries = indexById(input.ancestries, "ancestry");
  const professions = indexById(input.professions, "profession");
  const paths = indexById(input.paths, "path");
  const backgrounds = indexById(input.backgrounds, "background");
  const talents = indexById(input.talents, "talent");

  for (const race of races.values()) {
    assertKnownSkills(`Race ${race.id}`, [
      ...race.skillProficiencies,
      ...Object.keys(race.skillBonuses),
      ...choiceSkills(race.skillChoices),
    ]);
  }

  for (const ancestry of ancestries.values()) {
    if (!races.has(ancestry.raceId)) {
      throw new RulesError("InvalidInput", `Ancestry ${ancestry.id} references unknown race ${ancestry.raceId}`);
    }
    assertKnownSkills(`Ancestry ${ancestry.id}`, [...ancestry.skillProficiencies, ...Object.keys(ancestry.skillBonuses)]);
  }

  for (const profession of professions.values()) {
    assertKnownSkills(`Profession ${profession.id}`, choiceSkills(profession.skillChoices));
    for (const duty of profession.duties) {
      assertKnownSkills(`Duty ${duty.id}`, choiceSkills(duty.skillChoices));
    }
  }

  for (const background of backgrounds.values()) {
    assertKnownSkills(`Background ${background.id}`, background.skillProficiencies);
  }

  for (const talent of talents.values()) {
    assertDenseRanks(talent);
    if (talent.category === "path" && (!talent.pathId || !paths.has(talent.pathId))) {
      throw new RulesError("InvalidInput", `Talent ${talent.id} references unknown path ${talent.pathId ?? "(none)"}`);
    }
  }

  return Object.freeze({
    languages: Object.freeze([...(input.languages ?? DEFAULT_LANGUAGES)]),
    races,
    ancestries,
    professions,
    paths,
    backgrounds,
    talents,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// LOOKUPS
// ═══════════════════════════════════════════════════════════════════════════

type EntryOfKind<K extends RulesEntryKind> = Extract<RulesEntry, { kind: K }>;

const LABELS: Record<RulesEntryKind, string> = {
  race: "race",
  ancestry: "ancestry",
  profession: "profession",
  path: "path",
  background: "background",
  talent: "talent",
};

function tableFor<K extends RulesEntryKind>(catalog: RulesCatalog, kind: K): ReadonlyMap<string, EntryOfKind<K>>;
function tableFor(catalog: RulesCatalog, kind: RulesEntryKind): ReadonlyMap<string, RulesEntry> {
  switch (kind) {
    case "race":
      return catalog.races;
    case "ancestry":
      return catalog.ancestries;
    case "profession":
      return catalog.professions;
    case "path":
      return catalog.paths;
    case "background":
      return catalog.backgrounds;
    case "talent":
      return catalog.talents;
  }
}

export function findEntry<K extends RulesEntryKind>(catalog: RulesCatalog, kind: K, id: string): EntryOfKind<K> | undefined {
  return tableFor(catalog, kind).get(id);
}

/** Like findEntry, but an unknown id is a NotFound rules error. */
export function requireEntry<K extends RulesEntryKind>(catalog: RulesCatalog, kind: K, id: string): EntryOfKind<K> {
  const entry = findEntry(catalog, kind, id);
  if (!entry) {
    throw new RulesError("NotFound", `Unknown ${LABELS[kind]}: ${id}`, { kind, id });
  }
  return entry;
}

export function listEntries<K extends RulesEntryKind>(catalog: RulesCatalog, kind: K): EntryOfKind<K>[] {
  return [...tableFor(catalog, kind).values()];
}

export const ancestriesForRace = (catalog: RulesCatalog, raceId: string): AncestryEntry[] =>
  listEntries(catalog, "ancestry").filter((a) => a.raceId === raceId);

export const talentsForPath = (catalog: RulesCatalog, pathId: string): TalentEntry[] =>
  listEntries(catalog, "talent").filter((t) => t.pathId === pathId);

export const findDuty = (profession: ProfessionEntry, dutyId: string): DutyEntry | undefined =>
  profession.duties.find((d) => d.id === dutyId);
