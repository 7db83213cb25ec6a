import path from "path";

import type {
  ContentAncestry,
  ContentBackground,
  ContentDuty,
  ContentFeature,
  ContentPack,
  ContentPath,
  ContentPersonality,
  ContentPersonalityEntry,
  ContentProfession,
  ContentRace,
  ContentTalent,
} from "../content/content-types";
import { loadContentPackFromFile } from "../content/import";
import type {
  AncestryEntry,
  BackgroundEntry,
  DutyEntry,
  Feature,
  PathEntry,
  PersonalityEntry,
  PersonalityTables,
  ProfessionEntry,
  RaceEntry,
  RulesCatalog,
  RulesCatalogInput,
  RulesEntry,
  TalentEntry,
} from "@shared/rules/catalog";
import { createRulesCatalog } from "@shared/rules/catalog";

export type NamedDefinition = {
  id: string;
  name: string;
  description?: string;
  parentId?: string;
};

export const getContentPackPath = () =>
  process.env.CONTENT_PACK_PATH ?? path.join(process.cwd(), "server", "data", "content-pack.yaml");

let cachedContentPack: ContentPack | null = null;
let cachedCatalog: RulesCatalog | null = null;

export const getContentPack = (): ContentPack => {
  if (!cachedContentPack) {
    cachedContentPack = loadContentPackFromFile(getContentPackPath());
  }
  return cachedContentPack;
};

export const getRulesCatalog = (): RulesCatalog => {
  if (!cachedCatalog) {
    cachedCatalog = createRulesCatalog(toCatalogInput(getContentPack()));
  }
  return cachedCatalog;
};

/** Drops the cached pack and catalog so the next request reloads from disk. */
export const resetContentCache = () => {
  cachedContentPack = null;
  cachedCatalog = null;
};

// ═══════════════════════════════════════════════════════════════════════════
// PACK → CATALOG
// ═══════════════════════════════════════════════════════════════════════════

const mapFeatures = (features?: ContentFeature[]): Feature[] =>
  (features ?? []).map(({ name, description }) => ({ name, description }));

export const mapRace = (race: ContentRace): RaceEntry => ({
  kind: "race",
  id: race.key,
  name: race.name,
  description: race.description,
  creatureType: race.creatureType ?? "Humanoid",
  size: race.size ?? "Medium",
  speed: race.speed ?? 30,
  darkvision: race.darkvision ?? 0,
  languages: race.languages ?? [],
  bonusLanguageChoices: race.bonusLanguageChoices ?? 0,
  abilityModifiers: { ...race.abilityModifiers },
  flexibleAbilityAdjustment: race.flexibleAbilityAdjustment ? { type: race.flexibleAbilityAdjustment } : undefined,
  skillProficiencies: race.skillProficiencies ?? [],
  skillBonuses: { ...race.skillBonuses },
  skillChoices: race.skillChoices,
  features: mapFeatures(race.features),
});

export const mapAncestry = (ancestry: ContentAncestry): AncestryEntry => ({
  kind: "ancestry",
  id: ancestry.key,
  name: ancestry.name,
  description: ancestry.description,
  raceId: ancestry.raceKey,
  region: ancestry.region,
  abilityModifiers: { ...ancestry.abilityModifiers },
  languages: ancestry.languages ?? [],
  languageChoices: ancestry.languageChoices,
  skillProficiencies: ancestry.skillProficiencies ?? [],
  skillBonuses: { ...ancestry.skillBonuses },
  toolProficiencies: ancestry.toolProficiencies ?? [],
  features: mapFeatures(ancestry.features),
  reputationModifier: ancestry.reputation,
});

const mapDuty = (duty: ContentDuty): DutyEntry => ({
  id: duty.key,
  name: duty.name,
  description: duty.description,
  armorProficiencies: duty.armorProficiencies ?? [],
  weaponProficiencies: duty.weaponProficiencies ?? [],
  skillChoices: duty.skillChoices,
  toolChoices: duty.toolChoices,
  suggestedPaths: duty.suggestedPaths ?? [],
  equipment: duty.equipment ?? [],
});

export const mapProfession = (profession: ContentProfession): ProfessionEntry => ({
  kind: "profession",
  id: profession.key,
  name: profession.name,
  description: profession.description,
  baseHp: profession.baseHp,
  feature: profession.feature,
  armorProficiencies: profession.armorProficiencies ?? [],
  weaponProficiencies: profession.weaponProficiencies ?? [],
  toolProficiencies: profession.toolProficiencies ?? [],
  skillChoices: profession.skillChoices,
  toolChoices: profession.toolChoices,
  suggestedPaths: profession.suggestedPaths ?? [],
  equipment: profession.equipment ?? [],
  duties: (profession.duties ?? []).map(mapDuty),
});

export const mapPath = (entry: ContentPath): PathEntry => ({
  kind: "path",
  id: entry.key,
  name: entry.name,
  description: entry.description,
  role: entry.role,
  prerequisites: entry.prerequisites,
  primaryBonus: { ...entry.primaryBonus },
  talentPointsAttribute: entry.talentPointsAttribute,
  attackBonusMelee: entry.attackBonusMelee ?? 0,
  attackBonusRanged: entry.attackBonusRanged ?? 0,
  spellcasting: entry.spellcasting ?? false,
  features: mapFeatures(entry.features),
});

const mapPersonalityEntry = (entry: ContentPersonalityEntry): PersonalityEntry => ({
  roll: entry.roll,
  text: entry.text,
  morality: entry.morality ?? 0,
  reputation: entry.reputation ?? 0,
});

const mapPersonality = (tables: ContentPersonality): PersonalityTables => ({
  traits: tables.traits.map(mapPersonalityEntry),
  ideals: tables.ideals.map(mapPersonalityEntry),
  bonds: tables.bonds.map(mapPersonalityEntry),
  flaws: tables.flaws.map(mapPersonalityEntry),
});

export const mapBackground = (background: ContentBackground): BackgroundEntry => ({
  kind: "background",
  id: background.key,
  name: background.name,
  description: background.description,
  skillProficiencies: background.skillProficiencies ?? [],
  toolProficiencies: background.toolProficiencies ?? [],
  languagesGranted: background.languagesGranted ?? 0,
  equipment: background.equipment ?? [],
  feature: background.feature,
  personalityTables: background.personality && mapPersonality(background.personality),
});

// YAML keys are always strings; the catalog wants rank numbers.
const numericKeys = (values?: Record<string, number>): Record<number, number> => {
  const result: Record<number, number> = {};
  for (const [key, value] of Object.entries(values ?? {})) {
    const rank = Number(key);
    if (Number.isInteger(rank)) result[rank] = value;
  }
  return result;
};

export const mapTalent = (talent: ContentTalent): TalentEntry => {
  const ranks: Record<number, string> = {};
  talent.ranks.forEach((text, i) => {
    ranks[i + 1] = text;
  });
  const prereq = talent.prerequisites;
  const choiceOptions = talent.choice?.options ?? [];
  return {
    kind: "talent",
    id: talent.key,
    name: talent.name,
    description: talent.description ?? talent.ranks[0] ?? "",
    maxRank: talent.ranks.length,
    ranks,
    category: talent.pathKey ? "path" : "general",
    pathId: talent.pathKey,
    isPrimary: talent.isPrimary ?? false,
    isCapstone: talent.isCapstone ?? false,
    requiresChoice: Boolean(talent.choice),
    choiceType: talent.choice?.type,
    choiceOptions,
    weaponRequirement: talent.weaponRequirement,
    prerequisites: {
      abilities: { ...prereq?.abilities },
      mode: prereq?.mode ?? "and",
      levelByRank: numericKeys(prereq?.levelByRank),
      requiredTalents: prereq?.talents ?? [],
      allPathTalents: prereq?.allPathTalents ?? false,
    },
  };
};

export const toCatalogInput = (pack: ContentPack): RulesCatalogInput => ({
  languages: pack.languages,
  races: pack.races.map(mapRace),
  ancestries: pack.ancestries.map(mapAncestry),
  professions: pack.professions.map(mapProfession),
  paths: pack.paths.map(mapPath),
  backgrounds: pack.backgrounds.map(mapBackground),
  talents: pack.talents.map(mapTalent),
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARIES
// ═══════════════════════════════════════════════════════════════════════════

export const mapDefinition = (entry: RulesEntry): NamedDefinition => {
  const summary: NamedDefinition = { id: entry.id, name: entry.name, description: entry.description };
  if (entry.kind === "ancestry") summary.parentId = entry.raceId;
  if (entry.kind === "talent" && entry.pathId) summary.parentId = entry.pathId;
  return summary;
};
