// Content pack loading. Reads a YAML or JSON file and narrows it, field by
// field, into a ContentPack. Anything malformed fails here with the path of
// the offending field rather than deep inside the rules engine.

import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import type { AbilityName } from "@shared/rules/abilities";
import { isAbilityName } from "@shared/rules/abilities";
import type {
  ContentAbilityValues,
  ContentAncestry,
  ContentBackground,
  ContentChoice,
  ContentDuty,
  ContentFeature,
  ContentPack,
  ContentPath,
  ContentPersonality,
  ContentPersonalityEntry,
  ContentProfession,
  ContentRace,
  ContentSkillChoice,
  ContentTalent,
} from "./content-types";

export function loadContentPackFromFile(filePath: string): ContentPack {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") {
    return parseContentPack(yaml.load(fs.readFileSync(filePath, "utf8")));
  }
  if (ext === ".json") {
    return parseContentPack(JSON.parse(fs.readFileSync(filePath, "utf8")));
  }
  throw new Error(`Unsupported content file extension: ${ext}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// FIELD READERS
// ═══════════════════════════════════════════════════════════════════════════

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fail = (where: string, message: string): never => {
  throw new Error(`${where}: ${message}`);
};

const isMissing = (value: unknown): value is undefined | null => value === undefined || value === null;

function requiredString(raw: RawRecord, field: string, where: string): string {
  const value = raw[field];
  if (typeof value !== "string" || !value.trim()) return fail(where, `${field} must be a non-empty string`);
  return value;
}

function optionalString(raw: RawRecord, field: string, where: string): string | undefined {
  const value = raw[field];
  if (isMissing(value)) return undefined;
  if (typeof value !== "string") return fail(where, `${field} must be a string`);
  return value;
}

function optionalNumber(raw: RawRecord, field: string, where: string): number | undefined {
  const value = raw[field];
  if (isMissing(value)) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) return fail(where, `${field} must be a number`);
  return value;
}

function requiredNumber(raw: RawRecord, field: string, where: string): number {
  return optionalNumber(raw, field, where) ?? fail(where, `${field} is required`);
}

function optionalBoolean(raw: RawRecord, field: string, where: string): boolean | undefined {
  const value = raw[field];
  if (isMissing(value)) return undefined;
  if (typeof value !== "boolean") return fail(where, `${field} must be true or false`);
  return value;
}

function stringList(raw: RawRecord, field: string, where: string): string[] | undefined {
  const value = raw[field];
  if (isMissing(value)) return undefined;
  if (!Array.isArray(value)) return fail(where, `${field} must be a list`);
  return value.map((item, i) => (typeof item === "string" ? item : fail(where, `${field}[${i}] must be a string`)));
}

function requiredRecord(raw: RawRecord, field: string, where: string): RawRecord {
  const value = raw[field];
  return isRecord(value) ? value : fail(where, `${field} must be an object`);
}

function optionalRecord(raw: RawRecord, field: string, where: string): RawRecord | undefined {
  return isMissing(raw[field]) ? undefined : requiredRecord(raw, field, where);
}

function recordList(raw: RawRecord, field: string, where: string, required: boolean): RawRecord[] {
  const value = raw[field];
  if (isMissing(value) && !required) return [];
  if (!Array.isArray(value)) return fail(where, `${field} must be a list`);
  return value.map((item, i) => (isRecord(item) ? item : fail(where, `${field}[${i}] must be an object`)));
}

function numberRecord(raw: RawRecord, field: string, where: string): Record<string, number> | undefined {
  const value = optionalRecord(raw, field, where);
  if (!value) return undefined;
  const result: Record<string, number> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = typeof entry === "number" ? entry : fail(where, `${field}.${key} must be a number`);
  }
  return result;
}

function toAbility(value: unknown, where: string): AbilityName {
  return typeof value === "string" && isAbilityName(value) ? value : fail(where, `unknown ability ${String(value)}`);
}

function abilityValues(raw: RawRecord, field: string, where: string): ContentAbilityValues | undefined {
  const values = numberRecord(raw, field, where);
  if (!values) return undefined;
  const result: ContentAbilityValues = {};
  for (const [key, value] of Object.entries(values)) {
    result[toAbility(key, `${where}.${field}`)] = value;
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// SHARED SHAPES
// ═══════════════════════════════════════════════════════════════════════════

const parseFeature = (raw: RawRecord, where: string): ContentFeature => ({
  name: requiredString(raw, "name", where),
  description: optionalString(raw, "description", where) ?? "",
});

const parseFeatures = (raw: RawRecord, where: string): ContentFeature[] | undefined =>
  isMissing(raw.features)
    ? undefined
    : recordList(raw, "features", where, true).map((f, i) => parseFeature(f, `${where}.features[${i}]`));

function parseChoice(raw: RawRecord, field: string, where: string): ContentChoice | undefined {
  const value = optionalRecord(raw, field, where);
  if (!value) return undefined;
  const at = `${where}.${field}`;
  return { count: requiredNumber(value, "count", at), options: stringList(value, "options", at) ?? [] };
}

function parseSkillChoice(raw: RawRecord, where: string): ContentSkillChoice | undefined {
  const value = optionalRecord(raw, "skillChoices", where);
  if (!value) return undefined;
  const at = `${where}.skillChoices`;
  const count = requiredNumber(value, "count", at);
  return value.options === "any" ? { count, options: "any" } : { count, options: stringList(value, "options", at) ?? [] };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRIES
// ═══════════════════════════════════════════════════════════════════════════

function parseRace(raw: RawRecord, where: string): ContentRace {
  return {
    key: requiredString(raw, "key", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    creatureType: optionalString(raw, "creatureType", where),
    size: optionalString(raw, "size", where),
    speed: optionalNumber(raw, "speed", where),
    darkvision: optionalNumber(raw, "darkvision", where),
    languages: stringList(raw, "languages", where),
    bonusLanguageChoices: optionalNumber(raw, "bonusLanguageChoices", where),
    abilityModifiers: abilityValues(raw, "abilityModifiers", where),
    flexibleAbilityAdjustment: optionalString(raw, "flexibleAbilityAdjustment", where),
    skillProficiencies: stringList(raw, "skillProficiencies", where),
    skillBonuses: numberRecord(raw, "skillBonuses", where),
    skillChoices: parseSkillChoice(raw, where),
    features: parseFeatures(raw, where),
  };
}

function parseAncestry(raw: RawRecord, where: string): ContentAncestry {
  const reputation = optionalRecord(raw, "reputation", where);
  return {
    key: requiredString(raw, "key", where),
    raceKey: requiredString(raw, "raceKey", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    region: optionalString(raw, "region", where),
    abilityModifiers: abilityValues(raw, "abilityModifiers", where),
    languages: stringList(raw, "languages", where),
    languageChoices: parseChoice(raw, "languageChoices", where),
    skillProficiencies: stringList(raw, "skillProficiencies", where),
    skillBonuses: numberRecord(raw, "skillBonuses", where),
    toolProficiencies: stringList(raw, "toolProficiencies", where),
    features: parseFeatures(raw, where),
    reputation: reputation && {
      region: requiredString(reputation, "region", `${where}.reputation`),
      value: requiredNumber(reputation, "value", `${where}.reputation`),
    },
  };
}

function parseDuty(raw: RawRecord, where: string): ContentDuty {
  return {
    key: requiredString(raw, "key", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    armorProficiencies: stringList(raw, "armorProficiencies", where),
    weaponProficiencies: stringList(raw, "weaponProficiencies", where),
    skillChoices: parseChoice(raw, "skillChoices", where),
    toolChoices: parseChoice(raw, "toolChoices", where),
    suggestedPaths: stringList(raw, "suggestedPaths", where),
    equipment: stringList(raw, "equipment", where),
  };
}

function parseProfession(raw: RawRecord, where: string): ContentProfession {
  const feature = optionalRecord(raw, "feature", where);
  return {
    key: requiredString(raw, "key", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    baseHp: requiredNumber(raw, "baseHp", where),
    feature: feature && parseFeature(feature, `${where}.feature`),
    armorProficiencies: stringList(raw, "armorProficiencies", where),
    weaponProficiencies: stringList(raw, "weaponProficiencies", where),
    toolProficiencies: stringList(raw, "toolProficiencies", where),
    skillChoices: parseChoice(raw, "skillChoices", where),
    toolChoices: parseChoice(raw, "toolChoices", where),
    suggestedPaths: stringList(raw, "suggestedPaths", where),
    equipment: stringList(raw, "equipment", where),
    duties: recordList(raw, "duties", where, false).map((d, i) => parseDuty(d, `${where}.duties[${i}]`)),
  };
}

function parsePath(raw: RawRecord, where: string): ContentPath {
  const prereq = optionalRecord(raw, "prerequisites", where);
  const at = `${where}.prerequisites`;
  const primary = prereq && requiredRecord(prereq, "primary", at);
  const secondary = prereq && requiredRecord(prereq, "secondary", at);
  const talentAttribute = optionalString(raw, "talentPointsAttribute", where);
  return {
    key: requiredString(raw, "key", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    role: optionalString(raw, "role", where),
    prerequisites:
      primary && secondary
        ? {
            primary: {
              attribute: toAbility(primary.attribute, `${at}.primary`),
              minimum: requiredNumber(primary, "minimum", `${at}.primary`),
            },
            secondary: {
              options: (stringList(secondary, "options", `${at}.secondary`) ?? []).map((a) => toAbility(a, `${at}.secondary`)),
              minimum: requiredNumber(secondary, "minimum", `${at}.secondary`),
            },
          }
        : undefined,
    primaryBonus: abilityValues(raw, "primaryBonus", where),
    talentPointsAttribute: talentAttribute === undefined ? undefined : toAbility(talentAttribute, where),
    attackBonusMelee: optionalNumber(raw, "attackBonusMelee", where),
    attackBonusRanged: optionalNumber(raw, "attackBonusRanged", where),
    spellcasting: optionalBoolean(raw, "spellcasting", where),
    features: parseFeatures(raw, where),
  };
}

const parsePersonalityEntry = (raw: RawRecord, where: string): ContentPersonalityEntry => ({
  roll: requiredNumber(raw, "roll", where),
  text: requiredString(raw, "text", where),
  morality: optionalNumber(raw, "morality", where),
  reputation: optionalNumber(raw, "reputation", where),
});

function parsePersonality(raw: RawRecord, where: string): ContentPersonality {
  const table = (field: string) =>
    recordList(raw, field, where, false).map((e, i) => parsePersonalityEntry(e, `${where}.${field}[${i}]`));
  return { traits: table("traits"), ideals: table("ideals"), bonds: table("bonds"), flaws: table("flaws") };
}

function parseBackground(raw: RawRecord, where: string): ContentBackground {
  const feature = optionalRecord(raw, "feature", where);
  const personality = optionalRecord(raw, "personality", where);
  return {
    key: requiredString(raw, "key", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    skillProficiencies: stringList(raw, "skillProficiencies", where),
    toolProficiencies: stringList(raw, "toolProficiencies", where),
    languagesGranted: optionalNumber(raw, "languagesGranted", where),
    equipment: stringList(raw, "equipment", where),
    feature: feature && parseFeature(feature, `${where}.feature`),
    personality: personality && parsePersonality(personality, `${where}.personality`),
  };
}

function parseTalent(raw: RawRecord, where: string): ContentTalent {
  const choice = optionalRecord(raw, "choice", where);
  const prereq = optionalRecord(raw, "prerequisites", where);
  const at = `${where}.prerequisites`;
  const mode = prereq && optionalString(prereq, "mode", at);
  if (mode !== undefined && mode !== "and" && mode !== "or") fail(at, `mode must be "and" or "or"`);
  return {
    key: requiredString(raw, "key", where),
    name: requiredString(raw, "name", where),
    description: optionalString(raw, "description", where),
    pathKey: optionalString(raw, "pathKey", where),
    ranks: stringList(raw, "ranks", where) ?? fail(where, "ranks is required"),
    isPrimary: optionalBoolean(raw, "isPrimary", where),
    isCapstone: optionalBoolean(raw, "isCapstone", where),
    choice: choice && {
      type: optionalString(choice, "type", `${where}.choice`),
      options: stringList(choice, "options", `${where}.choice`),
    },
    weaponRequirement: optionalString(raw, "weaponRequirement", where),
    prerequisites: prereq && {
      abilities: abilityValues(prereq, "abilities", at),
      mode: mode === "or" ? "or" : "and",
      levelByRank: numberRecord(prereq, "levelByRank", at),
      talents: stringList(prereq, "talents", at),
      allPathTalents: optionalBoolean(prereq, "allPathTalents", at),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PACK
// ═══════════════════════════════════════════════════════════════════════════

export function parseContentPack(data: unknown): ContentPack {
  if (!isRecord(data)) {
    throw new Error("Content pack must be an object");
  }
  const root: RawRecord = data;
  const ruleset = optionalRecord(root, "ruleset", "pack");
  if (!ruleset || typeof ruleset.key !== "string") {
    throw new Error("Content pack must include ruleset with key");
  }

  const entries = <T>(field: string, parse: (raw: RawRecord, where: string) => T): T[] =>
    recordList(root, field, "pack", true).map((raw, i) => parse(raw, `${field}[${i}]`));

  return {
    ruleset: {
      key: ruleset.key,
      name: optionalString(ruleset, "name", "ruleset") ?? ruleset.key,
      description: optionalString(ruleset, "description", "ruleset"),
    },
    languages: stringList(root, "languages", "pack"),
    races: entries("races", parseRace),
    ancestries: entries("ancestries", parseAncestry),
    professions: entries("professions", parseProfession),
    paths: entries("paths", parsePath),
    backgrounds: entries("backgrounds", parseBackground),
    talents: entries("talents", parseTalent),
  };
}
