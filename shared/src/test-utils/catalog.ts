/**
 * In-memory rules catalog for engine tests.
 *
 * Small, hand-built entries covering every branch the builder and the
 * advancement engine take: a flexible-adjustment race, duties, a spellcasting
 * path, personality tables, ranked and choice talents and a capstone.
 */

import type {
  AncestryEntry,
  BackgroundEntry,
  PathEntry,
  ProfessionEntry,
  RaceEntry,
  RulesCatalog,
  RulesCatalogInput,
  TalentEntry,
} from "../rules/catalog";
import { createRulesCatalog } from "../rules/catalog";

// ═══════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════

export function createRace(overrides: Partial<RaceEntry> & Pick<RaceEntry, "id" | "name">): RaceEntry {
  return {
    kind: "race",
    creatureType: "Humanoid",
    size: "Medium",
    speed: 30,
    darkvision: 0,
    languages: ["Common"],
    bonusLanguageChoices: 0,
    abilityModifiers: {},
    skillProficiencies: [],
    skillBonuses: {},
    features: [],
    ...overrides,
  };
}

export function createTalent(overrides: Partial<TalentEntry> & Pick<TalentEntry, "id" | "name">): TalentEntry {
  const maxRank = overrides.maxRank ?? 1;
  const ranks: Record<number, string> = {};
  for (let rank = 1; rank <= maxRank; rank++) ranks[rank] = `${overrides.name} rank ${rank}`;
  return {
    kind: "talent",
    description: `${overrides.name} talent`,
    maxRank,
    ranks,
    category: overrides.pathId ? "path" : "general",
    isPrimary: false,
    isCapstone: false,
    requiresChoice: false,
    choiceOptions: [],
    prerequisites: { abilities: {}, mode: "and", levelByRank: {}, requiredTalents: [], allPathTalents: false },
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

export const TEST_RACES: RaceEntry[] = [
  createRace({
    id: "elf",
    name: "Elf",
    darkvision: 60,
    languages: ["Common", "Elvish"],
    abilityModifiers: { Agility: 2 },
    skillProficiencies: ["Perception"],
    features: [{ name: "Keen Senses", description: "Proficiency in Perception." }],
  }),
  createRace({
    id: "human",
    name: "Human",
    bonusLanguageChoices: 1,
    flexibleAbilityAdjustment: { type: "human_core" },
    skillChoices: { count: 1, options: "any" },
  }),
  createRace({
    id: "tauran",
    name: "Tauran",
    size: "Large",
    abilityModifiers: { Might: 2, Agility: -1 },
    flexibleAbilityAdjustment: { type: "any_one" },
  }),
];

export const TEST_ANCESTRIES: AncestryEntry[] = [
  {
    kind: "ancestry",
    id: "sylari",
    name: "Sylari",
    raceId: "elf",
    region: "Sylvan Reaches",
    abilityModifiers: { Wisdom: 1 },
    languages: ["Sylvan"],
    skillProficiencies: [],
    skillBonuses: { Nature: 1 },
    toolProficiencies: ["Herbalism Kit"],
    features: [{ name: "Forest Stride", description: "Ignore difficult terrain in forests." }],
    reputationModifier: { region: "Sylvan Reaches", value: 1 },
  },
  {
    kind: "ancestry",
    id: "lowlander",
    name: "Lowlander",
    raceId: "human",
    abilityModifiers: {},
    languages: [],
    languageChoices: { count: 1, options: ["Halffolk", "Dwarvish", "Goblin"] },
    skillProficiencies: [],
    skillBonuses: {},
    toolProficiencies: [],
    features: [],
  },
];

export const TEST_PROFESSIONS: ProfessionEntry[] = [
  {
    kind: "profession",
    id: "scholar",
    name: "Scholar",
    baseHp: 6,
    feature: { name: "Lorekeeper", description: "Recall obscure facts." },
    armorProficiencies: [],
    weaponProficiencies: ["Daggers"],
    toolProficiencies: ["Calligrapher's Supplies"],
    skillChoices: { count: 2, options: ["Arcana", "History", "Investigation", "Nature", "Medicine", "Appraisal"] },
    suggestedPaths: ["mystic"],
    equipment: ["Ink and quill"],
    duties: [],
  },
  {
    kind: "profession",
    id: "warrior",
    name: "Warrior",
    baseHp: 10,
    armorProficiencies: ["Light Armor", "Medium Armor"],
    weaponProficiencies: ["Simple Weapons"],
    toolProficiencies: [],
    suggestedPaths: ["defense"],
    equipment: [],
    duties: [
      {
        id: "fighter",
        name: "Fighter",
        armorProficiencies: ["Heavy Armor"],
        weaponProficiencies: ["Martial Weapons"],
        skillChoices: { count: 1, options: ["Athletics", "Intimidation"] },
        suggestedPaths: ["defense"],
        equipment: [],
      },
      {
        id: "ranger",
        name: "Ranger",
        armorProficiencies: [],
        weaponProficiencies: ["Longbows"],
        skillChoices: { count: 1, options: ["Survival", "Nature"] },
        toolChoices: { count: 1, options: ["Cartographer's Tools", "Herbalism Kit"] },
        suggestedPaths: ["skirmisher"],
        equipment: [],
      },
    ],
  },
];

export const TEST_PATHS: PathEntry[] = [
  {
    kind: "path",
    id: "mystic",
    name: "Mystic",
    role: "Caster",
    prerequisites: {
      primary: { attribute: "Intellect", minimum: 15 },
      secondary: { options: ["Wisdom", "Agility"], minimum: 13 },
    },
    primaryBonus: { Intellect: 1 },
    talentPointsAttribute: "Intellect",
    attackBonusMelee: 0,
    attackBonusRanged: 0,
    spellcasting: true,
    features: [{ name: "Spellcraft", description: "Shape raw magic into spells." }],
  },
  {
    kind: "path",
    id: "defense",
    name: "Defense",
    role: "Tank",
    prerequisites: {
      primary: { attribute: "Endurance", minimum: 15 },
      secondary: { options: ["Might", "Agility"], minimum: 13 },
    },
    primaryBonus: { Endurance: 1 },
    talentPointsAttribute: "Endurance",
    attackBonusMelee: 1,
    attackBonusRanged: 0,
    spellcasting: false,
    features: [],
  },
  {
    kind: "path",
    id: "skirmisher",
    name: "Skirmisher",
    prerequisites: {
      primary: { attribute: "Agility", minimum: 13 },
      secondary: { options: ["Might", "Wisdom"], minimum: 12 },
    },
    primaryBonus: {},
    talentPointsAttribute: "Agility",
    attackBonusMelee: 0,
    attackBonusRanged: 1,
    spellcasting: false,
    features: [],
  },
];

export const TEST_BACKGROUNDS: BackgroundEntry[] = [
  {
    kind: "background",
    id: "scholar",
    name: "Scholar",
    skillProficiencies: ["History", "Investigation"],
    toolProficiencies: [],
    languagesGranted: 1,
    equipment: ["Bottle of ink"],
    feature: { name: "Researcher", description: "You know where to find lore." },
    personalityTables: {
      traits: [
        { roll: 1, text: "I quote old texts at every turn.", morality: 0, reputation: 0 },
        { roll: 2, text: "I am curious about everything.", morality: 1, reputation: 0 },
      ],
      ideals: [
        { roll: 1, text: "Knowledge should be shared.", morality: 1, reputation: 0 },
        { roll: 2, text: "Knowledge is power.", morality: -1, reputation: 0 },
      ],
      bonds: [
        { roll: 1, text: "My mentor's library.", morality: 0, reputation: 1 },
        { roll: 2, text: "A lost manuscript.", morality: 0, reputation: 0 },
      ],
      flaws: [
        { roll: 1, text: "I forget to eat while reading.", morality: 0, reputation: -1 },
        { roll: 2, text: "I hoard rare books.", morality: -1, reputation: 0 },
      ],
    },
  },
  {
    kind: "background",
    id: "drifter",
    name: "Drifter",
    skillProficiencies: ["Survival"],
    toolProficiencies: ["Dice Set"],
    languagesGranted: 0,
    equipment: [],
  },
];

export const TEST_TALENTS: TalentEntry[] = [
  createTalent({
    id: "arcane-focus",
    name: "Arcane Focus",
    maxRank: 3,
    pathId: "mystic",
    isPrimary: true,
    prerequisites: { abilities: { Intellect: 13 }, mode: "and", levelByRank: { 3: 5 }, requiredTalents: [], allPathTalents: false },
  }),
  createTalent({
    id: "mystic-ward",
    name: "Mystic Ward",
    maxRank: 2,
    pathId: "mystic",
    prerequisites: { abilities: {}, mode: "and", levelByRank: {}, requiredTalents: ["arcane-focus"], allPathTalents: false },
  }),
  createTalent({ id: "archmage", name: "Archmage", pathId: "mystic", isCapstone: true }),
  createTalent({
    id: "shield-wall",
    name: "Shield Wall",
    maxRank: 2,
    pathId: "defense",
    prerequisites: { abilities: { Might: 13, Endurance: 13 }, mode: "or", levelByRank: {}, requiredTalents: [], allPathTalents: false },
  }),
  createTalent({ id: "quick-step", name: "Quick Step", maxRank: 3, pathId: "skirmisher" }),
  createTalent({ id: "toughness", name: "Toughness", maxRank: 3 }),
  createTalent({
    id: "weapon-focus",
    name: "Weapon Focus",
    maxRank: 2,
    requiresChoice: true,
    choiceType: "weapon",
    choiceOptions: ["Sword", "Axe", "Bow"],
  }),
];

export const createTestCatalogInput = (): RulesCatalogInput => ({
  races: structuredClone(TEST_RACES),
  ancestries: structuredClone(TEST_ANCESTRIES),
  professions: structuredClone(TEST_PROFESSIONS),
  paths: structuredClone(TEST_PATHS),
  backgrounds: structuredClone(TEST_BACKGROUNDS),
  talents: structuredClone(TEST_TALENTS),
});

export const createTestCatalog = (): RulesCatalog => createRulesCatalog(createTestCatalogInput());

/** Base scores of the reference build (elf mystic scholar). */
export const SCHOLAR_SCORES = {
  Might: 10,
  Agility: 14,
  Endurance: 13,
  Intellect: 15,
  Wisdom: 12,
  Charisma: 8,
} as const;
