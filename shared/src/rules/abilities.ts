/**
 * Core abilities, skills and languages.
 *
 * Skill modifiers always derive from the linked ability; nothing else in the
 * engine hard-codes that mapping.
 */

export const ABILITY_NAMES = [
  "Might",
  "Agility",
  "Endurance",
  "Intellect",
  "Wisdom",
  "Charisma",
] as const;

export type AbilityName = (typeof ABILITY_NAMES)[number];

export const SKILL_ATTRIBUTES = {
  Acrobatics: "Agility",
  "Animal Handling": "Wisdom",
  Appraisal: "Intellect",
  Arcana: "Intellect",
  Athletics: "Might",
  Crafting: "Intellect",
  Deception: "Charisma",
  Diplomacy: "Charisma",
  History: "Intellect",
  Insight: "Wisdom",
  Intimidation: "Charisma",
  Investigation: "Intellect",
  Medicine: "Wisdom",
  Nature: "Intellect",
  Perception: "Wisdom",
  Performance: "Charisma",
  Persuasion: "Charisma",
  "Sleight of Hand": "Agility",
  Stealth: "Agility",
  Streetwise: "Charisma",
  Survival: "Wisdom",
} as const satisfies Record<string, AbilityName>;

export type SkillName = keyof typeof SKILL_ATTRIBUTES;

export const SKILL_NAMES = Object.keys(SKILL_ATTRIBUTES).filter(isSkillName);

export const DEFAULT_LANGUAGES: readonly string[] = [
  "Common",
  "Elvish",
  "Dwarvish",
  "Ancient Dwarvish",
  "Orcish",
  "Goblin",
  "Halffolk",
  "Draconic",
  "Celestial",
  "Infernal",
  "Sylvan",
  "Aquan",
  "Tauric",
  "Simarru",
  "Velkarran",
];

/** Score every ability starts at before a roll is recorded. */
export const INITIAL_ABILITY_ROLL = 10;

export function isAbilityName(value: string): value is AbilityName {
  return (ABILITY_NAMES as readonly string[]).includes(value);
}

export function isSkillName(value: string): value is SkillName {
  return Object.prototype.hasOwnProperty.call(SKILL_ATTRIBUTES, value);
}

export const abilityModifier = (total: number): number => Math.floor((total - 10) / 2);

export const linkedAbility = (skill: SkillName): AbilityName => SKILL_ATTRIBUTES[skill];
