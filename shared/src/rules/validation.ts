/**
 * Validator
 *
 * Stateless rule checks shared by the builder and the advancement engine.
 * Nothing here mutates its inputs; every entry point reports errors and
 * warnings, and warnings never make a result invalid.
 */

import type { AbilityName, SkillName } from "./abilities";
import { ABILITY_NAMES, isAbilityName, isSkillName } from "./abilities";
import type { PathEntry, RulesCatalog, RulesEntryKind, TalentEntry } from "./catalog";
import { findEntry } from "./catalog";
import type { CharacterSheet } from "./character";
import { abilityTotals, ownedTalentRanks, trainedSkills } from "./character";
import { checkPathPrerequisites, checkTalentPrerequisites, talentRankCost } from "./entries";
import type { RulesErrorCode } from "./errors";
import { RulesError } from "./errors";
import type { AdvancementType } from "./progression";
import { ADVANCEMENT_COSTS, isAdvancementType } from "./progression";

// ═══════════════════════════════════════════════════════════════════════════
// RESULT HELPERS
// ═══════════════════════════════════════════════════════════════════════════

export interface ValidationResult {
  /** Whether the checked input is acceptable */
  valid: boolean;
  /** Human-readable reasons the input was rejected */
  errors: string[];
  /** Advisory notes that don't block progress */
  warnings: string[];
  /** Distinct error categories, in the order first seen */
  codes: RulesErrorCode[];
}

export function validResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [], codes: [] };
}

export function invalidResult(code: RulesErrorCode, ...errors: string[]): ValidationResult {
  return { valid: false, errors, warnings: [], codes: [code] };
}

export function addWarning(result: ValidationResult, warning: string): ValidationResult {
  return { ...result, warnings: [...result.warnings, warning] };
}

export function mergeResults(...results: ValidationResult[]): ValidationResult {
  const errors = results.flatMap((r) => r.errors);
  const codes = [...new Set(results.flatMap((r) => r.codes))];
  return {
    valid: errors.length === 0,
    errors,
    warnings: results.flatMap((r) => r.warnings),
    codes,
  };
}

/** Converts a failed result into the builder's thrown error. */
export function toRulesError(result: ValidationResult, details?: Record<string, unknown>): RulesError {
  return new RulesError(result.codes[0] ?? "InvalidInput", result.errors.join("; "), {
    ...details,
    errors: result.errors,
    codes: result.codes,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// ABILITY SCORES
// ═══════════════════════════════════════════════════════════════════════════

export type AbilityScoreMethod = "manual" | "roll" | "point_buy" | "standard_array" | "quick_test";

export const ABILITY_SCORE_METHODS: readonly AbilityScoreMethod[] = [
  "manual",
  "roll",
  "point_buy",
  "standard_array",
  "quick_test",
];

export const isAbilityScoreMethod = (value: string): value is AbilityScoreMethod =>
  (ABILITY_SCORE_METHODS as readonly string[]).includes(value);

export const SCORE_MIN = 1;
export const SCORE_MAX = 20;
export const LOW_SCORE_WARNING = 3;

export const POINT_BUY_COSTS: Readonly<Record<number, number>> = {
  8: 0,
  9: 1,
  10: 2,
  11: 3,
  12: 4,
  13: 5,
  14: 7,
  15: 9,
  16: 11,
};
export const POINT_BUY_BUDGET = 30;
export const POINT_BUY_MIN = 8;
export const POINT_BUY_MAX = 16;

export const STANDARD_ARRAY: readonly number[] = [15, 14, 13, 12, 11, 10, 8];
export const QUICK_TEST_SCORE = 12;

function validatePointBuy(scores: ReadonlyMap<AbilityName, number>): ValidationResult {
  const results: ValidationResult[] = [];
  let spent = 0;
  for (const [name, value] of scores) {
    if (value < POINT_BUY_MIN) {
      results.push(invalidResult("InvalidInput", `Point buy: ${name} cannot be below ${POINT_BUY_MIN} (got ${value})`));
    } else if (value > POINT_BUY_MAX) {
      results.push(invalidResult("InvalidInput", `Point buy: ${name} cannot exceed ${POINT_BUY_MAX} (got ${value})`));
    } else {
      spent += POINT_BUY_COSTS[value] ?? 0;
    }
  }
  let result = mergeResults(validResult(), ...results);
  if (spent > POINT_BUY_BUDGET) {
    result = mergeResults(result, invalidResult("BudgetExceeded", `Point buy: spent ${spent} points (max ${POINT_BUY_BUDGET})`));
  } else if (spent < POINT_BUY_BUDGET) {
    result = addWarning(result, `Point buy: only spent ${spent} of ${POINT_BUY_BUDGET} points`);
  }
  return result;
}

function validateStandardArray(scores: ReadonlyMap<AbilityName, number>): ValidationResult {
  const remaining = [...STANDARD_ARRAY];
  for (const value of scores.values()) {
    const idx = remaining.indexOf(value);
    if (idx === -1) {
      return invalidResult(
        "InvalidInput",
        `Standard array values must be chosen from ${STANDARD_ARRAY.join(", ")} without reuse; got ${[...scores.values()].join(", ")}`
      );
    }
    remaining.splice(idx, 1);
  }
  return validResult();
}

/**
 * Shape and range checks for the six base scores, plus the budget rules of
 * the generation method.
 */
export function validateAbilityScores(
  scores: Readonly<Record<string, unknown>>,
  method: AbilityScoreMethod = "manual"
): ValidationResult {
  const results: ValidationResult[] = [];
  const warnings: string[] = [];

  const missing = ABILITY_NAMES.filter((name) => !(name in scores));
  if (missing.length) {
    results.push(invalidResult("InvalidInput", `Missing ability scores: ${missing.join(", ")}`));
  }
  const unknown = Object.keys(scores).filter((name) => !isAbilityName(name));
  if (unknown.length) {
    results.push(invalidResult("InvalidInput", `Unknown ability scores: ${unknown.join(", ")}`));
  }

  const numeric = new Map<AbilityName, number>();
  for (const name of ABILITY_NAMES) {
    if (!(name in scores)) continue;
    const value = scores[name];
    if (typeof value !== "number" || !Number.isInteger(value)) {
      results.push(invalidResult("InvalidInput", `${name} must be an integer, got ${JSON.stringify(value)}`));
      continue;
    }
    numeric.set(name, value);
    if (value < SCORE_MIN) {
      results.push(invalidResult("InvalidInput", `${name} cannot be less than ${SCORE_MIN} (got ${value})`));
    } else if (value > SCORE_MAX) {
      results.push(invalidResult("InvalidInput", `${name} cannot exceed ${SCORE_MAX} (got ${value})`));
    } else if (value < LOW_SCORE_WARNING) {
      warnings.push(`${name} is unusually low (${value})`);
    }
  }

  // Method budgets only make sense once all six are usable numbers
  if (numeric.size === ABILITY_NAMES.length) {
    if (method === "point_buy") {
      results.push(validatePointBuy(numeric));
    } else if (method === "standard_array") {
      results.push(validateStandardArray(numeric));
    } else if (method === "quick_test" && [...numeric.values()].some((v) => v !== QUICK_TEST_SCORE)) {
      warnings.push(`Quick test should have all ${QUICK_TEST_SCORE}s`);
    }
  }

  return warnings.reduce(addWarning, mergeResults(validResult(), ...results));
}

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG SELECTIONS
// ═══════════════════════════════════════════════════════════════════════════

const KIND_LABELS: Record<RulesEntryKind, string> = {
  race: "Race",
  ancestry: "Ancestry",
  profession: "Profession",
  path: "Path",
  background: "Background",
  talent: "Talent",
};

export function validateCatalogId(catalog: RulesCatalog, kind: RulesEntryKind, id: string | undefined): ValidationResult {
  if (!id) return invalidResult("InvalidInput", `${KIND_LABELS[kind]} is required`);
  if (!findEntry(catalog, kind, id)) return invalidResult("NotFound", `Unknown ${kind}: ${id}`);
  return validResult();
}

export function describePathPrerequisites(path: PathEntry, isPrimary = true): string {
  const prereq = path.prerequisites;
  if (!prereq) return "";
  const primary = `Need ${prereq.primary.attribute} ${prereq.primary.minimum}+`;
  if (!isPrimary) return primary;
  return `${primary} and one of [${prereq.secondary.options.join(", ")}] ${prereq.secondary.minimum}+`;
}

export function validatePathPrerequisites(
  path: PathEntry,
  totals: ReadonlyMap<AbilityName, number>,
  isPrimary = true
): ValidationResult {
  if (checkPathPrerequisites(path, totals, isPrimary)) return validResult();
  return invalidResult(
    "PrerequisitesNotMet",
    `Prerequisites not met for ${path.name}: ${describePathPrerequisites(path, isPrimary)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// CHOICE SETS
// ═══════════════════════════════════════════════════════════════════════════

export interface ChoiceSet {
  count: number;
  options: readonly string[];
}

/**
 * Exact count, no repeats, every pick offered, and nothing the character
 * already has when possession makes the pick pointless.
 */
export function validateChoiceSelections(
  choice: ChoiceSet,
  selections: readonly string[],
  possessed: ReadonlySet<string> = new Set()
): ValidationResult {
  if (selections.length !== choice.count) {
    return invalidResult("WrongCount", `Expected ${choice.count} selections, got ${selections.length}`);
  }
  const results: ValidationResult[] = [];
  const seen = new Set<string>();
  for (const selection of selections) {
    if (seen.has(selection)) {
      results.push(invalidResult("InvalidInput", `Cannot choose the same option twice: ${selection}`));
      continue;
    }
    seen.add(selection);
    if (!choice.options.includes(selection)) {
      results.push(invalidResult("InvalidOption", `Invalid selection '${selection}'. Options: ${choice.options.join(", ")}`));
    } else if (possessed.has(selection)) {
      results.push(invalidResult("AlreadyPossessed", `Already have ${selection}`));
    }
  }
  return mergeResults(validResult(), ...results);
}

// ═══════════════════════════════════════════════════════════════════════════
// TALENT PURCHASES
// ═══════════════════════════════════════════════════════════════════════════

export interface TalentPurchaseRequest {
  talentId: string;
  desiredNewRank: number;
  pathId?: string;
  choiceData?: string;
}

export interface TalentBudget {
  talentPoints: number;
  minPrimaryPathPoints: number;
  /** Character level the purchased ranks will be held at */
  level: number;
  primaryPathId?: string;
}

export interface PlannedTalentPurchase {
  talent: TalentEntry;
  newRank: number;
  cost: number;
  choiceData?: string;
}

export interface TalentPurchasePlan {
  result: ValidationResult;
  purchases: PlannedTalentPurchase[];
  totalCost: number;
  primaryCost: number;
}

export const GENERAL_TALENT_POOL = "general";

function checkTalentChoice(talent: TalentEntry, request: TalentPurchaseRequest, isNew: boolean): ValidationResult {
  if (!talent.requiresChoice || !isNew) return validResult();
  const choice = request.choiceData?.trim();
  if (!choice) {
    return invalidResult("InvalidInput", `${talent.name} requires a choice${talent.choiceType ? ` of ${talent.choiceType}` : ""}`);
  }
  if (talent.choiceOptions.length && !talent.choiceOptions.includes(choice)) {
    return invalidResult(
      "InvalidOption",
      `Invalid choice '${choice}' for ${talent.name}. Options: ${talent.choiceOptions.join(", ")}`
    );
  }
  return validResult();
}

/**
 * Validate a batch of talent rank purchases in order. Ranks are tracked
 * across the batch, so buying rank 1 then rank 2 of the same talent is one
 * legal sequence while rank 2 alone is not.
 */
export function validateTalentPurchases(
  catalog: RulesCatalog,
  character: CharacterSheet,
  requests: readonly TalentPurchaseRequest[],
  budget: TalentBudget
): TalentPurchasePlan {
  const running = ownedTalentRanks(character);
  const totals = abilityTotals(character);
  const results: ValidationResult[] = [];
  const purchases: PlannedTalentPurchase[] = [];
  let totalCost = 0;
  let primaryCost = 0;

  for (const request of requests) {
    const talent = catalog.talents.get(request.talentId);
    if (!talent) {
      results.push(invalidResult("NotFound", `Unknown talent: ${request.talentId}`));
      continue;
    }
    const desired = request.desiredNewRank;
    const current = running.get(talent.id) ?? 0;
    if (!Number.isInteger(desired) || desired < 1) {
      results.push(invalidResult("InvalidInput", `${talent.name}: Rank must be at least 1 (got ${desired})`));
      continue;
    }
    if (desired <= current) {
      results.push(invalidResult("AlreadyPossessed", `${talent.name}: Already at rank ${current}`));
      continue;
    }
    if (desired > talent.maxRank) {
      results.push(invalidResult("InvalidInput", `${talent.name}: Max rank is ${talent.maxRank}`));
      continue;
    }
    if (desired !== current + 1) {
      results.push(
        invalidResult("PrerequisitesNotMet", `${talent.name}: Rank ${desired} requires rank ${current + 1} first`)
      );
      continue;
    }

    const pool = talent.pathId ?? GENERAL_TALENT_POOL;
    if (request.pathId !== undefined && request.pathId !== pool) {
      results.push(invalidResult("InvalidInput", `${talent.name} belongs to ${pool} talents, not ${request.pathId}`));
    }

    const outcome = checkTalentPrerequisites(
      talent,
      { totals, level: budget.level, ownedRanks: running, targetRank: desired },
      catalog
    );
    if (!outcome.met) {
      results.push(invalidResult("PrerequisitesNotMet", ...outcome.reasons.map((r) => `${talent.name}: ${r}`)));
    }
    results.push(checkTalentChoice(talent, request, current === 0));

    const cost = talentRankCost(desired);
    totalCost += cost;
    if (budget.primaryPathId && talent.pathId === budget.primaryPathId) primaryCost += cost;
    running.set(talent.id, desired);
    purchases.push({ talent, newRank: desired, cost, choiceData: request.choiceData?.trim() || undefined });
  }

  if (totalCost > budget.talentPoints) {
    results.push(invalidResult("BudgetExceeded", `Spent ${totalCost} TP but only have ${budget.talentPoints}`));
  }
  if (requests.length > 0 && primaryCost < budget.minPrimaryPathPoints) {
    results.push(
      invalidResult(
        "BudgetExceeded",
        `Must spend at least ${budget.minPrimaryPathPoints} TP in primary path (spent ${primaryCost})`
      )
    );
  }

  return { result: mergeResults(validResult(), ...results), purchases, totalCost, primaryCost };
}

// ═══════════════════════════════════════════════════════════════════════════
// ADVANCEMENT POINT PURCHASES
// ═══════════════════════════════════════════════════════════════════════════

export interface AdvancementPurchaseRequest {
  choiceType: string;
  target: string;
}

export interface PlannedAdvancement {
  choiceType: AdvancementType;
  target: string;
  cost: number;
}

export interface AdvancementPlan {
  result: ValidationResult;
  purchases: PlannedAdvancement[];
  totalCost: number;
}

function checkSkillTarget(target: string): SkillName | ValidationResult {
  return isSkillName(target) ? target : invalidResult("NotFound", `Unknown skill: ${target}`);
}

export function validateAdvancementPurchases(
  catalog: RulesCatalog,
  character: CharacterSheet,
  requests: readonly AdvancementPurchaseRequest[],
  advancementPoints: number,
  costs: Readonly<Record<AdvancementType, number>> = ADVANCEMENT_COSTS
): AdvancementPlan {
  const trained = new Set<string>(trainedSkills(character));
  const languages = new Set(character.languages);
  const proficiencies = new Set(character.proficiencies);
  const results: ValidationResult[] = [];
  const purchases: PlannedAdvancement[] = [];
  let totalCost = 0;

  for (const { choiceType, target } of requests) {
    if (!isAdvancementType(choiceType)) {
      results.push(invalidResult("InvalidInput", `Unknown advancement type: ${choiceType}`));
      continue;
    }
    const name = target.trim();

    switch (choiceType) {
      case "skill_rank":
      case "train_skill": {
        const skill = checkSkillTarget(name);
        if (typeof skill !== "string") {
          results.push(skill);
          continue;
        }
        if (choiceType === "skill_rank" && !trained.has(skill)) {
          results.push(invalidResult("InvalidInput", `Cannot increase rank of untrained skill: ${skill}`));
          continue;
        }
        if (choiceType === "train_skill") {
          if (trained.has(skill)) {
            results.push(invalidResult("AlreadyPossessed", `Already trained in ${skill}`));
            continue;
          }
          trained.add(skill);
        }
        break;
      }
      case "proficiency":
        if (!name) {
          results.push(invalidResult("InvalidInput", "Proficiency name is required"));
          continue;
        }
        if (proficiencies.has(name)) {
          results.push(invalidResult("AlreadyPossessed", `Already have proficiency: ${name}`));
          continue;
        }
        proficiencies.add(name);
        break;
      case "language":
        if (!name) {
          results.push(invalidResult("InvalidInput", "Language name is required"));
          continue;
        }
        if (languages.has(name)) {
          results.push(invalidResult("AlreadyPossessed", `Already know language: ${name}`));
          continue;
        }
        if (!catalog.languages.includes(name)) {
          results.push(addWarning(validResult(), `Unknown language: ${name} (may be valid)`));
        }
        languages.add(name);
        break;
      case "inherit_gold":
        break;
    }

    const cost = costs[choiceType];
    totalCost += cost;
    purchases.push({ choiceType, target: name, cost });
  }

  if (totalCost > advancementPoints) {
    results.push(invalidResult("BudgetExceeded", `Spent ${totalCost} AP but only have ${advancementPoints}`));
  }

  return { result: mergeResults(validResult(), ...results), purchases, totalCost };
}

// ═══════════════════════════════════════════════════════════════════════════
// ABILITY INCREASE
// ═══════════════════════════════════════════════════════════════════════════

export type AbilityIncrease = Readonly<Record<string, number>>;

export const ABILITY_INCREASE_TOTAL = 2;

/** Exactly {X: +2} or {X: +1, Y: +1}, and only on a level that grants it. */
export function validateAbilityIncrease(
  increase: AbilityIncrease | undefined,
  level: number,
  grantsIncrease: boolean
): ValidationResult {
  const entries = Object.entries(increase ?? {});
  if (!grantsIncrease) {
    return entries.length
      ? invalidResult("InvalidAbilityIncrease", `Level ${level} does not grant ability increase`)
      : validResult();
  }
  if (!entries.length) {
    return invalidResult("InvalidAbilityIncrease", `Level ${level} requires an ability increase choice`);
  }

  const errors: string[] = [];
  const total = entries.reduce((sum, [, value]) => sum + value, 0);
  if (total !== ABILITY_INCREASE_TOTAL) {
    errors.push(`Ability increase must total +${ABILITY_INCREASE_TOTAL} (got ${total})`);
  }
  if (entries.length === 1) {
    if (entries[0][1] !== 2) errors.push("Single ability increase must be +2");
  } else if (entries.length === 2) {
    if (entries.some(([, value]) => value !== 1)) errors.push("Two ability increases must each be +1");
  } else {
    errors.push(`Can increase 1 or 2 abilities, not ${entries.length}`);
  }
  for (const [ability] of entries) {
    if (!isAbilityName(ability)) errors.push(`Unknown ability: ${ability}`);
  }

  return errors.length ? invalidResult("InvalidAbilityIncrease", ...errors) : validResult();
}

// ═══════════════════════════════════════════════════════════════════════════
// WHOLE CHARACTER
// ═══════════════════════════════════════════════════════════════════════════

const REQUIRED_SELECTIONS = [
  ["race", "race"],
  ["ancestry", "ancestry"],
  ["profession", "profession"],
  ["primaryPath", "path"],
  ["background", "background"],
] as const;

export const STANDARD_MAX_LEVEL = 20;

export function validateCharacter(character: CharacterSheet, catalog?: RulesCatalog): ValidationResult {
  const results: ValidationResult[] = [];
  const warnings: string[] = [];

  for (const [field, kind] of REQUIRED_SELECTIONS) {
    const selection = character.origin[field];
    if (!selection) {
      results.push(invalidResult("InvalidInput", `Missing required field: ${field}`));
    } else if (catalog) {
      results.push(validateCatalogId(catalog, kind, selection.id));
    }
  }

  const totals = abilityTotals(character);
  results.push(validateAbilityScores(Object.fromEntries(totals)));

  const pathId = character.origin.primaryPath?.id;
  const path = catalog && pathId ? catalog.paths.get(pathId) : undefined;
  if (path) {
    results.push(validatePathPrerequisites(path, totals, true));
  }

  if (!Number.isInteger(character.level) || character.level < 1) {
    results.push(invalidResult("InvalidInput", `Invalid level: ${character.level}`));
  } else if (character.level > STANDARD_MAX_LEVEL) {
    warnings.push(`Level ${character.level} is above standard max (${STANDARD_MAX_LEVEL})`);
  }

  if (character.health.max < 1) {
    results.push(invalidResult("InvalidInput", `Max HP must be at least 1 (got ${character.health.max})`));
  }

  return warnings.reduce(addWarning, mergeResults(validResult(), ...results));
}
