/**
 * Character Builder
 *
 * Ordered creation wizard: ability scores, race, ancestry, profession (and
 * duty), path, background. Each step applies its catalog entry and may queue
 * pending choices that have to be resolved before the build is complete.
 *
 * Every operation validates against the state it would build on and only
 * then commits, so a thrown RulesError leaves the builder untouched.
 * Re-running an earlier step restores the snapshot taken before that step
 * and discards everything after it.
 */

import type { AbilityName } from "./abilities";
import { ABILITY_NAMES, SKILL_NAMES, isAbilityName, isSkillName } from "./abilities";
import { computeTalentBudget } from "./advancement";
import type { AncestryEntry, BackgroundEntry, PathEntry, PersonalityEntry, ProfessionEntry, RaceEntry, RulesCatalog } from "./catalog";
import { ancestriesForRace, findDuty, listEntries, requireEntry } from "./catalog";
import type { CharacterSheet } from "./character";
import { abilityTotals, addUnique, cloneCharacter, createCharacter, trainSkill, trainedSkills } from "./character";
import { recalculateAll, recalculateInPlace } from "./derived";
import {
  applyAncestry,
  applyBackground,
  applyPath,
  applyProfession,
  applyRace,
  applyTalentRank,
  checkPathPrerequisites,
  sourceLabel,
} from "./entries";
import { RulesError } from "./errors";
import type { AbilityScoreMethod, TalentPurchaseRequest, ValidationResult } from "./validation";
import {
  describePathPrerequisites,
  toRulesError,
  validateAbilityScores,
  validateChoiceSelections,
  validatePathPrerequisites,
  validateTalentPurchases,
} from "./validation";

// ═══════════════════════════════════════════════════════════════════════════
// STEPS & CHOICES
// ═══════════════════════════════════════════════════════════════════════════

export type BuilderStep = "ability_scores" | "race" | "ancestry" | "profession" | "path" | "background" | "complete";

export const BUILDER_STEPS: readonly BuilderStep[] = [
  "ability_scores",
  "race",
  "ancestry",
  "profession",
  "path",
  "background",
  "complete",
];

const STEP_LABELS: Record<BuilderStep, string> = {
  ability_scores: "Ability Scores",
  race: "Race",
  ancestry: "Ancestry",
  profession: "Profession",
  path: "Path",
  background: "Background",
  complete: "Complete",
};

export type ChoiceType =
  | "skill"
  | "language"
  | "tool"
  | "ability_bonus"
  | "ability_bonus_plus2"
  | "ability_penalty"
  | "human_ability_mode"
  | "personality_trait"
  | "personality_ideal"
  | "personality_bond"
  | "personality_flaw";

export const CHOICE_TYPES: readonly ChoiceType[] = [
  "skill",
  "language",
  "tool",
  "ability_bonus",
  "ability_bonus_plus2",
  "ability_penalty",
  "human_ability_mode",
  "personality_trait",
  "personality_ideal",
  "personality_bond",
  "personality_flaw",
];

export const isChoiceType = (value: string): value is ChoiceType => (CHOICE_TYPES as readonly string[]).includes(value);

export interface PendingChoice {
  choiceType: ChoiceType;
  count: number;
  options: string[];
  source: string;
}

/** The +2 and the -1 of a split adjustment must land on different abilities. */
const SPLIT_PARTNERS: Partial<Record<ChoiceType, ChoiceType>> = {
  ability_bonus_plus2: "ability_penalty",
  ability_penalty: "ability_bonus_plus2",
};

export const HUMAN_CORE_ADJUSTMENT = "human_core";
export const HUMAN_MODE_PLUS_ONE = "+1 to one ability";
export const HUMAN_MODE_SPLIT = "+2 to one ability and -1 to another";

const PERSONALITY_TABLES = {
  personality_trait: { table: "traits", field: "traits" },
  personality_ideal: { table: "ideals", field: "ideal" },
  personality_bond: { table: "bonds", field: "bond" },
  personality_flaw: { table: "flaws", field: "flaw" },
} as const;

type PersonalityChoiceType = keyof typeof PERSONALITY_TABLES;

const isPersonalityChoice = (type: ChoiceType): type is PersonalityChoiceType => type in PERSONALITY_TABLES;

const formatPersonalityOption = (entry: PersonalityEntry): string => `${entry.roll}: ${entry.text}`;

// ═══════════════════════════════════════════════════════════════════════════
// BUILDER
// ═══════════════════════════════════════════════════════════════════════════

export interface BuilderOptions {
  /** Refuse to start a step while choices from earlier steps are unresolved */
  requireResolvedChoices?: boolean;
  characterName?: string;
}

interface BuilderState {
  step: BuilderStep;
  character: CharacterSheet;
  pendingChoices: PendingChoice[];
}

export interface PathAvailability {
  path: PathEntry;
  prerequisitesMet: boolean;
}

const stepIndex = (step: BuilderStep): number => BUILDER_STEPS.indexOf(step);

const cloneState = (state: BuilderState): BuilderState => ({
  step: state.step,
  character: cloneCharacter(state.character),
  pendingChoices: state.pendingChoices.map((c) => ({ ...c, options: [...c.options] })),
});

export class CharacterBuilder {
  private state: BuilderState;
  private characterName: string;
  private readonly snapshots = new Map<BuilderStep, BuilderState>();

  constructor(
    private readonly catalog: RulesCatalog,
    private readonly options: BuilderOptions = {}
  ) {
    this.characterName = (options.characterName ?? "").trim();
    this.state = {
      step: "ability_scores",
      character: recalculateAll(createCharacter(this.characterName)),
      pendingChoices: [],
    };
  }

  get currentStep(): BuilderStep {
    return this.state.step;
  }

  /** The name is not a step effect; it survives going back. */
  setCharacterName(name: string): void {
    this.characterName = name.trim();
    this.state.character.name = this.characterName;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step plumbing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * State the given step builds on: the live state when moving forward, or
   * the snapshot from before that step when going back.
   */
  private baseFor(step: BuilderStep): BuilderState {
    const current = stepIndex(this.state.step);
    const target = stepIndex(step);
    if (target > current) {
      throw new RulesError(
        "StepOutOfOrder",
        `Cannot choose ${STEP_LABELS[step]} before ${STEP_LABELS[this.state.step]}`,
        { step, currentStep: this.state.step }
      );
    }
    const snapshot = target < current ? this.snapshots.get(step) : undefined;
    const base = cloneState(snapshot ?? this.state);
    base.character.name = this.characterName;
    if (this.options.requireResolvedChoices && base.pendingChoices.length) {
      throw new RulesError(
        "ChoicesPending",
        `Resolve ${base.pendingChoices.length} pending choice(s) before choosing ${STEP_LABELS[step]}`,
        { pending: base.pendingChoices.map((c) => c.source) }
      );
    }
    return base;
  }

  private commit(step: BuilderStep, base: BuilderState, next: BuilderState): void {
    const target = stepIndex(step);
    for (const later of BUILDER_STEPS.slice(target)) {
      this.snapshots.delete(later);
    }
    this.snapshots.set(step, base);
    this.state = { ...next, step: BUILDER_STEPS[target + 1] ?? "complete" };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step 1: ability scores
  // ─────────────────────────────────────────────────────────────────────────

  /** Returns the validation result so callers can surface its warnings. */
  setAbilityScores(values: Readonly<Record<string, unknown>>, method: AbilityScoreMethod = "manual"): ValidationResult {
    const result = validateAbilityScores(values, method);
    if (!result.valid) throw toRulesError(result);

    const base = this.baseFor("ability_scores");
    const character = cloneCharacter(base.character);
    for (const ability of ABILITY_NAMES) {
      const value = values[ability];
      if (typeof value === "number") character.abilityScores[ability].roll = value;
    }
    recalculateInPlace(character);
    this.commit("ability_scores", cloneState(base), { ...base, character });
    return result;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step 2: race
  // ─────────────────────────────────────────────────────────────────────────

  getAvailableRaces(): RaceEntry[] {
    return listEntries(this.catalog, "race");
  }

  setRace(raceId: string): void {
    const race = requireEntry(this.catalog, "race", raceId);
    const base = this.baseFor("race");
    const source = sourceLabel.race(race);
    const queued: PendingChoice[] = [];

    if (race.skillChoices) {
      const options = race.skillChoices.options === "any" ? [...SKILL_NAMES] : [...race.skillChoices.options];
      queued.push({ choiceType: "skill", count: race.skillChoices.count, options, source });
    }
    if (race.bonusLanguageChoices > 0) {
      queued.push({ choiceType: "language", count: race.bonusLanguageChoices, options: [...this.catalog.languages], source });
    }
    if (race.flexibleAbilityAdjustment) {
      queued.push(
        race.flexibleAbilityAdjustment.type === HUMAN_CORE_ADJUSTMENT
          ? {
              choiceType: "human_ability_mode",
              count: 1,
              options: [HUMAN_MODE_PLUS_ONE, HUMAN_MODE_SPLIT],
              source: `${source} - Core Ability Adjustment`,
            }
          : { choiceType: "ability_bonus", count: 1, options: [...ABILITY_NAMES], source: `${source} - Ability Adjustment` }
      );
    }

    this.commit("race", cloneState(base), {
      ...base,
      character: applyRace(base.character, race),
      pendingChoices: [...base.pendingChoices, ...queued],
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step 3: ancestry
  // ─────────────────────────────────────────────────────────────────────────

  getAvailableAncestries(): AncestryEntry[] {
    const raceId = this.state.character.origin.race?.id;
    return raceId ? ancestriesForRace(this.catalog, raceId) : [];
  }

  setAncestry(ancestryId: string): void {
    const ancestry = requireEntry(this.catalog, "ancestry", ancestryId);
    const base = this.baseFor("ancestry");
    const race = base.character.origin.race;
    if (race && ancestry.raceId !== race.id) {
      throw new RulesError("RaceMismatch", `Ancestry ${ancestry.name} is not valid for race ${race.name}`, {
        ancestryId,
        raceId: race.id,
        requiredRaceId: ancestry.raceId,
      });
    }

    const queued: PendingChoice[] = [];
    if (ancestry.languageChoices) {
      queued.push({
        choiceType: "language",
        count: ancestry.languageChoices.count,
        options: [...ancestry.languageChoices.options],
        source: sourceLabel.ancestry(ancestry),
      });
    }

    this.commit("ancestry", cloneState(base), {
      ...base,
      character: applyAncestry(base.character, ancestry),
      pendingChoices: [...base.pendingChoices, ...queued],
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step 4: profession
  // ─────────────────────────────────────────────────────────────────────────

  getAvailableProfessions(): ProfessionEntry[] {
    return listEntries(this.catalog, "profession");
  }

  setProfession(professionId: string, dutyId?: string): void {
    const profession = requireEntry(this.catalog, "profession", professionId);
    const duty = dutyId ? findDuty(profession, dutyId) : undefined;
    if (profession.duties.length && !dutyId) {
      throw new RulesError("DutyRequired", `Profession ${profession.name} requires a duty choice`, {
        professionId,
        duties: profession.duties.map((d) => d.id),
      });
    }
    if (dutyId && !duty) {
      throw new RulesError("NotFound", `Unknown duty for ${profession.name}: ${dutyId}`, { professionId, dutyId });
    }

    const base = this.baseFor("profession");
    const source = sourceLabel.profession(profession);
    const queued: PendingChoice[] = [];
    if (profession.skillChoices) {
      queued.push({ choiceType: "skill", count: profession.skillChoices.count, options: [...profession.skillChoices.options], source });
    }
    if (profession.toolChoices) {
      queued.push({ choiceType: "tool", count: profession.toolChoices.count, options: [...profession.toolChoices.options], source });
    }
    if (duty) {
      const dutySource = sourceLabel.duty(duty);
      if (duty.skillChoices) {
        queued.push({ choiceType: "skill", count: duty.skillChoices.count, options: [...duty.skillChoices.options], source: dutySource });
      }
      if (duty.toolChoices) {
        queued.push({ choiceType: "tool", count: duty.toolChoices.count, options: [...duty.toolChoices.options], source: dutySource });
      }
    }

    this.commit("profession", cloneState(base), {
      ...base,
      character: applyProfession(base.character, profession, duty),
      pendingChoices: [...base.pendingChoices, ...queued],
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step 5: path
  // ─────────────────────────────────────────────────────────────────────────

  getAvailablePaths(): PathAvailability[] {
    const totals = abilityTotals(this.state.character);
    return listEntries(this.catalog, "path").map((path) => ({
      path,
      prerequisitesMet: checkPathPrerequisites(path, totals, true),
    }));
  }

  setPath(pathId: string, ignorePrerequisites = false): void {
    const path = requireEntry(this.catalog, "path", pathId);
    const base = this.baseFor("path");
    if (!ignorePrerequisites) {
      const result = validatePathPrerequisites(path, abilityTotals(base.character), true);
      if (!result.valid) {
        throw toRulesError(result, {
          pathId,
          requirement: describePathPrerequisites(path),
          primary: path.prerequisites?.primary,
          secondary: path.prerequisites?.secondary,
        });
      }
    }

    this.commit("path", cloneState(base), { ...base, character: applyPath(base.character, path, true) });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Step 6: background
  // ─────────────────────────────────────────────────────────────────────────

  getAvailableBackgrounds(): BackgroundEntry[] {
    return listEntries(this.catalog, "background");
  }

  setBackground(backgroundId: string): void {
    const background = requireEntry(this.catalog, "background", backgroundId);
    const base = this.baseFor("background");
    const source = sourceLabel.background(background);
    const queued: PendingChoice[] = [];

    if (background.languagesGranted > 0) {
      queued.push({ choiceType: "language", count: background.languagesGranted, options: [...this.catalog.languages], source });
    }
    const tables = background.personalityTables;
    if (tables) {
      for (const [choiceType, { table }] of Object.entries(PERSONALITY_TABLES)) {
        const entries = tables[table];
        if (isChoiceType(choiceType) && entries.length) {
          queued.push({ choiceType, count: 1, options: entries.map(formatPersonalityOption), source });
        }
      }
    }

    this.commit("background", cloneState(base), {
      ...base,
      character: applyBackground(base.character, background),
      pendingChoices: [...base.pendingChoices, ...queued],
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Pending choices
  // ─────────────────────────────────────────────────────────────────────────

  private possessedFor(choiceType: ChoiceType, character: CharacterSheet): ReadonlySet<string> {
    switch (choiceType) {
      case "skill":
        return new Set<string>(trainedSkills(character));
      case "language":
        return new Set(character.languages);
      case "tool":
        return new Set(character.proficiencies);
      default:
        return new Set();
    }
  }

  /** Options still worth picking, with the count shrunk to match. */
  private offered(choice: PendingChoice, character: CharacterSheet): PendingChoice {
    const possessed = this.possessedFor(choice.choiceType, character);
    const options = choice.options.filter((o) => !possessed.has(o));
    return { ...choice, options, count: Math.min(choice.count, options.length) };
  }

  getPendingChoices(): PendingChoice[] {
    return this.state.pendingChoices.map((choice) => this.offered(choice, this.state.character));
  }

  resolveChoice(choiceType: string, selections: readonly string[], source?: string): void {
    const queue = this.state.pendingChoices;
    const index = queue.findIndex((c) => c.choiceType === choiceType && (source === undefined || c.source === source));
    if (index === -1) {
      throw new RulesError(
        "NoPendingChoice",
        `No pending choice of type '${choiceType}'${source === undefined ? "" : ` from ${source}`}`,
        { choiceType, source }
      );
    }

    const choice = queue[index];
    const character = cloneCharacter(this.state.character);
    const view = this.offered(choice, character);
    const result = validateChoiceSelections(
      { count: view.count, options: choice.options },
      selections,
      this.possessedFor(choice.choiceType, character)
    );
    if (!result.valid) throw toRulesError(result, { choiceType, source: choice.source });

    const followUps = this.applyChoice(character, choice, selections);
    recalculateInPlace(character);
    const partner = SPLIT_PARTNERS[choice.choiceType];
    const remaining = [...queue.slice(0, index), ...queue.slice(index + 1)].map((pending) =>
      pending.choiceType === partner
        ? { ...pending, options: pending.options.filter((o) => !selections.includes(o)) }
        : pending
    );
    this.state = { ...this.state, character, pendingChoices: [...remaining, ...followUps] };
  }

  private applyChoice(character: CharacterSheet, choice: PendingChoice, selections: readonly string[]): PendingChoice[] {
    const adjustAbilities = (delta: number): void => {
      for (const selection of selections) {
        if (isAbilityName(selection)) character.abilityScores[selection].misc += delta;
      }
    };

    switch (choice.choiceType) {
      case "skill":
        for (const selection of selections) {
          if (isSkillName(selection)) trainSkill(character, selection);
        }
        return [];
      case "language":
        selections.forEach((s) => addUnique(character.languages, s));
        return [];
      case "tool":
        selections.forEach((s) => addUnique(character.proficiencies, s));
        return [];
      case "ability_bonus":
        adjustAbilities(1);
        return [];
      case "ability_bonus_plus2":
        adjustAbilities(2);
        return [];
      case "ability_penalty":
        adjustAbilities(-1);
        return [];
      case "human_ability_mode":
        return this.humanFollowUps(character, selections[0]);
      case "personality_trait":
      case "personality_ideal":
      case "personality_bond":
      case "personality_flaw":
        this.applyPersonality(character, choice.choiceType, selections[0]);
        return [];
    }
  }

  private humanFollowUps(character: CharacterSheet, mode: string): PendingChoice[] {
    const raceName = character.origin.race?.name ?? "Human";
    const options: AbilityName[] = [...ABILITY_NAMES];
    if (mode === HUMAN_MODE_SPLIT) {
      return [
        { choiceType: "ability_bonus_plus2", count: 1, options: [...options], source: `${raceName} Race - +2 Bonus` },
        { choiceType: "ability_penalty", count: 1, options: [...options], source: `${raceName} Race - -1 Penalty` },
      ];
    }
    return [{ choiceType: "ability_bonus", count: 1, options, source: `${raceName} Race - +1 Bonus` }];
  }

  private applyPersonality(character: CharacterSheet, choiceType: ChoiceType, selection: string): void {
    if (!isPersonalityChoice(choiceType)) return;
    const backgroundId = character.origin.background?.id;
    if (!backgroundId) return;
    const tables = requireEntry(this.catalog, "background", backgroundId).personalityTables;
    const { table, field } = PERSONALITY_TABLES[choiceType];
    const roll = Number.parseInt(selection.split(":")[0], 10);
    const entry = tables?.[table].find((e) => e.roll === roll);
    if (!entry) return;
    character.personality[field] = entry.text;
    character.alignment.modifier += entry.morality;
    character.reputation.modifier += entry.reputation;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Starting talents
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Initial talent purchase at level 1. Same rank, prerequisite and budget
   * rules as a level-up; all requests apply or none do.
   */
  purchaseStartingTalents(requests: readonly TalentPurchaseRequest[]): void {
    if (stepIndex(this.state.step) <= stepIndex("path")) {
      throw new RulesError("StepOutOfOrder", "Choose a path before purchasing talents", { currentStep: this.state.step });
    }
    const character = this.state.character;
    if (character.talents.length) {
      throw new RulesError("AlreadyPossessed", "Starting talents have already been purchased");
    }

    const budget = computeTalentBudget(this.catalog, character);
    const plan = validateTalentPurchases(this.catalog, character, requests, { ...budget, level: character.level });
    if (!plan.result.valid) throw toRulesError(plan.result, { talentPoints: budget.talentPoints });

    const next = plan.purchases.reduce(
      (sheet, purchase) => applyTalentRank(sheet, purchase.talent, purchase.newRank, purchase.choiceData),
      character
    );
    this.state = { ...this.state, character: next };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Finalisation
  // ─────────────────────────────────────────────────────────────────────────

  isComplete(): boolean {
    return this.state.step === "complete" && this.state.pendingChoices.length === 0;
  }

  recalculateAll(): void {
    this.state = { ...this.state, character: recalculateAll(this.state.character) };
  }

  /** Recalculated copy of the character; the builder keeps its own. */
  getCharacter(): CharacterSheet {
    this.recalculateAll();
    return cloneCharacter(this.state.character);
  }

  getSummary(): string {
    const { character, pendingChoices, step } = this.state;
    const { origin } = character;
    const chosen = (value?: { name: string }) => value?.name ?? "(not chosen)";
    const lines = [
      `Character: ${character.name || "(unnamed)"}`,
      `Current Step: ${STEP_LABELS[step]}`,
      "",
      `Race: ${chosen(origin.race)}`,
      `Ancestry: ${chosen(origin.ancestry)}`,
      `Profession: ${chosen(origin.profession)}`,
    ];
    if (origin.duty) lines.push(`  Duty: ${origin.duty.name}`);
    lines.push(
      `Path: ${chosen(origin.primaryPath)}`,
      `Background: ${chosen(origin.background)}`,
      "",
      `Pending Choices: ${pendingChoices.length}`,
      ...pendingChoices.map((c) => `  - ${c.source}: Choose ${c.count} ${c.choiceType}(s)`)
    );
    return lines.join("\n");
  }
}
