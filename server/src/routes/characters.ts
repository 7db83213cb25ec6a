import { Router } from "express";
import type { Request, Response } from "express";

import { AdvancementEngine } from "@shared/rules/advancement";
import type { LevelUpRequest } from "@shared/rules/advancement";
import { CharacterBuilder } from "@shared/rules/builder";
import type { CharacterSheet } from "@shared/rules/character";
import { toCharacterRecord } from "@shared/rules/character";
import { RulesError } from "@shared/rules/errors";
import { awardExperience } from "@shared/rules/progression";
import type { AdvancementPurchaseRequest, TalentPurchaseRequest } from "@shared/rules/validation";
import { describePathPrerequisites, isAbilityScoreMethod, validateCharacter } from "@shared/rules/validation";
import { getRulesCatalog } from "./definitions-helpers";
import { sendRouteError } from "./errors";

/**
 * Builder sessions are held in memory for the life of the process. Once a
 * finished character levels up or gains experience, `sheet` holds the live
 * copy and the builder is frozen.
 */
export interface CharacterSession {
  id: string;
  builder: CharacterBuilder;
  sheet: CharacterSheet | null;
  createdAt: string;
  updatedAt: string;
}

const sessions = new Map<string, CharacterSession>();

function createCharacterId(): string {
  return `${Date.now()}-${Math.random().toString(16).slice(2)}`;
}

const currentSheet = (session: CharacterSession): CharacterSheet =>
  session.sheet ?? session.builder.getCharacter();

const touch = (session: CharacterSession) => {
  session.updatedAt = new Date().toISOString();
};

const snapshot = (session: CharacterSession) => ({
  id: session.id,
  step: session.builder.currentStep,
  complete: session.builder.isComplete(),
  levelled: session.sheet !== null,
  pendingChoices: session.builder.getPendingChoices(),
  summary: session.builder.getSummary(),
  character: toCharacterRecord(currentSheet(session)),
  createdAt: session.createdAt,
  updatedAt: session.updatedAt,
});

function assertBuilding(session: CharacterSession): void {
  if (session.sheet) {
    throw new RulesError("StepOutOfOrder", "Character creation is closed once the character has advanced", {
      level: session.sheet.level,
    });
  }
}

function assertComplete(session: CharacterSession): void {
  if (!session.sheet && !session.builder.isComplete()) {
    throw new RulesError("StepOutOfOrder", "Finish character creation first", {
      step: session.builder.currentStep,
      pendingChoices: session.builder.getPendingChoices().length,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// BODY SANITIZERS
// ═══════════════════════════════════════════════════════════════════════════

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function sanitizeId(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}

function sanitizeStringList(input: unknown): string[] | undefined {
  if (!Array.isArray(input)) return undefined;
  const cleaned = input.filter((v): v is string => typeof v === "string");
  return cleaned.length === input.length ? cleaned : undefined;
}

function sanitizeTalentRequests(input: unknown): TalentPurchaseRequest[] | undefined {
  if (input === undefined) return [];
  if (!Array.isArray(input)) return undefined;
  const requests: TalentPurchaseRequest[] = [];
  for (const item of input) {
    if (!isRecord(item)) return undefined;
    const { talentId, desiredNewRank, pathId, choiceData } = item;
    if (typeof talentId !== "string" || typeof desiredNewRank !== "number") return undefined;
    requests.push({
      talentId,
      desiredNewRank,
      pathId: typeof pathId === "string" ? pathId : undefined,
      choiceData: typeof choiceData === "string" ? choiceData : undefined,
    });
  }
  return requests;
}

function sanitizeAdvancements(input: unknown): AdvancementPurchaseRequest[] | undefined {
  if (input === undefined) return [];
  if (!Array.isArray(input)) return undefined;
  const requests: AdvancementPurchaseRequest[] = [];
  for (const item of input) {
    if (!isRecord(item) || typeof item.choiceType !== "string") return undefined;
    requests.push({ choiceType: item.choiceType, target: typeof item.target === "string" ? item.target : "" });
  }
  return requests;
}

/** Non-numeric values stay in as NaN so the rules reject the whole increase. */
function sanitizeAbilityIncrease(input: unknown): Record<string, number> | undefined {
  if (!isRecord(input)) return undefined;
  const result: Record<string, number> = {};
  for (const [key, value] of Object.entries(input)) {
    result[key] = typeof value === "number" ? value : Number.NaN;
  }
  return result;
}

function sanitizeLevelUpRequest(body: unknown): LevelUpRequest | string {
  const value: Record<string, unknown> = isRecord(body) ? body : {};
  const talents = sanitizeTalentRequests(value.talents);
  if (!talents) return "talents must be a list of { talentId, desiredNewRank }";
  const advancements = sanitizeAdvancements(value.advancements);
  if (!advancements) return "advancements must be a list of { choiceType, target }";
  const abilityIncrease = sanitizeAbilityIncrease(value.abilityIncrease);
  if (value.abilityIncrease !== undefined && !abilityIncrease) {
    return "abilityIncrease must be an object of ability to points";
  }
  return {
    targetLevel: typeof value.targetLevel === "number" ? value.targetLevel : undefined,
    talents,
    advancements,
    abilityIncrease,
    hpRoll: typeof value.hpRoll === "number" ? value.hpRoll : undefined,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════════════════

export const charactersRouter = Router();

/** Looks up the session, answering 404 itself when there is none. */
function findSession(req: Request, res: Response): CharacterSession | undefined {
  const session = sessions.get(req.params.id);
  if (!session) res.status(404).json({ error: "not found" });
  return session;
}

/** Runs one builder step and replies with the updated snapshot. */
function runStep(req: Request, res: Response, fallback: string, step: (builder: CharacterBuilder) => unknown) {
  const session = findSession(req, res);
  if (!session) return;
  try {
    assertBuilding(session);
    const outcome = step(session.builder);
    touch(session);
    res.json({ ...snapshot(session), ...(isRecord(outcome) ? { validation: outcome } : {}) });
  } catch (err) {
    sendRouteError(res, err, fallback);
  }
}

charactersRouter.get("/", (_req: Request, res: Response) => {
  res.json(
    [...sessions.values()].map((session) => {
      const sheet = currentSheet(session);
      return { id: session.id, name: sheet.name, level: sheet.level, step: session.builder.currentStep };
    })
  );
});

charactersRouter.post("/", (req: Request, res: Response) => {
  const { name, requireResolvedChoices } = req.body ?? {};
  try {
    const now = new Date().toISOString();
    const session: CharacterSession = {
      id: createCharacterId(),
      builder: new CharacterBuilder(getRulesCatalog(), {
        characterName: typeof name === "string" ? name.trim() : "",
        requireResolvedChoices: requireResolvedChoices === true,
      }),
      sheet: null,
      createdAt: now,
      updatedAt: now,
    };
    sessions.set(session.id, session);
    res.status(201).json(snapshot(session));
  } catch (err) {
    sendRouteError(res, err, "Unable to create character");
  }
});

charactersRouter.get("/:id", (req: Request, res: Response) => {
  const session = findSession(req, res);
  if (!session) return;
  try {
    res.json(snapshot(session));
  } catch (err) {
    sendRouteError(res, err, "Unable to load character");
  }
});

charactersRouter.put("/:id/name", (req: Request, res: Response) => {
  const name = sanitizeId(req.body?.name);
  if (!name) return res.status(400).json({ error: "name is required" });
  runStep(req, res, "Unable to rename character", (builder) => builder.setCharacterName(name));
});

charactersRouter.put("/:id/ability-scores", (req: Request, res: Response) => {
  const { scores, method } = req.body ?? {};
  if (!isRecord(scores)) return res.status(400).json({ error: "scores must be an object" });
  if (method !== undefined && (typeof method !== "string" || !isAbilityScoreMethod(method))) {
    return res.status(400).json({ error: `Unknown ability score method: ${String(method)}` });
  }
  runStep(req, res, "Unable to set ability scores", (builder) => builder.setAbilityScores(scores, method));
});

charactersRouter.put("/:id/race", (req: Request, res: Response) => {
  const raceId = sanitizeId(req.body?.raceId);
  if (!raceId) return res.status(400).json({ error: "raceId is required" });
  runStep(req, res, "Unable to set race", (builder) => builder.setRace(raceId));
});

charactersRouter.put("/:id/ancestry", (req: Request, res: Response) => {
  const ancestryId = sanitizeId(req.body?.ancestryId);
  if (!ancestryId) return res.status(400).json({ error: "ancestryId is required" });
  runStep(req, res, "Unable to set ancestry", (builder) => builder.setAncestry(ancestryId));
});

charactersRouter.put("/:id/profession", (req: Request, res: Response) => {
  const professionId = sanitizeId(req.body?.professionId);
  const dutyId = sanitizeId(req.body?.dutyId);
  if (!professionId) return res.status(400).json({ error: "professionId is required" });
  runStep(req, res, "Unable to set profession", (builder) => builder.setProfession(professionId, dutyId));
});

charactersRouter.get("/:id/paths", (req: Request, res: Response) => {
  const session = findSession(req, res);
  if (!session) return;
  try {
    res.json(
      session.builder.getAvailablePaths().map(({ path, prerequisitesMet }) => ({
        id: path.id,
        name: path.name,
        description: path.description,
        requirement: describePathPrerequisites(path),
        prerequisitesMet,
      }))
    );
  } catch (err) {
    sendRouteError(res, err, "Unable to list paths");
  }
});

charactersRouter.put("/:id/path", (req: Request, res: Response) => {
  const pathId = sanitizeId(req.body?.pathId);
  const ignorePrerequisites = req.body?.ignorePrerequisites === true;
  if (!pathId) return res.status(400).json({ error: "pathId is required" });
  runStep(req, res, "Unable to set path", (builder) => builder.setPath(pathId, ignorePrerequisites));
});

charactersRouter.put("/:id/background", (req: Request, res: Response) => {
  const backgroundId = sanitizeId(req.body?.backgroundId);
  if (!backgroundId) return res.status(400).json({ error: "backgroundId is required" });
  runStep(req, res, "Unable to set background", (builder) => builder.setBackground(backgroundId));
});

charactersRouter.post("/:id/choices", (req: Request, res: Response) => {
  const { choiceType, selections, source } = req.body ?? {};
  const cleanedSelections = sanitizeStringList(selections);
  if (typeof choiceType !== "string" || !cleanedSelections) {
    return res.status(400).json({ error: "choiceType and selections are required" });
  }
  const cleanedSource = typeof source === "string" ? source : undefined;
  runStep(req, res, "Unable to resolve choice", (builder) =>
    builder.resolveChoice(choiceType, cleanedSelections, cleanedSource)
  );
});

charactersRouter.post("/:id/talents", (req: Request, res: Response) => {
  const talents = sanitizeTalentRequests(req.body?.talents);
  if (!talents) return res.status(400).json({ error: "talents must be a list of { talentId, desiredNewRank }" });
  runStep(req, res, "Unable to purchase talents", (builder) => builder.purchaseStartingTalents(talents));
});

charactersRouter.get("/:id/validation", (req: Request, res: Response) => {
  const session = findSession(req, res);
  if (!session) return;
  try {
    res.json(validateCharacter(currentSheet(session), getRulesCatalog()));
  } catch (err) {
    sendRouteError(res, err, "Unable to validate character");
  }
});

charactersRouter.get("/:id/level-up", (req: Request, res: Response) => {
  const session = findSession(req, res);
  if (!session) return;
  try {
    assertComplete(session);
    const engine = new AdvancementEngine(getRulesCatalog());
    res.json(engine.getLevelUpOptions(currentSheet(session)));
  } catch (err) {
    sendRouteError(res, err, "Unable to load level-up options");
  }
});

charactersRouter.post("/:id/level-up", (req: Request, res: Response) => {
  const session = findSession(req, res);
  if (!session) return;
  const request = sanitizeLevelUpRequest(req.body);
  if (typeof request === "string") return res.status(400).json({ error: request });
  try {
    assertComplete(session);
    const engine = new AdvancementEngine(getRulesCatalog());
    const outcome = engine.levelUp(currentSheet(session), request);
    const { errors, warnings, codes } = outcome.validation;
    if (!outcome.success) {
      return res.status(422).json({ error: errors.join("; "), errors, warnings, codes });
    }
    session.sheet = outcome.character;
    touch(session);
    res.json({ ...snapshot(session), warnings });
  } catch (err) {
    sendRouteError(res, err, "Unable to level up");
  }
});

charactersRouter.post("/:id/experience", (req: Request, res: Response) => {
  const session = findSession(req, res);
  if (!session) return;
  const { amount } = req.body ?? {};
  if (typeof amount !== "number") return res.status(400).json({ error: "amount must be a number" });
  try {
    assertComplete(session);
    session.sheet = awardExperience(currentSheet(session), amount);
    touch(session);
    const engine = new AdvancementEngine(getRulesCatalog());
    res.json({ ...snapshot(session), progress: engine.getLevelSummary(session.sheet) });
  } catch (err) {
    sendRouteError(res, err, "Unable to award experience");
  }
});

charactersRouter.delete("/:id", (req: Request, res: Response) => {
  if (!sessions.delete(req.params.id)) return res.status(404).json({ error: "not found" });
  res.status(204).end();
});
