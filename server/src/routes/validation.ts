import { Router } from "express";
import type { Request, Response } from "express";

import { isAbilityScoreMethod, validateAbilityScores } from "@shared/rules/validation";

export const validationRouter = Router();

// Dry-run check for ability scores; always 200 with the full result.
validationRouter.post("/ability-scores", (req: Request, res: Response) => {
  const { scores, method } = req.body ?? {};
  if (!scores || typeof scores !== "object" || Array.isArray(scores)) {
    return res.status(400).json({ error: "scores must be an object" });
  }
  if (method !== undefined && (typeof method !== "string" || !isAbilityScoreMethod(method))) {
    return res.status(400).json({ error: `Unknown ability score method: ${String(method)}` });
  }
  res.json(validateAbilityScores(scores, method));
});
