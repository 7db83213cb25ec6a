import { Router } from "express";
import type { Request, Response } from "express";

import { isRulesEntryKind, listEntries, requireEntry, RULES_ENTRY_KINDS } from "@shared/rules/catalog";
import { getContentPack, getRulesCatalog, mapDefinition } from "./definitions-helpers";
import { sendRouteError } from "./errors";

export const definitionsRouter = Router();

definitionsRouter.get("/", (_req: Request, res: Response) => {
  try {
    const pack = getContentPack();
    const catalog = getRulesCatalog();
    res.json({
      ruleset: pack.ruleset,
      languages: catalog.languages,
      races: listEntries(catalog, "race").map(mapDefinition),
      ancestries: listEntries(catalog, "ancestry").map(mapDefinition),
      professions: listEntries(catalog, "profession").map(mapDefinition),
      paths: listEntries(catalog, "path").map(mapDefinition),
      backgrounds: listEntries(catalog, "background").map(mapDefinition),
      talents: listEntries(catalog, "talent").map(mapDefinition),
    });
  } catch (err) {
    sendRouteError(res, err, "Unable to load definitions");
  }
});

definitionsRouter.get("/:kind", (req: Request, res: Response) => {
  const { kind } = req.params;
  if (!isRulesEntryKind(kind)) {
    return res.status(404).json({ error: `Unknown definition kind: ${kind}`, kinds: RULES_ENTRY_KINDS });
  }
  try {
    res.json(listEntries(getRulesCatalog(), kind));
  } catch (err) {
    sendRouteError(res, err, "Unable to load definitions");
  }
});

definitionsRouter.get("/:kind/:id", (req: Request, res: Response) => {
  const { kind, id } = req.params;
  if (!isRulesEntryKind(kind)) {
    return res.status(404).json({ error: `Unknown definition kind: ${kind}`, kinds: RULES_ENTRY_KINDS });
  }
  try {
    res.json(requireEntry(getRulesCatalog(), kind, id));
  } catch (err) {
    sendRouteError(res, err, "Unable to load definition");
  }
});
