import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { loadContentPackFromFile, parseContentPack } from "../content/import";
import { mapDefinition, toCatalogInput } from "../routes/definitions-helpers";
import { createRulesCatalog, requireEntry } from "@shared/rules/catalog";
import { RulesError } from "@shared/rules/errors";

const PACK_PATH = path.join(process.cwd(), "server", "data", "content-pack.yaml");

const emptyPack = {
  ruleset: { key: "test" },
  races: [],
  ancestries: [],
  professions: [],
  paths: [],
  backgrounds: [],
  talents: [],
};

describe("loadContentPackFromFile", () => {
  it("loads the bundled YAML pack", () => {
    const pack = loadContentPackFromFile(PACK_PATH);
    expect(pack.ruleset.key).toBe("core");
    expect(pack.races.map((r) => r.key)).toEqual(["elf", "human", "dwarf", "tauran"]);
    expect(pack.professions.find((p) => p.key === "warrior")?.duties?.map((d) => d.key)).toEqual(["fighter", "ranger"]);
  });

  it("loads JSON packs", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "content-pack-"));
    const file = path.join(dir, "pack.json");
    fs.writeFileSync(file, JSON.stringify({ ...emptyPack, ruleset: { key: "json", name: "From JSON" } }));
    try {
      expect(loadContentPackFromFile(file).ruleset).toEqual({ key: "json", name: "From JSON", description: undefined });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("rejects other file types", () => {
    expect(() => loadContentPackFromFile("pack.txt")).toThrow("Unsupported content file extension: .txt");
  });
});

describe("parseContentPack", () => {
  it("defaults the ruleset name to its key", () => {
    expect(parseContentPack(emptyPack).ruleset.name).toBe("test");
  });

  it("requires a ruleset key", () => {
    expect(() => parseContentPack(null)).toThrow("Content pack must be an object");
    expect(() => parseContentPack({ races: [] })).toThrow("Content pack must include ruleset with key");
  });

  it("names the field that failed", () => {
    expect(() => parseContentPack({ ...emptyPack, races: "nope" })).toThrow("pack: races must be a list");
    expect(() =>
      parseContentPack({ ...emptyPack, races: [{ key: "a", name: "A", abilityModifiers: { Luck: 1 } }] })
    ).toThrow("races[0].abilityModifiers: unknown ability Luck");
    expect(() => parseContentPack({ ...emptyPack, talents: [{ key: "t", name: "T" }] })).toThrow(
      "talents[0]: ranks is required"
    );
  });
});

describe("toCatalogInput", () => {
  const catalog = createRulesCatalog(toCatalogInput(loadContentPackFromFile(PACK_PATH)));

  it("turns rank lists into numbered ranks", () => {
    const talent = requireEntry(catalog, "talent", "arcane-focus");
    expect(talent.maxRank).toBe(3);
    expect(talent.category).toBe("path");
    expect(talent.pathId).toBe("mystic");
    expect(talent.ranks[3]).toBe("+3 to spell attack rolls and one free recast per rest.");
    expect(talent.prerequisites).toEqual({
      abilities: { Intellect: 13 },
      mode: "and",
      levelByRank: { 3: 5 },
      requiredTalents: [],
      allPathTalents: false,
    });
  });

  it("maps choices and flexible adjustments", () => {
    const focus = requireEntry(catalog, "talent", "weapon-focus");
    expect(focus.category).toBe("general");
    expect(focus.requiresChoice).toBe(true);
    expect(focus.choiceType).toBe("weapon");
    expect(focus.choiceOptions).toEqual(["Sword", "Axe", "Bow"]);

    const human = requireEntry(catalog, "race", "human");
    expect(human.flexibleAbilityAdjustment).toEqual({ type: "human_core" });
    expect(human.skillChoices).toEqual({ count: 1, options: "any" });
  });

  it("fills personality defaults", () => {
    const sage = requireEntry(catalog, "background", "scholar");
    expect(sage.personalityTables?.ideals[0]).toEqual({
      roll: 1,
      text: "Knowledge should be shared.",
      morality: 1,
      reputation: 0,
    });
  });

  it("summarises entries with their parent", () => {
    expect(mapDefinition(requireEntry(catalog, "ancestry", "sylari"))).toEqual({
      id: "sylari",
      name: "Sylari",
      description: "Wood elves who keep the groves of the western wilds.",
      parentId: "elf",
    });
  });

  it("rejects ancestries of unknown races", () => {
    const pack = parseContentPack({ ...emptyPack, ancestries: [{ key: "x", raceKey: "orc", name: "X" }] });
    expect(() => createRulesCatalog(toCatalogInput(pack))).toThrow(RulesError);
  });
});
