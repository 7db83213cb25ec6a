import { describe, expect, it } from "vitest";
import { DEFAULT_LANGUAGES } from "../rules/abilities";
import { ancestriesForRace, createRulesCatalog, findEntry, listEntries, requireEntry, talentsForPath } from "../rules/catalog";
import { RulesError } from "../rules/errors";
import { createRace, createTalent, createTestCatalog, createTestCatalogInput } from "../test-utils/catalog";

const captureError = (fn: () => unknown): RulesError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof RulesError) return err;
    throw err;
  }
  throw new Error("expected a RulesError");
};

describe("createRulesCatalog", () => {
  it("indexes entries by kind and id", () => {
    const catalog = createTestCatalog();
    expect(listEntries(catalog, "race").map((r) => r.id)).toEqual(["elf", "human", "tauran"]);
    expect(findEntry(catalog, "path", "mystic")?.name).toBe("Mystic");
    expect(findEntry(catalog, "path", "necromancer")).toBeUndefined();
    expect(catalog.languages).toEqual(DEFAULT_LANGUAGES);
  });

  it("freezes entries", () => {
    const catalog = createTestCatalog();
    expect(Object.isFrozen(requireEntry(catalog, "race", "elf"))).toBe(true);
  });

  it("rejects duplicate ids", () => {
    const input = createTestCatalogInput();
    input.races.push(createRace({ id: "elf", name: "Other Elf" }));
    const error = captureError(() => createRulesCatalog(input));
    expect(error.code).toBe("InvalidInput");
    expect(error.message).toBe("Duplicate race id: elf");
  });

  it("rejects ancestries of unknown races", () => {
    const input = createTestCatalogInput();
    input.ancestries[0].raceId = "dwarf";
    expect(() => createRulesCatalog(input)).toThrow("Ancestry sylari references unknown race dwarf");
  });

  it("rejects talents with gaps in their ranks", () => {
    const input = createTestCatalogInput();
    input.talents.push(createTalent({ id: "gap", name: "Gap", maxRank: 2, ranks: { 1: "first" } }));
    expect(() => createRulesCatalog(input)).toThrow("Talent gap is missing rank 2 of 2");
  });

  it("rejects path talents without a known path", () => {
    const input = createTestCatalogInput();
    input.talents.push(createTalent({ id: "lost", name: "Lost", pathId: "nowhere" }));
    expect(() => createRulesCatalog(input)).toThrow("Talent lost references unknown path nowhere");
  });

  it("rejects unknown skills", () => {
    const input = createTestCatalogInput();
    input.backgrounds[0].skillProficiencies = ["Basket Weaving"];
    expect(() => createRulesCatalog(input)).toThrow("Background scholar references unknown skill Basket Weaving");
  });

  it("uses a custom language list when given", () => {
    const catalog = createRulesCatalog({ ...createTestCatalogInput(), languages: ["Common", "Sylvan"] });
    expect(catalog.languages).toEqual(["Common", "Sylvan"]);
  });
});

describe("lookups", () => {
  const catalog = createTestCatalog();

  it("reports unknown ids as NotFound", () => {
    const error = captureError(() => requireEntry(catalog, "race", "dwarf"));
    expect(error.code).toBe("NotFound");
    expect(error.message).toBe("Unknown race: dwarf");
  });

  it("filters ancestries by race and talents by path", () => {
    expect(ancestriesForRace(catalog, "elf").map((a) => a.id)).toEqual(["sylari"]);
    expect(talentsForPath(catalog, "mystic").map((t) => t.id)).toEqual(["arcane-focus", "mystic-ward", "archmage"]);
  });
});
