import { describe, expect, it } from "vitest";
import { collectDescendants, getChildren, getFamily, getIndividual, getIndividuals, lookup } from "./descendants";
import { parseGedcom } from "./gedcom";

const document = parseGedcom(
  [
    "0 @I1@ INDI",
    "1 NAME Walter /Pryce/",
    "1 FAMS @F1@",
    "0 @I2@ INDI",
    "1 NAME Edith /Cole/",
    "1 FAMS @F1@",
    "0 @I3@ INDI",
    "1 NAME Arthur /Pryce/",
    "1 FAMC @F1@",
    "1 FAMS @F2@",
    "1 FAMS @F3@",
    "1 FAMS @F404@",
    "0 @I4@ INDI",
    "1 NAME Margaret /Pryce/",
    "1 FAMC @F1@",
    "0 @I5@ INDI",
    "1 NAME Thomas /Pryce/",
    "1 FAMC @F2@",
    "0 @I6@ INDI",
    "1 NAME Ruth /Lamb/",
    "1 FAMS @F2@",
    "0 @F1@ FAM",
    "1 HUSB @I1@",
    "1 WIFE @I2@",
    "1 CHIL @I3@",
    "1 CHIL @I4@",
    "0 @F2@ FAM",
    "1 HUSB @I3@",
    "1 WIFE @I6@",
    "1 CHIL @I5@",
    "1 CHIL @I99@",
    "0 @F3@ FAM",
    "1 HUSB @I3@",
    "1 CHIL @I5@",
    "0 @F4@ FAM",
    "1 HUSB @I1@",
  ].join("\n"),
);

describe("lookup", () => {
  it("treats empty and dangling pointers as absent", () => {
    expect(lookup(document.individuals, undefined)).toBeUndefined();
    expect(lookup(document.individuals, "")).toBeUndefined();
    expect(getIndividual(document, "@I404@")).toBeUndefined();
    expect(getFamily(document, "@F404@")).toBeUndefined();
    expect(getFamily(document, "@F1@")?.husband).toBe("@I1@");
  });

  it("skips holes when resolving a list", () => {
    const resolved = getIndividuals(document, ["@I5@", "@I99@", "@I3@"]);
    expect(resolved.map((individual) => individual.id)).toEqual(["@I5@", "@I3@"]);
  });
});

describe("getChildren", () => {
  it("merges children across spouse families without duplicates", () => {
    const arthur = getIndividual(document, "@I3@");
    expect(arthur).toBeDefined();
    if (!arthur) {
      return;
    }
    expect(getChildren(document, arthur).map((child) => child.id)).toEqual(["@I5@"]);
  });
});

describe("collectDescendants", () => {
  const root = getFamily(document, "@F1@");
  if (!root) {
    throw new Error("fixture family @F1@ missing");
  }

  it("collects children and grandchildren but not the couple", () => {
    const descendants = collectDescendants(document, root);
    expect([...descendants].sort()).toEqual(["@I3@", "@I4@", "@I5@", "@I99@"]);
    expect(descendants.has("@I1@")).toBe(false);
    expect(descendants.has("@I2@")).toBe(false);
  });

  it("returns the same set on repeated runs", () => {
    expect(collectDescendants(document, root)).toEqual(collectDescendants(document, root));
  });

  it("returns an empty set for a childless family", () => {
    const childless = getFamily(document, "@F4@");
    expect(childless).toBeDefined();
    if (childless) {
      expect(collectDescendants(document, childless).size).toBe(0);
    }
  });

  it("terminates on cyclic family references", () => {
    const cyclic = parseGedcom(
      [
        "0 @I1@ INDI",
        "1 FAMS @F1@",
        "0 @I2@ INDI",
        "1 FAMS @F2@",
        "0 @F1@ FAM",
        "1 HUSB @I1@",
        "1 CHIL @I2@",
        "0 @F2@ FAM",
        "1 HUSB @I2@",
        "1 CHIL @I1@",
      ].join("\n"),
    );
    const family = getFamily(cyclic, "@F1@");
    expect(family).toBeDefined();
    if (family) {
      expect([...collectDescendants(cyclic, family)].sort()).toEqual(["@I1@", "@I2@"]);
    }
  });
});
