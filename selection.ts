import { getFamily, getIndividual, getSpouseFamilies } from "./descendants";
import { RootSelectionError } from "./errors";
import type { GedcomDocument } from "./gedcom";
import { displayName, normalize } from "./names";
import type { Family, Individual } from "./schema";

export interface RootSelection {
  familyId?: string;
  husband?: string;
  wife?: string;
}

export interface RootCouple {
  family: Family;
  husband: Individual;
  wife: Individual;
}

type MatchTier = 0 | 1 | 2;

function scoreMatch(display: string, query: string): [MatchTier, number] {
  if (display === query) {
    return [0, display.length];
  }
  if (display.startsWith(query)) {
    return [1, display.length];
  }
  return [2, display.length];
}

/**
 * Finds the single individual whose name best matches `query`. Exact matches
 * beat prefix matches, which beat substring matches; shorter names win within
 * a tier. Two candidates sharing the best tier are reported as ambiguous.
 */
export function findIndividual(individuals: ReadonlyMap<string, Individual>, query: string): Individual {
  const normalizedQuery = normalize(query);
  if (!normalizedQuery) {
    throw new RootSelectionError("empty-query", "Empty name provided");
  }

  const matches = [...individuals.values()]
    .map((individual) => ({
      individual,
      score: scoreMatch(normalize(displayName(individual)), normalizedQuery),
    }))
    .filter(({ individual }) => normalize(displayName(individual)).includes(normalizedQuery))
    .sort((a, b) => a.score[0] - b.score[0] || a.score[1] - b.score[1]);

  if (!matches.length) {
    throw new RootSelectionError("not-found", `Could not find an individual matching '${query}'.`);
  }

  const [best, runnerUp] = matches;
  if (runnerUp && runnerUp.score[0] === best.score[0]) {
    throw new RootSelectionError(
      "ambiguous",
      `Multiple individuals match '${query}'. Please be more specific or use an ID.`,
    );
  }

  return best.individual;
}

/**
 * First family joining the two individuals as spouses, in either role.
 */
export function findFamilyBySpouses(
  families: ReadonlyMap<string, Family>,
  husbandId: string,
  wifeId: string,
): Family | undefined {
  for (const family of families.values()) {
    if (family.husband === husbandId && family.wife === wifeId) {
      return family;
    }
    if (family.husband === wifeId && family.wife === husbandId) {
      return family;
    }
  }
  return undefined;
}

function resolveByFamilyId(document: GedcomDocument, familyId: string): RootCouple {
  const family = getFamily(document, familyId);
  if (!family) {
    throw new RootSelectionError("family-not-found", `Family ID ${familyId} not found in GEDCOM file.`);
  }
  if (!family.husband || !family.wife) {
    throw new RootSelectionError("incomplete-family", "Base family must have both husband and wife defined.");
  }

  const husband = getIndividual(document, family.husband);
  const wife = getIndividual(document, family.wife);
  if (!husband || !wife) {
    throw new RootSelectionError("missing-spouse", "Base family references individuals that were not found.");
  }

  return { family, husband, wife };
}

function listSpousePairs(document: GedcomDocument, husband: Individual): Array<{ family: Family; spouse: Individual }> {
  return getSpouseFamilies(document, husband).flatMap((family) => {
    const spouseId = family.husband === husband.id ? family.wife : family.husband;
    const spouse = getIndividual(document, spouseId);
    return spouse ? [{ family, spouse }] : [];
  });
}

/**
 * Determines the couple at the root of the site. An explicit family ID wins;
 * otherwise the husband is looked up by name and his spouses are filtered by
 * the wife's name, falling back to his only spouse, and finally to looking
 * the wife up on her own.
 */
export function resolveRootCouple(document: GedcomDocument, selection: RootSelection): RootCouple {
  if (selection.familyId) {
    return resolveByFamilyId(document, selection.familyId);
  }

  const husband = findIndividual(document.individuals, selection.husband ?? "");
  const pairs = listSpousePairs(document, husband);
  const wifeQuery = normalize(selection.wife ?? "");

  const named = pairs.find(({ spouse }) => !wifeQuery || normalize(displayName(spouse)).includes(wifeQuery));
  if (named) {
    return { family: named.family, husband, wife: named.spouse };
  }

  if (pairs.length === 1) {
    return { family: pairs[0].family, husband, wife: pairs[0].spouse };
  }

  const wife = findIndividual(document.individuals, selection.wife ?? "");
  const family = findFamilyBySpouses(document.families, husband.id, wife.id);
  if (!family) {
    throw new RootSelectionError(
      "no-shared-family",
      "Could not locate a family where the provided individuals are spouses. Consider using --base-family-id.",
    );
  }

  return { family, husband, wife };
}
