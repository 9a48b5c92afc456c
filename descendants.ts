import type { GedcomDocument } from "./gedcom";
import type { Family, Individual } from "./schema";

type Reference = string | null | undefined;

/**
 * Resolves a cross-record pointer. Dangling or empty pointers resolve to
 * `undefined` so every caller treats them as absent.
 */
export function lookup<T>(records: ReadonlyMap<string, T>, id: Reference): T | undefined {
  return id ? records.get(id) : undefined;
}

export function getIndividual(document: GedcomDocument, id: Reference): Individual | undefined {
  return lookup(document.individuals, id);
}

export function getFamily(document: GedcomDocument, id: Reference): Family | undefined {
  return lookup(document.families, id);
}

/**
 * Resolves pointers in order, skipping the ones that do not resolve.
 */
export function getIndividuals(document: GedcomDocument, ids: readonly Reference[]): Individual[] {
  return ids.flatMap((id) => {
    const individual = getIndividual(document, id);
    return individual ? [individual] : [];
  });
}

export function getSpouseFamilies(document: GedcomDocument, individual: Individual): Family[] {
  return individual.fams.flatMap((id) => {
    const family = getFamily(document, id);
    return family ? [family] : [];
  });
}

/**
 * The other spouse of `family` from `individualId`'s point of view.
 */
export function getSpouseId(family: Family, individualId: string): string | undefined {
  if (family.husband === individualId) {
    return family.wife;
  }
  if (family.wife === individualId) {
    return family.husband;
  }
  return undefined;
}

/**
 * Children of every family the individual is a spouse in, first occurrence
 * kept, missing individuals skipped.
 */
export function getChildren(document: GedcomDocument, individual: Individual): Individual[] {
  const seen = new Set<string>();
  const children: Individual[] = [];

  for (const family of getSpouseFamilies(document, individual)) {
    for (const child of getIndividuals(document, family.children)) {
      if (seen.has(child.id)) {
        continue;
      }
      seen.add(child.id);
      children.push(child);
    }
  }

  return children;
}

/**
 * Pointers of everyone reachable as a child of `rootFamily`, a child of one
 * of those children, and so on. The root couple is not included.
 */
export function collectDescendants(document: GedcomDocument, rootFamily: Family): Set<string> {
  const descendants = new Set<string>();
  const pending = [...rootFamily.children];

  while (pending.length) {
    const current = pending.pop();
    if (current === undefined || descendants.has(current)) {
      continue;
    }
    descendants.add(current);

    const person = getIndividual(document, current);
    if (!person) {
      continue;
    }

    for (const family of getSpouseFamilies(document, person)) {
      for (const child of family.children) {
        if (!descendants.has(child)) {
          pending.push(child);
        }
      }
    }
  }

  return descendants;
}
