import { posix } from "node:path";
import { getFamily, getIndividual, getSpouseFamilies, getSpouseId } from "./descendants";
import type { GedcomDocument } from "./gedcom";
import { displayName } from "./names";
import type { Family, Individual } from "./schema";

export const INDEX_PAGE = "index.html";
export const PEOPLE_DIR = "people";
export const STYLESHEET_PATH = "assets/styles.css";

/** Descendant pointer to site-relative page path. */
export type PageLookup = ReadonlyMap<string, string>;

function stripDelimiters(identifier: string): string {
  return identifier.replace(/^@+|@+$/g, "");
}

/**
 * File-name-safe slug for a person's page. The pointer suffix keeps two
 * people with the same name apart.
 */
export function slugify(name: string, identifier: string): string {
  const bare = stripDelimiters(identifier);
  const base =
    name
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "") || bare;
  return `${base}-${bare}`;
}

export function pagePathFor(individual: Individual): string {
  return posix.join(PEOPLE_DIR, `${slugify(displayName(individual), individual.id)}.html`);
}

/**
 * Assigns a page to every descendant present in the document.
 */
export function buildPageLookup(document: GedcomDocument, descendants: Iterable<string>): Map<string, string> {
  const lookup = new Map<string, string>();

  for (const id of descendants) {
    const person = getIndividual(document, id);
    if (person) {
      lookup.set(id, pagePathFor(person));
    }
  }

  return lookup;
}

/**
 * Link from the page at `fromPage` to the page at `toPage`, both site-relative.
 */
export function relativeHref(fromPage: string, toPage: string): string {
  return posix.relative(posix.dirname(fromPage), toPage);
}

export function personHref(lookup: PageLookup, id: string | undefined, fromPage: string): string | undefined {
  const target = id ? lookup.get(id) : undefined;
  return target ? relativeHref(fromPage, target) : undefined;
}

export interface ResolvedLink {
  person: Individual;
  href?: string;
}

/**
 * Parents of `person`, linked to their own page when they have one. Members
 * of the root couple link to the index page instead.
 */
export function resolveParentLinks(
  document: GedcomDocument,
  person: Individual,
  lookup: PageLookup,
  rootFamily: Family,
  fromPage: string,
): ResolvedLink[] {
  const family = getFamily(document, person.famc);
  if (!family) {
    return [];
  }

  const links: ResolvedLink[] = [];
  for (const parentId of [family.husband, family.wife]) {
    const parent = getIndividual(document, parentId);
    if (!parent) {
      continue;
    }

    let href = personHref(lookup, parent.id, fromPage);
    if (!href && family.id === rootFamily.id) {
      href = relativeHref(fromPage, INDEX_PAGE);
    }
    links.push({ person: parent, href });
  }

  return links;
}

export interface SpouseLink extends ResolvedLink {
  family: Family;
}

export function resolveSpouseLinks(
  document: GedcomDocument,
  person: Individual,
  lookup: PageLookup,
  fromPage: string,
): SpouseLink[] {
  const links: SpouseLink[] = [];

  for (const family of getSpouseFamilies(document, person)) {
    const spouse = getIndividual(document, getSpouseId(family, person.id));
    if (!spouse) {
      continue;
    }

    links.push({ person: spouse, family, href: personHref(lookup, spouse.id, fromPage) });
  }

  return links;
}
