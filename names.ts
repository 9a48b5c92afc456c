import type { Individual } from "./schema";

const NAME_SUFFIXES: ReadonlySet<string> = new Set(["jr", "sr", "ii", "iii", "iv", "v"]);

/**
 * Lowercases and collapses every run of non-alphanumeric characters to a
 * single space.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

type NamedIndividual = Pick<Individual, "id" | "name" | "givenName" | "surname">;

export function displayName(individual: NamedIndividual): string {
  if (individual.name) {
    // Surnames are wrapped in slashes: "John /Smith/".
    return individual.name.replace(/\//g, "").trim().replace(/\s+/g, " ");
  }

  const pieces = [individual.givenName, individual.surname].filter((piece) => piece);
  return pieces.length ? pieces.join(" ") : individual.id;
}

/**
 * Reduces a free-text name to a `"first last"` key, skipping trailing
 * generational suffixes. Returns `undefined` for single-token names.
 */
export function nameKey(name: string): string | undefined {
  const tokens = name.split(/[^A-Za-z]+/).filter((token) => token);
  if (tokens.length < 2) {
    return undefined;
  }

  const first = tokens[0].toLowerCase();
  let last: string | undefined;

  for (const token of tokens.slice(1).reverse()) {
    const lower = token.toLowerCase();
    if (NAME_SUFFIXES.has(lower)) {
      continue;
    }
    last = lower;
    break;
  }

  return `${first} ${last ?? tokens[tokens.length - 1].toLowerCase()}`;
}
