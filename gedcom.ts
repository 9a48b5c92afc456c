import { readFile } from "node:fs/promises";
import type { Family, GedcomEvent, Individual } from "./schema";

export interface GedcomDocument {
  individuals: ReadonlyMap<string, Individual>;
  families: ReadonlyMap<string, Family>;
}

interface GedcomLine {
  level: number;
  pointer?: string;
  tag: string;
  value: string;
}

type ParserContext =
  | { kind: "none" }
  | { kind: "individual"; record: Individual }
  | { kind: "family"; record: Family };

type EventSection = "BIRT" | "DEAT" | "MARR";

const NO_CONTEXT: ParserContext = { kind: "none" };

function createIndividual(id: string): Individual {
  return {
    id,
    name: "",
    givenName: "",
    surname: "",
    sex: "",
    birth: {},
    death: {},
    fams: [],
  };
}

function createFamily(id: string): Family {
  return {
    id,
    children: [],
    marriage: {},
  };
}

function isPointer(token: string): boolean {
  return token.length > 1 && token.startsWith("@") && token.endsWith("@");
}

/**
 * Splits a line into level, tag and value. Returns `undefined` for blank or
 * malformed lines, which the parser drops.
 */
export function tokenizeLine(line: string): GedcomLine | undefined {
  if (!line) {
    return undefined;
  }

  const firstSpace = line.indexOf(" ");
  if (firstSpace === -1) {
    return undefined;
  }

  const levelText = line.slice(0, firstSpace);
  const rest = line.slice(firstSpace + 1);
  const secondSpace = rest.indexOf(" ");
  let tag = secondSpace === -1 ? rest : rest.slice(0, secondSpace);
  let value = secondSpace === -1 ? "" : rest.slice(secondSpace + 1);

  if (!/^\d+$/.test(levelText)) {
    return undefined;
  }

  const level = Number(levelText);

  if (isPointer(tag)) {
    return { level, pointer: tag, tag: value, value: "" };
  }

  return { level, tag, value };
}

function applyIndividualField(record: Individual, tag: string, value: string): void {
  switch (tag) {
    case "NAME":
      record.name = value;
      break;
    case "GIVN":
      record.givenName = value;
      break;
    case "SURN":
      record.surname = value;
      break;
    case "SEX":
      record.sex = value;
      break;
    case "FAMC":
      record.famc = value;
      break;
    case "FAMS":
      record.fams.push(value);
      break;
    default:
      break;
  }
}

function applyFamilyField(record: Family, tag: string, value: string): void {
  switch (tag) {
    case "HUSB":
      record.husband = value;
      break;
    case "WIFE":
      record.wife = value;
      break;
    case "CHIL":
      record.children.push(value);
      break;
    default:
      break;
  }
}

function applyEventDetail(event: GedcomEvent, tag: string, value: string): void {
  if (tag === "DATE") {
    event.date = value;
  } else if (tag === "PLAC") {
    event.place = value;
  }
}

function resolveEvent(context: ParserContext, section: EventSection | null): GedcomEvent | undefined {
  if (context.kind === "individual") {
    if (section === "BIRT") {
      return context.record.birth;
    }
    if (section === "DEAT") {
      return context.record.death;
    }
    return undefined;
  }

  if (context.kind === "family" && section === "MARR") {
    return context.record.marriage;
  }

  return undefined;
}

function toEventSection(tag: string): EventSection | null {
  return tag === "BIRT" || tag === "DEAT" || tag === "MARR" ? tag : null;
}

/**
 * Parses the `INDI` and `FAM` records of a GEDCOM file. Unknown records,
 * unknown tags, lines nested deeper than level 2 and malformed lines are
 * skipped.
 */
export function parseGedcom(text: string): GedcomDocument {
  const individuals = new Map<string, Individual>();
  const families = new Map<string, Family>();

  let context: ParserContext = NO_CONTEXT;
  let section: EventSection | null = null;

  const content = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const line = tokenizeLine(rawLine);
    if (!line) {
      continue;
    }

    const { level, pointer, tag, value } = line;

    if (level === 0) {
      section = null;
      context = NO_CONTEXT;

      if (tag === "INDI" && pointer) {
        const record = createIndividual(pointer);
        individuals.set(pointer, record);
        context = { kind: "individual", record };
      } else if (tag === "FAM" && pointer) {
        const record = createFamily(pointer);
        families.set(pointer, record);
        context = { kind: "family", record };
      }
      continue;
    }

    if (level === 1) {
      section = toEventSection(tag);

      if (context.kind === "individual") {
        applyIndividualField(context.record, tag, value);
      } else if (context.kind === "family") {
        applyFamilyField(context.record, tag, value);
      }
      continue;
    }

    if (level === 2) {
      const event = resolveEvent(context, section);
      if (event) {
        applyEventDetail(event, tag, value);
      }
    }
  }

  return { individuals, families };
}

export async function parseGedcomFile(path: string): Promise<GedcomDocument> {
  const text = await readFile(path, "utf8");
  return parseGedcom(text);
}
