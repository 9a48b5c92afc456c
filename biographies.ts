import { readdir, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { load, type CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import JSZip from "jszip";
import { displayName, nameKey } from "./names";
import type { Individual } from "./schema";
import { escapeHtml } from "@/formatting/sitePages";

const DOCUMENT_PART = "word/document.xml";
const WORDPROCESSING_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const DOCX_EXTENSION = ".docx";

export interface BiographyOptions {
  /**
   * Called for every document, or biography directory, that could not be read.
   */
  onWarning?: (message: string) => void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Prefix bound to the WordprocessingML namespace on the root element, or
 * `undefined` when the part does not declare it.
 */
function findNamespacePrefix($: CheerioAPI): string | undefined {
  const root = $.root().children().first();
  const attributes = root.attr() ?? {};

  for (const [name, value] of Object.entries(attributes)) {
    if (value !== WORDPROCESSING_NS) {
      continue;
    }
    if (name === "xmlns") {
      return "";
    }
    if (name.startsWith("xmlns:")) {
      return name.slice("xmlns:".length);
    }
  }

  return undefined;
}

function qualified(prefix: string, local: string): string {
  return prefix ? `${prefix}\\:${local}` : local;
}

/**
 * Text of each top-level body paragraph, runs concatenated, blank paragraphs
 * dropped.
 */
export function extractParagraphsFromXml(xml: string): string[] {
  const $ = load(xml, { xml: true });
  const prefix = findNamespacePrefix($);
  if (prefix === undefined) {
    return [];
  }

  const paragraphs: string[] = [];
  $(`${qualified(prefix, "body")} > ${qualified(prefix, "p")}`).each((_, paragraph: AnyNode) => {
    const text = $(paragraph)
      .find(qualified(prefix, "t"))
      .map((__, run) => $(run).text())
      .get()
      .join("")
      .trim();

    if (text) {
      paragraphs.push(text);
    }
  });

  return paragraphs;
}

export async function extractDocxParagraphs(data: Uint8Array): Promise<string[]> {
  const zip = await JSZip.loadAsync(data);
  const xml = await zip.file(DOCUMENT_PART)?.async("text");
  return xml ? extractParagraphsFromXml(xml) : [];
}

async function indexDocuments(directory: string, options: BiographyOptions): Promise<Map<string, string>> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (!isMissingPath(error)) {
      options.onWarning?.(`Skipping biography directory ${directory}: ${describeError(error)}`);
    }
    return new Map();
  }

  const documents = new Map<string, string>();
  for (const entry of entries.filter((name) => name.endsWith(DOCX_EXTENSION)).sort()) {
    const key = nameKey(basename(entry, DOCX_EXTENSION));
    if (key) {
      documents.set(key, join(directory, entry));
    }
  }

  return documents;
}

/**
 * Matches `.docx` files in `directory` to `candidates` by their `"first last"`
 * name key and renders each match as escaped `<p>` elements. Candidates
 * without a readable, non-empty document are left out.
 */
export async function loadBiographies(
  directory: string,
  candidates: readonly Individual[],
  options: BiographyOptions = {},
): Promise<Map<string, string>> {
  const documents = await indexDocuments(directory, options);
  const biographies = new Map<string, string>();

  for (const candidate of candidates) {
    const key = nameKey(displayName(candidate));
    const path = key ? documents.get(key) : undefined;
    if (!path) {
      continue;
    }

    let paragraphs: string[];
    try {
      paragraphs = await extractDocxParagraphs(await readFile(path));
    } catch (error) {
      options.onWarning?.(`Skipping biography ${path}: ${describeError(error)}`);
      continue;
    }

    if (paragraphs.length) {
      biographies.set(candidate.id, paragraphs.map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`).join(""));
    }
  }

  return biographies;
}
