import { copyFile, mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadBiographies } from "../biographies";
import { collectDescendants, getIndividual, getIndividuals } from "../descendants";
import { parseGedcomFile, type GedcomDocument } from "../gedcom";
import { displayName } from "../names";
import { INDEX_PAGE, STYLESHEET_PATH, buildPageLookup } from "../pages";
import { SiteOptionsSchema, type SiteOptionsInput } from "../schema";
import { resolveRootCouple, type RootCouple } from "../selection";
import { renderDescendantPage, renderIndexPage } from "./formatting/sitePages";

export interface SitePage {
  /** Site-relative POSIX path. */
  path: string;
  content: string;
}

export interface BuildSiteOptions {
  title?: string;
  biographies?: ReadonlyMap<string, string>;
}

export interface GenerateSiteOptions {
  onWarning?: (message: string) => void;
}

export interface GenerateSiteResult {
  outputDir: string;
  pageCount: number;
}

function getStylesheetSource(): string {
  return fileURLToPath(new URL("../assets/styles.css", import.meta.url));
}

export function defaultTitle(root: RootCouple): string {
  return `${displayName(root.husband)} & ${displayName(root.wife)}`;
}

/**
 * Renders the index page and one page per descendant of the root couple.
 */
export function buildSite(document: GedcomDocument, root: RootCouple, options: BuildSiteOptions = {}): SitePage[] {
  const descendants = collectDescendants(document, root.family);
  const lookup = buildPageLookup(document, descendants);
  const context = {
    document,
    lookup,
    rootFamily: root.family,
    title: options.title ?? defaultTitle(root),
    biographies: options.biographies ?? new Map<string, string>(),
  };

  const pages: SitePage[] = [{ path: INDEX_PAGE, content: renderIndexPage(context, root.husband, root.wife) }];

  for (const [id, path] of lookup) {
    const person = getIndividual(document, id);
    if (person) {
      pages.push({ path, content: renderDescendantPage(context, person, path) });
    }
  }

  return pages;
}

async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf8");
}

/**
 * Parses the GEDCOM file, selects the root couple and writes the site. Root
 * selection errors are raised before anything touches `outputDir`.
 */
export async function generateSite(
  input: SiteOptionsInput,
  hooks: GenerateSiteOptions = {},
): Promise<GenerateSiteResult> {
  const options = SiteOptionsSchema.parse(input);
  const document = await parseGedcomFile(options.gedcomPath);
  const root = resolveRootCouple(document, {
    familyId: options.baseFamilyId,
    husband: options.baseHusband,
    wife: options.baseWife,
  });

  const biographies = await loadBiographies(
    options.biographyDir ?? dirname(options.gedcomPath),
    getIndividuals(document, root.family.children),
    { onWarning: hooks.onWarning },
  );

  const pages = buildSite(document, root, { title: options.title, biographies });

  const stylesheet = join(options.outputDir, STYLESHEET_PATH);
  await mkdir(dirname(stylesheet), { recursive: true });
  await copyFile(getStylesheetSource(), stylesheet);

  for (const page of pages) {
    await writeOutput(join(options.outputDir, page.path), page.content);
  }

  return { outputDir: options.outputDir, pageCount: pages.length - 1 };
}
