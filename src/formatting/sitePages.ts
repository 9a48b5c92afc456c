import { sortByBirth } from "../../dates";
import { getChildren, getIndividuals } from "../../descendants";
import type { GedcomDocument } from "../../gedcom";
import { displayName } from "../../names";
import {
  INDEX_PAGE,
  STYLESHEET_PATH,
  personHref,
  relativeHref,
  resolveParentLinks,
  resolveSpouseLinks,
  type PageLookup,
  type ResolvedLink,
} from "../../pages";
import type { Family, GedcomEvent, Individual } from "../../schema";

export interface SitePageContext {
  document: GedcomDocument;
  lookup: PageLookup;
  rootFamily: Family;
  title: string;
  /** Pre-rendered biography HTML by individual pointer. */
  biographies: ReadonlyMap<string, string>;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

export function describeEvent(event: GedcomEvent): string | null {
  const parts = [event.date, event.place].filter((part): part is string => Boolean(part));
  return parts.length ? parts.join(", ") : null;
}

function renderLink(label: string, href: string | undefined): string {
  const text = escapeHtml(label);
  return href ? `<a href="${escapeHtml(href)}">${text}</a>` : text;
}

export function renderPersonSummary(person: Individual): string {
  const lines: string[] = [];
  const birth = describeEvent(person.birth);
  const death = describeEvent(person.death);

  if (birth) {
    lines.push(`<p><strong>Born:</strong> ${escapeHtml(birth)}</p>`);
  }
  if (death) {
    lines.push(`<p><strong>Died:</strong> ${escapeHtml(death)}</p>`);
  }

  return lines.join("");
}

export function renderPersonCard(person: Individual, href?: string, extra = "", headingLevel = 3): string {
  const heading = `h${headingLevel}`;
  return (
    `<div class="person-card">` +
    `<${heading}>${renderLink(displayName(person), href)}</${heading}>` +
    renderPersonSummary(person) +
    extra +
    `</div>`
  );
}

function renderLinkList(links: readonly ResolvedLink[]): string {
  return links.map((link) => renderLink(displayName(link.person), link.href)).join(", ");
}

export function renderSpouseLine(context: SitePageContext, person: Individual, fromPage: string): string {
  const spouses = resolveSpouseLinks(context.document, person, context.lookup, fromPage).map((link) => {
    const marriage = describeEvent(link.family.marriage);
    const meta = marriage ? ` <span class="meta">(m. ${escapeHtml(marriage)})</span>` : "";
    return renderLink(displayName(link.person), link.href) + meta;
  });

  if (!spouses.length) {
    return "<p><strong>Spouse(s):</strong> None recorded.</p>";
  }
  return `<p><strong>Spouse(s):</strong> ${spouses.join(", ")}</p>`;
}

export function renderParentLine(context: SitePageContext, person: Individual, fromPage: string): string {
  const parents = resolveParentLinks(context.document, person, context.lookup, context.rootFamily, fromPage);
  if (!parents.length) {
    return "";
  }
  return `<p><strong>Parent(s):</strong> ${renderLinkList(parents)}</p>`;
}

function renderChildrenGrid(context: SitePageContext, children: readonly Individual[], fromPage: string): string {
  if (!children.length) {
    return `<p class="empty">No recorded children.</p>`;
  }

  const cards = children.map((child) => renderPersonCard(child, personHref(context.lookup, child.id, fromPage), "", 4));
  return `<div class="children-grid">${cards.join("")}</div>`;
}

function renderDocument(title: string, stylesheetHref: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="utf-8">
    <title>${title}</title>
    <link rel="stylesheet" href="${escapeHtml(stylesheetHref)}">
</head>
<body>
    <div class="container">
${body}
    </div>
</body>
</html>
`;
}

export function renderIndexPage(context: SitePageContext, husband: Individual, wife: Individual): string {
  const children = sortByBirth(getIndividuals(context.document, context.rootFamily.children));
  const cards = children.map((child) =>
    renderPersonCard(
      child,
      personHref(context.lookup, child.id, INDEX_PAGE),
      renderSpouseLine(context, child, INDEX_PAGE),
      3,
    ),
  );

  const body = `        <header>
            <h1>${escapeHtml(context.title)}</h1>
            <p class="lead">Click a name to explore that branch of the family.</p>
        </header>
        <section class="base-layout">
            <div class="base-column">
                ${renderPersonCard(husband, undefined, "", 2)}
                ${renderPersonCard(wife, undefined, "", 2)}
            </div>
            <div class="children-column">
                <h2>Children</h2>
                <div class="children-grid">${cards.join("")}</div>
            </div>
        </section>`;

  return renderDocument(`${escapeHtml(context.title)} Family Tree`, relativeHref(INDEX_PAGE, STYLESHEET_PATH), body);
}

export function renderDescendantPage(context: SitePageContext, person: Individual, pagePath: string): string {
  const name = escapeHtml(displayName(person));
  const children = sortByBirth(getChildren(context.document, person));
  const biography = context.biographies.get(person.id);
  const biographySection = biography
    ? `        <section class="person-biography"><h2>Biography</h2>${biography}</section>\n`
    : "";

  const body = `        <header class="page-header">
            <h1>${name}</h1>
        </header>
        <section class="person-details">
            ${renderPersonSummary(person)}
            ${renderSpouseLine(context, person, pagePath)}
            ${renderParentLine(context, person, pagePath)}
            <p><a href="${escapeHtml(relativeHref(pagePath, INDEX_PAGE))}">&larr; Back to ${escapeHtml(context.title)}</a></p>
        </section>
${biographySection}        <section class="person-children"><h2>Children</h2>${renderChildrenGrid(context, children, pagePath)}</section>`;

  return renderDocument(`${name} &mdash; ${escapeHtml(context.title)}`, relativeHref(pagePath, STYLESHEET_PATH), body);
}
