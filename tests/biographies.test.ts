import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { extractDocxParagraphs, extractParagraphsFromXml, loadBiographies } from "../biographies";
import type { Individual } from "../schema";

const WORD_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

const DOCUMENT_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="${WORD_NS}" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">
  <w:body>
    <w:p><w:r><w:t>Arthur was born</w:t></w:r><w:r><w:t xml:space="preserve"> in Leeds.</w:t></w:r></w:p>
    <w:p><w:r><w:t>   </w:t></w:r></w:p>
    <w:p><w:r><w:t>He &amp; Ruth &lt;married&gt; in 1955.</w:t></w:r></w:p>
    <w:tbl><w:tr><w:tc><w:p><w:r><w:t>Table cell</w:t></w:r></w:p></w:tc></w:tr></w:tbl>
  </w:body>
</w:document>`;

async function buildDocx(xml: string): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file("word/document.xml", xml);
  return zip.generateAsync({ type: "uint8array" });
}

function person(id: string, name: string): Individual {
  return { id, name, givenName: "", surname: "", sex: "", birth: {}, death: {}, fams: [] };
}

describe("extractParagraphsFromXml", () => {
  it("joins runs per top-level body paragraph and drops blank ones", () => {
    expect(extractParagraphsFromXml(DOCUMENT_XML)).toEqual([
      "Arthur was born in Leeds.",
      "He & Ruth <married> in 1955.",
    ]);
  });

  it("follows whichever prefix the namespace is bound to", () => {
    const xml = `<document xmlns="${WORD_NS}"><body><p><r><t>Plain</t></r></p></body></document>`;
    expect(extractParagraphsFromXml(xml)).toEqual(["Plain"]);
  });

  it("ignores parts outside the wordprocessing namespace", () => {
    expect(extractParagraphsFromXml("<document><body><p><t>Text</t></p></body></document>")).toEqual([]);
  });
});

describe("extractDocxParagraphs", () => {
  it("reads the main document part", async () => {
    expect(await extractDocxParagraphs(await buildDocx(DOCUMENT_XML))).toHaveLength(2);
  });

  it("returns nothing when the part is missing", async () => {
    const zip = new JSZip();
    zip.file("docProps/core.xml", "<coreProperties/>");
    expect(await extractDocxParagraphs(await zip.generateAsync({ type: "uint8array" }))).toEqual([]);
  });
});

describe("loadBiographies", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "biographies-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("matches documents by first and last name", async () => {
    await writeFile(join(directory, "Arthur Pryce.docx"), await buildDocx(DOCUMENT_XML));
    await writeFile(join(directory, "notes.txt"), "Arthur Pryce");

    const biographies = await loadBiographies(directory, [
      person("@I3@", "Arthur James /Pryce/"),
      person("@I4@", "Margaret /Pryce/"),
    ]);

    expect(Object.fromEntries(biographies)).toEqual({
      "@I3@": "<p>Arthur was born in Leeds.</p><p>He &amp; Ruth &lt;married&gt; in 1955.</p>",
    });
  });

  it("skips unreadable documents and reports them", async () => {
    await writeFile(join(directory, "Ruth Lamb.docx"), "not a zip archive");
    const warnings: string[] = [];

    const biographies = await loadBiographies(directory, [person("@I6@", "Ruth /Lamb/")], {
      onWarning: (message) => warnings.push(message),
    });

    expect(biographies.size).toBe(0);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Skipping biography ${join(directory, "Ruth Lamb.docx")}: `)).toBe(true);
  });

  it("treats a missing directory as having no biographies", async () => {
    const biographies = await loadBiographies(join(directory, "absent"), [person("@I3@", "Arthur /Pryce/")]);
    expect(biographies.size).toBe(0);
  });

  it("reports a biography path that is not a directory and carries on", async () => {
    const file = join(directory, "bios.txt");
    await writeFile(file, "Arthur Pryce");
    const warnings: string[] = [];

    const biographies = await loadBiographies(file, [person("@I3@", "Arthur /Pryce/")], {
      onWarning: (message) => warnings.push(message),
    });

    expect(biographies.size).toBe(0);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Skipping biography directory ${file}: `)).toBe(true);
  });
});
