import { parseArgs } from "node:util";
import { argv, exit, stderr, stdout } from "node:process";
import { ZodError } from "zod";
import { RootSelectionError } from "./errors";
import { generateSite } from "@/site";

const USAGE = `Usage: cli <gedcom> <output> [options]

Options:
  --base-family-id <id>   Select the root couple by family pointer (e.g. @F2@)
  --base-husband <name>   Name, or part of a name, of the root husband
  --base-wife <name>      Name, or part of a name, of the root wife
  --biographies <dir>     Directory holding .docx biographies (default: the GEDCOM file's directory)
  --title <text>          Site title (default: "<husband> & <wife>")
  -h, --help              Show this message
`;

async function main() {
  const { values, positionals } = parseArgs({
    args: argv.slice(2),
    allowPositionals: true,
    options: {
      "base-family-id": { type: "string" },
      "base-husband": { type: "string" },
      "base-wife": { type: "string" },
      biographies: { type: "string" },
      title: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    stdout.write(USAGE);
    return;
  }

  const [gedcomPath = "", outputDir = ""] = positionals;

  try {
    const result = await generateSite(
      {
        gedcomPath,
        outputDir,
        baseFamilyId: values["base-family-id"],
        baseHusband: values["base-husband"],
        baseWife: values["base-wife"],
        biographyDir: values.biographies,
        title: values.title,
      },
      { onWarning: (message) => stderr.write(`Warning: ${message}\n`) },
    );
    stdout.write(`Generated ${result.pageCount} descendant pages in ${result.outputDir}.\n`);
  } catch (error) {
    if (error instanceof ZodError) {
      stderr.write("Invalid options:\n");
      for (const issue of error.issues) {
        const path = issue.path.length ? issue.path.join(".") : "<root>";
        stderr.write(` - ${path}: ${issue.message}\n`);
      }
      stderr.write(`\n${USAGE}`);
      exit(1);
    }

    if (error instanceof RootSelectionError) {
      stderr.write(`${error.message}\n`);
      exit(1);
    }

    throw error;
  }
}

main().catch((error) => {
  stderr.write(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`);
  exit(1);
});
