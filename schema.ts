import { z } from "zod";

/**
 * Dated, placed occurrence attached to an individual or a family.
 */
export const EventSchema = z.object({
  /**
   * Free-text date exactly as written in the source file.
   */
  date: z.string().optional(),
  /**
   * Free-text place exactly as written in the source file.
   */
  place: z.string().optional(),
});

/**
 * Schema describing an individual (`INDI`) record.
 */
export const IndividualSchema = z.object({
  /**
   * Pointer of the record, delimiters included (`@I1@`).
   */
  id: z.string(),
  /**
   * Raw `NAME` value; the surname is wrapped in slashes.
   */
  name: z.string(),
  givenName: z.string(),
  surname: z.string(),
  /**
   * Sex code as recorded (`M`, `F`, `U` or anything else the file holds).
   */
  sex: z.string(),
  birth: EventSchema,
  death: EventSchema,
  /**
   * Family in which the individual appears as a child.
   */
  famc: z.string().optional(),
  /**
   * Families in which the individual appears as a spouse, in source order.
   */
  fams: z.array(z.string()),
});

/**
 * Schema describing a family (`FAM`) record.
 */
export const FamilySchema = z.object({
  id: z.string(),
  husband: z.string().optional(),
  wife: z.string().optional(),
  /**
   * Child pointers in source order. Entries may point at missing individuals.
   */
  children: z.array(z.string()),
  marriage: EventSchema,
});

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Options accepted by the site generator.
 */
export const SiteOptionsSchema = z
  .object({
    gedcomPath: z.string().min(1, "GEDCOM path is required"),
    outputDir: z.string().min(1, "Output directory is required"),
    baseFamilyId: optionalText,
    baseHusband: optionalText,
    baseWife: optionalText,
    /**
     * Directory scanned for `.docx` biographies. Defaults to the GEDCOM file's directory.
     */
    biographyDir: optionalText,
    title: optionalText,
  })
  .refine((options) => options.baseFamilyId !== undefined || options.baseHusband !== undefined, {
    message: "Provide a base family ID or a base husband name",
    path: ["baseHusband"],
  });

export type GedcomEvent = z.infer<typeof EventSchema>;
export type Individual = z.infer<typeof IndividualSchema>;
export type Family = z.infer<typeof FamilySchema>;
export type SiteOptionsInput = z.input<typeof SiteOptionsSchema>;
