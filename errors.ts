export type RootSelectionFailure =
  | "empty-query"
  | "not-found"
  | "ambiguous"
  | "family-not-found"
  | "incomplete-family"
  | "missing-spouse"
  | "no-shared-family";

/**
 * Raised when the couple at the root of the site cannot be determined.
 * Always thrown before anything is written to disk.
 */
export class RootSelectionError extends Error {
  readonly reason: RootSelectionFailure;

  constructor(reason: RootSelectionFailure, message: string) {
    super(message);
    this.name = "RootSelectionError";
    this.reason = reason;
  }
}
