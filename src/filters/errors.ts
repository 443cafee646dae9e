/** Raised when a filter references tags the forum does not know. */
export class TagNotFoundError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Tag not found: ${missing.join(", ")}`);
    this.name = "TagNotFoundError";
    this.missing = missing;
  }

  /** First missing tag, for single-tag replies. */
  get tag(): string {
    return this.missing[0] ?? "";
  }
}
