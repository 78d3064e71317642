import type { CanonicalColumn } from "./types.js";

/**
 * Raised when one or more canonical columns cannot be resolved from the
 * input headers. The only fatal ingestion error.
 */
export class MissingColumnsError extends Error {
  readonly missing: CanonicalColumn[];
  readonly required: CanonicalColumn[];

  constructor(missing: CanonicalColumn[], required: CanonicalColumn[]) {
    super(
      `Missing column(s): ${missing.join(", ")}. Required columns: ${required.join(", ")}`
    );
    this.name = "MissingColumnsError";
    this.missing = missing;
    this.required = required;
  }
}

/**
 * A request the caller can fix: unsupported upload, invalid setting.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}
