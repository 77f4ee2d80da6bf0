/**
 * Error raised while inlining an asset into an embedded page
 * Carries the reason so the tracker can classify it without parsing messages
 */
export class AssetError extends Error {
  constructor(
    message: string,
    readonly reason: "unsupported-type" | "too-large",
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when two sources (or a source and a generated file) would write the
 * same output path
 */
export class OutputConflictError extends Error {
  constructor(
    readonly outputPath: string,
    readonly owner: string,
  ) {
    super(`${outputPath} is already written by ${owner}`);
    this.name = new.target.name;
  }
}
