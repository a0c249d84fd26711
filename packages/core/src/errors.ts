/** Raised at construction when the engine configuration cannot be used. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`INVALID_CONFIG: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Raised when a submitted feed is missing fields, carries non-finite rewards or repeats a key. */
export class FeedShapeError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`INVALID_FEED: ${issues.join("; ")}`);
    this.name = "FeedShapeError";
    this.issues = issues;
  }
}

/** Raised when a checkpoint file parses as JSON but does not hold an engine state. */
export class CheckpointError extends Error {
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`INVALID_CHECKPOINT (${filePath}): ${issues.join("; ")}`);
    this.name = "CheckpointError";
    this.issues = issues;
  }
}
