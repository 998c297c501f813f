/**
 * The ways a single page request can fail.
 */
export type FetchErrorKind = "network" | "status" | "decode";

/**
 * A page request failed. Never retried: the pipeline halts and rethrows it.
 */
export class FetchError extends Error {
  readonly page: number;
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(
    message: string,
    options: {
      page: number;
      kind: FetchErrorKind;
      status?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.page = options.page;
    this.kind = options.kind;
    this.status = options.status;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
