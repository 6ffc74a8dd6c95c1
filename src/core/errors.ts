export type ErrorCode = "INVALID_INPUT" | "INVALID_CONFIG";

export type InvalidInputReason = "missing" | "empty";

export class InvalidInputError extends Error {
  readonly code: ErrorCode = "INVALID_INPUT";

  constructor(readonly reason: InvalidInputReason, message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ConfigError extends Error {
  readonly code: ErrorCode = "INVALID_CONFIG";

  constructor(readonly issues: readonly string[]) {
    super(`invalid options: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
