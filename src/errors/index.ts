import { ERROR_MESSAGES } from "../constants";

export class ForkSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ConfigError extends ForkSyncError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `CONFIG_${code}`, cause);
  }
}

export class MissingCredentialsError extends ConfigError {
  constructor(public readonly missing: string[]) {
    super(`Missing ${missing.join(" and ")}. ${ERROR_MESSAGES.MISSING_CREDENTIALS}`, "MISSING_CREDENTIALS");
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid configuration for '${field}': ${reason}`, "VALIDATION_FAILED");
  }
}

export class GatewayError extends ForkSyncError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    details: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(`${method} ${url} failed: ${details}`, "GATEWAY_REQUEST_FAILED", cause);
  }
}

export class InvalidRepositoryNameError extends ForkSyncError {
  constructor(public readonly repository: string) {
    super(`Invalid repository name '${repository}'. Expected the form owner/repo`, "CATALOG_INVALID_REPOSITORY_NAME");
  }
}

export class InvalidSelectionError extends ForkSyncError {
  constructor(
    public readonly input: string,
    public readonly max: number,
  ) {
    super(`Selection '${input}' is not a number between 1 and ${max}`, "SHELL_INVALID_SELECTION");
  }
}

export function isForkSyncError(error: unknown): error is ForkSyncError {
  return error instanceof ForkSyncError;
}
