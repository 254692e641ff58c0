import * as path from "path";

import { DEFAULT_CONFIG, ENV_VARS, GITHUB_CONSTANTS } from "../constants";
import { ConfigValidationError, MissingCredentialsError } from "../errors";

import type { Config } from "../types";

export type Environment = Record<string, string | undefined>;

export interface ConfigOverrides {
  apiUrl?: string;
  errorLog?: string;
  concurrency?: number;
  debug?: boolean;
}

export class ConfigLoaderService {
  /**
   * Builds the runtime configuration once at startup. Credentials come only
   * from the environment; everything else may be overridden on the command line.
   */
  load(env: Environment, overrides: ConfigOverrides = {}, cwd: string = process.cwd()): Config {
    const username = env[ENV_VARS.USERNAME]?.trim();
    const token = env[ENV_VARS.TOKEN]?.trim();

    const missing: string[] = [];
    if (!username) missing.push(ENV_VARS.USERNAME);
    if (!token) missing.push(ENV_VARS.TOKEN);
    if (!username || !token) {
      throw new MissingCredentialsError(missing);
    }

    const apiUrl = this.resolveApiUrl(overrides.apiUrl ?? env[ENV_VARS.API_URL]);
    const errorLogPath = this.resolvePath(
      overrides.errorLog ?? env[ENV_VARS.ERROR_LOG] ?? DEFAULT_CONFIG.ERROR_LOG_FILE,
      cwd,
    );
    const maxConcurrentPullRequests = this.resolveConcurrency(overrides.concurrency);

    return Object.freeze({
      username,
      token,
      apiUrl,
      errorLogPath,
      maxConcurrentPullRequests,
      debug: overrides.debug ?? false,
    });
  }

  private resolveApiUrl(value: string | undefined): string {
    const raw = value?.trim();
    if (!raw) {
      return GITHUB_CONSTANTS.API_URL;
    }

    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch {
      throw new ConfigValidationError("apiUrl", `'${raw}' is not a valid URL`);
    }

    if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
      throw new ConfigValidationError("apiUrl", "must use http or https");
    }

    return raw.replace(/\/+$/, "");
  }

  private resolveConcurrency(value: number | undefined): number {
    if (value === undefined) {
      return DEFAULT_CONFIG.MAX_CONCURRENT_PULL_REQUESTS;
    }
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigValidationError("concurrency", "must be a positive integer");
    }
    return value;
  }

  private resolvePath(inputPath: string, baseDir: string): string {
    if (path.isAbsolute(inputPath)) {
      return inputPath;
    }

    return path.resolve(baseDir, inputPath);
  }
}
