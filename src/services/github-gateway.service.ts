import { Octokit } from "@octokit/rest";

import { GITHUB_CONSTANTS } from "../constants";
import { GatewayError } from "../errors";
import { getErrorMessage, getErrorStatus } from "../utils/error-message";

import { Logger } from "./logger.service";

import type { ErrorLogService } from "./error-log.service";
import type { Config, GatewayResult, HttpMethod } from "../types";

/**
 * Seam between the catalogs and the HTTP client. Implementations resolve
 * every call; failures come back as `{ ok: false }`.
 */
export interface RequestGateway {
  call(method: HttpMethod, url: string, body?: object): Promise<GatewayResult<unknown>>;
}

export interface GitHubGatewayOptions {
  errorLog: ErrorLogService;
  logger?: Logger;
  /** Replaces the global fetch used by Octokit. */
  fetch?: typeof fetch;
}

export class GitHubGatewayService implements RequestGateway {
  private readonly octokit: Octokit;
  private readonly errorLog: ErrorLogService;
  private readonly logger: Logger;

  constructor(config: Pick<Config, "username" | "token" | "apiUrl">, options: GitHubGatewayOptions) {
    this.errorLog = options.errorLog;
    this.logger = options.logger ?? Logger.createDefault();

    this.octokit = new Octokit({
      auth: config.token,
      baseUrl: config.apiUrl,
      userAgent: `${GITHUB_CONSTANTS.USER_AGENT} (${config.username})`,
      request: options.fetch ? { fetch: options.fetch } : undefined,
      // Octokit's request log goes to debug output; failures are reported below.
      log: {
        debug: (message: string) => this.logger.debug(message),
        info: (message: string) => this.logger.debug(message),
        warn: (message: string) => this.logger.warn(message),
        error: (message: string) => this.logger.debug(message),
      },
    });
  }

  async call(method: HttpMethod, url: string, body?: object): Promise<GatewayResult<unknown>> {
    this.logger.debug(`${method} ${url}`);

    try {
      const response = await this.octokit.request(body === undefined ? { method, url } : { method, url, data: body });
      return { ok: true, data: response.data };
    } catch (error) {
      const gatewayError = new GatewayError(
        method,
        url,
        getErrorMessage(error),
        getErrorStatus(error),
        error instanceof Error ? error : undefined,
      );
      await this.errorLog.record(`API request error: ${gatewayError.message}`);
      return { ok: false, error: gatewayError };
    }
  }
}
