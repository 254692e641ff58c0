import { ConfigError } from "./errors";
import { BranchCatalogService } from "./services/branch-catalog.service";
import { ConfigLoaderService } from "./services/config-loader.service";
import { ErrorLogService } from "./services/error-log.service";
import { ForkCatalogService } from "./services/fork-catalog.service";
import { GitHubGatewayService } from "./services/github-gateway.service";
import { InteractiveShellService } from "./services/interactive-shell.service";
import { Logger } from "./services/logger.service";
import { SyncEngineService } from "./services/sync-engine.service";
import { parseArguments } from "./utils/cli";

import type { Environment } from "./services/config-loader.service";
import type { AskFn } from "./services/interactive-shell.service";
import type { Config } from "./types";

export interface RunOptions {
  env?: Environment;
  cwd?: string;
  logger?: Logger;
  ask?: AskFn;
  fetch?: typeof fetch;
  now?: () => Date;
}

/**
 * Wires the services together and runs the menu.
 * @returns the process exit code
 */
export async function run(args: string[], options: RunOptions = {}): Promise<number> {
  const cliOptions = parseArguments(args);

  let config: Config;
  try {
    config = new ConfigLoaderService().load(options.env ?? process.env, cliOptions, options.cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      (options.logger ?? Logger.createDefault()).error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = options.logger ?? Logger.createDefault(config.debug);
  const errorLog = new ErrorLogService({ filePath: config.errorLogPath, now: options.now, logger });
  const gateway = new GitHubGatewayService(config, { errorLog, logger, fetch: options.fetch });
  const forkCatalog = new ForkCatalogService(gateway);
  const branchCatalog = new BranchCatalogService(gateway);
  const syncEngine = new SyncEngineService(gateway, forkCatalog, branchCatalog, {
    maxConcurrentPullRequests: config.maxConcurrentPullRequests,
    logger,
  });
  const shell = new InteractiveShellService({ forkCatalog, branchCatalog, syncEngine, logger, ask: options.ask });

  logger.debug(`Signed in as ${config.username}, API ${config.apiUrl}`);

  try {
    await shell.run();
  } finally {
    await errorLog.flush();
  }
  return 0;
}
