import yargs from "yargs";

import type { ConfigOverrides } from "../services/config-loader.service";

export type CliOptions = ConfigOverrides;

export function parseArguments(args: string[]): CliOptions {
  const argv = yargs(args)
    .scriptName("fork-sync")
    .usage("$0\n\nInteractive menu for keeping your GitHub forks in sync with their upstream repositories.")
    .option("api-url", {
      type: "string",
      description: "GitHub REST API base URL (default: https://api.github.com, or $GITHUB_API_URL).",
    })
    .option("error-log", {
      type: "string",
      description: "File that failed API requests are appended to (default: ./error.log).",
    })
    .option("concurrency", {
      type: "number",
      description: "Pull requests created at the same time for one fork (default: 1).",
    })
    .option("debug", {
      type: "boolean",
      description: "Print every API request.",
      default: false,
    })
    .help()
    .alias("help", "h")
    .parseSync();

  return {
    apiUrl: argv["api-url"],
    errorLog: argv["error-log"],
    concurrency: argv.concurrency,
    debug: argv.debug,
  };
}
