import * as fs from "fs/promises";

import { getErrorMessage } from "../utils/error-message";

import type { Logger } from "./logger.service";

export interface ErrorLogOptions {
  filePath: string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Append-only failure log. Each entry is one line:
 * `<ISO timestamp> - ERROR - <message>`.
 */
export class ErrorLogService {
  readonly filePath: string;
  private readonly now: () => Date;
  private readonly logger?: Logger;
  private pending: Promise<void> = Promise.resolve();
  private writeFailed = false;

  constructor(options: ErrorLogOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  static formatEntry(timestamp: Date, message: string): string {
    return `${timestamp.toISOString()} - ERROR - ${message.replace(/\r?\n/g, " ")}\n`;
  }

  /**
   * Queues one entry behind any earlier ones. The first failed write is
   * reported as a warning, later ones at debug level; the returned promise
   * never rejects.
   */
  record(message: string): Promise<void> {
    const entry = ErrorLogService.formatEntry(this.now(), message);
    this.pending = this.pending.then(async () => {
      try {
        await fs.appendFile(this.filePath, entry, "utf8");
      } catch (error) {
        const message = `Could not write to error log ${this.filePath}: ${getErrorMessage(error)}`;
        if (this.writeFailed) {
          this.logger?.debug(message);
        } else {
          this.writeFailed = true;
          this.logger?.warn(message);
        }
      }
    });
    return this.pending;
  }

  flush(): Promise<void> {
    return this.pending;
  }
}
