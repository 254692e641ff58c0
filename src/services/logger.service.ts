export type LogLevel = "info" | "success" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  debug?: boolean;
  outputFn?: LogOutputFn;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  info: "[INFO]",
  success: "[SUCCESS]",
  warn: "[WARNING]",
  error: "[ERROR]",
  debug: "[DEBUG]",
};

export class Logger {
  private debugEnabled: boolean;
  private outputFn?: LogOutputFn;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.outputFn = options.outputFn;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    this.write("debug", this.formatMessage(message, args));
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", this.formatMessage(message, args));
  }

  success(message: string, ...args: unknown[]): void {
    this.write("success", this.formatMessage(message, args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", this.formatMessage(message, args));
  }

  error(message: string, error?: Error | unknown): void {
    let formattedMessage = message;
    if (error instanceof Error) {
      formattedMessage += ` ${error.message}`;
    } else if (error) {
      formattedMessage += ` ${String(error)}`;
    }
    this.write("error", formattedMessage);
  }

  /** Writes a line without a level label, used for menus and banners. */
  plain(message: string): void {
    if (this.outputFn) {
      this.outputFn(message, "info");
    } else {
      console.log(message);
    }
  }

  private write(level: LogLevel, message: string): void {
    const line = `${LEVEL_LABELS[level]} ${message}`;
    if (this.outputFn) {
      this.outputFn(line, level);
      return;
    }
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(debug?: boolean): Logger {
    return new Logger({ debug });
  }
}
