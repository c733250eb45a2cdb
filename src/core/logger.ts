import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  prefix?: string;
}

const PREFIX = "[rr]";

/**
 * Console logger used by the CLI. Info goes to stdout, everything else to
 * stderr so pipeline output stays readable when redirected.
 */
export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const prefix = opts.prefix ?? PREFIX;
  const verbose = opts.verbose ?? process.env["RR_DEBUG"] === "1";
  return {
    debug(message) {
      if (verbose) console.error(pc.dim(`${prefix} ${message}`));
    },
    info(message) {
      if (!opts.quiet) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.error(pc.yellow(`${prefix} ${message}`));
    },
    error(message) {
      console.error(pc.red(`${prefix} ${message}`));
    },
  };
}

export interface LogRecord {
  level: LogLevel;
  message: string;
}

/** Logger that keeps records in memory; handy for tests and dry runs. */
export class MemoryLogger implements Logger {
  readonly records: LogRecord[] = [];

  debug(message: string): void {
    this.records.push({ level: "debug", message });
  }
  info(message: string): void {
    this.records.push({ level: "info", message });
  }
  warn(message: string): void {
    this.records.push({ level: "warn", message });
  }
  error(message: string): void {
    this.records.push({ level: "error", message });
  }

  messages(level?: LogLevel): string[] {
    return this.records
      .filter((r) => level === undefined || r.level === level)
      .map((r) => r.message);
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
