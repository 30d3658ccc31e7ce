import type { Logger } from "./types.js";

export interface LoggerOptions {
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly verbose: boolean;

  constructor(component: string, opts: LoggerOptions = {}) {
    this.prefix = `[${component}]`;
    this.verbose = opts.verbose ?? false;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.verbose) return;
    console.debug(`${this.prefix} · ${msg}${formatData(data)}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${msg}${formatData(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ⚠ ${msg}${formatData(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ✗ ${msg}${formatData(data)}`);
  }

  progress(current: number, total: number, label: string): void {
    if (!process.stdout.isTTY) return;
    const pct = total > 0 ? Math.min(100, Math.round((current / total) * 100)) : 0;
    process.stdout.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stdout.write("\n");
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(component, { verbose: this.verbose });
  }
}

function formatData(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(component: string, opts: LoggerOptions = {}): ConsoleLogger {
  return new ConsoleLogger(component, opts);
}

/** Logger that drops everything; for callers that do not want output. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  progress() {},
};
