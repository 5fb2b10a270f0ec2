import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { isErrorLike } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component?: string;
  message: string;
  data?: unknown;
  stack?: string;
}

interface LoggerOptions {
  debug?: boolean;
  logToFile?: boolean;
  logDir?: string;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m",  // green
  warn: "\x1b[33m",  // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

class Logger {
  private debugMode: boolean;
  private logToFile: boolean;
  private logDir: string;
  private logQueue: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private initialized: boolean = false;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? (process.env.VAULTWEAVE_DEBUG === "true");
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? path.join(os.homedir(), ".vaultweave", "logs");
  }

  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.flushInterval = setInterval(() => {
        void this.flush();
      }, 5000);
      // An ingestion run must be able to exit while the timer is armed
      this.flushInterval.unref();
    }
    this.initialized = true;
  }

  private createEntry(level: LogLevel, message: string, data?: unknown, component?: string): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (component) {
      entry.component = component;
    }

    if (data !== undefined) {
      entry.data = data;
    }

    if (isErrorLike(data)) {
      entry.stack = data.stack;
    }

    return entry;
  }

  private formatConsoleOutput(entry: LogEntry): string {
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    const scope = entry.component ? `[${entry.component}] ` : "";
    let output = `${LEVEL_COLORS[entry.level]}${levelStr}${RESET} ${scope}${entry.message}`;

    if (entry.data !== undefined && !isErrorLike(entry.data)) {
      output += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.stack) {
      output += `\n${entry.stack}`;
    }

    return output;
  }

  /** @internal used by scoped loggers */
  write(level: LogLevel, message: string, data?: unknown, component?: string): void {
    if (level === "debug" && !this.debugMode) {
      return;
    }

    const entry = this.createEntry(level, message, data, component);
    const output = this.formatConsoleOutput(entry);

    if (level === "error") {
      console.error(output);
    } else if (level === "warn") {
      console.warn(output);
    } else {
      console.log(output);
    }

    if (this.logToFile) {
      this.logQueue.push(entry);
    }
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: Error | unknown): void {
    this.write("error", message, error);
  }

  /**
   * Logger bound to a component name, printed as a `[component]` prefix and
   * stored as a field in file logs.
   */
  child(component: string): ScopedLogger {
    return new ScopedLogger(this, component);
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.logDir, `vaultweave-${date}.log`);
  }

  async flush(): Promise<void> {
    if (!this.logToFile || this.logQueue.length === 0) {
      return;
    }

    const entries = [...this.logQueue];
    this.logQueue = [];

    try {
      const lines = entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
      await fs.appendFile(this.getLogFilePath(), lines, "utf-8");
    } catch (err) {
      // Fallback to console if file write fails
      console.error("Failed to write to log file:", err);
    }
  }

  async close(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    await this.flush();
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }
}

class ScopedLogger {
  constructor(
    private readonly parent: Logger,
    readonly component: string
  ) {}

  debug(message: string, data?: unknown): void {
    this.parent.write("debug", message, data, this.component);
  }

  info(message: string, data?: unknown): void {
    this.parent.write("info", message, data, this.component);
  }

  warn(message: string, data?: unknown): void {
    this.parent.write("warn", message, data, this.component);
  }

  error(message: string, error?: Error | unknown): void {
    this.parent.write("error", message, error, this.component);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

export function createLogger(options?: LoggerOptions): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(options);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

// Error tracking utilities
export interface ErrorContext {
  component?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

export function trackError(error: Error, context?: ErrorContext): void {
  const logger = getLogger();
  const message = context?.component
    ? `[${context.component}] ${error.message}`
    : error.message;

  logger.error(message, {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
  });
}

export function createErrorTracker(component: string) {
  return (error: Error, action?: string, metadata?: Record<string, unknown>) => {
    trackError(error, { component, action, metadata });
  };
}

export { Logger, ScopedLogger };
export type { LoggerOptions };
export default getLogger;
