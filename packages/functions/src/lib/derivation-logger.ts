import type { InvocationContext } from "@azure/functions";
import type { PaletteLogEntry, PaletteLogLevel } from "imgpal-shared";
import type { PaletteLogger } from "./palette-logger";

/** The part of the Functions context the logger writes to. */
export type LogSink = Pick<InvocationContext, "log" | "warn" | "error">;

export interface DerivationLoggerOptions {
  context: LogSink;
  maxEntries?: number;
  /** Injected for tests; defaults to the wall clock. */
  now?: () => Date;
}

/**
 * DerivationLogger collects structured entries for one palette request
 * and forwards each of them to the Azure Functions context logger.
 *
 * The entries are returned to the caller when a request asks for debug
 * output.
 */
export class DerivationLogger implements PaletteLogger {
  private readonly context: LogSink;
  private readonly entries: PaletteLogEntry[] = [];
  private readonly maxEntries: number;
  private readonly now: () => Date;

  constructor(options: DerivationLoggerOptions) {
    this.context = options.context;
    this.maxEntries = options.maxEntries || 200;
    this.now = options.now ?? (() => new Date());
  }

  private record(level: PaletteLogLevel, msg: string, data?: Record<string, unknown>): void {
    const entry: PaletteLogEntry = { ts: this.now().toISOString(), level, msg };
    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }

    // Drop the oldest fifth once full
    if (this.entries.length >= this.maxEntries) {
      this.entries.splice(0, Math.max(1, Math.floor(this.maxEntries * 0.2)));
    }
    this.entries.push(entry);

    const line = `[${level.toUpperCase()}] ${msg}`;
    const args: unknown[] = entry.data ? [line, entry.data] : [line];
    switch (level) {
      case "warn":
        this.context.warn(...args);
        break;
      case "error":
        this.context.error(...args);
        break;
      default:
        this.context.log(...args);
    }
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.record("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.record("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.record("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.record("error", msg, data);
  }

  /**
   * Runs `work` and logs how long it took under `stage`.
   */
  async time<T>(stage: string, work: () => Promise<T> | T): Promise<T> {
    const started = performance.now();
    try {
      return await work();
    } finally {
      const elapsedMs = Math.round(performance.now() - started);
      this.debug(`${stage} finished`, { stage, elapsedMs });
    }
  }

  getEntries(): PaletteLogEntry[] {
    return [...this.entries];
  }
}
