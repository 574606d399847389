import type { ILogDriver } from "../../domain/interfaces/ILogDriver";
import type { ILogger, LogLevel } from "../../domain/interfaces/ILogger";
import { LOG_LEVELS, type LogLevelName } from "../config/loadConfig";

export interface LogBufferOptions {
  label?: string;
  /** Entries less severe than this level are never buffered. */
  level?: LogLevelName;
  chunkSize?: number;
  /** Pending entries beyond this count push out the oldest ones. */
  capacity?: number;
}

type Entry = [message: string, extra: object, level: LogLevel];

/**
 * Collects log entries from the encode and decode paths and hands them to the
 * driver on a later tick, one chunk per tick.
 */
export class LogBuffer implements ILogger {
  private flushId?: NodeJS.Immediate;
  private pending: Entry[] = [];
  private dropped = 0;

  private readonly label?: string;
  private readonly threshold: number;
  private readonly chunkSize: number;
  private readonly capacity: number;

  constructor(
    private readonly driver: ILogDriver,
    options: LogBufferOptions = {}
  ) {
    this.label = options.label;
    this.threshold = LOG_LEVELS.indexOf(options.level ?? "info");
    this.chunkSize = options.chunkSize ?? 50;
    this.capacity = options.capacity ?? this.chunkSize * 20;
  }

  log(msg: string, extra?: object, level: LogLevel = "info") {
    if (LOG_LEVELS.indexOf(level) > this.threshold) return;

    this.pending.push([msg, extra ?? {}, level]);
    if (this.pending.length > this.capacity) {
      this.pending.shift();
      this.dropped++;
    }
    this.flushId ??= setImmediate(this.flush);
  }

  flush = () => {
    this.cancel();
    this.write(this.pending.splice(0, this.chunkSize));
    if (this.pending.length > 0) {
      this.flushId = setImmediate(this.flush);
    }
  };

  drain() {
    this.cancel();
    this.write(this.pending.splice(0));
  }

  destroy() {
    this.cancel();
    this.pending = [];
    this.dropped = 0;
  }

  private cancel() {
    clearImmediate(this.flushId);
    this.flushId = undefined;
  }

  private write(entries: Entry[]) {
    const ts = Date.now();
    const { label } = this;

    if (this.dropped > 0) {
      this.driver.warn("Log entries dropped", { dropped: this.dropped, label, ts });
      this.dropped = 0;
    }
    for (const [message, extra, level] of entries) {
      this.driver[level]?.(message, { ...extra, label, ts });
    }
  }
}
