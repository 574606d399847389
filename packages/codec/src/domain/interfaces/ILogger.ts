import type { ILogDriver } from "./ILogDriver";

export type LogLevel = keyof ILogDriver;

export interface ILogger {
  log(msg: string, extra?: object, level?: LogLevel): void;
  /** Writes the next chunk of pending entries. */
  flush(): void;
  /** Writes every pending entry now. */
  drain(): void;
  /** Discards pending entries. */
  destroy(): void;
}
