import winston from "winston";
import type { ILogDriver } from "../../domain/interfaces/ILogDriver";

export function createWinstonLogger(level = "info"): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => {
        const { timestamp, level, message, label, ...meta } = info;
        const scope = label ? ` [${String(label)}]` : "";
        const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `${String(timestamp)}${scope} ${level}: ${String(message)}${rest}`;
      })
    ),
    transports: [new winston.transports.Console()],
  });
}

export class WinstonLogDriver implements ILogDriver {
  constructor(private readonly logger: winston.Logger = createWinstonLogger()) {}

  info(msg: string, extra?: unknown) {
    this.logger.info(msg, this.meta(extra));
  }

  warn(msg: string, extra?: unknown) {
    this.logger.warn(msg, this.meta(extra));
  }

  error(msg: string, extra?: unknown) {
    this.logger.error(msg, this.meta(extra));
  }

  debug(msg: string, extra?: unknown) {
    this.logger.debug(msg, this.meta(extra));
  }

  private meta(extra: unknown): object {
    if (extra === undefined) return {};
    return typeof extra === "object" && extra !== null ? extra : { extra };
  }
}
