import pino from "pino";
import { LoggingConfig } from "../../core/domain/entities/config.entity.js";
import { ILogger, LogFields } from "../../core/domain/services/logger.service.js";

export class PinoLogger implements ILogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  static create(config: LoggingConfig): PinoLogger {
    return new PinoLogger(
      pino({
        level: config.level,
        transport: config.pretty
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            }
          : undefined,
      }),
    );
  }

  static silent(): PinoLogger {
    return new PinoLogger(pino({ level: "silent" }));
  }

  debug(msg: string, fields?: LogFields): void {
    this.pinoLogger.debug(fields ?? {}, msg);
  }

  info(msg: string, fields?: LogFields): void {
    this.pinoLogger.info(fields ?? {}, msg);
  }

  warn(msg: string, fields?: LogFields): void {
    this.pinoLogger.warn(fields ?? {}, msg);
  }

  error(msg: string, fields?: LogFields): void {
    this.pinoLogger.error(fields ?? {}, msg);
  }

  child(bindings: LogFields): ILogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}
