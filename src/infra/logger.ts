import { pino, type Logger as PinoLogger, type LoggerOptions } from "pino";
import type { AppEnv } from "../config/env.js";

export class Logger {
  private constructor(private readonly log: PinoLogger) {}

  static create(env: Pick<AppEnv, "logLevel">): Logger {
    const opts: LoggerOptions = {
      level: env.logLevel,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    };
    return new Logger(pino(opts));
  }

  info(obj: unknown, msg?: string) {
    this.log.info(obj, msg);
  }
  warn(obj: unknown, msg?: string) {
    this.log.warn(obj, msg);
  }
  error(obj: unknown, msg?: string) {
    this.log.error(obj, msg);
  }
  debug(obj: unknown, msg?: string) {
    this.log.debug(obj, msg);
  }
  fatal(obj: unknown, msg?: string) {
    this.log.fatal(obj, msg);
  }
}
