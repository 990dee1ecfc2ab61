import winston from 'winston';

import type { Config } from '../config/args';

// syslog-like levels, notice sits between info and warn
export const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    notice: 2,
    info: 3,
    debug: 4,
  },
  colors: {
    error: 'red',
    warn: 'yellow',
    notice: 'cyan',
    info: 'green',
    debug: 'blue',
  },
};

declare module 'winston' {
  interface Logger {
    notice: winston.LeveledLogMethod;
  }
}

export type LoggerConfig = Pick<Config, 'log_level' | 'logger' | 'log_file'>;

/**
 * The terminal belongs to the UI, so logs go to a file unless
 * `--logger console` is given (console output then goes to stderr).
 */
export const buildLogger = (config: LoggerConfig): winston.Logger => {
  return winston.createLogger({
    levels: customLevels.levels,
    level: config.log_level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message }) => {
        return `${String(timestamp)} [${level}]: ${String(message)}`;
      })
    ),
    transports: [
      config.logger === 'console'
        ? new winston.transports.Console({
            stderrLevels: Object.keys(customLevels.levels),
          })
        : new winston.transports.File({ filename: config.log_file }),
    ],
  });
};

/**
 * Logger that drops everything
 */
export const silentLogger = (): winston.Logger =>
  winston.createLogger({
    levels: customLevels.levels,
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
