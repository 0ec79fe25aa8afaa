// ─── Logging ────────────────────────────────────────────────────────────────
//
// One winston logger per service. Output goes to stderr so that the CLI's
// stdout stays clean for the expanded tree.

import winston from 'winston';

export const loggingConfig = {
  levels: winston.config.npm.levels,
  colors: winston.config.npm.colors,
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true,
  },
  services: {
    expander: { level: 'warn' },
    highlight: { level: 'warn' },
    parser: { level: 'warn' },
    cli: { level: 'info' },
  },
} as const;

export type ServiceName = keyof typeof loggingConfig.services;

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ' ' + JSON.stringify(metadata);
    }
    return msg;
  }),
);

function levelFor(service: ServiceName): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return process.env.TEST_LOG_LEVEL || 'error';
  if (process.env.NOWIKI_DEBUG === 'true') return 'debug';
  return loggingConfig.services[service].level;
}

export function createServiceLogger(service: ServiceName): winston.Logger {
  return winston.createLogger({
    level: levelFor(service),
    levels: loggingConfig.levels,
    defaultMeta: { service },
    // Quiet under test unless a level was asked for
    silent: process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL,
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: Object.keys(loggingConfig.levels),
      }),
    ],
  });
}
