import winston from 'winston';

const LOG_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

const silent = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, stack, ...extra } = info;
    let line = `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}`;
    if (Object.keys(extra).length > 0) {
      line += ` ${JSON.stringify(extra)}`;
    }
    if (stack) {
      line += `\n${String(stack)}`;
    }
    return line;
  })
);

const logger = winston.createLogger({
  levels: LOG_LEVELS,
  level: process.env.LOG_LEVEL || 'info',
  format: consoleFormat,
  transports: [new winston.transports.Console({ silent })]
});

type Meta = Record<string, unknown>;

function toMeta(meta: unknown): Meta | undefined {
  if (meta === undefined) return undefined;
  if (meta instanceof Error) {
    return { error: meta.message, stack: meta.stack };
  }
  if (meta && typeof meta === 'object' && !Array.isArray(meta)) {
    return { ...meta };
  }
  return { detail: meta };
}

function write(level: keyof typeof LOG_LEVELS, message: string, meta?: unknown) {
  const normalized = toMeta(meta);
  if (normalized) {
    logger.log(level, message, normalized);
  } else {
    logger.log(level, message);
  }
}

export const log = {
  error: (message: string, meta?: unknown) => write('error', message, meta),
  warn: (message: string, meta?: unknown) => write('warn', message, meta),
  info: (message: string, meta?: unknown) => write('info', message, meta),
  debug: (message: string, meta?: unknown) => write('debug', message, meta),
  setLevel(level: string) {
    if (level in LOG_LEVELS) {
      logger.level = level;
    }
  }
};

export type Logger = typeof log;
