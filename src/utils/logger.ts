import winston from 'winston';
import { getConfig } from '../config/index.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

// `<time> <level> [Component] message {meta}`
const lineFormat = printf(({ level, message, timestamp: time, component, ...metadata }) => {
  const componentStr = typeof component === 'string' ? ` [${component}]` : '';
  const metaStr = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${String(time)} ${level}${componentStr} ${String(message)}${metaStr}`;
});

export interface RootLoggerOptions {
  level: 'debug' | 'info' | 'warn' | 'error';
  // Colors off for log shippers
  colorize: boolean;
}

/**
 * Build a root winston logger writing one line per entry to the console
 */
export function createRootLogger(options: RootLoggerOptions): winston.Logger {
  const consoleFormat = options.colorize
    ? combine(colorize({ all: true }), timestamp({ format: TIMESTAMP_FORMAT }), lineFormat)
    : combine(timestamp({ format: TIMESTAMP_FORMAT }), lineFormat);

  return winston.createLogger({
    level: options.level,
    format: errors({ stack: true }),
    transports: [new winston.transports.Console({ format: consoleFormat })],
    exitOnError: false,
  });
}

let rootLogger: winston.Logger | null = null;

/**
 * Root logger, configured from LOG_LEVEL on first use
 */
export function getLogger(): winston.Logger {
  if (!rootLogger) {
    const config = getConfig();
    rootLogger = createRootLogger({ level: config.logLevel, colorize: config.env !== 'production' });
  }
  return rootLogger;
}

/**
 * Logging capability handed to every component
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(options: { component: string }): Logger;
}

/**
 * Logger bound to a component name; children extend the name with `:`
 */
export class ComponentLogger implements Logger {
  private readonly target: winston.Logger;
  readonly component: string;

  constructor(component: string, root: winston.Logger = getLogger()) {
    this.component = component;
    this.target = root.child({ component });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.target.debug(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.target.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.target.warn(message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.target.error(message, meta);
  }

  child(options: { component: string }): Logger {
    return new ComponentLogger(`${this.component}:${options.component}`, this.target);
  }
}

export function logger(component: string): Logger {
  return new ComponentLogger(component);
}

/**
 * Shorten a wallet address for log output
 */
export function shortAddress(address: string): string {
  return address.length > 12 ? `${address.slice(0, 10)}...` : address;
}

/**
 * Flatten an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}
