/**
 * Structured Logging Utility for StampDesk
 *
 * Namespaced loggers with log levels and a namespace filter. Configured
 * from the environment when the module loads:
 *
 *   STAMPDESK_LOG=1 | true | debug | info | warn | error
 *   STAMPDESK_LOG_LEVEL=debug
 *   STAMPDESK_LOG_FILTER=Pipeline|Compositor
 *
 * Usage:
 *   import { createLogger } from './logger';
 *
 *   const log = createLogger('StampPipeline');
 *   log.info('Applying stamps', { count: 3 });
 *   log.error('Export failed', new Error('disk full'));
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;
  /** Whether logging is enabled */
  enabled: boolean;
  /** Namespace filter (regex pattern, e.g., 'Pipeline|Transform') */
  filter: string | null;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const config: LoggerConfig = {
  minLevel: 'info',
  enabled: false,
  filter: null,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Initialize logger configuration from environment
 */
export function configureFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  config.enabled = true;
  config.minLevel = env.NODE_ENV === 'production' ? 'warn' : 'info';
  config.filter = null;

  const flag = env.STAMPDESK_LOG?.trim().toLowerCase();
  if (flag === '1' || flag === 'true') {
    config.enabled = true;
  } else if (flag === '0' || flag === 'false') {
    config.enabled = false;
  } else if (isLogLevel(flag)) {
    config.enabled = true;
    config.minLevel = flag;
  }

  const level = env.STAMPDESK_LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(level)) {
    config.minLevel = level;
  }

  const filter = env.STAMPDESK_LOG_FILTER?.trim();
  if (filter) {
    config.filter = filter;
  }
}

configureFromEnv();

/**
 * Format log arguments for output
 */
function formatArgs(args: unknown[]): unknown[] {
  return args.map((arg) => {
    if (arg instanceof Error) {
      return {
        name: arg.name,
        message: arg.message,
        stack: arg.stack,
      };
    }
    return arg;
  });
}

function passesFilter(namespace: string): boolean {
  if (!config.filter) return true;
  try {
    return new RegExp(config.filter, 'i').test(namespace);
  } catch {
    // An unparsable filter lets everything through
    return true;
  }
}

/**
 * Logger interface for a specific namespace
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Get the namespace of this logger */
  readonly namespace: string;
}

/**
 * Create a logger instance for a namespace
 *
 * @param namespace - The namespace/category for this logger (e.g., 'StampPipeline')
 */
export function createLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`;

  const shouldLog = (level: LogLevel): boolean => {
    if (!config.enabled) return false;
    if (LOG_LEVELS[level] < LOG_LEVELS[config.minLevel]) return false;
    return passesFilter(namespace);
  };

  return {
    namespace,

    debug(message: string, ...args: unknown[]): void {
      if (!shouldLog('debug')) return;
      console.debug(prefix, message, ...formatArgs(args));
    },

    info(message: string, ...args: unknown[]): void {
      if (!shouldLog('info')) return;
      console.info(prefix, message, ...formatArgs(args));
    },

    warn(message: string, ...args: unknown[]): void {
      if (!shouldLog('warn')) return;
      console.warn(prefix, message, ...formatArgs(args));
    },

    error(message: string, ...args: unknown[]): void {
      if (!shouldLog('error')) return;
      console.error(prefix, message, ...formatArgs(args));
    },
  };
}

/**
 * Enable logging programmatically
 */
export function enableLogging(level: LogLevel = 'info', filter?: string): void {
  config.enabled = true;
  config.minLevel = level;
  if (filter !== undefined) {
    config.filter = filter;
  }
}

/**
 * Disable logging programmatically
 */
export function disableLogging(): void {
  config.enabled = false;
}

/**
 * Get current logging configuration
 */
export function getLogConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

// Pre-created loggers for the core components
export const loggers = {
  StampPipeline: createLogger('StampPipeline'),
  Compositor: createLogger('Compositor'),
  PdfBackend: createLogger('PdfBackend'),
  PageTransform: createLogger('PageTransform'),
  ExportManager: createLogger('ExportManager'),
  DocumentStore: createLogger('DocumentStore'),
} as const;
