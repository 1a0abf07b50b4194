/**
 * Logger - Structured logging with automatic scope injection
 *
 * Built on pino, with automatic injection of:
 * - Scope context (scope name, channel topic, join reference)
 * - Custom metadata
 *
 * @example
 * ```typescript
 * import { Logger } from 'switchyard-kernel';
 *
 * // Configure once at app start
 * Logger.configure({
 *   level: 'debug',
 *   transport: { target: 'pino-pretty', options: { colorize: true } },
 * });
 *
 * // Create scoped child logger
 * const log = Logger.for('Socket');
 * log.debug({ topic: 'room:1' }, 'Adding channel');
 * ```
 */

import pino, {
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { Context, resolveFields, type ScopeContext } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity (least to most).
 * `silent` disables all logging.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Function to extract fields from the scope context for logging.
 *
 * @example
 * ```typescript
 * const extractor: ContextFieldsExtractor = (ctx) => ({ scope: ctx.name });
 * ```
 *
 * @see {@link composeContextFields} - Combine multiple extractors
 */
export type ContextFieldsExtractor = (ctx: ScopeContext) => Record<string, unknown>;

export interface LoggerConfig {
  /** Log level (default: `SWITCHYARD_LOG_LEVEL` or 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Auto-inject scope context into every log (default: true) */
  includeContext?: boolean;
  /** Custom function to extract fields from the scope context */
  contextFields?: ContextFieldsExtractor;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Custom mixin function for additional properties */
  mixin?: () => Record<string, unknown>;
  /** Pretty print (default: true only if NODE_ENV === 'development') */
  prettyPrint?: boolean;
  /**
   * Replace existing config instead of merging (default: false).
   */
  replace?: boolean;
}

/**
 * Log method signature supporting both message-first and object-first forms.
 *
 * @example
 * ```typescript
 * log.info('Channel joined');
 * log.warn({ err, topic }, 'Join timed out');
 * ```
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

/**
 * Logger interface with structured logging and scope injection.
 */
export interface SwitchyardLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): SwitchyardLogger;

  /** Get the current log level */
  level: LogLevel;

  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

const defaultContextFieldsExtractor: ContextFieldsExtractor = (ctx) => ({
  scope: ctx.name,
  ...resolveFields(ctx.fields),
});

function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }

  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  const extractor = config.contextFields ?? defaultContextFieldsExtractor;
  return extractor(ctx);
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.SWITCHYARD_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : undefined;
}

/**
 * Create pino logger options from config.
 */
function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const usePretty = config.prettyPrint ?? process.env.NODE_ENV === "development";

  const options: LoggerOptions = {
    level: config.level ?? levelFromEnv() ?? "info",
    base: config.base ?? { pid: process.pid },

    // Mixin runs on every log to inject context
    mixin: () => {
      const contextFields = getContextFields(config);
      const customFields = config.mixin?.() ?? {};
      return { ...contextFields, ...customFields };
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function toLogLevel(level: string): LogLevel {
  return isLogLevel(level) ? level : "info";
}

/**
 * Wrap pino logger to match the SwitchyardLogger interface.
 */
function wrapLogger(pinoLogger: PinoLogger): SwitchyardLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): SwitchyardLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return toLogLevel(pinoLogger.level);
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = pino(createPinoOptions(globalConfig));
  }
  return globalLogger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton.
 *
 * Provides structured logging with automatic injection of the current scope
 * context (via AsyncLocalStorage).
 *
 * @example
 * ```typescript
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.for('Channel');
 * log.debug('Initializing');
 *
 * class MyTransport {
 *   private log = Logger.for(this);
 * }
 * ```
 */
export const Logger = {
  /**
   * Configure the global logger.
   * Should be called once at application startup.
   */
  configure(config: LoggerConfig): void {
    if (config.replace) {
      globalConfig = config;
    } else {
      globalConfig = { ...globalConfig, ...config };
    }

    globalLogger = pino(createPinoOptions(globalConfig));
  },

  /**
   * Get the global logger instance.
   */
  get(): SwitchyardLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Create a child logger scoped to a component or name.
   *
   * @param nameOrComponent Component name or object (uses constructor.name)
   */
  for(nameOrComponent: string | object): SwitchyardLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return wrapLogger(getOrCreateGlobalLogger().child({ component: name }));
  },

  /**
   * Create a child logger with custom bindings.
   */
  child(bindings: Record<string, unknown>): SwitchyardLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Create a standalone logger instance with custom config.
   * Does not affect the global logger.
   */
  create(config: LoggerConfig = {}): SwitchyardLogger {
    return wrapLogger(pino(createPinoOptions(config)));
  },

  get level(): LogLevel {
    return toLogLevel(getOrCreateGlobalLogger().level);
  },

  /**
   * Set the log level at runtime.
   */
  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compose multiple context field extractors into one.
 * Later extractors override earlier ones for the same keys.
 *
 * @example
 * ```typescript
 * Logger.configure({
 *   contextFields: composeContextFields(
 *     defaultContextFields,
 *     (ctx) => ({ scope_id: ctx.scopeId }),
 *   ),
 * });
 * ```
 */
export function composeContextFields(
  ...extractors: ContextFieldsExtractor[]
): ContextFieldsExtractor {
  return (ctx) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(ctx));
    }
    return result;
  };
}

/**
 * The default context fields extractor: scope name plus scope fields.
 */
export const defaultContextFields = defaultContextFieldsExtractor;

export type { PinoLogger, TransportSingleOptions, TransportMultiOptions };
