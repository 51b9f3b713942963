/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * All output goes to stderr so that CLI commands keep stdout for their own
 * results. The global level and the set of components with debug enabled
 * come from configuration:
 *
 * - `jobweave.logging.level`: `debug` | `info` | `warn` | `error`
 * - `jobweave.logging.debug`: comma-separated components, or `*`
 *
 * Components:
 * - graph: wait graph registration and release
 * - scheduler: scheduled futures
 * - runner: runners and worker pool
 * - dispatch: closure dispatch to backends
 * - store: job result store
 * - cluster: cluster watcher, status cache and scheduler adapter
 * - job: job templates and subprocess jobs
 * - cli: command line tools
 * - config: configuration loading
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('store');
 * log.info('Result cached', { jobDir });
 * log.debug('Hash compared', { stored, requested });
 * log.error('Failed to read result', error);
 * ```
 *
 * @module core/logger
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { ILogger } from '../interfaces/ILogger';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Components that can have logging enabled
 */
export type LogComponent = 'graph' | 'scheduler' | 'runner' | 'dispatch' | 'store' | 'cluster' | 'job' | 'cli' | 'config';

export const LOG_COMPONENTS: readonly LogComponent[] = [
  'graph', 'scheduler', 'runner', 'dispatch', 'store', 'cluster', 'job', 'cli', 'config',
];

/** Configuration section holding logging settings. */
export const LOGGING_SECTION = 'jobweave.logging';
/** Key of the global level within {@link LOGGING_SECTION}. */
export const LOGGING_LEVEL_KEY = 'level';
/** Key of the debug component list within {@link LOGGING_SECTION}. */
export const LOGGING_DEBUG_KEY = 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function isLogComponent(value: string): value is LogComponent {
  return LOG_COMPONENTS.some(c => c === value);
}

/**
 * Centralized logger with per-component debug control.
 *
 * A single instance is created by {@link Logger.initialize}; before that,
 * component loggers write straight to the console at info level and above.
 */
export class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel = 'info';
  private readonly debugComponents = new Set<LogComponent>();

  private constructor(private readonly configProvider?: IConfigProvider) {
    this.loadConfig();
  }

  /**
   * Initialize the logger from configuration. Calling it again replaces
   * the instance, which lets CLI entry points apply their own settings.
   */
  static initialize(configProvider?: IConfigProvider): Logger {
    Logger.instance = new Logger(configProvider);
    return Logger.instance;
  }

  /**
   * Get the singleton logger instance, if initialized.
   */
  static current(): Logger | undefined {
    return Logger.instance;
  }

  /**
   * Drop the singleton instance.
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  /**
   * Create a component-scoped logger.
   *
   * @param component - The component name for log prefixes
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  /**
   * Load level and debug components from configuration.
   */
  private loadConfig(): void {
    if (!this.configProvider) {
      return;
    }

    const level = this.configProvider.getConfig(LOGGING_SECTION, LOGGING_LEVEL_KEY, 'info').trim().toLowerCase();
    if (isLogLevel(level)) {
      this.level = level;
    } else {
      this.warn('config', `Unknown log level '${level}', using info`);
    }

    const debugList = this.configProvider.getConfig(LOGGING_SECTION, LOGGING_DEBUG_KEY, '');
    for (const entry of debugList.split(',').map(s => s.trim()).filter(Boolean)) {
      if (entry === '*') {
        LOG_COMPONENTS.forEach(c => this.debugComponents.add(c));
      } else if (isLogComponent(entry)) {
        this.debugComponents.add(entry);
      } else {
        this.warn('config', `Unknown log component '${entry}' in debug list`);
      }
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Enable or disable debug output for one component.
   */
  setDebug(component: LogComponent, enabled: boolean): void {
    if (enabled) {
      this.debugComponents.add(component);
    } else {
      this.debugComponents.delete(component);
    }
  }

  /**
   * Check if debug logging is enabled for a component.
   */
  isDebugEnabled(component: LogComponent): boolean {
    return this.level === 'debug' || this.debugComponents.has(component);
  }

  private isEnabled(level: LogLevel, component: LogComponent): boolean {
    if (level === 'debug') {
      return this.isDebugEnabled(component);
    }
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Format a log message with timestamp and component prefix.
   */
  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `[${timestamp}] [${levelStr}] [jobweave:${component}] ${message}`;
  }

  /**
   * Write a log entry.
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    if (!this.isEnabled(level, component)) {
      return;
    }
    console.error(this.formatMessage(level, component, message) + formatData(data));
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

/**
 * Format additional data for logging.
 */
export function formatData(data?: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) {
    return `\n  Error: ${data.message}${data.stack ? `\n  Stack: ${data.stack}` : ''}`;
  }
  try {
    return '\n  ' + JSON.stringify(data, null, 2).split('\n').join('\n  ');
  } catch {
    return `\n  [Unserializable data: ${typeof data}]`;
  }
}

/**
 * Component-scoped logger for convenience.
 *
 * Provides log methods pre-bound to a specific component.
 */
export class ComponentLogger implements ILogger {
  constructor(private readonly component: LogComponent) {}

  private write(level: LogLevel, message: string, data?: unknown): void {
    const instance = Logger.current();
    if (instance) {
      instance.log(level, this.component, message, data);
    } else if (level !== 'debug') {
      console.error(`[jobweave:${this.component}] ${message}${formatData(data)}`);
    }
  }

  /**
   * Log at debug level (only if debug enabled for this component).
   */
  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  isDebugEnabled(): boolean {
    return Logger.current()?.isDebugEnabled(this.component) ?? false;
  }
}
