import type { LoggingConfig, LogLevel } from '../config/types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Optional per-topic switches in LoggingConfig. */
export type LogCategory = 'requests' | 'responses' | 'filesystem' | 'xml' | 'locks';

// Logger class for structured logging
export class Logger {
  constructor(private config: LoggingConfig) {}

  /** True when debug output for the given category would be printed. */
  isEnabled(category: LogCategory): boolean {
    return this.config.enabled && this.config[category] && this.config.level === 'debug';
  }

  /** Debug output gated by a category switch. */
  trace(category: LogCategory, message: string, data?: unknown): void {
    if (this.isEnabled(category)) {
      this.debug(message, data);
    }
  }

  debug(message: string, data?: unknown): void {
    if (this.allows('debug')) {
      console.log(`🐛 ${new Date().toISOString()} DEBUG: ${message}`, data ?? '');
    }
  }

  info(message: string, data?: unknown): void {
    if (this.allows('info')) {
      console.log(`ℹ️  ${new Date().toISOString()} INFO: ${message}`, data ?? '');
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.allows('warn')) {
      console.warn(`⚠️  ${new Date().toISOString()} WARN: ${message}`, data ?? '');
    }
  }

  error(message: string, data?: unknown): void {
    if (this.config.enabled) {
      console.error(`❌ ${new Date().toISOString()} ERROR: ${message}`, data ?? '');
    }
  }

  private allows(level: LogLevel): boolean {
    return this.config.enabled && LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }
}

/** A logger that prints nothing, for embedding and tests. */
export function createSilentLogger(): Logger {
  return new Logger({
    enabled: false,
    level: 'error',
    requests: false,
    responses: false,
    filesystem: false,
    xml: false,
    locks: false,
  });
}
