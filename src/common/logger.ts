/**
 * Logging utility for the orchestration engine
 * Provides configurable category logging for the different phases of a run
 */

export interface LoggingConfig {
  enablePhaseLogs?: boolean;
  enableNodeLogs?: boolean;
  enableFleetLogs?: boolean;
  enableTestMode?: boolean;
  /** Receives every line instead of the console, e.g. a JSON stream writer */
  sink?: LogSink;
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type LogCategory = 'phase' | 'node' | 'fleet' | 'general';

export interface LogRecord {
  level: LogLevel;
  category: LogCategory;
  message: string;
  args: unknown[];
  timestamp: number;
}

export type LogSink = (record: LogRecord) => void;

export class FrameworkLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log phase-level progress (timeline headlines)
   */
  phase(message: string, ...args: unknown[]): void {
    if (this.config.enablePhaseLogs) {
      this.write('info', 'phase', `[PHASE] ${message}`, args);
    }
  }

  /**
   * Log per-node progress
   */
  node(nodeName: string, message: string, ...args: unknown[]): void {
    if (this.config.enableNodeLogs) {
      this.write('info', 'node', `[NODE ${nodeName}] ${message}`, args);
    }
  }

  /**
   * Log VM fleet interactions
   */
  fleet(message: string, ...args: unknown[]): void {
    if (this.config.enableFleetLogs) {
      this.write('info', 'fleet', `[FLEET] ${message}`, args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    this.write('error', 'general', `[ERROR] ${message}`, args);
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    this.write('warn', 'general', `[WARN] ${message}`, args);
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development') {
      this.write('debug', 'general', `[DEBUG] ${message}`, args);
    }
  }

  private write(level: LogLevel, category: LogCategory, message: string, args: unknown[]): void {
    if (this.config.sink) {
      this.config.sink({ level, category, message, args, timestamp: Date.now() });
      return;
    }
    if (this.config.enableTestMode) {
      return;
    }
    switch (level) {
      case 'error':
        console.error(message, ...args);
        break;
      case 'warn':
        console.warn(message, ...args);
        break;
      case 'debug':
        console.debug(message, ...args);
        break;
      default:
        console.log(message, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): FrameworkLogger {
  return new FrameworkLogger(config);
}

/**
 * Default logger instance for simple usage
 */
export const defaultLogger = new FrameworkLogger({
  enablePhaseLogs: true,
  enableNodeLogs: true,
  enableFleetLogs: false
});
