/**
 * Log levels, lowest first
 */
export enum LogLevel {
  DEBUG = 'debug',
  WARN = 'warn',
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole?: boolean;
  /** Count `incrementMetric` calls, e.g. `queries_rendered_total` */
  enableMetrics?: boolean;
}

function circularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();
  return (_key, value) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  };
}

/**
 * Process-wide logger for rendered queries and builder warnings, with
 * optional counters.
 *
 * Lines are written as `<ISO timestamp> [LEVEL] message`, followed by the
 * context as indented JSON when one is given.
 */
export class Logger {
  private static instance: Logger | undefined;
  private config: LoggerConfig;
  private readonly metrics = new Map<string, number>();

  private constructor(config: Partial<LoggerConfig>) {
    this.config = {
      minLevel: LogLevel.WARN,
      enableConsole: true,
      enableMetrics: false,
      ...config,
    };
  }

  /**
   * The shared instance. A passed config is merged into it, and so affects
   * every caller.
   */
  public static getInstance(config?: Partial<LoggerConfig>): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config || {});
    } else if (config) {
      Logger.instance.config = { ...Logger.instance.config, ...config };
    }
    return Logger.instance;
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  /**
   * No-op unless metrics are enabled.
   */
  public incrementMetric(name: string, value = 1): void {
    if (!this.config.enableMetrics) return;
    this.metrics.set(name, (this.metrics.get(name) || 0) + value);
  }

  public getMetrics(): Record<string, number> {
    return Object.fromEntries(this.metrics);
  }

  public resetMetrics(): void {
    this.metrics.clear();
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.config.enableConsole || !this.isEnabled(level)) {
      return;
    }

    let line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    if (context) {
      try {
        line += `\nContext: ${JSON.stringify(context, circularReplacer(), 2)}`;
      } catch (e) {
        line += '\nContext: [Unable to stringify context]';
      }
    }

    if (level === LogLevel.DEBUG) {
      console.debug(line);
    } else {
      console.warn(line);
    }
  }

  private isEnabled(level: LogLevel): boolean {
    const levels = Object.values(LogLevel);
    return levels.indexOf(level) >= levels.indexOf(this.config.minLevel);
  }
}
