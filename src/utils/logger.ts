export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'json' | 'pretty';

interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  scope?: string;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly scope: string | undefined;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      scope: this.scope ? `${this.scope}.${scope}` : scope
    });
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (this.format === 'json') {
      const payload = {
        level,
        scope: this.scope ?? null,
        message,
        metadata: metadata ?? null,
        timestamp: new Date().toISOString()
      };
      return JSON.stringify(payload);
    }

    const scopeText = this.scope ? ` [${this.scope}]` : '';
    const metadataText = metadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${new Date().toISOString()}] [${level.toUpperCase()}]${scopeText} ${message}${metadataText}`;
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    const formatted = this.formatMessage(level, message, metadata);
    if (level === 'error') {
      // eslint-disable-next-line no-console
      console.error(formatted);
      return;
    }
    // eslint-disable-next-line no-console
    console.log(formatted);
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>) {
    this.write('error', message, metadata);
  }
}
