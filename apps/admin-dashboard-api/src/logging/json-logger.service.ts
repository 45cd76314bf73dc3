import { ConsoleLogger, Injectable, LogLevel, Optional } from '@nestjs/common';

type LogMeta = Record<string, unknown>;

/**
 * JSON line logger so container log collectors can parse output without agents.
 * Writes `{ts,level,context,msg,...meta}` through Nest's console transport.
 */
@Injectable()
export class JsonLogger extends ConsoleLogger {
  constructor(@Optional() context?: string) {
    super(context ?? 'admin-dashboard-api');
  }

  private line(level: string, context: string | undefined, message: unknown, meta: LogMeta) {
    return JSON.stringify({
      ts: new Date().toISOString(),
      level,
      context,
      ...this.normalizeMessage(message),
      ...meta
    });
  }

  private normalizeError(error: unknown): LogMeta {
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }
    return { value: String(error) };
  }

  private normalizeMessage(message: unknown): LogMeta {
    if (message instanceof Error) {
      return { msg: message.message, error: this.normalizeError(message) };
    }
    return { msg: message };
  }

  private split(metaOrContext?: string | LogMeta): [string | undefined, LogMeta] {
    return typeof metaOrContext === 'string' ? [metaOrContext, {}] : [this.context, metaOrContext ?? {}];
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: LogMeta): void;
  log(message: unknown, metaOrContext?: string | LogMeta) {
    const [context, meta] = this.split(metaOrContext);
    super.log(this.line('info', context, message, meta));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: LogMeta): void;
  warn(message: unknown, metaOrContext?: string | LogMeta) {
    const [context, meta] = this.split(metaOrContext);
    super.warn(this.line('warn', context, message, meta));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: LogMeta): void;
  error(message: unknown, stackOrMeta?: string | LogMeta, maybeContext?: string) {
    const stack = typeof stackOrMeta === 'string' ? stackOrMeta : undefined;
    const context = maybeContext ?? this.context;
    const meta = typeof stackOrMeta === 'string' ? {} : (stackOrMeta ?? {});
    super.error(this.line('error', context, message, { ...(stack ? { stack } : {}), ...meta }));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: LogMeta): void;
  debug(message: unknown, metaOrContext?: string | LogMeta) {
    const [context, meta] = this.split(metaOrContext);
    super.debug(this.line('debug', context, message, meta));
  }

  verbose(message: unknown, context?: string): void;
  verbose(message: unknown, meta?: LogMeta): void;
  verbose(message: unknown, metaOrContext?: string | LogMeta) {
    const [context, meta] = this.split(metaOrContext);
    super.verbose(this.line('verbose', context, message, meta));
  }

  /** Keeps Nest from downgrading log levels when bufferLogs=true. */
  setLogLevels(levels: LogLevel[]) {
    super.setLogLevels(levels);
  }
}
