/**
 * Simple Logger with run_id and station tracking
 */

export interface LogContext {
  run_id?: string;
  station?: string;
  service?: string;
  [key: string]: unknown; // Allow additional properties
}

export interface Logger {
  info(message: string, context?: Omit<LogContext, 'service'>): void;
  warn(message: string, context?: Omit<LogContext, 'service'>): void;
  error(message: string, context?: Omit<LogContext, 'service'>): void;
  debug(message: string, context?: Omit<LogContext, 'service'>): void;
}

function describeExtra(extra: Record<string, unknown>): string | null {
  const entries = Object.entries(extra).filter(([, value]) => value !== undefined);
  if (entries.length === 0) return null;

  const printable = Object.fromEntries(
    entries.map(([key, value]) => [key, value instanceof Error ? value.message : value])
  );
  return JSON.stringify(printable);
}

export function formatLog(level: string, message: string, context?: LogContext, now: Date = new Date()): string {
  const parts = [
    `[${now.toISOString()}]`,
    `[${level}]`,
  ];

  const { service, run_id, station, ...extra }: LogContext = context ?? {};

  if (service) {
    parts.push(`[${service}]`);
  }

  if (run_id) {
    parts.push(`[run:${run_id.substring(0, 8)}]`);
  }

  if (station) {
    parts.push(`[${station}]`);
  }

  parts.push(message);

  const tail = describeExtra(extra);
  if (tail) {
    parts.push(tail);
  }

  return parts.join(' ');
}

export function createLogger(service: string): Logger {
  return {
    info(message, context) {
      console.log(formatLog('INFO', message, { ...context, service }));
    },

    warn(message, context) {
      console.warn(formatLog('WARN', message, { ...context, service }));
    },

    error(message, context) {
      console.error(formatLog('ERROR', message, { ...context, service }));
    },

    debug(message, context) {
      if (process.env.DEBUG) {
        console.log(formatLog('DEBUG', message, { ...context, service }));
      }
    },
  };
}

/**
 * Logger bound to a fixed context (run id, station) so callers don't repeat it
 */
export function withContext(logger: Logger, bound: Omit<LogContext, 'service'>): Logger {
  return {
    info: (message, context) => logger.info(message, { ...bound, ...context }),
    warn: (message, context) => logger.warn(message, { ...bound, ...context }),
    error: (message, context) => logger.error(message, { ...bound, ...context }),
    debug: (message, context) => logger.debug(message, { ...bound, ...context }),
  };
}
