/**
 * Logging sink handed to the engine through its context. The engine never
 * writes to the console itself.
 */
export interface ProbeLogger {
  debug(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
}

export const silentLogger: ProbeLogger = Object.freeze({
  debug: () => undefined,
  warn: () => undefined,
});

export interface StderrLoggerOptions {
  /** Emit debug lines as well as warnings (default: false) */
  verbose?: boolean;
  /** Line prefix (default: '[payloadprobe]') */
  prefix?: string;
  /** Sink, process.stderr unless overridden */
  stream?: Pick<NodeJS.WriteStream, 'write'>;
}

function formatLine(
  prefix: string,
  level: 'debug' | 'warn',
  message: string,
  details?: Record<string, unknown>
): string {
  const suffix =
    details && Object.keys(details).length > 0
      ? ` ${JSON.stringify(details)}`
      : '';
  return `${prefix} ${level}: ${message}${suffix}\n`;
}

export function createStderrLogger(
  options: StderrLoggerOptions = {}
): ProbeLogger {
  const prefix = options.prefix ?? '[payloadprobe]';
  const stream = options.stream ?? process.stderr;
  const verbose = options.verbose === true;

  return Object.freeze({
    debug(message: string, details?: Record<string, unknown>): void {
      if (!verbose) return;
      stream.write(formatLine(prefix, 'debug', message, details));
    },
    warn(message: string, details?: Record<string, unknown>): void {
      stream.write(formatLine(prefix, 'warn', message, details));
    },
  });
}
