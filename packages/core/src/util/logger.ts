/**
 * Verbosity-gated logger handle.
 *
 * Passed explicitly to every component that reports progress; there is no
 * process-wide logging state.
 *
 * Levels: 0 warnings only, 1 info, 2 debug, 3 trace.
 */

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  readonly verbosity: number;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

export interface LoggerOptions {
  verbosity?: number;
  sink?: LogSink;
  prefix?: string;
}

export const LOG_PREFIX = '[hyperenum]';

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbosity = options.verbosity ?? 1;
  const sink = options.sink ?? process.stderr;
  const prefix = options.prefix ?? LOG_PREFIX;

  const emit = (level: number, tag: string, message: string): void => {
    if (verbosity < level) return;
    sink.write(`${prefix} ${tag}${message}\n`);
  };

  return {
    verbosity,
    warn: (message) => emit(0, 'warning: ', message),
    info: (message) => emit(1, '', message),
    debug: (message) => emit(2, '', message),
    trace: (message) => emit(3, '', message),
  };
}

export const silentLogger: Logger = {
  verbosity: -1,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
  trace: () => undefined,
};
