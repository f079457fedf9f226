export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
};

export type LoggerOptions = {
  verbose?: boolean;
  sink?: (line: string) => void;
};

// Diagnostics share stderr with the error report, stdout stays for results.
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const sink = opts.sink ?? ((line: string) => console.error(line));
  const emit = (level: string, msg: string) => {
    sink(level ? `${scope}: ${level}: ${msg}` : `${scope}: ${msg}`);
  };
  return {
    info: (msg) => emit("", msg),
    warn: (msg) => emit("warning", msg),
    error: (msg) => emit("error", msg),
    debug: (msg) => {
      if (opts.verbose) emit("debug", msg);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
