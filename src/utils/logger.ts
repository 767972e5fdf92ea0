export type ConsoleWriter = Pick<Console, 'log' | 'warn' | 'error'>;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Printed only in verbose mode. */
  debug(message: string): void;
  isVerbose(): boolean;
  setVerbose(verbose: boolean): void;
  child(prefix: string): Logger;
  newline(): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  prefix?: string;
  console?: ConsoleWriter;
}

interface LoggerState {
  verbose: boolean;
}

function build(state: LoggerState, sink: ConsoleWriter, prefix: string): Logger {
  const tag = (message: string) => (prefix ? `[${prefix}] ${message}` : message);
  return {
    info: (message) => sink.log(tag(message)),
    warn: (message) => sink.warn(tag(message)),
    error: (message) => sink.error(tag(message)),
    debug: (message) => {
      if (state.verbose) sink.error(tag(message));
    },
    isVerbose: () => state.verbose,
    setVerbose: (verbose) => {
      state.verbose = verbose;
    },
    // children share the verbosity switch of their parent
    child: (childPrefix) => build(state, sink, prefix ? `${prefix}:${childPrefix}` : childPrefix),
    newline: () => sink.log(''),
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return build(
    { verbose: options.verbose ?? false },
    options.console ?? globalThis.console,
    options.prefix ?? '',
  );
}
