export interface Logger {
  info(message: string): void;
  // Only printed in verbose mode
  detail(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(options: { verbose: boolean; quiet: boolean }): Logger {
  const { verbose, quiet } = options;
  return {
    info: (message) => {
      if (!quiet) console.log(message);
    },
    detail: (message) => {
      if (verbose && !quiet) console.log(message);
    },
    warn: (message) => {
      if (!quiet) console.warn(message);
    },
    error: (message) => console.error(message),
  };
}
