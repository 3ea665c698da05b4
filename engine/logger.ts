export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger = (opts: { debug?: boolean } = {}): Logger => ({
  debug: (message) => {
    if (opts.debug) console.log(`[debug] ${message}`);
  },
  info: (message) => console.log(message),
  warn: (message) => console.warn(`Warning: ${message}`),
  error: (message) => console.error(message),
});

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
