/**
 * Logger shape accepted by the client. Homebridge's logger and `console` both satisfy it.
 */
export interface BlinkLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const PREFIX = '[blink-home-client]';

export const createLogger = (debug = false): BlinkLogger => ({
  debug: (message, ...args) => {
    debug && console.log(`${PREFIX} ${message}`, ...args);
  },
  info: (message, ...args) => console.info(`${PREFIX} ${message}`, ...args),
  warn: (message, ...args) => console.warn(`${PREFIX} ${message}`, ...args),
  error: (message, ...args) => console.error(`${PREFIX} ${message}`, ...args)
});

export const nullLogger: BlinkLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
