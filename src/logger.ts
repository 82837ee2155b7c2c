/** Subset of `console` the stream logs through. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
