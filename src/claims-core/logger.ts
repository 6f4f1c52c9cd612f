/**
 * Minimal logging port. Core classes log through this so the API process
 * can keep its tagged console output and tests can stay quiet.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function consoleLogger(tag: string): Logger {
  return {
    info: (message) => console.warn(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message, err) =>
      err === undefined
        ? console.error(`[${tag}] ${message}`)
        : console.error(`[${tag}] ${message}`, err),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
