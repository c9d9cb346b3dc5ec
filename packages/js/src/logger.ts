import { ProcessingWarning } from './errors.js';

/**
 * Sink for diagnostics emitted while processing. Warnings describe input the
 * algorithms tolerated; debug messages trace remote context loads.
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string, warning?: ProcessingWarning): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};

export const consoleLogger: Logger = {
  debug: (message) => console.debug(`[jsonld] ${message}`),
  warn: (message, warning) =>
    console.warn(`[jsonld] ${warning ? `${warning.code}: ` : ''}${message}`),
};

export function warn(logger: Logger, warning: ProcessingWarning): void {
  logger.warn(warning.message, warning);
}
