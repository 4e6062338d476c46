/**
 * Minimal logging surface so library code can be run quietly from tests
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export const BANNER = "═══════════════════════════════════════════════════════";

/**
 * Prints a script title between banner lines
 */
export function logBanner(logger: Logger, title: string): void {
  logger.info(`\n${BANNER}`);
  logger.info(`  ${title}`);
  logger.info(`${BANNER}\n`);
}
