export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

/**
 * Prepends a bracketed component tag, e.g. `[orchestrator] config unchanged`.
 */
export function withPrefix(prefix: string, logger: Logger = console): Logger {
  const tag = `[${prefix}]`;
  const prefixed: Logger = {
    info: (message) => logger.info(`${tag} ${message}`),
    warn: (message) => logger.warn(`${tag} ${message}`),
    error: (message) => logger.error(`${tag} ${message}`),
  };
  if (logger.debug) {
    prefixed.debug = (message) => logger.debug?.(`${tag} ${message}`);
  }
  return prefixed;
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
