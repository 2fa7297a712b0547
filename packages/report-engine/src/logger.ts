/** Logging surface of the engine: per-node progress at debug, unexpected failures at error. */
export interface ReporterLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  error(message: string | Error, meta?: Record<string, unknown>): void;
}

export const noopLogger: ReporterLogger = {
  debug: () => {},
  error: () => {}
};
