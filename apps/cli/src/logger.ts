import pino, { stdTimeFunctions } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { ReporterLogger } from '@glreporter/report-engine';
import type { LogLevel } from './config';

/** Logs go to stderr; stdout carries only the report. */
export function createCliLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
  return pino(
    {
      name: 'glreporter',
      level,
      base: undefined,
      timestamp: stdTimeFunctions.isoTime
    },
    destination
  );
}

export function toReporterLogger(logger: Logger): ReporterLogger {
  return {
    debug(message, meta) {
      logger.debug(meta ?? {}, message);
    },
    error(message, meta) {
      if (message instanceof Error) {
        logger.error({ ...meta, err: message }, message.message);
      } else {
        logger.error(meta ?? {}, message);
      }
    }
  };
}
