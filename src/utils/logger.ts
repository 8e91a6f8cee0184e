import pino from 'pino';
import { config } from '../config';

/**
 * Structured logger
 *
 * JSON lines on stderr; stdout is reserved for `--print` output.
 * - time: ISO 8601
 * - level: label
 * - service: "launch-env"
 */
export const logger = pino(
  {
    level: config.logLevel,
    formatters: {
      level: (label) => {
        return { level: label };
      },
      bindings: () => {
        return { service: 'launch-env' };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.destination(2)
);

export default logger;
