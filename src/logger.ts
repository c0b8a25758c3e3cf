import pino from 'pino';
import { config } from './config';

// pino uses JSON.stringify internally; BigInt values cause it to silently drop
// the entire merging object and only output the string message.
// This makes BigInt serialize as a string, preserving log output.
(BigInt.prototype as unknown as Record<string, unknown>).toJSON = function () {
  return this.toString();
};

const transport = config.isDev
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        singleLine: false,
      },
    })
  : undefined;

const logger = pino(
  {
    name: 'service-objects',
    level: config.logLevel,
  },
  transport
);

export default logger;
