import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isDev = env !== 'production';
const isTest = env === 'test' || process.env['VITEST'] !== undefined;

const options: LoggerOptions = {
  level: process.env['CRAWL_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only for an interactive dev process; tests stay on plain JSON
if (isDev && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
