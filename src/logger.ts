import pino from 'pino';
import type { Logger } from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  level,
  base: { service: 'pcm-cast' },
  transport:
    process.env.NODE_ENV === 'production' || level === 'silent'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,service',
          },
        },
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
