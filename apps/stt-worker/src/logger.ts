import pino, { type Logger } from 'pino';

export function createLogger(level = 'info'): Logger {
  return pino({
    name: 'stt-worker',
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'SYS:standard',
        colorize: true,
      },
    },
  });
}
