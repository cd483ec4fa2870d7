import pino, { type Logger } from 'pino';

export type { Logger };

export function createComponentLogger(component: string, parent?: Logger): Logger {
  return parent ? parent.child({ component }) : pino({ name: 'stream-engine' }).child({ component });
}
