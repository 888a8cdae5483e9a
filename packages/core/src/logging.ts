import { pino } from 'pino';
import { config } from './config.js';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'vfs-connect',
  level: config.logging.level,
  redact: {
    paths: [
      // Option projections that carry credentials
      'value.password',
      '*.password',
      '*.secret',
    ],
    censor: '[REDACTED]',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
});
