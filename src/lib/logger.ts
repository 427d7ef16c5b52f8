import { pino, type Logger } from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  level: config.logLevel,
  base: { service: 'company-lookup' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
