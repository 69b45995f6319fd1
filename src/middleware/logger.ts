import pino from 'pino';
import { resolveLogLevel } from '../config/env.js';

export const logger = pino({
  name: 'ai-gateway',
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: { service: 'ai-gateway' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
