/**
 * Shared pino logger (the logger Fastify runs on).
 * Modules log through a child tagged with their component name.
 */
import 'dotenv/config';
import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info'
});

export function componentLogger(component: string) {
  return logger.child({ component });
}
