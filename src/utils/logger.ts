import pino from 'pino';
import { env } from '../config/env';

// stdout carries the run summary only, so every log line goes to stderr
const STDERR = 2;
const usePretty = !env.IS_PROD && !env.IS_TEST;
const logger = usePretty ? pino({
  level: env.LOG_LEVEL,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
      destination: STDERR
    }
  }
}) : pino({
  level: env.LOG_LEVEL
}, pino.destination(STDERR));
export { logger };
export default logger;
