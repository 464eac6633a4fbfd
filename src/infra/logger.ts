import pino from 'pino';
import { env } from './env';

// App-wide pino logger
// level: LOG_LEVEL wins, otherwise production logs info and everything else debug
// redact: credential fields never reach the output
export const logger = pino({
  name: 'library-lending',
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  redact: {
    paths: ['secret', '*.secret', 'currentSecret', 'nextSecret'],
    remove: true,
  },
});
