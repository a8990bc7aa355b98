import pino from 'pino';
import { config } from '@config/app.config.js';

export const logger = pino({
  level: config.isTest ? 'silent' : config.isDevelopment ? 'debug' : 'info',
  transport: config.isDevelopment
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
  redact: [
    'req.headers.authorization',
    'req.headers["stripe-signature"]',
    'password',
    'token',
    'clientSecret',
    'client_secret',
  ],
});
