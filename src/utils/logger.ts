import pino from 'pino';
import { config } from '../config';

const isTest = process.env.VITEST !== undefined;

export const logger = pino({
  level: isTest ? 'silent' : config.logLevel,
  base: { service: 'thermal-label-print' },
  transport: config.isProduction || isTest
    ? undefined
    : { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } },
});
