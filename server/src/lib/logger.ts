import pino from 'pino';
import { config } from '../config.js';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  base: {
    service: 'camhub',
    env: config.nodeEnv,
  },
  // Ingest and viewer URLs carry an opaque token query parameter.
  redact: {
    paths: ['token', '*.token', 'query.token'],
    remove: true,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});
