import pino, { type LoggerOptions } from 'pino';
import { config } from '../config/env';

// stdout carries the MCP protocol stream, so every log line goes to stderr.
const STDERR_FD = 2;

const options: LoggerOptions = {
  level: config.LOG_LEVEL,
  base: {
    env: config.NODE_ENV,
    service: 'llm-sidekick',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.Authorization', '*.password', '*.token', '*.key', '*.secret'],
    remove: true,
  },
};

export const logger =
  config.NODE_ENV === 'test'
    ? pino(options, pino.destination(STDERR_FD))
    : pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            destination: STDERR_FD,
          },
        },
      });

export const childLogger = (bindings: Record<string, unknown>) => logger.child(bindings);
