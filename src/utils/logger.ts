// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import pino from 'pino';

export function createLogger(level = 'info', isDev = false): pino.Logger {
  return pino({
    level,
    redact: {
      paths: [
        'password',
        'passwordHash',
        'token',
        'accessToken',
        'authorization',
        'secret',
        'JWT_SECRET',
        'DATABASE_URL',
        '*.password',
        '*.passwordHash',
        '*.token',
        '*.accessToken',
        '*.secret',
        '*.authorization',
        'headers.authorization',
        'body.password',
      ],
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    ...(isDev && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export type Logger = pino.Logger;
