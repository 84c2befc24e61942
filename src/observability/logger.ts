import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level,
  base: { service: 'threadline' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['headers.authorization', 'accessToken', 'apiKey'],
    censor: '[redacted]',
  },
});

/** Child logger scoped to one inbound turn */
export function turnLogger(requestId: string, customerId: string): pino.Logger {
  return logger.child({ requestId, customerId });
}
