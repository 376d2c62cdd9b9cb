import pino from 'pino';

const level = process.env.NODE_ENV === 'test' ? 'silent' : process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Email bodies and credential-like entities never reach the log sink
  redact: {
    paths: ['body', '*.body', 'rawPayload', '*.rawPayload', 'entities.current_pw', 'entities.new_pw', '*.entities.current_pw', '*.entities.new_pw'],
    censor: '[redacted]',
  },
  ...(process.env.NODE_ENV === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Child logger carrying the per-event correlation fields */
export function eventLogger(requestId: string, sourceId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ requestId, sourceId, ...extra });
}
