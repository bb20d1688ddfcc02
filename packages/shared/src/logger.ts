import pino from 'pino';
import { trace } from '@opentelemetry/api';

// stderr keeps log lines out of the chat transcript on stdout
export const logger = pino(
  {
    name: 'taskchat',
    level: process.env.LOG_LEVEL ?? 'warn',
    mixin() {
      const span = trace.getActiveSpan();
      if (!span) return {};
      const ctx = span.spanContext();
      return {
        traceId: ctx.traceId,
        spanId: ctx.spanId,
      };
    },
  },
  pino.destination({ dest: 2, sync: true }),
);
