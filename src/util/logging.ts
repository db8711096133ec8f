import pino, { type DestinationStream, type Logger } from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export interface LoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

/**
 * Creates a pino logger with PII redaction unless LOG_LEVEL=debug.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  const options: pino.LoggerOptions = {
    level,
    hooks: {
      // Scrub arguments in place before pino formats them
      logMethod(args, method) {
        for (let i = 0; i < args.length; i++) {
          const arg: unknown = args[i];
          args[i] = typeof arg === 'string' ? scrubMessage(arg, redactEnabled) : scrubPII(arg, redactEnabled);
        }
        method.apply(this, args);
      },
    },
  };

  return opts.destination ? pino(options, opts.destination) : pino(options);
}
