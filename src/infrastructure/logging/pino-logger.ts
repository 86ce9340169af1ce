import pino from 'pino';
import type { Logger, LogContext } from '../../application/ports/driven/logger-port.js';
import { sanitizeForLogs } from '../../domain/helpers/log-sanitizer.js';

export class PinoLogger implements Logger {
  private logger: pino.Logger;

  constructor(level: string = 'info', serviceName: string = 'itops-chat-assistant') {
    this.logger = pino({
      level,
      name: serviceName,
      transport: process.env.NODE_ENV === 'development' ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      } : undefined,
      serializers: {
        req: (req: unknown) => {
          if (typeof req === 'object' && req !== null) {
            return sanitizeForLogs(req);
          }
          return req;
        },
        err: pino.stdSerializers.err,
      },
    });
  }

  info(context: LogContext, message: string): void {
    this.logger.info(sanitizeForLogs(context), message);
  }

  error(context: LogContext, message: string): void {
    this.logger.error(sanitizeForLogs(context), message);
  }

  warn(context: LogContext, message: string): void {
    this.logger.warn(sanitizeForLogs(context), message);
  }

  debug(context: LogContext, message: string): void {
    this.logger.debug(sanitizeForLogs(context), message);
  }
}
