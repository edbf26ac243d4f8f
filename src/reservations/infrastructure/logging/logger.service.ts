import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino from 'pino';
import { AllConfigType } from '../../../config/config.type';

export interface OperationLogContext {
  requestId?: string;
  op: string;
  outcome: 'success' | 'error';
  durationMs?: number;
  reservationId?: string;
  tableId?: string;
  partySize?: number;
  [key: string]: unknown;
}

@Injectable()
export class LoggerService {
  private logger: pino.Logger;

  constructor(configService: ConfigService<AllConfigType>) {
    const nodeEnv = configService.getOrThrow('app.nodeEnv', { infer: true });

    this.logger = pino({
      level: configService.getOrThrow('app.logLevel', { infer: true }),
      transport:
        nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
    });
  }

  log(context: OperationLogContext): void {
    this.logger.info(context);
  }

  error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void {
    this.logger.error({ err: error, ...context }, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context, message);
  }
}
