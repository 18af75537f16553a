import { ConsoleLogger, Inject, Injectable, Scope } from '@nestjs/common';
import * as winston from 'winston';
import { AppConfigService } from './config.service';

export const WINSTON_LOGGER = Symbol('WINSTON_LOGGER');

export const winstonLoggerProvider = {
  provide: WINSTON_LOGGER,
  inject: [AppConfigService],
  useFactory: (configService: AppConfigService): winston.Logger => {
    const logger = winston.createLogger(configService.winstonConfig);
    if (configService.nodeEnv === 'development') {
      logger.debug('Logging initialized at debug level', { context: 'Winston' });
    }
    return logger;
  },
};

/**
 * Nest logger backed by a shared winston instance. Transient, so every
 * consumer keeps its own context after calling `setContext`.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService extends ConsoleLogger {
  constructor(@Inject(WINSTON_LOGGER) private readonly logger: winston.Logger) {
    super(LoggerService.name, { timestamp: true });
  }

  error(message: string, trace?: string, context?: string): void {
    this.logger.error(message, { trace, context: context ?? this.context });
  }
  log(message: string, context?: string) {
    this.logger.info(message, { context: context ?? this.context });
  }
  info(message: string, context?: string) {
    this.logger.info(message, { context: context ?? this.context });
  }
  debug(message: string, context?: string) {
    this.logger.debug(message, { context: context ?? this.context });
  }
  warn(message: string, context?: string) {
    this.logger.warn(message, { context: context ?? this.context });
  }
}
