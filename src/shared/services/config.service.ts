import { Injectable } from '@nestjs/common';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as dotenv from 'dotenv';
import {
  ConflictPolicy,
  DEFAULT_CONFLICT_POLICY,
  isConflictPolicy,
} from '@/shared/constants/conflict-policy.constant';

@Injectable()
export class AppConfigService {
  constructor() {
    dotenv.config({
      path: `.env`,
    });

    // Replace \\n with \n to support multiline strings in container envs
    for (const envName of Object.keys(process.env)) {
      process.env[envName] = process.env[envName]?.replace(/\\n/g, '\n');
    }
  }

  public get(key: string): string {
    return process.env[key] || '';
  }

  public getNumber(key: string): number {
    return Number(this.get(key));
  }

  get nodeEnv(): string {
    return this.get('NODE_ENV') || 'development';
  }

  get logLevel(): string {
    return this.get('LOG_LEVEL') || 'debug';
  }

  get grpcConfig() {
    return {
      host: this.get('GRPC_HOST') || '0.0.0.0',
      port: this.getNumber('GRPC_PORT') || 50055,
    };
  }

  get idempotencyConfig(): { conflictPolicy: ConflictPolicy } {
    const raw = this.get('IDEMPOTENCY_CONFLICT_POLICY');
    if (!raw) {
      return { conflictPolicy: DEFAULT_CONFLICT_POLICY };
    }
    if (!isConflictPolicy(raw)) {
      throw new Error(`Unsupported IDEMPOTENCY_CONFLICT_POLICY: ${raw}`);
    }
    return { conflictPolicy: raw };
  }

  get winstonConfig(): winston.LoggerOptions {
    const consoleTransport = new winston.transports.Console({
      level: this.logLevel,
      handleExceptions: true,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({
          format: 'DD-MM-YYYY HH:mm:ss',
        }),
        winston.format.printf(({ level, message, timestamp, context, trace }) => {
          const ctx = context ? ` [${context}]` : '';
          const msgStr = typeof message === 'string' ? message : JSON.stringify(message);
          const stackStr = trace ? `\n${trace}` : '';
          return `${timestamp} ${level}:${ctx} ${msgStr}${stackStr}`;
        }),
      ),
    });

    if (this.nodeEnv === 'test') {
      return { transports: [consoleTransport], exitOnError: false };
    }

    return {
      transports: [
        new DailyRotateFile({
          level: 'debug',
          filename: `./logs/${this.nodeEnv}/debug-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        new DailyRotateFile({
          level: 'error',
          filename: `./logs/${this.nodeEnv}/error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: false,
          maxSize: '20m',
          maxFiles: '30d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        consoleTransport,
      ],
      exitOnError: false,
    };
  }

  get appConfig() {
    return {
      name: this.get('NAME') || 'payment-admission-service',
      version: this.get('VERSION') || '0.1.0',
      logLevel: this.logLevel,
    };
  }
}
