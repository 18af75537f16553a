import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { join } from 'path';
import * as winston from 'winston';
import { LoggerService } from '@/shared/services/logger.service';
import { AppConfigService } from '@/shared/services/config.service';
import { AppModule } from './app.module';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { PAYMENT_PACKAGE_NAME } from './modules/payment/controllers/grpc/payment.grpc';

async function bootstrap() {
  const config = new AppConfigService();
  const { host, port } = config.grpcConfig;

  const app = await NestFactory.createMicroservice<MicroserviceOptions>(AppModule, {
    transport: Transport.GRPC,
    bufferLogs: true,
    options: {
      url: `${host}:${port}`,
      package: PAYMENT_PACKAGE_NAME,
      protoPath: join(__dirname, '..', 'protos', 'payment.proto'),
      loader: {
        keepCase: false,
        longs: Number,
        enums: String,
        defaults: true,
        oneofs: true,
      },
    },
  });

  const logger = await app.resolve(LoggerService);
  logger.setContext('Bootstrap');
  app.useLogger(logger);
  app.useGlobalPipes(createValidationPipe());
  app.enableShutdownHooks();

  await app.listen();
  logger.log(`${config.appConfig.name} ${config.appConfig.version} gRPC server running on: ${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = winston.createLogger(new AppConfigService().winstonConfig);
  logger.error('Failed to start payment service', {
    context: 'Bootstrap',
    trace: error instanceof Error ? error.stack : String(error),
  });
  logger.on('finish', () => process.exit(1));
  logger.end();
});
