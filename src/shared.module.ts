import { Module, Global } from '@nestjs/common';

import { AppConfigService } from './shared/services/config.service';
import { LoggerService, winstonLoggerProvider } from './shared/services/logger.service';

const providers = [AppConfigService, winstonLoggerProvider, LoggerService];

@Global()
@Module({
  providers,
  exports: [...providers],
})
export class SharedModule {}
