import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { converterConfig, serverConfig } from './config/converter.config';
import { LoggerModule } from './logger/logger.module';
import { TranslationModule } from './translation/translation.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [converterConfig, serverConfig],
    }),
    LoggerModule,
    TranslationModule,
  ],
})
export class AppModule {}
