import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { converterConfig, serverConfig } from '../config/converter.config';
import { SessionRegistryService } from './session-registry.service';
import { TranslationController } from './translation.controller';
import { TranslationService } from './translation.service';

@Module({
  imports: [
    ConfigModule.forFeature(converterConfig),
    ConfigModule.forFeature(serverConfig),
  ],
  controllers: [TranslationController],
  providers: [TranslationService, SessionRegistryService],
  exports: [TranslationService, SessionRegistryService],
})
export class TranslationModule {}
