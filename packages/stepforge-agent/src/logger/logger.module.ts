import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import { serverConfig } from '../config/converter.config';
import { createWinstonLogger } from './winston-logger.service';

@Module({
  imports: [
    WinstonModule.forRootAsync({
      imports: [ConfigModule.forFeature(serverConfig)],
      inject: [serverConfig.KEY],
      useFactory: (server: ConfigType<typeof serverConfig>) => ({
        instance: createWinstonLogger(server.logDir),
      }),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
