import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { serverConfig } from './config/converter.config';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  try {
    logger.log('Starting Stepforge translation service...');

    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));
    app.enableShutdownHooks();

    const server = app.get<ConfigType<typeof serverConfig>>(serverConfig.KEY);
    const host = '0.0.0.0';

    await app.listen(server.port, host);

    logger.log(`HTTP server listening on http://${host}:${server.port}`);
    logger.log(`Default parser mode: ${server.parserMode}`);
    logger.log(`Process ID: ${process.pid}`);
  } catch (error) {
    logger.error(
      'Failed to start Stepforge translation service',
      error instanceof Error ? error.stack : String(error),
    );
    process.exit(1);
  }
}
void bootstrap();
