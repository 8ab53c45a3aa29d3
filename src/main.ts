import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import type { VcsConfiguration } from './config/config.types';
import { getErrorMessage } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    // Enable global validation pipe for DTO validation
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true, // Strip properties not in DTO
        forbidNonWhitelisted: true, // Reject requests with extra properties
        transform: true, // Transform payloads to DTO instances
      }),
    );

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const port = config.get<number>('vcs.main.port');
    const environment = config.get<string>('vcs.environment');

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        const stack = shutdownError instanceof Error ? shutdownError.stack : undefined;
        logger.error(`Error during shutdown: ${getErrorMessage(shutdownError)}`, stack);
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    // Handle CORS and Swagger
    if (environment === 'development') {
      app.enableCors();
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const vcsConfig = config.get<VcsConfiguration>('vcs');
      if (vcsConfig) {
        logConfigurationSummary(vcsConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Credential Issuer Service API')
        .setDescription('Issues verifiable credentials, manages their status lists and stores them in an encrypted vault.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    } else {
      const origin = config.get<string>('vcs.main.origin');
      app.enableCors({ origin });
      logger.log(`Accepting requests from origin "${origin ?? '*'}"`);
    }

    if (!port) {
      logger.error('NO HTTP PORT CONFIGURED (VCS_SERVER_PORT)');
      return;
    }

    await app.listen(port);
    logger.log(`Credential issuer service listening on port ${port}`);
  } catch (error) {
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, errorStack);
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
