import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT } from './config/config.constants';
import type { OtpvConfiguration } from './config/config.types';
import { getErrorMessage } from './shared/error.utils';

/** Room for a base64 QR upload */
const JSON_BODY_LIMIT = '6mb';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
      bodyParser: false,
    });

    app.useBodyParser('json', { limit: JSON_BODY_LIMIT });

    // Enable global validation pipe for DTO validation
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true, // Strip properties not in DTO
        forbidNonWhitelisted: true, // Reject requests with extra properties
        transform: true, // Transform payloads to DTO instances
      }),
    );

    const config = app.get<ConfigService>(ConfigService);

    const host = config.get<string>('otpv.server.host', DEFAULT_SERVER_HOST);
    const port = config.get<number>('otpv.server.port', DEFAULT_SERVER_PORT);
    const environment = config.get<string>('otpv.environment');

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

    if (environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const otpvConfig = config.get<OtpvConfiguration>('otpv');
      if (otpvConfig) {
        logConfigurationSummary(otpvConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('OTP Vault API')
        .setDescription('Local API of the encrypted one-time-password vault.')
        .setVersion('1.0')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    await app.listen(port, host);

    logger.log(`OTP vault listening on http://${host}:${port}`);
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
