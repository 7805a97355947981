import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { logger } from './core/logger/logger.config';

async function bootstrap() {
  const pinoLogger = logger();

  try {
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: false,
      bodyParser: false,
    });
    configureApp(app);

    const configService = app.get(ConfigService);
    const port = Number(configService.get<string>('PORT', '3001'));
    await app.listen(port);

    pinoLogger.info(`Application running on: http://localhost:${port}`);
  } catch (error: unknown) {
    pinoLogger.error(
      {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Bootstrap failed',
    );
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start application',
  );
  process.exit(1);
});
