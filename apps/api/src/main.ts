import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { ValidationPipe } from './common/pipes/validation.pipe';
import { appConfig, logLevels } from './config/app.config';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: logLevels(appConfig.logLevel),
    cors: {
      origin: appConfig.corsOrigin,
      credentials: true,
    },
  });

  app.useGlobalPipes(new ValidationPipe());
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port', appConfig.port);
  const corsOrigin = configService.get<string>('corsOrigin', appConfig.corsOrigin);
  const nodeEnv = configService.get<string>('nodeEnv', appConfig.nodeEnv);
  const outputDir = configService.get<string>('gcodeOutputDir', appConfig.gcodeOutputDir);

  await app.listen(port);

  logger.log(`🚀 API is running on http://localhost:${port}`);
  logger.log(`📝 Environment: ${nodeEnv}`);
  logger.log(`🌍 CORS origin: ${corsOrigin}`);
  logger.log(`📁 Output directory: ${outputDir}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
