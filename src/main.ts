import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { StructuredLogger } from './logging/structured-logger.service';
import { AdmissionMetricsService } from './metrics/admission-metrics.service';
import { RuleStoreService } from './rules/rule-store.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  // swap out Nest's default logger with our structured implementation
  app.useLogger(app.get(StructuredLogger));
  app.enableShutdownHooks();

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Gateway Admission API')
    .setDescription(
      'Admission control for the API gateway: WAF rules, distributed rate limiting and per-backend circuit breaking',
    )
    .setVersion('1.0')
    .addTag('Admission Management')
    .addTag('Metrics')
    .addTag('Health')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  app.get(AdmissionMetricsService).collectProcessMetrics();

  const logger = new Logger('Bootstrap');
  const ruleStore = app.get(RuleStoreService);
  process.on('SIGHUP', () => {
    logger.log('SIGHUP received, reloading admission rules');
    ruleStore.reload().catch((error: unknown) => {
      logger.warn(
        `Reload on SIGHUP failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  });

  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  logger.log(`Gateway admission listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start gateway admission', error);
  process.exit(1);
});
