import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { SeedService } from './reservations/infrastructure/persistence/seed.service';
import { LoggerService } from './reservations/infrastructure/logging/logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = app.get(LoggerService);

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );

  // Swagger documentation
  const options = new DocumentBuilder()
    .setTitle('Restaurant Reservations API')
    .setDescription(
      'Tables, operating hours, availability and reservations for a single restaurant',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, options);
  SwaggerModule.setup('docs', app, document);

  if (configService.getOrThrow('database.seed', { infer: true })) {
    try {
      await app.get(SeedService).seed();
    } catch (error) {
      logger.error('Failed to seed database', error, { op: 'seed' });
    }
  }

  const port = configService.getOrThrow('app.port', { infer: true });
  await app.listen(port);
  logger.log({
    op: 'bootstrap',
    outcome: 'success',
    url: `http://localhost:${port}`,
    docs: `http://localhost:${port}/docs`,
  });
}
void bootstrap();
