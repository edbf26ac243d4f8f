import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { AppModule } from '../../src/app.module';
import { SeedService } from '../../src/reservations/infrastructure/persistence/seed.service';

/**
 * Boots the whole application on a fresh in-memory database, seeded with the
 * default weekly hours and floor plan.
 */
export async function createTestApp(): Promise<INestApplication> {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication();

  // Set global prefix to match production
  app.setGlobalPrefix('api', {
    exclude: ['/'],
  });

  await app.init();
  await app.get(SeedService).seed();

  return app;
}
