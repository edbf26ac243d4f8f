import { INestApplication } from '@nestjs/common';
import request from 'supertest';

describe('Rate Limiting (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    // Limits are read when the controllers load, so the app is imported late.
    process.env.ENABLE_RATE_LIMITING = 'true';
    const { createTestApp } = await import('../support/test-app');
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
    delete process.env.ENABLE_RATE_LIMITING;
  });

  it('should allow 20 writes per minute and refuse the 21st', async () => {
    for (let i = 0; i < 20; i++) {
      await request(app.getHttpServer())
        .post('/api/reservations')
        .send({})
        .expect(400);
    }

    const response = await request(app.getHttpServer())
      .post('/api/reservations')
      .send({})
      .expect(429);

    expect(response.body).toEqual({
      error: 'rate_limited',
      detail: 'Too many requests. Please slow down and try again later.',
    });
  });

  it('should count each endpoint separately', async () => {
    await request(app.getHttpServer()).get('/api/tables').expect(200);
  });

  it('should never limit the health probe', async () => {
    for (let i = 0; i < 110; i++) {
      await request(app.getHttpServer()).get('/api/health').expect(200);
    }
  });
});
