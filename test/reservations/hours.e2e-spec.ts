import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from '../support/test-app';

describe('Hours API (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should answer the health probe', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/health')
      .expect(200);

    expect(response.body).toEqual({ status: 'ok' });
  });

  describe('weekly hours', () => {
    it('should return the seeded week from Monday to Sunday', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/hours')
        .expect(200);

      expect(
        response.body.map((h: { dayOfWeek: number }) => h.dayOfWeek),
      ).toEqual([0, 1, 2, 3, 4, 5, 6]);
      expect(response.body[4]).toMatchObject({
        openTime: '11:00',
        closeTime: '23:00',
        lastReservationTime: '21:30',
      });
    });

    it('should replace the hours of one weekday', async () => {
      await request(app.getHttpServer())
        .put('/api/hours')
        .send({
          dayOfWeek: 0,
          openTime: '12:00',
          closeTime: '21:00',
          lastReservationTime: '19:30',
        })
        .expect(200);

      // 2025-03-10 is a Monday.
      const response = await request(app.getHttpServer())
        .get('/api/hours/2025-03-10/effective')
        .expect(200);

      expect(response.body).toEqual({
        date: '2025-03-10',
        isOpen: true,
        source: 'weekly',
        openTime: '12:00',
        closeTime: '21:00',
        lastReservationTime: '19:30',
      });
    });

    it('should reject a last reservation time after closing', async () => {
      const response = await request(app.getHttpServer())
        .put('/api/hours')
        .send({
          dayOfWeek: 1,
          openTime: '11:00',
          closeTime: '22:00',
          lastReservationTime: '22:30',
        })
        .expect(400);

      expect(response.body).toEqual({
        error: 'invalid_input',
        detail:
          'Last reservation time must be between open time and close time',
      });
    });
  });

  describe('special hours', () => {
    const date = '2025-12-24';

    it('should override the weekly hours for one date', async () => {
      const saved = await request(app.getHttpServer())
        .put('/api/special-hours')
        .send({
          date,
          name: 'Christmas Eve',
          openTime: '12:00',
          closeTime: '18:00',
          lastReservationTime: '16:00',
        })
        .expect(200);
      expect(saved.body).toMatchObject({
        date,
        name: 'Christmas Eve',
        isClosed: false,
      });

      const effective = await request(app.getHttpServer())
        .get(`/api/hours/${date}/effective`)
        .expect(200);
      expect(effective.body).toMatchObject({
        isOpen: true,
        source: 'special',
        openTime: '12:00',
        closeTime: '18:00',
        lastReservationTime: '16:00',
      });

      const availability = await request(app.getHttpServer())
        .post('/api/availability')
        .send({ partySize: 2, reservationDate: date, startTime: '17:00' })
        .expect(200);
      expect(availability.body.isValidTime).toBe(false);
    });

    it('should list special hours inside a range', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/special-hours')
        .query({ dateFrom: '2025-12-01', dateTo: '2025-12-31' })
        .expect(200);

      expect(response.body.map((s: { date: string }) => s.date)).toEqual([
        date,
      ]);
    });

    it('should fall back to the weekly hours once deleted', async () => {
      const existing = await request(app.getHttpServer())
        .get(`/api/special-hours/${date}`)
        .expect(200);

      await request(app.getHttpServer())
        .delete(`/api/special-hours/${existing.body.id}`)
        .expect(204);

      await request(app.getHttpServer())
        .get(`/api/special-hours/${date}`)
        .expect(404);

      // 2025-12-24 is a Wednesday.
      const effective = await request(app.getHttpServer())
        .get(`/api/hours/${date}/effective`)
        .expect(200);
      expect(effective.body).toMatchObject({
        isOpen: true,
        source: 'weekly',
        openTime: '11:00',
        closeTime: '22:00',
      });
    });

    it('should require times on an open day', async () => {
      const response = await request(app.getHttpServer())
        .put('/api/special-hours')
        .send({ date: '2025-12-31', name: 'New Year Eve' })
        .expect(400);

      expect(response.body.error).toBe('invalid_input');
    });
  });
});
