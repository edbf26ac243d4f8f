import bookingConfig from './booking.config';

describe('bookingConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.BOOKING_DEFAULT_DURATION_MINUTES;
    delete process.env.BOOKING_PLACEHOLDER_PARTY_LIMIT;
    delete process.env.BOOKING_LOCK_TIMEOUT_MS;
    delete process.env.RESTAURANT_TIMEZONE;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should fall back to the defaults', async () => {
    expect(await bookingConfig()).toEqual({
      defaultDurationMinutes: 90,
      placeholderPartyLimit: 6,
      lockTimeoutMs: 5000,
      timezone: 'UTC',
    });
  });

  it('should read the lock timeout', async () => {
    process.env.BOOKING_LOCK_TIMEOUT_MS = '250';

    expect((await bookingConfig()).lockTimeoutMs).toBe(250);
  });

  it('should accept a default duration of a whole day', async () => {
    process.env.BOOKING_DEFAULT_DURATION_MINUTES = '1440';

    expect((await bookingConfig()).defaultDurationMinutes).toBe(1440);
  });

  it('should reject a default duration longer than a day', () => {
    process.env.BOOKING_DEFAULT_DURATION_MINUTES = '1441';

    expect(() => bookingConfig()).toThrow(
      'Invalid environment configuration: BOOKING_DEFAULT_DURATION_MINUTES: Number must be less than or equal to 1440',
    );
  });
});
