import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { validateConfig } from '../../utils/validate-config';
import { BookingConfig } from './booking-config.type';

const BookingEnvSchema = z.object({
  BOOKING_DEFAULT_DURATION_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .max(24 * 60)
    .default(90),
  BOOKING_PLACEHOLDER_PARTY_LIMIT: z.coerce.number().int().positive().default(6),
  BOOKING_LOCK_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000),
  RESTAURANT_TIMEZONE: z.string().min(1).default('UTC'),
});

export default registerAs<BookingConfig>('booking', () => {
  const env = validateConfig(process.env, BookingEnvSchema);

  return {
    defaultDurationMinutes: env.BOOKING_DEFAULT_DURATION_MINUTES,
    placeholderPartyLimit: env.BOOKING_PLACEHOLDER_PARTY_LIMIT,
    lockTimeoutMs: env.BOOKING_LOCK_TIMEOUT_MS,
    timezone: env.RESTAURANT_TIMEZONE,
  };
});
