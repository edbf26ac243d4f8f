import { seconds } from '@nestjs/throttler';

// Tests run with much higher limits so unrelated e2e suites never trip them.
// ENABLE_RATE_LIMITING=true restores production limits in tests.
export const getThrottleConfig = (defaultLimit: number) => {
  const isTest = process.env.NODE_ENV === 'test';
  const relaxInTests = isTest && process.env.ENABLE_RATE_LIMITING !== 'true';
  return {
    default: {
      limit: relaxInTests ? 10000 : defaultLimit,
      ttl: seconds(60),
    },
  };
};

// Per-minute limits per client.
export const READ_LIMIT = 100;
export const WRITE_LIMIT = 20;
