export type BookingConfig = {
  defaultDurationMinutes: number;
  // Parties below this size may book without an email or phone.
  placeholderPartyLimit: number;
  // Longest a request waits for the store lock before a retryable 503.
  lockTimeoutMs: number;
  timezone: string;
};
