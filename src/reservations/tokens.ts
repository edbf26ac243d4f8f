// Injection tokens for repository interfaces
// Using Symbols to avoid conflicts and ensure type safety
export const TABLE_REPOSITORY = Symbol('TableRepository');
export const RESERVATION_REPOSITORY = Symbol('ReservationRepository');
export const OPERATING_HOURS_REPOSITORY = Symbol('OperatingHoursRepository');
export const SPECIAL_HOURS_REPOSITORY = Symbol('SpecialHoursRepository');
export const UNIT_OF_WORK = Symbol('UnitOfWork');
