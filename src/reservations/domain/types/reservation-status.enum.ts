export enum ReservationStatus {
  PENDING = 'pending',
  CONFIRMED = 'confirmed',
  SEATED = 'seated',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  NO_SHOW = 'no_show',
}

// Reservations in these states never block a table or consume its capacity.
export const INACTIVE_RESERVATION_STATUSES: readonly ReservationStatus[] = [
  ReservationStatus.CANCELLED,
  ReservationStatus.NO_SHOW,
];

export function isActiveStatus(status: ReservationStatus): boolean {
  return !INACTIVE_RESERVATION_STATUSES.includes(status);
}
