import { BadRequestException } from '@nestjs/common';
import { parseClockTime } from '../../domain/utils/time-window.util';

/**
 * Validates that a schedule opens before it takes its last reservation, and
 * takes its last reservation before it closes.
 *
 * @param openTime - HH:mm
 * @param closeTime - HH:mm
 * @param lastReservationTime - HH:mm
 * @throws BadRequestException if the times are malformed or out of order
 */
export function validateHoursOrdering(
  openTime: string,
  closeTime: string,
  lastReservationTime: string,
): void {
  const open = parseClockTime(openTime);
  const close = parseClockTime(closeTime);
  const lastReservation = parseClockTime(lastReservationTime);

  if (open === null || close === null || lastReservation === null) {
    throw new BadRequestException({
      error: 'invalid_input',
      detail: 'Times must use the HH:mm format',
    });
  }

  if (close <= open) {
    throw new BadRequestException({
      error: 'invalid_input',
      detail: 'Close time must be after open time',
    });
  }

  // The last reservation sits strictly inside the opening hours.
  if (lastReservation <= open || lastReservation >= close) {
    throw new BadRequestException({
      error: 'invalid_input',
      detail: 'Last reservation time must be between open time and close time',
    });
  }
}
