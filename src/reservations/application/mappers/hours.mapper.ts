import { OperatingHours } from '../../domain/entities/operating-hours.entity';
import { SpecialHours } from '../../domain/entities/special-hours.entity';
import { EffectiveHours } from '../../domain/types/effective-hours.type';
import {
  EffectiveHoursResponse,
  OperatingHoursResponse,
  SpecialHoursResponse,
} from '../dto/hours.dto';

export function toOperatingHoursResponse(
  hours: OperatingHours,
): OperatingHoursResponse {
  return {
    id: hours.id,
    dayOfWeek: hours.dayOfWeek,
    openTime: hours.openTime,
    closeTime: hours.closeTime,
    lastReservationTime: hours.lastReservationTime,
  };
}

export function toSpecialHoursResponse(
  special: SpecialHours,
): SpecialHoursResponse {
  return {
    id: special.id,
    date: special.date,
    name: special.name,
    description: special.description,
    isClosed: special.isClosed,
    openTime: special.openTime,
    closeTime: special.closeTime,
    lastReservationTime: special.lastReservationTime,
    createdAt: special.createdAt.toISOString(),
    updatedAt: special.updatedAt.toISOString(),
  };
}

export function toEffectiveHoursResponse(
  date: string,
  hours: EffectiveHours,
): EffectiveHoursResponse {
  if (!hours.isOpen) {
    return {
      date,
      isOpen: false,
      source: hours.source,
      openTime: null,
      closeTime: null,
      lastReservationTime: null,
    };
  }
  return {
    date,
    isOpen: true,
    source: hours.source,
    openTime: hours.openTime,
    closeTime: hours.closeTime,
    lastReservationTime: hours.lastReservationTime,
  };
}
