import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { TableRepository as ITableRepository } from '../../ports/repositories/table.repository.interface';
import { ReservationRepository as IReservationRepository } from '../../ports/repositories/reservation.repository.interface';
import { TransactionScope } from '../../ports/repositories/unit-of-work.interface';
import { RESERVATION_REPOSITORY, TABLE_REPOSITORY } from '../../tokens';
import { AvailabilityCalculatorService } from '../../domain/services/availability-calculator.service';
import { TableAvailability } from '../../domain/types/table-availability.type';
import { TimeWindow } from '../../domain/types/time-window.type';
import { createTimeWindow } from '../../domain/utils/time-window.util';
import {
  CheckAvailabilityRequest,
  CheckAvailabilityResponse,
} from '../dto/check-availability.dto';
import { toAvailableTable } from '../mappers/table.mapper';
import { HoursService } from './hours.service';

export type AvailabilityReader = Pick<TransactionScope, 'tables' | 'reservations'>;

@Injectable()
export class AvailabilityService {
  constructor(
    @Inject(TABLE_REPOSITORY)
    private readonly tableRepository: ITableRepository,
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: IReservationRepository,
    private readonly availabilityCalculatorService: AvailabilityCalculatorService,
    private readonly hoursService: HoursService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Tables that can seat the party during the window, closest fit first.
   * Operating hours are not checked here.
   */
  async findAvailable(
    partySize: number,
    window: TimeWindow,
    ignoreReservationId?: string,
    reader: AvailabilityReader = {
      tables: this.tableRepository,
      reservations: this.reservationRepository,
    },
  ): Promise<TableAvailability[]> {
    const tables = await reader.tables.findFitting(partySize);
    if (tables.length === 0) {
      return [];
    }

    const reservations = await reader.reservations.findActiveOnDate(
      window.date,
    );

    return this.availabilityCalculatorService.calculate(tables, reservations, {
      partySize,
      window,
      ignoreReservationId,
    });
  }

  async checkAvailability(
    request: CheckAvailabilityRequest,
  ): Promise<CheckAvailabilityResponse> {
    const durationMinutes =
      request.durationMinutes ??
      this.configService.getOrThrow('booking.defaultDurationMinutes', {
        infer: true,
      });
    const window = createTimeWindow(
      request.reservationDate,
      request.startTime,
      durationMinutes,
    );

    const isValidTime = await this.hoursService.isValidTime(window);
    if (!isValidTime) {
      return { availableTables: [], isValidTime: false };
    }

    const available = await this.findAvailable(request.partySize, window);
    return {
      availableTables: available.map(toAvailableTable),
      isValidTime: true,
    };
  }
}
