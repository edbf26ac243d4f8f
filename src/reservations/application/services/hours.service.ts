import {
  Inject,
  Injectable,
  BadRequestException,
  NotFoundException,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import { OperatingHoursRepository as IOperatingHoursRepository } from '../../ports/repositories/operating-hours.repository.interface';
import { SpecialHoursRepository as ISpecialHoursRepository } from '../../ports/repositories/special-hours.repository.interface';
import {
  TransactionScope,
  UnitOfWork,
} from '../../ports/repositories/unit-of-work.interface';
import {
  OPERATING_HOURS_REPOSITORY,
  SPECIAL_HOURS_REPOSITORY,
  UNIT_OF_WORK,
} from '../../tokens';
import { OperatingHours } from '../../domain/entities/operating-hours.entity';
import { SpecialHours } from '../../domain/entities/special-hours.entity';
import { OperatingHoursResolverService } from '../../domain/services/operating-hours-resolver.service';
import { EffectiveHours } from '../../domain/types/effective-hours.type';
import { TimeWindow } from '../../domain/types/time-window.type';
import { weekdayIndex } from '../../domain/utils/time-window.util';
import {
  EffectiveHoursResponse,
  ListSpecialHoursQuery,
  OperatingHoursResponse,
  SetOperatingHoursRequest,
  SetSpecialHoursRequest,
  SpecialHoursResponse,
} from '../dto/hours.dto';
import {
  toEffectiveHoursResponse,
  toOperatingHoursResponse,
  toSpecialHoursResponse,
} from '../mappers/hours.mapper';
import { validateHoursOrdering } from '../utils/hours-validation.util';

// Where hours are read from: the plain repositories, or a transaction scope
// when the read must see the same snapshot as the write that follows it.
export type HoursReader = Pick<TransactionScope, 'operatingHours' | 'specialHours'>;

@Injectable()
export class HoursService {
  constructor(
    @Inject(OPERATING_HOURS_REPOSITORY)
    private readonly operatingHoursRepository: IOperatingHoursRepository,
    @Inject(SPECIAL_HOURS_REPOSITORY)
    private readonly specialHoursRepository: ISpecialHoursRepository,
    @Inject(UNIT_OF_WORK)
    private readonly unitOfWork: UnitOfWork,
    private readonly operatingHoursResolverService: OperatingHoursResolverService,
  ) {}

  async resolveHours(
    date: string,
    reader: HoursReader = this.defaultReader(),
  ): Promise<EffectiveHours> {
    const special = await reader.specialHours.findByDate(date);
    const weekly = special
      ? null
      : await reader.operatingHours.findByDay(weekdayIndex(date));
    return this.operatingHoursResolverService.resolve(special, weekly);
  }

  async isValidTime(
    window: TimeWindow,
    reader: HoursReader = this.defaultReader(),
  ): Promise<boolean> {
    const hours = await this.resolveHours(window.date, reader);
    return this.operatingHoursResolverService.isWithinHours(hours, window);
  }

  async getEffectiveHours(date: string): Promise<EffectiveHoursResponse> {
    return toEffectiveHoursResponse(date, await this.resolveHours(date));
  }

  async getWeeklyHours(): Promise<OperatingHoursResponse[]> {
    const hours = await this.operatingHoursRepository.findAll();
    return hours.map(toOperatingHoursResponse);
  }

  async setWeeklyHours(
    request: SetOperatingHoursRequest,
  ): Promise<OperatingHoursResponse> {
    validateHoursOrdering(
      request.openTime,
      request.closeTime,
      request.lastReservationTime,
    );

    const saved = await this.unitOfWork.run(
      'set_weekly_hours',
      async (scope) => {
        const existing = await scope.operatingHours.findByDay(
          request.dayOfWeek,
        );
        const hours = existing ?? new OperatingHours();
        if (!existing) {
          hours.id = randomUUID();
          hours.dayOfWeek = request.dayOfWeek;
        }
        hours.openTime = request.openTime;
        hours.closeTime = request.closeTime;
        hours.lastReservationTime = request.lastReservationTime;
        return scope.operatingHours.save(hours);
      },
    );

    return toOperatingHoursResponse(saved);
  }

  async listSpecialHours(
    query: ListSpecialHoursQuery,
  ): Promise<SpecialHoursResponse[]> {
    const entries = await this.specialHoursRepository.findInRange(
      query.dateFrom,
      query.dateTo,
    );
    return entries.map(toSpecialHoursResponse);
  }

  async getSpecialHours(date: string): Promise<SpecialHoursResponse> {
    const special = await this.specialHoursRepository.findByDate(date);
    if (!special) {
      throw new NotFoundException({
        error: 'not_found',
        detail: `No special hours set for ${date}`,
      });
    }
    return toSpecialHoursResponse(special);
  }

  /**
   * Creates or replaces the special hours of a date. A closed day keeps no
   * times.
   */
  async setSpecialHours(
    request: SetSpecialHoursRequest,
  ): Promise<SpecialHoursResponse> {
    const times = this.resolveSpecialTimes(request);

    const saved = await this.unitOfWork.run(
      'set_special_hours',
      async (scope) => {
        const existing = await scope.specialHours.findByDate(request.date);
        const special = existing ?? new SpecialHours();
        if (!existing) {
          special.id = randomUUID();
          special.date = request.date;
        }
        special.name = request.name;
        special.description = request.description ?? null;
        special.isClosed = request.isClosed;
        special.openTime = times?.openTime ?? null;
        special.closeTime = times?.closeTime ?? null;
        special.lastReservationTime = times?.lastReservationTime ?? null;
        return scope.specialHours.save(special);
      },
    );

    return toSpecialHoursResponse(saved);
  }

  async deleteSpecialHours(id: string): Promise<void> {
    const deleted = await this.unitOfWork.run('delete_special_hours', (scope) =>
      scope.specialHours.delete(id),
    );
    if (!deleted) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'Special hours not found',
      });
    }
  }

  private resolveSpecialTimes(request: SetSpecialHoursRequest): {
    openTime: string;
    closeTime: string;
    lastReservationTime: string;
  } | null {
    if (request.isClosed) {
      return null;
    }

    const { openTime, closeTime, lastReservationTime } = request;
    if (!openTime || !closeTime || !lastReservationTime) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail:
          'Open, close and last reservation times are required unless the day is closed',
      });
    }
    validateHoursOrdering(openTime, closeTime, lastReservationTime);
    return { openTime, closeTime, lastReservationTime };
  }

  private defaultReader(): HoursReader {
    return {
      operatingHours: this.operatingHoursRepository,
      specialHours: this.specialHoursRepository,
    };
  }
}
