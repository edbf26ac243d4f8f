import {
  Injectable,
  NotFoundException,
  ConflictException,
  BadRequestException,
  Inject,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import {
  TransactionScope,
  UnitOfWork,
} from '../../ports/repositories/unit-of-work.interface';
import { ReservationChanges } from '../../ports/repositories/reservation.repository.interface';
import { UNIT_OF_WORK } from '../../tokens';
import { Customer } from '../../domain/entities/customer.entity';
import { Reservation } from '../../domain/entities/reservation.entity';
import {
  ContactResolverService,
  CustomerContact,
} from '../../domain/services/contact-resolver.service';
import {
  ReservationStatus,
  isActiveStatus,
} from '../../domain/types/reservation-status.enum';
import { TimeWindow } from '../../domain/types/time-window.type';
import { createTimeWindow } from '../../domain/utils/time-window.util';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import {
  CreateReservationRequest,
  ReservationResponse,
  UpdateReservationRequest,
} from '../dto/reservation.dto';
import { toReservationResponse } from '../mappers/reservation.mapper';
import { AvailabilityService } from './availability.service';
import { HoursService } from './hours.service';

interface TableClaim {
  tableIds: string[];
  partySize: number;
  window: TimeWindow;
  ignoreReservationId?: string;
  // Tables the reservation already holds and keeps without a fresh check.
  heldTableIds?: string[];
}

@Injectable()
export class ReservationCommandService {
  constructor(
    @Inject(UNIT_OF_WORK)
    private readonly unitOfWork: UnitOfWork,
    private readonly availabilityService: AvailabilityService,
    private readonly hoursService: HoursService,
    private readonly contactResolverService: ContactResolverService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly metricsService: MetricsService,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Books the requested tables for a guest.
   *
   * Hours, table existence, availability, customer lookup and the inserts all
   * run in one unit of work, so two bookings racing for the same table cannot
   * both pass the availability check.
   */
  async createReservation(
    request: CreateReservationRequest,
  ): Promise<ReservationResponse> {
    const tableIds = this.distinctTableIds(request.tableIds);
    const durationMinutes =
      request.durationMinutes ?? this.getBookingConfig().defaultDurationMinutes;
    const window = createTimeWindow(
      request.reservationDate,
      request.startTime,
      durationMinutes,
    );
    const contact = this.resolveContact(request);

    const reservation = await this.unitOfWork.run(
      'create_reservation',
      async (scope) => {
        await this.assertWithinHours(
          scope,
          window,
          'Reservation time is outside restaurant operating hours',
        );
        await this.assertTablesExist(scope, tableIds);
        await this.assertTablesAvailable(scope, {
          tableIds,
          partySize: request.partySize,
          window,
        });

        const customer = await this.findOrCreateCustomer(scope, contact);

        const entity = new Reservation();
        entity.id = randomUUID();
        entity.customerId = customer.id;
        entity.partySize = request.partySize;
        entity.reservationDate = request.reservationDate;
        entity.startTime = request.startTime;
        entity.durationMinutes = durationMinutes;
        entity.notes = request.notes ?? '';
        entity.status = request.status ?? ReservationStatus.PENDING;

        await scope.reservations.create(entity);
        await scope.reservations.assignTables(entity.id, tableIds);

        return this.loadReservation(scope, entity.id);
      },
    );

    this.metricsService.recordReservationCreated();
    return toReservationResponse(reservation, this.getBookingConfig().timezone);
  }

  /**
   * Applies a partial update. Changing the date, start time, duration, party
   * size or tables re-checks operating hours and availability, ignoring the
   * reservation's own occupancy.
   */
  async updateReservation(
    id: string,
    request: UpdateReservationRequest,
  ): Promise<ReservationResponse> {
    const { tableIds: requestedTableIds, ...fields } = request;
    const changes = this.collectChanges(fields);
    const tableIds =
      requestedTableIds !== undefined
        ? this.distinctTableIds(requestedTableIds)
        : undefined;

    if (Object.keys(changes).length === 0 && tableIds === undefined) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail: 'No valid fields to update',
      });
    }

    const reservation = await this.unitOfWork.run(
      'update_reservation',
      async (scope) => {
        const current = await this.loadReservation(scope, id);

        const timeChanged =
          changes.reservationDate !== undefined ||
          changes.startTime !== undefined ||
          changes.durationMinutes !== undefined;
        const partyChanged = changes.partySize !== undefined;
        const partySize = changes.partySize ?? current.partySize;
        const window = createTimeWindow(
          changes.reservationDate ?? current.reservationDate,
          changes.startTime ?? current.startTime,
          changes.durationMinutes ?? current.durationMinutes,
        );

        if (timeChanged) {
          await this.assertWithinHours(
            scope,
            window,
            'Updated reservation time is outside restaurant operating hours',
          );
        }
        if (tableIds !== undefined) {
          await this.assertTablesExist(scope, tableIds);
        }

        const currentTableIds = (current.assignments ?? []).map(
          (assignment) => assignment.tableId,
        );
        const resultingStatus = changes.status ?? current.status;
        const reactivated =
          !isActiveStatus(current.status) && isActiveStatus(resultingStatus);

        if (
          isActiveStatus(resultingStatus) &&
          (timeChanged ||
            partyChanged ||
            tableIds !== undefined ||
            reactivated)
        ) {
          await this.assertTablesAvailable(scope, {
            tableIds: tableIds ?? currentTableIds,
            partySize,
            window,
            ignoreReservationId: id,
            heldTableIds:
              timeChanged || partyChanged || reactivated ? [] : currentTableIds,
          });
        }

        if (Object.keys(changes).length > 0) {
          await scope.reservations.update(id, changes);
        }
        if (tableIds !== undefined) {
          await scope.reservations.replaceAssignments(id, tableIds);
        }

        return this.loadReservation(scope, id);
      },
    );

    this.metricsService.recordReservationUpdated();
    return toReservationResponse(reservation, this.getBookingConfig().timezone);
  }

  /**
   * Moves a reservation to a new status. Only a move from cancelled or no-show
   * back to an active status needs the tables to be free again.
   */
  async updateStatus(
    id: string,
    status: ReservationStatus,
  ): Promise<ReservationResponse> {
    const reservation = await this.unitOfWork.run(
      'update_reservation_status',
      async (scope) => {
        const current = await this.loadReservation(scope, id);

        if (!isActiveStatus(current.status) && isActiveStatus(status)) {
          await this.assertTablesAvailable(scope, {
            tableIds: (current.assignments ?? []).map(
              (assignment) => assignment.tableId,
            ),
            partySize: current.partySize,
            window: createTimeWindow(
              current.reservationDate,
              current.startTime,
              current.durationMinutes,
            ),
            ignoreReservationId: id,
          });
        }

        await scope.reservations.update(id, { status });
        return this.loadReservation(scope, id);
      },
    );

    this.metricsService.recordReservationUpdated();
    return toReservationResponse(reservation, this.getBookingConfig().timezone);
  }

  /**
   * Removes the reservation and its table assignments.
   * Returns false when no such reservation exists.
   */
  async deleteReservation(id: string): Promise<boolean> {
    const deleted = await this.unitOfWork.run('delete_reservation', (scope) =>
      scope.reservations.delete(id),
    );
    if (deleted) {
      this.metricsService.recordReservationDeleted();
    }
    return deleted;
  }

  private resolveContact(request: CreateReservationRequest): CustomerContact {
    const { placeholderPartyLimit } = this.getBookingConfig();
    const contact = this.contactResolverService.resolve(
      {
        name: request.customer.name,
        email: request.customer.email ?? null,
        phone: request.customer.phone ?? null,
        notes: request.customer.notes ?? '',
      },
      request.partySize,
      placeholderPartyLimit,
    );

    if (!this.contactResolverService.hasContactChannel(contact)) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail: `Email or phone is required for parties of ${placeholderPartyLimit} or more`,
      });
    }
    return contact;
  }

  private async findOrCreateCustomer(
    scope: TransactionScope,
    contact: CustomerContact,
  ): Promise<Customer> {
    if (contact.email) {
      const byEmail = await scope.customers.findByEmail(contact.email);
      if (byEmail) {
        return byEmail;
      }
    }
    if (contact.phone) {
      const byPhone = await scope.customers.findByPhone(contact.phone);
      if (byPhone) {
        return byPhone;
      }
    }

    const customer = new Customer();
    customer.id = randomUUID();
    customer.name = contact.name;
    customer.email = contact.email;
    customer.phone = contact.phone;
    customer.notes = contact.notes;
    return scope.customers.create(customer);
  }

  private async assertWithinHours(
    scope: TransactionScope,
    window: TimeWindow,
    detail: string,
  ): Promise<void> {
    if (!(await this.hoursService.isValidTime(window, scope))) {
      throw new BadRequestException({
        error: 'outside_operating_hours',
        detail,
      });
    }
  }

  private async assertTablesExist(
    scope: TransactionScope,
    tableIds: string[],
  ): Promise<void> {
    const tables = await scope.tables.findByIds(tableIds);
    const found = new Set(tables.map((table) => table.id));
    const missing = tableIds.filter((tableId) => !found.has(tableId));
    if (missing.length > 0) {
      throw new NotFoundException({
        error: 'not_found',
        detail: `Table ${missing[0]} not found`,
      });
    }
  }

  private async assertTablesAvailable(
    scope: TransactionScope,
    claim: TableClaim,
  ): Promise<void> {
    const available = await this.availabilityService.findAvailable(
      claim.partySize,
      claim.window,
      claim.ignoreReservationId,
      scope,
    );
    const availableIds = new Set(available.map((entry) => entry.table.id));
    for (const tableId of claim.heldTableIds ?? []) {
      availableIds.add(tableId);
    }

    const unavailable = claim.tableIds.filter(
      (tableId) => !availableIds.has(tableId),
    );
    if (unavailable.length > 0) {
      this.metricsService.recordConflict('table_unavailable');
      this.logger.warn('Requested tables are not available', {
        op: 'assert_tables_available',
        reservationId: claim.ignoreReservationId,
        tableIds: unavailable,
        partySize: claim.partySize,
      });
      throw new ConflictException({
        error: 'table_unavailable',
        detail: `Table ${unavailable[0]} is not available for the requested time`,
        tableIds: unavailable,
      });
    }
  }

  private async loadReservation(
    scope: TransactionScope,
    id: string,
  ): Promise<Reservation> {
    const reservation = await scope.reservations.findById(id);
    if (!reservation) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'Reservation not found',
      });
    }
    return reservation;
  }

  private collectChanges(
    fields: Omit<UpdateReservationRequest, 'tableIds'>,
  ): ReservationChanges {
    const changes: ReservationChanges = {};
    if (fields.partySize !== undefined) {
      changes.partySize = fields.partySize;
    }
    if (fields.reservationDate !== undefined) {
      changes.reservationDate = fields.reservationDate;
    }
    if (fields.startTime !== undefined) {
      changes.startTime = fields.startTime;
    }
    if (fields.durationMinutes !== undefined) {
      changes.durationMinutes = fields.durationMinutes;
    }
    if (fields.notes !== undefined) {
      changes.notes = fields.notes;
    }
    if (fields.status !== undefined) {
      changes.status = fields.status;
    }
    return changes;
  }

  private distinctTableIds(tableIds: string[]): string[] {
    const distinct = [...new Set(tableIds)];
    if (distinct.length === 0) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail: 'At least one table is required',
      });
    }
    return distinct;
  }

  private getBookingConfig() {
    return this.configService.getOrThrow('booking', { infer: true });
  }
}
