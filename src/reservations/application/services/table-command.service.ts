import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  TransactionScope,
  UnitOfWork,
} from '../../ports/repositories/unit-of-work.interface';
import { UNIT_OF_WORK } from '../../tokens';
import { Chair } from '../../domain/entities/chair.entity';
import { RestaurantTable } from '../../domain/entities/restaurant-table.entity';
import { Reservation } from '../../domain/entities/reservation.entity';
import {
  createTimeWindow,
  windowsOverlap,
} from '../../domain/utils/time-window.util';
import { TableDetailsResponse, TableInput } from '../dto/table.dto';
import { toTableDetailsResponse } from '../mappers/table.mapper';

@Injectable()
export class TableCommandService {
  constructor(
    @Inject(UNIT_OF_WORK)
    private readonly unitOfWork: UnitOfWork,
  ) {}

  /**
   * Creates a table with one chair per seat of its maximum capacity.
   */
  async createTable(request: TableInput): Promise<TableDetailsResponse> {
    this.validateCapacity(request);

    return this.unitOfWork.run('create_table', async (scope) => {
      await this.assertNumberFree(scope, request.tableNumber);

      const table = new RestaurantTable();
      table.id = randomUUID();
      this.applyInput(table, request);
      const saved = await scope.tables.create(table);

      await scope.tables.addChairs(this.buildChairs(saved.id, 1, saved.maxCapacity));
      return toTableDetailsResponse(saved, await scope.tables.findChairs(saved.id));
    });
  }

  /**
   * Replaces every field of the table. Chairs follow maxCapacity: new ones are
   * appended after the last position, surplus ones are removed newest first.
   * Refused while the table's active reservations would not fit the new
   * capacity or sharing mode.
   */
  async updateTable(
    id: string,
    request: TableInput,
  ): Promise<TableDetailsResponse> {
    this.validateCapacity(request);

    return this.unitOfWork.run('update_table', async (scope) => {
      const table = await scope.tables.findById(id);
      if (!table) {
        throw new NotFoundException({
          error: 'not_found',
          detail: 'Table not found',
        });
      }
      if (table.tableNumber !== request.tableNumber) {
        await this.assertNumberFree(scope, request.tableNumber);
      }

      this.assertFitsReservations(
        table.tableNumber,
        request,
        await scope.reservations.findActiveForTable(id),
      );

      this.applyInput(table, request);
      const saved = await scope.tables.update(table);

      const chairs = await scope.tables.findChairs(id);
      if (chairs.length < saved.maxCapacity) {
        const lastPosition = chairs.length > 0 ? chairs[chairs.length - 1].position : 0;
        await scope.tables.addChairs(
          this.buildChairs(id, lastPosition + 1, saved.maxCapacity - chairs.length),
        );
      } else if (chairs.length > saved.maxCapacity) {
        await scope.tables.removeChairs(
          chairs.slice(saved.maxCapacity).map((chair) => chair.id),
        );
      }

      return toTableDetailsResponse(saved, await scope.tables.findChairs(id));
    });
  }

  /**
   * Deletes the table with its chairs. Refused while an active reservation
   * still holds it.
   */
  async deleteTable(id: string): Promise<void> {
    await this.unitOfWork.run('delete_table', async (scope) => {
      const table = await scope.tables.findById(id);
      if (!table) {
        throw new NotFoundException({
          error: 'not_found',
          detail: 'Table not found',
        });
      }

      const activeReservations =
        await scope.reservations.findActiveForTable(id);
      if (activeReservations.length > 0) {
        throw this.tableInUse(
          `Table ${table.tableNumber} is assigned to ${activeReservations.length} active reservation(s)`,
        );
      }

      await scope.tables.delete(id);
    });
  }

  private validateCapacity(request: TableInput): void {
    if (request.maxCapacity < request.minCapacity) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail: 'maxCapacity must be greater than or equal to minCapacity',
      });
    }
  }

  private assertFitsReservations(
    tableNumber: string,
    request: TableInput,
    reservations: Reservation[],
  ): void {
    const outOfRange = reservations.find(
      (reservation) =>
        reservation.partySize < request.minCapacity ||
        reservation.partySize > request.maxCapacity,
    );
    if (outOfRange) {
      throw this.tableInUse(
        `Table ${tableNumber} has an active reservation for ${outOfRange.partySize} guests, outside ${request.minCapacity}-${request.maxCapacity}`,
      );
    }

    const windows = reservations.map((reservation) => ({
      partySize: reservation.partySize,
      window: createTimeWindow(
        reservation.reservationDate,
        reservation.startTime,
        reservation.durationMinutes,
      ),
    }));

    for (const { window } of windows) {
      // Seated guests peak at the start of some reservation.
      const startMinute = {
        date: window.date,
        startMinutes: window.startMinutes,
        endMinutes: window.startMinutes + 1,
      };
      const seated = windows.filter((other) =>
        windowsOverlap(other.window, startMinute),
      );

      if (!request.isShared && seated.length > 1) {
        throw this.tableInUse(
          `Table ${tableNumber} has overlapping active reservations and cannot stop being shared`,
        );
      }

      const guests = seated.reduce((sum, other) => sum + other.partySize, 0);
      if (guests > request.maxCapacity) {
        throw this.tableInUse(
          `Table ${tableNumber} seats ${guests} guests at once in active reservations`,
        );
      }
    }
  }

  private tableInUse(detail: string): ConflictException {
    return new ConflictException({ error: 'table_in_use', detail });
  }

  private async assertNumberFree(
    scope: TransactionScope,
    tableNumber: string,
  ): Promise<void> {
    if (await scope.tables.findByNumber(tableNumber)) {
      throw new ConflictException({
        error: 'table_number_taken',
        detail: `Table number ${tableNumber} already exists`,
      });
    }
  }

  private applyInput(table: RestaurantTable, request: TableInput): void {
    table.tableNumber = request.tableNumber;
    table.minCapacity = request.minCapacity;
    table.maxCapacity = request.maxCapacity;
    table.isShared = request.isShared;
    table.location = request.location;
  }

  private buildChairs(
    tableId: string,
    firstPosition: number,
    count: number,
  ): Chair[] {
    return Array.from({ length: count }, (_, offset) => {
      const chair = new Chair();
      chair.id = randomUUID();
      chair.tableId = tableId;
      chair.position = firstPosition + offset;
      chair.isAssigned = true;
      return chair;
    });
  }
}
