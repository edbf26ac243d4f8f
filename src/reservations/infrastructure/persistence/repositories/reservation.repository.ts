import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Repository,
  In,
  Not,
  Between,
  MoreThanOrEqual,
  LessThanOrEqual,
  FindOptionsWhere,
  FindOptionsRelations,
} from 'typeorm';
import { randomUUID } from 'crypto';
import { Reservation } from '../../../domain/entities/reservation.entity';
import { TableAssignment } from '../../../domain/entities/table-assignment.entity';
import { INACTIVE_RESERVATION_STATUSES } from '../../../domain/types/reservation-status.enum';
import {
  ReservationRepository as IReservationRepository,
  ReservationCriteria,
  ReservationChanges,
} from '../../../ports/repositories/reservation.repository.interface';

const DETAIL_RELATIONS: FindOptionsRelations<Reservation> = {
  customer: true,
  assignments: { table: true },
};

@Injectable()
export class ReservationRepository implements IReservationRepository {
  constructor(
    @InjectRepository(Reservation)
    private readonly repository: Repository<Reservation>,
    @InjectRepository(TableAssignment)
    private readonly assignmentRepository: Repository<TableAssignment>,
  ) {}

  async findById(id: string): Promise<Reservation | null> {
    return this.repository.findOne({
      where: { id },
      relations: DETAIL_RELATIONS,
    });
  }

  async find(criteria: ReservationCriteria): Promise<Reservation[]> {
    const where: FindOptionsWhere<Reservation> = {};

    if (criteria.date !== undefined) {
      where.reservationDate = criteria.date;
    } else if (criteria.dateFrom !== undefined && criteria.dateTo !== undefined) {
      where.reservationDate = Between(criteria.dateFrom, criteria.dateTo);
    } else if (criteria.dateFrom !== undefined) {
      where.reservationDate = MoreThanOrEqual(criteria.dateFrom);
    } else if (criteria.dateTo !== undefined) {
      where.reservationDate = LessThanOrEqual(criteria.dateTo);
    }

    if (criteria.customerId !== undefined) {
      where.customerId = criteria.customerId;
    }

    if (criteria.statuses !== undefined && criteria.statuses.length > 0) {
      where.status = In(criteria.statuses);
    }

    if (criteria.tableId !== undefined) {
      const assignments = await this.assignmentRepository.find({
        where: { tableId: criteria.tableId },
      });
      if (assignments.length === 0) {
        return [];
      }
      where.id = In(assignments.map((a) => a.reservationId));
    }

    return this.repository.find({
      where,
      relations: DETAIL_RELATIONS,
      order: { reservationDate: 'ASC', startTime: 'ASC' },
      skip: criteria.offset,
      take: criteria.limit,
    });
  }

  async findActiveOnDate(date: string): Promise<Reservation[]> {
    return this.repository.find({
      where: {
        reservationDate: date,
        status: Not(In([...INACTIVE_RESERVATION_STATUSES])),
      },
      relations: { assignments: true },
    });
  }

  async findActiveForTable(tableId: string): Promise<Reservation[]> {
    const assignments = await this.assignmentRepository.find({
      where: { tableId },
    });
    if (assignments.length === 0) {
      return [];
    }

    return this.repository.find({
      where: {
        id: In(assignments.map((a) => a.reservationId)),
        status: Not(In([...INACTIVE_RESERVATION_STATUSES])),
      },
      order: { reservationDate: 'ASC', startTime: 'ASC' },
    });
  }

  async create(reservation: Reservation): Promise<Reservation> {
    const newReservation = this.repository.create(reservation);
    return this.repository.save(newReservation);
  }

  async update(id: string, changes: ReservationChanges): Promise<void> {
    if (Object.keys(changes).length === 0) {
      return;
    }
    await this.repository.update({ id }, changes);
  }

  async assignTables(reservationId: string, tableIds: string[]): Promise<void> {
    if (tableIds.length === 0) {
      return;
    }
    const assignments = tableIds.map((tableId) => {
      const assignment = new TableAssignment();
      assignment.id = randomUUID();
      assignment.reservationId = reservationId;
      assignment.tableId = tableId;
      return assignment;
    });
    await this.assignmentRepository.insert(assignments);
  }

  async replaceAssignments(
    reservationId: string,
    tableIds: string[],
  ): Promise<void> {
    await this.assignmentRepository.delete({ reservationId });
    await this.assignTables(reservationId, tableIds);
  }

  async delete(id: string): Promise<boolean> {
    const existing = await this.repository.findOne({ where: { id } });
    if (!existing) {
      return false;
    }
    await this.repository.delete(id);
    return true;
  }
}
