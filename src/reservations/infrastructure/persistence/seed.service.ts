import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, DataSource } from 'typeorm';
import { randomUUID } from 'crypto';
import { OperatingHours } from '../../domain/entities/operating-hours.entity';
import { RestaurantTable } from '../../domain/entities/restaurant-table.entity';
import { Chair } from '../../domain/entities/chair.entity';
import { LoggerService } from '../logging/logger.service';

interface WeeklyHoursSeed {
  dayOfWeek: number;
  openTime: string;
  closeTime: string;
  lastReservationTime: string;
}

interface TableSeed {
  tableNumber: string;
  minCapacity: number;
  maxCapacity: number;
  isShared: boolean;
  location: string;
}

const WEEKDAY_HOURS = {
  openTime: '11:00',
  closeTime: '22:00',
  lastReservationTime: '20:30',
};
const WEEKEND_HOURS = {
  openTime: '11:00',
  closeTime: '23:00',
  lastReservationTime: '21:30',
};

export const WEEKLY_HOURS_SEED: WeeklyHoursSeed[] = [0, 1, 2, 3, 4, 5, 6].map(
  (dayOfWeek) => ({
    dayOfWeek,
    // Friday and Saturday stay open an hour longer.
    ...(dayOfWeek === 4 || dayOfWeek === 5 ? WEEKEND_HOURS : WEEKDAY_HOURS),
  }),
);

export const FLOOR_PLAN_SEED: TableSeed[] = [
  { tableNumber: 'T1', minCapacity: 1, maxCapacity: 2, isShared: false, location: 'window' },
  { tableNumber: 'T2', minCapacity: 1, maxCapacity: 2, isShared: false, location: 'window' },
  { tableNumber: 'T3', minCapacity: 2, maxCapacity: 4, isShared: false, location: 'main' },
  { tableNumber: 'T4', minCapacity: 2, maxCapacity: 4, isShared: false, location: 'main' },
  { tableNumber: 'T5', minCapacity: 4, maxCapacity: 6, isShared: false, location: 'main' },
  { tableNumber: 'B1', minCapacity: 1, maxCapacity: 10, isShared: true, location: 'bar' },
];

/**
 * Gives an empty database a weekly schedule and a starter floor plan.
 * Each part is skipped when it already has rows.
 */
@Injectable()
export class SeedService {
  constructor(
    @InjectRepository(OperatingHours)
    private readonly operatingHoursRepository: Repository<OperatingHours>,
    @InjectRepository(RestaurantTable)
    private readonly tableRepository: Repository<RestaurantTable>,
    private readonly dataSource: DataSource,
    private readonly logger: LoggerService,
  ) {}

  async seed(): Promise<void> {
    const seedHours = (await this.operatingHoursRepository.count()) === 0;
    const seedTables = (await this.tableRepository.count()) === 0;

    if (!seedHours && !seedTables) {
      return;
    }

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      if (seedHours) {
        for (const entry of WEEKLY_HOURS_SEED) {
          const hours = this.operatingHoursRepository.create({
            id: randomUUID(),
            ...entry,
          });
          await queryRunner.manager.save(hours);
        }
      }

      if (seedTables) {
        for (const entry of FLOOR_PLAN_SEED) {
          const table = this.tableRepository.create({
            id: randomUUID(),
            ...entry,
          });
          await queryRunner.manager.save(table);

          const chairs = Array.from({ length: entry.maxCapacity }, (_, index) =>
            queryRunner.manager.create(Chair, {
              id: randomUUID(),
              tableId: table.id,
              position: index + 1,
              isAssigned: true,
            }),
          );
          await queryRunner.manager.save(chairs);
        }
      }

      await queryRunner.commitTransaction();
      this.logger.log({
        op: 'seed',
        outcome: 'success',
        weeklyHours: seedHours ? WEEKLY_HOURS_SEED.length : 0,
        tables: seedTables ? FLOOR_PLAN_SEED.length : 0,
      });
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
