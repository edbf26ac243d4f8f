import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Repository,
  In,
  FindOptionsWhere,
  MoreThanOrEqual,
  LessThanOrEqual,
} from 'typeorm';
import { RestaurantTable } from '../../../domain/entities/restaurant-table.entity';
import { Chair } from '../../../domain/entities/chair.entity';
import {
  TableRepository as ITableRepository,
  TableCriteria,
} from '../../../ports/repositories/table.repository.interface';

@Injectable()
export class TableRepository implements ITableRepository {
  constructor(
    @InjectRepository(RestaurantTable)
    private readonly repository: Repository<RestaurantTable>,
    @InjectRepository(Chair)
    private readonly chairRepository: Repository<Chair>,
  ) {}

  async findById(id: string): Promise<RestaurantTable | null> {
    return this.repository.findOne({ where: { id } });
  }

  async findByIds(ids: string[]): Promise<RestaurantTable[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.repository.find({ where: { id: In(ids) } });
  }

  async findByNumber(tableNumber: string): Promise<RestaurantTable | null> {
    return this.repository.findOne({ where: { tableNumber } });
  }

  async find(criteria: TableCriteria): Promise<RestaurantTable[]> {
    const where: FindOptionsWhere<RestaurantTable> = {};

    if (criteria.minCapacity !== undefined) {
      where.minCapacity = MoreThanOrEqual(criteria.minCapacity);
    }
    if (criteria.maxCapacity !== undefined) {
      where.maxCapacity = MoreThanOrEqual(criteria.maxCapacity);
    }
    if (criteria.isShared !== undefined) {
      where.isShared = criteria.isShared;
    }
    if (criteria.location !== undefined) {
      where.location = criteria.location;
    }

    return this.repository.find({
      where,
      order: { tableNumber: 'ASC' },
    });
  }

  async findFitting(partySize: number): Promise<RestaurantTable[]> {
    return this.repository.find({
      where: {
        minCapacity: LessThanOrEqual(partySize),
        maxCapacity: MoreThanOrEqual(partySize),
      },
      order: { tableNumber: 'ASC' },
    });
  }

  async create(table: RestaurantTable): Promise<RestaurantTable> {
    const newTable = this.repository.create(table);
    return this.repository.save(newTable);
  }

  async update(table: RestaurantTable): Promise<RestaurantTable> {
    return this.repository.save(table);
  }

  async delete(id: string): Promise<boolean> {
    const existing = await this.repository.findOne({ where: { id } });
    if (!existing) {
      return false;
    }
    await this.repository.delete(id);
    return true;
  }

  async findChairs(tableId: string): Promise<Chair[]> {
    return this.chairRepository.find({
      where: { tableId },
      order: { position: 'ASC' },
    });
  }

  async addChairs(chairs: Chair[]): Promise<void> {
    if (chairs.length === 0) {
      return;
    }
    await this.chairRepository.insert(chairs);
  }

  async removeChairs(chairIds: string[]): Promise<void> {
    if (chairIds.length === 0) {
      return;
    }
    await this.chairRepository.delete({ id: In(chairIds) });
  }
}
