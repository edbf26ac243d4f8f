import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Repository,
  Between,
  MoreThanOrEqual,
  LessThanOrEqual,
  FindOptionsWhere,
} from 'typeorm';
import { SpecialHours } from '../../../domain/entities/special-hours.entity';
import { SpecialHoursRepository as ISpecialHoursRepository } from '../../../ports/repositories/special-hours.repository.interface';

@Injectable()
export class SpecialHoursRepository implements ISpecialHoursRepository {
  constructor(
    @InjectRepository(SpecialHours)
    private readonly repository: Repository<SpecialHours>,
  ) {}

  async findById(id: string): Promise<SpecialHours | null> {
    return this.repository.findOne({ where: { id } });
  }

  async findByDate(date: string): Promise<SpecialHours | null> {
    return this.repository.findOne({ where: { date } });
  }

  async findInRange(
    dateFrom?: string,
    dateTo?: string,
  ): Promise<SpecialHours[]> {
    const where: FindOptionsWhere<SpecialHours> = {};
    if (dateFrom !== undefined && dateTo !== undefined) {
      where.date = Between(dateFrom, dateTo);
    } else if (dateFrom !== undefined) {
      where.date = MoreThanOrEqual(dateFrom);
    } else if (dateTo !== undefined) {
      where.date = LessThanOrEqual(dateTo);
    }

    return this.repository.find({ where, order: { date: 'ASC' } });
  }

  async save(specialHours: SpecialHours): Promise<SpecialHours> {
    return this.repository.save(specialHours);
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
