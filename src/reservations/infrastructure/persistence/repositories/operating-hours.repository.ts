import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { OperatingHours } from '../../../domain/entities/operating-hours.entity';
import { OperatingHoursRepository as IOperatingHoursRepository } from '../../../ports/repositories/operating-hours.repository.interface';

@Injectable()
export class OperatingHoursRepository implements IOperatingHoursRepository {
  constructor(
    @InjectRepository(OperatingHours)
    private readonly repository: Repository<OperatingHours>,
  ) {}

  async findAll(): Promise<OperatingHours[]> {
    return this.repository.find({ order: { dayOfWeek: 'ASC' } });
  }

  async findByDay(dayOfWeek: number): Promise<OperatingHours | null> {
    return this.repository.findOne({ where: { dayOfWeek } });
  }

  async save(hours: OperatingHours): Promise<OperatingHours> {
    return this.repository.save(hours);
  }
}
