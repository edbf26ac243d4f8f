import { SpecialHours } from '../../domain/entities/special-hours.entity';

export interface SpecialHoursRepository {
  findById(id: string): Promise<SpecialHours | null>;
  findByDate(date: string): Promise<SpecialHours | null>;
  findInRange(dateFrom?: string, dateTo?: string): Promise<SpecialHours[]>;
  save(specialHours: SpecialHours): Promise<SpecialHours>;
  delete(id: string): Promise<boolean>;
}
