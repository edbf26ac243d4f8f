import { OperatingHours } from '../../domain/entities/operating-hours.entity';

export interface OperatingHoursRepository {
  findAll(): Promise<OperatingHours[]>;
  findByDay(dayOfWeek: number): Promise<OperatingHours | null>;
  save(hours: OperatingHours): Promise<OperatingHours>;
}
