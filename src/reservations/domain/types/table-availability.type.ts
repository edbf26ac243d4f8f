import { RestaurantTable } from '../entities/restaurant-table.entity';

export interface TableAvailability {
  table: RestaurantTable;
  remainingCapacity: number;
  canBeShared: boolean;
}
