import { RestaurantTable } from '../../domain/entities/restaurant-table.entity';
import { Chair } from '../../domain/entities/chair.entity';

/**
 * Each field maps to one fixed predicate; absent fields do not filter.
 */
export interface TableCriteria {
  minCapacity?: number; // minCapacity >= value
  maxCapacity?: number; // maxCapacity >= value
  isShared?: boolean;
  location?: string;
}

export interface TableRepository {
  findById(id: string): Promise<RestaurantTable | null>;
  findByIds(ids: string[]): Promise<RestaurantTable[]>;
  findByNumber(tableNumber: string): Promise<RestaurantTable | null>;
  find(criteria: TableCriteria): Promise<RestaurantTable[]>;
  findFitting(partySize: number): Promise<RestaurantTable[]>;
  create(table: RestaurantTable): Promise<RestaurantTable>;
  update(table: RestaurantTable): Promise<RestaurantTable>;
  delete(id: string): Promise<boolean>;
  findChairs(tableId: string): Promise<Chair[]>;
  addChairs(chairs: Chair[]): Promise<void>;
  removeChairs(chairIds: string[]): Promise<void>;
}
