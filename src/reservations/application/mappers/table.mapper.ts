import { RestaurantTable } from '../../domain/entities/restaurant-table.entity';
import { Chair } from '../../domain/entities/chair.entity';
import { TableAvailability } from '../../domain/types/table-availability.type';
import { TableDetailsResponse, TableResponse } from '../dto/table.dto';
import { AvailableTable } from '../dto/check-availability.dto';

export function toTableResponse(table: RestaurantTable): TableResponse {
  return {
    id: table.id,
    tableNumber: table.tableNumber,
    minCapacity: table.minCapacity,
    maxCapacity: table.maxCapacity,
    isShared: table.isShared,
    location: table.location,
    createdAt: table.createdAt.toISOString(),
    updatedAt: table.updatedAt.toISOString(),
  };
}

export function toTableDetailsResponse(
  table: RestaurantTable,
  chairs: Chair[],
): TableDetailsResponse {
  return {
    ...toTableResponse(table),
    chairs: chairs.map((chair) => ({
      id: chair.id,
      position: chair.position,
      isAssigned: chair.isAssigned,
    })),
  };
}

export function toAvailableTable(availability: TableAvailability): AvailableTable {
  const { table } = availability;
  return {
    id: table.id,
    tableNumber: table.tableNumber,
    minCapacity: table.minCapacity,
    maxCapacity: table.maxCapacity,
    isShared: table.isShared,
    location: table.location,
    canBeShared: availability.canBeShared,
    remainingCapacity: availability.remainingCapacity,
  };
}
