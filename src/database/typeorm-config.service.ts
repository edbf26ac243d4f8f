import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';
import { RestaurantTable } from '../reservations/domain/entities/restaurant-table.entity';
import { Chair } from '../reservations/domain/entities/chair.entity';
import { Customer } from '../reservations/domain/entities/customer.entity';
import { Reservation } from '../reservations/domain/entities/reservation.entity';
import { TableAssignment } from '../reservations/domain/entities/table-assignment.entity';
import { OperatingHours } from '../reservations/domain/entities/operating-hours.entity';
import { SpecialHours } from '../reservations/domain/entities/special-hours.entity';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', { infer: true });
    const nodeEnv = this.configService.getOrThrow('app.nodeEnv', {
      infer: true,
    });

    return {
      type: 'better-sqlite3',
      database: database.path,
      synchronize: true,
      dropSchema: database.dropSchema,
      logging: nodeEnv === 'development' ? ['error', 'warn'] : false,
      entities: [
        RestaurantTable,
        Chair,
        Customer,
        Reservation,
        TableAssignment,
        OperatingHours,
        SpecialHours,
      ],
    };
  }
}
