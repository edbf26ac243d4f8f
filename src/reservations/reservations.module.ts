import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard, seconds } from '@nestjs/throttler';
import { APP_GUARD, APP_FILTER } from '@nestjs/core';
import { RestaurantTable } from './domain/entities/restaurant-table.entity';
import { Chair } from './domain/entities/chair.entity';
import { Customer } from './domain/entities/customer.entity';
import { Reservation } from './domain/entities/reservation.entity';
import { TableAssignment } from './domain/entities/table-assignment.entity';
import { OperatingHours } from './domain/entities/operating-hours.entity';
import { SpecialHours } from './domain/entities/special-hours.entity';
import { TableRepository } from './infrastructure/persistence/repositories/table.repository';
import { ReservationRepository } from './infrastructure/persistence/repositories/reservation.repository';
import { OperatingHoursRepository } from './infrastructure/persistence/repositories/operating-hours.repository';
import { SpecialHoursRepository } from './infrastructure/persistence/repositories/special-hours.repository';
import { TypeOrmUnitOfWork } from './infrastructure/persistence/typeorm-unit-of-work';
import { ThrottlerExceptionFilter } from './infrastructure/rate-limiting/throttler-exception.filter';
import { SeedService } from './infrastructure/persistence/seed.service';
import { OperatingHoursResolverService } from './domain/services/operating-hours-resolver.service';
import { AvailabilityCalculatorService } from './domain/services/availability-calculator.service';
import { ContactResolverService } from './domain/services/contact-resolver.service';
import { LockManagerService } from './infrastructure/locking/lock-manager.service';
import { LoggerService } from './infrastructure/logging/logger.service';
import { MetricsService } from './infrastructure/metrics/metrics.service';
import { HoursService } from './application/services/hours.service';
import { AvailabilityService } from './application/services/availability.service';
import { ReservationQueryService } from './application/services/reservation-query.service';
import { ReservationCommandService } from './application/services/reservation-command.service';
import { TableQueryService } from './application/services/table-query.service';
import { TableCommandService } from './application/services/table-command.service';
import { TablesController } from './infrastructure/http/tables.controller';
import { ReservationsController } from './infrastructure/http/reservations.controller';
import { HoursController } from './infrastructure/http/hours.controller';
import { HealthController } from './infrastructure/http/health.controller';
import {
  TABLE_REPOSITORY,
  RESERVATION_REPOSITORY,
  OPERATING_HOURS_REPOSITORY,
  SPECIAL_HOURS_REPOSITORY,
  UNIT_OF_WORK,
} from './tokens';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      RestaurantTable,
      Chair,
      Customer,
      Reservation,
      TableAssignment,
      OperatingHours,
      SpecialHours,
    ]),
    ThrottlerModule.forRoot({
      throttlers: [
        {
          ttl: seconds(60),
          limit: process.env.NODE_ENV === 'test' ? 10000 : 100, // Much higher limit in test (overridden by @Throttle decorators)
        },
      ],
    }),
  ],
  controllers: [
    TablesController,
    ReservationsController,
    HoursController,
    HealthController,
  ],
  providers: [
    // Domain services
    OperatingHoursResolverService,
    AvailabilityCalculatorService,
    ContactResolverService,
    // Infrastructure services
    LockManagerService,
    LoggerService,
    MetricsService,
    SeedService,
    // Repository interfaces (provide tokens, use implementations)
    {
      provide: TABLE_REPOSITORY,
      useClass: TableRepository,
    },
    {
      provide: RESERVATION_REPOSITORY,
      useClass: ReservationRepository,
    },
    {
      provide: OPERATING_HOURS_REPOSITORY,
      useClass: OperatingHoursRepository,
    },
    {
      provide: SPECIAL_HOURS_REPOSITORY,
      useClass: SpecialHoursRepository,
    },
    {
      provide: UNIT_OF_WORK,
      useClass: TypeOrmUnitOfWork,
    },
    // Application services
    HoursService,
    AvailabilityService,
    ReservationQueryService,
    ReservationCommandService,
    TableQueryService,
    TableCommandService,
    // Rate limiting
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: ThrottlerExceptionFilter,
    },
  ],
  exports: [SeedService, LoggerService],
})
export class ReservationsModule {}
