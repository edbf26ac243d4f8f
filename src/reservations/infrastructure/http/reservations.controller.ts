import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Query,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { AvailabilityService } from '../../application/services/availability.service';
import { ReservationQueryService } from '../../application/services/reservation-query.service';
import { ReservationCommandService } from '../../application/services/reservation-command.service';
import { CheckAvailabilitySchema } from '../../application/dto/check-availability.dto';
import {
  CreateReservationSchema,
  ListReservationsQuerySchema,
  UpdateReservationSchema,
  UpdateStatusSchema,
} from '../../application/dto/reservation.dto';
import { IdSchema } from '../../application/dto/common.schemas';
import { LoggerService } from '../logging/logger.service';
import {
  getThrottleConfig,
  READ_LIMIT,
  WRITE_LIMIT,
} from '../rate-limiting/throttle-config';
import { handleRequest, parseInput } from './request-handler';

@ApiTags('reservations')
@Controller()
export class ReservationsController {
  constructor(
    private readonly availabilityService: AvailabilityService,
    private readonly reservationQueryService: ReservationQueryService,
    private readonly reservationCommandService: ReservationCommandService,
    private readonly logger: LoggerService,
  ) {}

  @Post('availability')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Check which tables can seat a party' })
  @ApiResponse({ status: 200, description: 'Availability computed' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  async checkAvailability(@Body() body: unknown) {
    return handleRequest(this.logger, 'check_availability', {}, () =>
      this.availabilityService.checkAvailability(
        parseInput(CheckAvailabilitySchema, body),
      ),
    );
  }

  @Get('reservations')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'List reservations' })
  @ApiResponse({ status: 200, description: 'Reservations listed' })
  @ApiResponse({ status: 400, description: 'Invalid filters' })
  async listReservations(@Query() query: unknown) {
    return handleRequest(this.logger, 'list_reservations', {}, () =>
      this.reservationQueryService.listReservations(
        parseInput(ListReservationsQuerySchema, query),
      ),
    );
  }

  @Get('reservations/:id')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'Get a reservation' })
  @ApiResponse({ status: 200, description: 'Reservation found' })
  @ApiResponse({ status: 404, description: 'Reservation not found' })
  async getReservation(@Param('id') id: string) {
    return handleRequest(
      this.logger,
      'get_reservation',
      { reservationId: id },
      () =>
        this.reservationQueryService.getReservation(parseInput(IdSchema, id)),
    );
  }

  @Post('reservations')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Book tables for a guest' })
  @ApiResponse({ status: 201, description: 'Reservation created' })
  @ApiResponse({
    status: 400,
    description: 'Invalid input or outside operating hours',
  })
  @ApiResponse({ status: 404, description: 'Table not found' })
  @ApiResponse({ status: 409, description: 'Table unavailable' })
  @ApiResponse({ status: 503, description: 'Reservation store busy' })
  async createReservation(@Body() body: unknown) {
    return handleRequest(this.logger, 'create_reservation', {}, () =>
      this.reservationCommandService.createReservation(
        parseInput(CreateReservationSchema, body),
      ),
    );
  }

  @Put('reservations/:id')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @ApiOperation({ summary: 'Update or reschedule a reservation' })
  @ApiResponse({ status: 200, description: 'Reservation updated' })
  @ApiResponse({
    status: 400,
    description: 'Invalid input or outside operating hours',
  })
  @ApiResponse({ status: 404, description: 'Reservation or table not found' })
  @ApiResponse({ status: 409, description: 'Table unavailable' })
  async updateReservation(@Param('id') id: string, @Body() body: unknown) {
    return handleRequest(
      this.logger,
      'update_reservation',
      { reservationId: id },
      () =>
        this.reservationCommandService.updateReservation(
          parseInput(IdSchema, id),
          parseInput(UpdateReservationSchema, body),
        ),
    );
  }

  @Patch('reservations/:id/status')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @ApiOperation({ summary: 'Change the status of a reservation' })
  @ApiResponse({ status: 200, description: 'Status updated' })
  @ApiResponse({ status: 404, description: 'Reservation not found' })
  @ApiResponse({
    status: 409,
    description: 'Tables taken while the reservation was inactive',
  })
  async updateStatus(@Param('id') id: string, @Body() body: unknown) {
    return handleRequest(
      this.logger,
      'update_reservation_status',
      { reservationId: id },
      () =>
        this.reservationCommandService.updateStatus(
          parseInput(IdSchema, id),
          parseInput(UpdateStatusSchema, body).status,
        ),
    );
  }

  @Delete('reservations/:id')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a reservation' })
  @ApiResponse({ status: 204, description: 'Reservation deleted' })
  @ApiResponse({ status: 404, description: 'Reservation not found' })
  async deleteReservation(@Param('id') id: string): Promise<void> {
    await handleRequest(
      this.logger,
      'delete_reservation',
      { reservationId: id },
      async () => {
        const deleted = await this.reservationCommandService.deleteReservation(
          parseInput(IdSchema, id),
        );
        if (!deleted) {
          throw new NotFoundException({
            error: 'not_found',
            detail: 'Reservation not found',
          });
        }
      },
    );
  }
}
