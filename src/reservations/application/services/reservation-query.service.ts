import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ReservationRepository as IReservationRepository } from '../../ports/repositories/reservation.repository.interface';
import { RESERVATION_REPOSITORY } from '../../tokens';
import {
  ListReservationsQuery,
  ReservationResponse,
} from '../dto/reservation.dto';
import { toReservationResponse } from '../mappers/reservation.mapper';

@Injectable()
export class ReservationQueryService {
  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: IReservationRepository,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async getReservation(id: string): Promise<ReservationResponse> {
    const reservation = await this.reservationRepository.findById(id);
    if (!reservation) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'Reservation not found',
      });
    }
    return toReservationResponse(reservation, this.getTimezone());
  }

  async listReservations(
    query: ListReservationsQuery,
  ): Promise<ReservationResponse[]> {
    const reservations = await this.reservationRepository.find({
      date: query.date,
      dateFrom: query.dateFrom,
      dateTo: query.dateTo,
      tableId: query.tableId,
      customerId: query.customerId,
      statuses: query.status,
      limit: query.limit,
      offset: query.offset,
    });

    const timezone = this.getTimezone();
    return reservations.map((reservation) =>
      toReservationResponse(reservation, timezone),
    );
  }

  private getTimezone(): string {
    return this.configService.getOrThrow('booking.timezone', { infer: true });
  }
}
