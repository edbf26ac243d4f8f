import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { ReservationStatus } from '../types/reservation-status.enum';
import { Customer } from './customer.entity';
import { TableAssignment } from './table-assignment.entity';

@Entity('reservations')
@Index(['reservationDate', 'startTime'])
export class Reservation {
  @PrimaryColumn('varchar')
  id!: string;

  @Column('varchar')
  customerId!: string;

  @ManyToOne(() => Customer)
  @JoinColumn({ name: 'customerId' })
  customer?: Customer;

  @Column('integer')
  partySize!: number;

  @Column('varchar')
  reservationDate!: string; // YYYY-MM-DD

  @Column('varchar')
  startTime!: string; // HH:mm

  @Column({ type: 'integer', default: 90 })
  durationMinutes!: number;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({
    type: 'varchar',
    enum: ReservationStatus,
    default: ReservationStatus.PENDING,
  })
  status!: ReservationStatus;

  @OneToMany(() => TableAssignment, (assignment) => assignment.reservation)
  assignments?: TableAssignment[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
