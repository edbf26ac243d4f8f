import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Reservation } from './reservation.entity';
import { RestaurantTable } from './restaurant-table.entity';

@Entity('table_assignments')
@Index(['reservationId', 'tableId'], { unique: true })
export class TableAssignment {
  @PrimaryColumn('varchar')
  id!: string;

  @Column('varchar')
  reservationId!: string;

  @ManyToOne(() => Reservation, (reservation) => reservation.assignments, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'reservationId' })
  reservation?: Reservation;

  @Index()
  @Column('varchar')
  tableId!: string;

  @ManyToOne(() => RestaurantTable, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'tableId' })
  table?: RestaurantTable;

  @CreateDateColumn()
  createdAt!: Date;
}
