import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('restaurant_hours')
export class OperatingHours {
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ type: 'integer', unique: true })
  dayOfWeek!: number; // 0 = Monday .. 6 = Sunday

  @Column('varchar')
  openTime!: string; // HH:mm

  @Column('varchar')
  closeTime!: string; // HH:mm

  @Column('varchar')
  lastReservationTime!: string; // HH:mm

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
