import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('special_hours')
export class SpecialHours {
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ type: 'varchar', unique: true })
  date!: string; // YYYY-MM-DD

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'boolean', default: false })
  isClosed!: boolean;

  // The time triple is null when the restaurant is closed for the day.
  @Column({ type: 'varchar', nullable: true })
  openTime!: string | null;

  @Column({ type: 'varchar', nullable: true })
  closeTime!: string | null;

  @Column({ type: 'varchar', nullable: true })
  lastReservationTime!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
