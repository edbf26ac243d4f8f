import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { RestaurantTable } from './restaurant-table.entity';

@Entity('chairs')
export class Chair {
  @PrimaryColumn('varchar')
  id!: string;

  @Index()
  @Column('varchar')
  tableId!: string;

  @ManyToOne(() => RestaurantTable, (table) => table.chairs, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'tableId' })
  table?: RestaurantTable;

  // Creation order within the table; lower positions are the older chairs.
  @Column('integer')
  position!: number;

  @Column({ type: 'boolean', default: true })
  isAssigned!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
