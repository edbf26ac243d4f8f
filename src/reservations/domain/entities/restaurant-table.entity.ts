import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { Chair } from './chair.entity';

@Entity('tables')
export class RestaurantTable {
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ type: 'varchar', length: 10, unique: true })
  tableNumber!: string;

  @Column('integer')
  minCapacity!: number;

  @Column('integer')
  maxCapacity!: number;

  @Column({ type: 'boolean', default: false })
  isShared!: boolean;

  @Column({ type: 'varchar', length: 50, nullable: true })
  location!: string | null;

  @OneToMany(() => Chair, (chair) => chair.table)
  chairs?: Chair[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
