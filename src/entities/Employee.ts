import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

@Entity('employees')
export class Employee {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'name', type: 'text', unique: true })
  name!: string;

  // 1 for active, 0 for disabled
  @Column({ name: 'is_active', type: 'integer', default: 1 })
  isActive!: number;
}
