import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';
import { AttendanceStatus } from '../types';

@Entity('attendance')
export class Attendance {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'employee_id', type: 'integer' })
  employeeId!: number;

  @Column({ name: 'status', type: 'text' })
  status!: AttendanceStatus;

  // ISO 8601 in the configured timezone, e.g. 2024-09-05T08:05:00.000+02:00
  @Column({ name: 'timestamp', type: 'text' })
  timestamp!: string;
}
