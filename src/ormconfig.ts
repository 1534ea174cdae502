import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { Employee } from './entities/Employee';
import { Attendance } from './entities/Attendance';
import { CreateInitialTables1725148800000 } from './migrations/1725148800000-CreateInitialTables';

/**
 * SQLite through sql.js. With a `location` the database file is loaded on
 * start and written back after every change; without one it stays in memory.
 */
export function createDataSource(location?: string, migrationsRun = false): DataSource {
  return new DataSource({
    type: 'sqljs',
    location,
    autoSave: location !== undefined,
    entities: [Employee, Attendance],
    migrations: [CreateInitialTables1725148800000],
    migrationsRun,
    synchronize: false,
    logging: false,
  });
}
