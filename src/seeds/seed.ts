import moment from 'moment-timezone';
import { DataSource } from 'typeorm';
import { createDataSource } from '../ormconfig';
import { loadConfig } from '../config';
import { Employee } from '../entities/Employee';
import { Attendance } from '../entities/Attendance';
import { isAttendanceStatus } from '../types';
import { createLogger } from '../utils/logger';
import { formatTimestamp } from '../utils/timezone';
import data from './data.json';

const logger = createLogger('seed');

export type SeedEvent = { employee: string; dayOffset: number; time: string; status: string };

export type SeedSchema = {
  employees: string[];
  attendance: SeedEvent[];
};

// Scenarios start a week before today: regular days, a missing Leave, a lunch break.
export async function seed(dataSource: DataSource, schema: SeedSchema, timezone: string, now: Date = new Date()) {
  const empRepo = dataSource.getRepository(Employee);
  const attRepo = dataSource.getRepository(Attendance);
  const baseDate = moment.tz(now, timezone).startOf('day').subtract(7, 'days');

  let empInserted = 0;
  const ids = new Map<string, number>();
  for (const name of schema.employees) {
    let employee = await empRepo.findOneBy({ name });
    if (!employee) {
      employee = await empRepo.save(empRepo.create({ name, isActive: 1 }));
      empInserted++;
    }
    ids.set(name, employee.id);
  }

  let attInserted = 0;
  for (const a of schema.attendance) {
    const employeeId = ids.get(a.employee);
    if (employeeId === undefined || !isAttendanceStatus(a.status)) {
      logger.warn('Skipping seed event', { event: a });
      continue;
    }
    const day = baseDate.clone().add(a.dayOffset, 'days').format('YYYY-MM-DD');
    const at = moment.tz(`${day} ${a.time}`, 'YYYY-MM-DD HH:mm:ss', timezone).toDate();
    await attRepo.save(attRepo.create({ employeeId, status: a.status, timestamp: formatTimestamp(at, timezone) }));
    attInserted++;
  }

  return { empInserted, attInserted };
}

async function runSeed() {
  const config = loadConfig();
  const dataSource = createDataSource(config.databasePath, true);
  await dataSource.initialize();
  logger.info('DataSource initialized for seeding');

  const { empInserted, attInserted } = await seed(dataSource, data, config.timezone);

  logger.info(`Seeding complete. Employees inserted: ${empInserted}, Attendance inserted: ${attInserted}`);
  await dataSource.destroy();
}

if (require.main === module) {
  runSeed().catch((err) => {
    logger.error('Seed failed', { error: err instanceof Error ? err.stack : String(err) });
    process.exit(1);
  });
}
