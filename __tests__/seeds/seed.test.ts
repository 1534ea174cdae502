import { DataSource } from 'typeorm';
import { createTestDataSource } from '../helpers/db';
import { seed } from '../../src/seeds/seed';
import { AttendanceService } from '../../src/services/attendance';
import { EmployeeService } from '../../src/services/employees';
import { calculateDailyHours } from '../../src/services/dailyHours';
import data from '../../src/seeds/data.json';

const TZ = 'Europe/Prague';
const NOW = new Date('2024-09-10T10:00:00Z');

describe('seed', () => {
  let dataSource: DataSource;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('inserts the employees and scenarios starting a week ago', async () => {
    const result = await seed(dataSource, data, TZ, NOW);

    expect(result).toEqual({ empInserted: 3, attInserted: 17 });

    const attendance = new AttendanceService(dataSource, TZ);
    const rows = await attendance.filterEvents({ startDate: '2024-09-03', endDate: '2024-09-05' });
    expect(rows.find((r) => r.employeeName === 'Anna Test')).toEqual({ employeeName: 'Anna Test', status: 'Enter', date: '2024-09-03', time: '08:05:00' });

    expect(calculateDailyHours(rows).filter((d) => d.employeeName === 'Anna Test')).toEqual([
      { employeeName: 'Anna Test', date: '2024-09-03', actualHours: '8:20', quarterHours: '8:15' },
      { employeeName: 'Anna Test', date: '2024-09-04', actualHours: '8:14', quarterHours: '8:15' },
      { employeeName: 'Anna Test', date: '2024-09-05', actualHours: '8:30', quarterHours: '8:34' },
    ]);
  });

  it('does not duplicate employees when run twice', async () => {
    await seed(dataSource, data, TZ, NOW);
    const second = await seed(dataSource, data, TZ, NOW);

    expect(second.empInserted).toBe(0);
    expect(await new EmployeeService(dataSource).listEmployees()).toHaveLength(3);
  });
});
