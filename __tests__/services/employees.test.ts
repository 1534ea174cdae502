import { DataSource } from 'typeorm';
import { createTestDataSource } from '../helpers/db';
import { EmployeeService } from '../../src/services/employees';
import { AttendanceService } from '../../src/services/attendance';
import { DuplicateEmployeeError, EmployeeNotFoundError, ValidationError } from '../../src/errors';

describe('EmployeeService', () => {
  let dataSource: DataSource;
  let employees: EmployeeService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    employees = new EmployeeService(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('adds active employees with trimmed names', async () => {
    const added = await employees.addEmployee('  Anna Test ');

    expect(added).toEqual({ id: expect.any(Number), name: 'Anna Test', isActive: true });
  });

  it('rejects blank names', async () => {
    await expect(employees.addEmployee('   ')).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects duplicate names', async () => {
    await employees.addEmployee('Anna');

    await expect(employees.addEmployee('Anna')).rejects.toBeInstanceOf(DuplicateEmployeeError);
    expect(await employees.listEmployees()).toHaveLength(1);
  });

  it('lists everyone by name, and only active employees in the active list', async () => {
    await employees.addEmployee('Cora');
    const bruno = await employees.addEmployee('Bruno');
    await employees.addEmployee('Anna');

    await employees.setActive(bruno.id, false);

    expect((await employees.listEmployees()).map((e) => [e.name, e.isActive])).toEqual([
      ['Anna', true],
      ['Bruno', false],
      ['Cora', true],
    ]);
    expect((await employees.listActiveEmployees()).map((e) => e.name)).toEqual(['Anna', 'Cora']);
  });

  it('re-enables a disabled employee', async () => {
    const anna = await employees.addEmployee('Anna');
    await employees.setActive(anna.id, false);

    const enabled = await employees.setActive(anna.id, true);

    expect(enabled.isActive).toBe(true);
    expect((await employees.listActiveEmployees()).map((e) => e.id)).toEqual([anna.id]);
  });

  it('keeps the history of a disabled employee unchanged', async () => {
    const attendance = new AttendanceService(dataSource, 'Europe/Prague');
    const anna = await employees.addEmployee('Anna');
    await attendance.recordEvent(anna.id, 'Enter', new Date('2024-09-05T06:00:00Z'));
    await attendance.recordEvent(anna.id, 'Leave', new Date('2024-09-05T14:30:00Z'));
    const before = await attendance.listEvents(anna.id);

    await employees.setActive(anna.id, false);

    expect(await attendance.listEvents(anna.id)).toEqual(before);
  });

  it('fails to toggle an unknown employee', async () => {
    await expect(employees.setActive(404, false)).rejects.toBeInstanceOf(EmployeeNotFoundError);
  });
});
