import { DataSource, QueryFailedError, Repository } from 'typeorm';
import { Employee } from '../entities/Employee';
import { DuplicateEmployeeError, EmployeeNotFoundError, ValidationError } from '../errors';
import { EmployeeSummary } from '../types';

function toSummary(employee: Employee): EmployeeSummary {
  return { id: employee.id, name: employee.name, isActive: employee.isActive === 1 };
}

export class EmployeeService {
  private readonly repo: Repository<Employee>;

  constructor(dataSource: DataSource) {
    this.repo = dataSource.getRepository(Employee);
  }

  async listEmployees(): Promise<EmployeeSummary[]> {
    const list = await this.repo.find({ order: { name: 'ASC' } });
    return list.map(toSummary);
  }

  async listActiveEmployees(): Promise<EmployeeSummary[]> {
    const list = await this.repo.find({ where: { isActive: 1 }, order: { name: 'ASC' } });
    return list.map(toSummary);
  }

  async addEmployee(rawName: string): Promise<EmployeeSummary> {
    const name = rawName.trim();
    if (!name) throw new ValidationError('Employee name is required');

    const employee = this.repo.create({ name, isActive: 1 });
    try {
      await this.repo.save(employee);
    } catch (err) {
      if (err instanceof QueryFailedError && /UNIQUE constraint failed/.test(err.message)) {
        throw new DuplicateEmployeeError(name);
      }
      throw err;
    }
    return toSummary(employee);
  }

  /** Disabled employees keep their history but can no longer clock in or out. */
  async setActive(employeeId: number, active: boolean): Promise<EmployeeSummary> {
    const employee = await this.repo.findOneBy({ id: employeeId });
    if (!employee) throw new EmployeeNotFoundError(employeeId);

    employee.isActive = active ? 1 : 0;
    await this.repo.save(employee);
    return toSummary(employee);
  }
}
