import { DataSource, Repository } from 'typeorm';
import { Employee } from '../entities/Employee';
import { Attendance } from '../entities/Attendance';
import { EmployeeNotFoundError, ValidationError } from '../errors';
import {
  AttendanceStatus,
  NextAction,
  RecordedEvent,
  ReportFilter,
  ReportRow,
  isAttendanceStatus,
} from '../types';
import {
  DateRange,
  formatTimestamp,
  isValidDate,
  localDate,
  previousMonthRange,
  timestampDate,
  timestampTime,
} from '../utils/timezone';

type RawReportRow = {
  employeeName: string;
  status: AttendanceStatus;
  timestamp: string;
  instant: number;
};

/**
 * Clock-in/clock-out state and history for employees.
 *
 * Nothing here serialises concurrent requests: two submissions that both read
 * "last action = Leave" will both record Enter. SQLite's single-writer lock is
 * the only guard.
 */
export class AttendanceService {
  private readonly employees: Repository<Employee>;
  private readonly events: Repository<Attendance>;

  constructor(dataSource: DataSource, private readonly timezone: string) {
    this.employees = dataSource.getRepository(Employee);
    this.events = dataSource.getRepository(Attendance);
  }

  /**
   * Next permitted action for an employee, decided by their last event of the
   * current local day: none or Leave means Enter, Enter means Leave.
   */
  async resolveNextAction(employeeId: number, now: Date = new Date()): Promise<NextAction> {
    const employee = await this.findActiveEmployee(employeeId);

    const last = await this.events
      .createQueryBuilder('a')
      .where('a.employeeId = :employeeId', { employeeId: employee.id })
      .andWhere('substr(a.timestamp, 1, 10) = :today', { today: localDate(now, this.timezone) })
      .orderBy('a.id', 'DESC')
      .limit(1)
      .getOne();

    return {
      employeeId: employee.id,
      employeeName: employee.name,
      nextAction: last?.status === 'Enter' ? 'Leave' : 'Enter',
    };
  }

  async recordEvent(employeeId: number, action: unknown, now: Date = new Date()): Promise<RecordedEvent> {
    if (!isAttendanceStatus(action)) {
      throw new ValidationError(`Unknown action: ${String(action)}`);
    }
    const employee = await this.findActiveEmployee(employeeId);

    const event = this.events.create({
      employeeId: employee.id,
      status: action,
      timestamp: formatTimestamp(now, this.timezone),
    });
    await this.events.save(event);

    return {
      id: event.id,
      employeeId: employee.id,
      employeeName: employee.name,
      status: event.status,
      timestamp: event.timestamp,
    };
  }

  /** Every event of one employee in insertion order. Includes disabled employees. */
  async listEvents(employeeId: number): Promise<Attendance[]> {
    return this.events.find({
      where: { employeeId },
      order: { id: 'ASC' },
    });
  }

  async filterEvents(filter: ReportFilter): Promise<ReportRow[]> {
    const { startDate, endDate, employeeId } = filter;
    const order = filter.order ?? 'ASC';

    if (!isValidDate(startDate) || !isValidDate(endDate)) {
      throw new ValidationError('Dates must be in YYYY-MM-DD format');
    }
    if (startDate > endDate) return [];

    const query = this.events
      .createQueryBuilder('a')
      .innerJoin(Employee, 'e', 'e.id = a.employeeId')
      .select('e.name', 'employeeName')
      .addSelect('a.status', 'status')
      .addSelect('a.timestamp', 'timestamp')
      // wall-clock text repeats an hour when clocks go back; sort on the instant
      .addSelect('julianday(a.timestamp)', 'instant')
      .where('substr(a.timestamp, 1, 10) >= :startDate', { startDate })
      .andWhere('substr(a.timestamp, 1, 10) <= :endDate', { endDate });

    if (employeeId !== undefined) {
      query.andWhere('a.employeeId = :employeeId', { employeeId });
    }

    const rows = await query
      .orderBy('instant', order)
      .addOrderBy('a.id', order)
      .getRawMany<RawReportRow>();

    return rows.map((row) => ({
      employeeName: row.employeeName,
      status: row.status,
      date: timestampDate(row.timestamp),
      time: timestampTime(row.timestamp),
    }));
  }

  /** Fills in the previous calendar month when either bound is missing. */
  reportRange(startDate?: string, endDate?: string, now: Date = new Date()): DateRange {
    if (!startDate || !endDate) return previousMonthRange(this.timezone, now);
    return { startDate, endDate };
  }

  private async findActiveEmployee(employeeId: number): Promise<Employee> {
    const employee = await this.employees.findOneBy({ id: employeeId, isActive: 1 });
    if (!employee) throw new EmployeeNotFoundError(employeeId);
    return employee;
  }
}
