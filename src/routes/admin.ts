import { Router, Request, Response } from 'express';
import { DataSource } from 'typeorm';
import { Logger } from 'winston';
import { AttendanceService } from '../services/attendance';
import { EmployeeService } from '../services/employees';
import { calculateDailyHours } from '../services/dailyHours';
import { DuplicateEmployeeError, EmployeeNotFoundError, ValidationError } from '../errors';
import { ReportFilter } from '../types';
import { dailyHoursToCsv, eventsToCsv } from '../utils/csv';
import { asyncRoute } from '../middleware/errors';
import { buildAdminHtml } from '../templates/pages';
import { parseId, queryString } from './params';

function adminRedirect(res: Response, message: string) {
  res.redirect(`/admin?message=${encodeURIComponent(message)}`);
}

function sendCsv(res: Response, filename: string, body: string) {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename=${filename}`);
  res.send(body);
}

export default function adminRouter(dataSource: DataSource, timezone: string, logger: Logger) {
  const router = Router();
  const attendance = new AttendanceService(dataSource, timezone);
  const employees = new EmployeeService(dataSource);

  function reportFilter(req: Request, order: 'ASC' | 'DESC'): ReportFilter {
    const range = attendance.reportRange(queryString(req.query.start_date), queryString(req.query.end_date));
    const rawEmployeeId = queryString(req.query.employee_id);
    const employeeId = parseId(rawEmployeeId);
    if (rawEmployeeId !== undefined && employeeId === undefined) {
      throw new ValidationError('Employee filter must be an employee id');
    }
    return { ...range, employeeId, order };
  }

  router.get('/admin', asyncRoute(async (req, res) => {
    const filter = reportFilter(req, 'DESC');
    const showDailyHours = req.query.show_daily_hours === '1';

    const records = await attendance.filterEvents(filter);
    const all = await employees.listEmployees();

    res.send(buildAdminHtml({
      records,
      dailyHours: showDailyHours && records.length ? calculateDailyHours(records) : null,
      employees: all,
      startDate: filter.startDate,
      endDate: filter.endDate,
      employeeId: filter.employeeId,
      showDailyHours,
      message: queryString(req.query.message),
    }));
  }));

  router.post('/employees', asyncRoute(async (req, res) => {
    const raw: unknown = req.body?.employee_name;
    const name = typeof raw === 'string' ? raw.trim() : '';
    if (!name) {
      res.redirect('/admin');
      return;
    }

    try {
      const employee = await employees.addEmployee(name);
      logger.info('Employee added', { employeeId: employee.id, name: employee.name });
      adminRedirect(res, `Employee '${employee.name}' was added.`);
    } catch (err) {
      if (!(err instanceof DuplicateEmployeeError)) throw err;
      adminRedirect(res, `Employee '${name}' already exists.`);
    }
  }));

  router.post('/employees/:employeeId/toggle', asyncRoute(async (req, res) => {
    const action: unknown = req.body?.action;
    if (action !== 'enable' && action !== 'disable') {
      res.redirect('/admin');
      return;
    }

    const employeeId = parseId(req.params.employeeId);
    try {
      if (employeeId === undefined) throw new EmployeeNotFoundError(req.params.employeeId);
      const employee = await employees.setActive(employeeId, action === 'enable');
      logger.info('Employee status changed', { employeeId, active: employee.isActive });
      adminRedirect(res, `Employee '${employee.name}' was ${action}d.`);
    } catch (err) {
      if (!(err instanceof EmployeeNotFoundError)) throw err;
      adminRedirect(res, 'Employee was not found.');
    }
  }));

  router.get('/export/csv', asyncRoute(async (req, res) => {
    const filter = reportFilter(req, 'ASC');
    const records = await attendance.filterEvents(filter);
    sendCsv(res, `attendance_report_${filter.startDate}_to_${filter.endDate}.csv`, eventsToCsv(records));
  }));

  router.get('/export/quarters.csv', asyncRoute(async (req, res) => {
    const filter = reportFilter(req, 'ASC');
    const records = await attendance.filterEvents(filter);
    sendCsv(
      res,
      `attendance_quarters_${filter.startDate}_to_${filter.endDate}.csv`,
      dailyHoursToCsv(calculateDailyHours(records)),
    );
  }));

  return router;
}
