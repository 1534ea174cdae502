import { Router } from 'express';
import { DataSource } from 'typeorm';
import { Logger } from 'winston';
import { AttendanceService } from '../services/attendance';
import { EmployeeService } from '../services/employees';
import { EmployeeNotFoundError } from '../errors';
import { isAttendanceStatus } from '../types';
import { timestampTime } from '../utils/timezone';
import { asyncRoute } from '../middleware/errors';
import { buildActionHtml, buildHomeHtml } from '../templates/pages';
import { parseId, queryString } from './params';

export default function clockRouter(dataSource: DataSource, timezone: string, logger: Logger) {
  const router = Router();
  const attendance = new AttendanceService(dataSource, timezone);
  const employees = new EmployeeService(dataSource);

  router.get('/', asyncRoute(async (req, res) => {
    const list = await employees.listActiveEmployees();
    res.send(buildHomeHtml(list, queryString(req.query.message)));
  }));

  router.get('/action/:employeeId', asyncRoute(async (req, res) => {
    const employeeId = parseId(req.params.employeeId);
    if (employeeId === undefined) throw new EmployeeNotFoundError(req.params.employeeId);

    const state = await attendance.resolveNextAction(employeeId);
    res.send(buildActionHtml(state));
  }));

  router.post('/record/:employeeId', asyncRoute(async (req, res) => {
    const employeeId = parseId(req.params.employeeId);
    if (employeeId === undefined) throw new EmployeeNotFoundError(req.params.employeeId);

    const action: unknown = req.body?.action;
    if (!isAttendanceStatus(action)) {
      res.redirect(`/action/${employeeId}`);
      return;
    }

    const event = await attendance.recordEvent(employeeId, action);
    logger.info('Attendance recorded', { employeeId, status: event.status, timestamp: event.timestamp });

    const message = `${event.employeeName}: ${event.status} recorded at ${timestampTime(event.timestamp)}`;
    res.redirect(`/?message=${encodeURIComponent(message)}`);
  }));

  return router;
}
