export const ATTENDANCE_STATUSES = ['Enter', 'Leave'] as const;

export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

export function isAttendanceStatus(value: unknown): value is AttendanceStatus {
  return value === 'Enter' || value === 'Leave';
}

export type EmployeeSummary = {
  id: number;
  name: string;
  isActive: boolean;
};

export type NextAction = {
  employeeId: number;
  employeeName: string;
  nextAction: AttendanceStatus;
};

export type RecordedEvent = {
  id: number;
  employeeId: number;
  employeeName: string;
  status: AttendanceStatus;
  timestamp: string;
};

export type ReportRow = {
  employeeName: string;
  status: AttendanceStatus;
  date: string; // YYYY-MM-DD
  time: string; // HH:mm:ss
};

export type ReportFilter = {
  startDate: string;
  endDate: string;
  employeeId?: number;
  order?: 'ASC' | 'DESC';
};

export type DailyHours = {
  employeeName: string;
  date: string;
  actualHours: string; // H:MM
  quarterHours: string; // H:MM
};
