import { DailyHours, EmployeeSummary, NextAction, ReportRow } from '../types';

export function escapeHtml(s: string | number | null | undefined) {
  if (s === null || s === undefined) return '';
  return String(s)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string, message?: string) {
  const flash = message ? `<div class="message">${escapeHtml(message)}</div>` : '';
  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial; background:#f8fafc; color:#0f172a; margin:0; padding:20px; }
    main { max-width: 960px; margin: 0 auto; background:#fff; border:1px solid #e6e9ee; border-radius:14px; padding:32px; }
    nav a { margin-right: 16px; color:#334155; }
    table { width:100%; border-collapse: collapse; margin: 16px 0; }
    th, td { border-bottom:1px solid #e6e9ee; padding:6px 8px; text-align:left; }
    .message { background:#ecfdf5; color:#065f46; padding:10px 14px; border-radius:8px; margin: 12px 0; }
    .employees a { display:block; padding:14px; margin:8px 0; background:#f1f5f9; border-radius:8px; font-size:20px; text-decoration:none; color:#0f172a; }
    .action { font-size:28px; padding:20px 48px; border:0; border-radius:12px; color:#fff; }
    .action-enter { background:#10b981; }
    .action-leave { background:#dc2626; }
    .inactive { color:#94a3b8; }
  </style>
</head>
<body>
  <main>
    <nav><a href="/">Employees</a><a href="/admin">Administration</a></nav>
    ${flash}
    ${body}
  </main>
</body>
</html>`;
}

export function buildHomeHtml(employees: EmployeeSummary[], message?: string) {
  const items = employees.length
    ? employees
        .map((e) => `<a href="/action/${e.id}">${escapeHtml(e.name)}</a>`)
        .join('\n')
    : '<p>No active employees.</p>';

  return layout('Attendance', `<h1>Select employee</h1><div class="employees">${items}</div>`, message);
}

export function buildActionHtml(state: NextAction) {
  const css = state.nextAction === 'Enter' ? 'action-enter' : 'action-leave';
  return layout(
    state.employeeName,
    `<h1>${escapeHtml(state.employeeName)}</h1>
    <form method="post" action="/record/${state.employeeId}">
      <input type="hidden" name="action" value="${state.nextAction}" />
      <button type="submit" class="action ${css}">${state.nextAction}</button>
    </form>`,
  );
}

export type AdminView = {
  records: ReportRow[];
  dailyHours: DailyHours[] | null;
  employees: EmployeeSummary[];
  startDate: string;
  endDate: string;
  employeeId?: number;
  showDailyHours: boolean;
  message?: string;
};

function reportQuery(view: AdminView) {
  const params = new URLSearchParams({ start_date: view.startDate, end_date: view.endDate });
  if (view.employeeId !== undefined) params.set('employee_id', String(view.employeeId));
  return params.toString();
}

function filterForm(view: AdminView) {
  const options = view.employees
    .map((e) => {
      const selected = e.id === view.employeeId ? ' selected' : '';
      return `<option value="${e.id}"${selected}>${escapeHtml(e.name)}</option>`;
    })
    .join('');

  return `<form method="get" action="/admin">
    <label>From <input type="date" name="start_date" value="${escapeHtml(view.startDate)}" /></label>
    <label>To <input type="date" name="end_date" value="${escapeHtml(view.endDate)}" /></label>
    <label>Employee <select name="employee_id"><option value="">All employees</option>${options}</select></label>
    <label><input type="checkbox" name="show_daily_hours" value="1"${view.showDailyHours ? ' checked' : ''} /> Daily hours</label>
    <button type="submit">Filter</button>
  </form>
  <p>
    <a href="/export/csv?${reportQuery(view)}">Export CSV</a>
    <a href="/export/quarters.csv?${reportQuery(view)}">Export daily hours CSV</a>
  </p>`;
}

function recordsTable(records: ReportRow[]) {
  if (!records.length) return '<p>No records for the selected period.</p>';
  const rows = records
    .map(
      (r) =>
        `<tr><td>${escapeHtml(r.employeeName)}</td><td>${r.status}</td><td>${escapeHtml(r.date)}</td><td>${escapeHtml(r.time)}</td></tr>`,
    )
    .join('\n');
  return `<table><thead><tr><th>Employee Name</th><th>Status</th><th>Date</th><th>Time</th></tr></thead><tbody>${rows}</tbody></table>`;
}

function dailyHoursTable(days: DailyHours[]) {
  const rows = days
    .map(
      (d) =>
        `<tr><td>${escapeHtml(d.employeeName)}</td><td>${escapeHtml(d.date)}</td><td>${d.actualHours}</td><td>${d.quarterHours}</td></tr>`,
    )
    .join('\n');
  return `<h2>Daily hours</h2>
  <table><thead><tr><th>Employee Name</th><th>Date</th><th>Worked Hours</th><th>Quarter Hours</th></tr></thead><tbody>${rows}</tbody></table>`;
}

function rosterSection(employees: EmployeeSummary[]) {
  const rows = employees
    .map((e) => {
      const action = e.isActive ? 'disable' : 'enable';
      return `<tr class="${e.isActive ? '' : 'inactive'}"><td>${escapeHtml(e.name)}</td><td>${e.isActive ? 'Active' : 'Disabled'}</td>
        <td><form method="post" action="/employees/${e.id}/toggle"><input type="hidden" name="action" value="${action}" /><button type="submit">${action === 'disable' ? 'Disable' : 'Enable'}</button></form></td></tr>`;
    })
    .join('\n');

  return `<h2>Employees</h2>
  <form method="post" action="/employees">
    <input type="text" name="employee_name" placeholder="Employee name" required />
    <button type="submit">Add employee</button>
  </form>
  <table><tbody>${rows}</tbody></table>`;
}

export function buildAdminHtml(view: AdminView) {
  const daily = view.dailyHours ? dailyHoursTable(view.dailyHours) : '';
  return layout(
    'Administration',
    `<h1>Attendance report</h1>
    ${filterForm(view)}
    ${daily}
    ${recordsTable(view.records)}
    ${rosterSection(view.employees)}`,
    view.message,
  );
}

export function buildErrorHtml(statusCode: number, message: string) {
  return layout(`Error ${statusCode}`, `<h1>Error ${statusCode}</h1><p>${escapeHtml(message)}</p>`);
}
