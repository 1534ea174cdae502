export class AppError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class EmployeeNotFoundError extends AppError {
  constructor(public employeeId: number | string) {
    super(`Employee ${employeeId} was not found`, 404);
    this.name = 'EmployeeNotFoundError';
  }
}

export class DuplicateEmployeeError extends AppError {
  constructor(public employeeName: string) {
    super(`Employee '${employeeName}' already exists`, 409);
    this.name = 'DuplicateEmployeeError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}
