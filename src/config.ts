import dotenv from 'dotenv';
import path from 'path';
import moment from 'moment-timezone';

dotenv.config({ path: path.resolve(process.cwd(), './.env') });

export type AppConfig = {
  username: string;
  password: string;
  databasePath: string;
  timezone: string;
  host: string;
  port: number;
  runMigrations: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timezone = env.TIMEZONE || 'Europe/Prague';
  if (!moment.tz.zone(timezone)) {
    throw new Error(`Unknown TIMEZONE: ${timezone}`);
  }

  const port = env.PORT ? Number(env.PORT) : 5000;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    username: env.ATTENDANCE_USERNAME || 'admin',
    password: env.ATTENDANCE_PASSWORD || 'password',
    databasePath: env.DATABASE || 'attendance.db',
    timezone,
    host: env.HOST || '127.0.0.1',
    port,
    runMigrations: env.RUN_MIGRATIONS_ON_START !== 'false',
  };
}
