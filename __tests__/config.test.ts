import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      username: 'admin',
      password: 'password',
      databasePath: 'attendance.db',
      timezone: 'Europe/Prague',
      host: '127.0.0.1',
      port: 5000,
      runMigrations: true,
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      ATTENDANCE_USERNAME: 'clock',
      ATTENDANCE_PASSWORD: 'test-secret',
      DATABASE: 'data/attendance.db',
      TIMEZONE: 'UTC',
      HOST: '0.0.0.0',
      PORT: '8080',
      RUN_MIGRATIONS_ON_START: 'false',
    });

    expect(config).toEqual({
      username: 'clock',
      password: 'test-secret',
      databasePath: 'data/attendance.db',
      timezone: 'UTC',
      host: '0.0.0.0',
      port: 8080,
      runMigrations: false,
    });
  });

  it('rejects an unknown timezone', () => {
    expect(() => loadConfig({ TIMEZONE: 'Mars/Olympus' })).toThrow('Unknown TIMEZONE: Mars/Olympus');
  });

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ PORT: 'http' })).toThrow('Invalid PORT: http');
  });
});
