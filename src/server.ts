import 'reflect-metadata';
import { loadConfig } from './config';
import { createDataSource } from './ormconfig';
import { createApp } from './app';
import { createLogger } from './utils/logger';

const logger = createLogger('attendance');

async function main() {
  const config = loadConfig();
  const dataSource = createDataSource(config.databasePath);

  await dataSource.initialize();
  logger.info('DB initialized', { database: config.databasePath });

  if (config.runMigrations) {
    logger.info('Running migrations...');
    await dataSource.runMigrations();
    logger.info('Migrations complete');
  }

  const app = createApp(dataSource, config, logger);
  app.listen(config.port, config.host, () =>
    logger.info(`Server listening at http://${config.host}:${config.port}`, { timezone: config.timezone }),
  );
}

main().catch((err) => {
  logger.error('Startup error', { error: err instanceof Error ? err.stack : String(err) });
  process.exit(1);
});
