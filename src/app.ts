import express from 'express';
import { DataSource } from 'typeorm';
import { Logger } from 'winston';
import { AppConfig } from './config';
import { basicAuth } from './middleware/auth';
import { errorHandler } from './middleware/errors';
import clockRouter from './routes/clock';
import adminRouter from './routes/admin';

export function createApp(dataSource: DataSource, config: AppConfig, logger: Logger) {
  const app = express();
  app.use(express.urlencoded({ extended: false }));
  app.use(basicAuth({ username: config.username, password: config.password }));

  app.use(clockRouter(dataSource, config.timezone, logger));
  app.use(adminRouter(dataSource, config.timezone, logger));

  app.use(errorHandler(logger));
  return app;
}
