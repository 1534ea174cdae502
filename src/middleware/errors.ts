import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { Logger } from 'winston';
import { AppError } from '../errors';
import { buildErrorHtml } from '../templates/pages';

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Forwards a rejected handler promise to the error middleware. */
export function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      logger.warn(err.message, { path: req.originalUrl, statusCode: err.statusCode });
      res.status(err.statusCode).send(buildErrorHtml(err.statusCode, err.message));
      return;
    }
    logger.error('Unexpected error', { path: req.originalUrl, error: err instanceof Error ? err.stack : String(err) });
    res.status(500).send(buildErrorHtml(500, 'Something went wrong. Please try again later.'));
  };
}
