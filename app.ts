import express, { Application, ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { AppConfig } from './config';
import { FileStorage } from './Helper/FileStorage';
import { Logger } from './Helper/Logger';
import { sendJsonError } from './Helper/MyRequestHandler';
import { requestLogger } from './middleware/requestLogger';
import { createUploadMiddleware } from './middleware/upload';
import { createImageRoutes } from './routes/ImageRoutes';
import { buildRouteTable, dispatch } from './routes';

export interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  storage?: FileStorage;
}

export const createApp = ({ config, logger, storage = new FileStorage(config) }: AppDependencies): Application => {
  const app: Application = express();
  app.disable('x-powered-by');

  app.use(requestLogger(logger));

  const routes = createImageRoutes({
    config,
    storage,
    logger,
    upload: createUploadMiddleware(config),
  });
  app.use(dispatch(buildRouteTable(routes), logger));

  const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method,
    });

    if (res.headersSent) {
      return next(err);
    }
    sendJsonError(req, res, logger, 500, 'Internal server error');
  };
  app.use(errorHandler);

  return app;
};
