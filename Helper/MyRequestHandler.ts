import { Request, Response } from 'express';
import { Logger } from './Logger';
import { ApiError } from './ApiError';
import { RouteHandler } from './RouteTable';
import { ErrorResponse } from '../types';

export const sendJsonError = (
  req: Request,
  res: Response,
  logger: Logger,
  statusCode: number,
  message: string
): void => {
  const line = `${req.method} ${req.originalUrl} -> ${statusCode}: ${message}`;
  if (statusCode >= 500) {
    logger.error(line);
  } else {
    logger.warn(line);
  }

  const body: ErrorResponse = { detail: message };
  res.status(statusCode).json(body);
};

/**
 * Request boundary: `ApiError`s go back to the client as they are, anything
 * else becomes a 500.
 */
export const MyRequestHandler = (logger: Logger, handler: RouteHandler): RouteHandler => {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      await handler(req, res);
    } catch (error) {
      if (res.headersSent) {
        logger.error('Error after response was sent', {
          error: error instanceof Error ? error.message : String(error),
          path: req.path,
          method: req.method,
        });
        return;
      }
      if (error instanceof ApiError) {
        sendJsonError(req, res, logger, error.statusCode, error.message);
        return;
      }
      logger.error('Unhandled error in request handler', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        path: req.path,
        method: req.method,
      });
      sendJsonError(req, res, logger, 500, 'Internal server error');
    }
  };
};
