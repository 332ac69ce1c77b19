import { Request, Response, NextFunction } from 'express';
import { Logger } from '../Helper/Logger';

export const requestLogger = (logger: Logger) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`, {
        method: req.method,
        endpoint: req.originalUrl,
        statusCode: res.statusCode,
        duration,
        ip: req.ip || '127.0.0.1',
        userAgent: req.get('user-agent'),
      });
    });

    next();
  };
};
