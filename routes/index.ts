import { NextFunction, Request, Response } from 'express';
import { Logger } from '../Helper/Logger';
import { RouteTable } from '../Helper/RouteTable';
import { sendJsonError } from '../Helper/MyRequestHandler';
import { ImageRoutes, UPLOAD_PATH } from './ImageRoutes';

export const buildRouteTable = (routes: ImageRoutes): RouteTable => {
  return new RouteTable()
    .get('/', routes.healthCheck)
    .get(UPLOAD_PATH, routes.listImages)
    .post(UPLOAD_PATH, routes.uploadImage)
    .delete(UPLOAD_PATH, routes.deleteImage);
};

export const dispatch = (table: RouteTable, logger: Logger) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const match = table.match(req.method, req.path);
    if (!match) {
      sendJsonError(req, res, logger, 404, 'Not found');
      return;
    }
    match.handler(req, res).catch(next);
  };
};
