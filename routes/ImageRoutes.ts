import { Request, RequestHandler, Response } from 'express';
import typeis from 'type-is';
import { AppConfig } from '../config';
import { FileStorage } from '../Helper/FileStorage';
import { Logger } from '../Helper/Logger';
import { MyRequestHandler } from '../Helper/MyRequestHandler';
import { RouteHandler } from '../Helper/RouteTable';
import {
  BadContentTypeError,
  FilenameNotProvidedError,
  InvalidFilePathError,
  NoFileProvidedError,
  NoImagesFoundError,
  RouteNotFoundError,
} from '../Helper/ApiError';
import { receiveFiles } from '../middleware/upload';
import { DeleteResponse, UploadedFileRecord, WelcomeResponse } from '../types';

export const UPLOAD_PATH = '/upload/';
export const WELCOME_MESSAGE = 'Welcome to the Image Hosting Server';

export interface ImageRouteDependencies {
  config: Pick<AppConfig, 'maxSize'>;
  storage: FileStorage;
  logger: Logger;
  upload: RequestHandler;
}

export interface ImageRoutes {
  healthCheck: RouteHandler;
  listImages: RouteHandler;
  uploadImage: RouteHandler;
  deleteImage: RouteHandler;
}

const decodeFilename = (raw: string): string => {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new InvalidFilePathError();
  }
};

export const createImageRoutes = ({ config, storage, logger, upload }: ImageRouteDependencies): ImageRoutes => {
  const healthCheck = async (_req: Request, res: Response): Promise<void> => {
    logger.info('Healthcheck endpoint hit: /');
    const body: WelcomeResponse = { message: WELCOME_MESSAGE };
    res.status(200).json(body);
  };

  const listImages = async (_req: Request, res: Response): Promise<void> => {
    const files = await storage.listImages();
    if (files.length === 0) {
      throw new NoImagesFoundError();
    }

    logger.info(`Returned list of ${files.length} uploaded images.`);
    res.status(200).json(files);
  };

  const uploadImage = async (req: Request, res: Response): Promise<void> => {
    // req.is() answers null for a request without a body, so read the header
    if (!typeis.is(req.headers['content-type'] ?? '', ['multipart/form-data'])) {
      throw new BadContentTypeError();
    }
    if (!typeis.hasBody(req) || req.headers['content-length'] === '0') {
      throw new NoFileProvidedError();
    }

    const [file] = await receiveFiles(upload, config.maxSize, req, res);
    if (!file) {
      throw new NoFileProvidedError();
    }

    const saved: UploadedFileRecord = await storage.saveImage(file);
    logger.info(`File '${saved.filename}' uploaded successfully.`, { size: saved.size });
    res.status(200).json(saved);
  };

  const deleteImage = async (req: Request, res: Response): Promise<void> => {
    if (!req.path.startsWith(UPLOAD_PATH)) {
      throw new RouteNotFoundError();
    }

    const raw = req.path.slice(UPLOAD_PATH.length);
    if (!raw) {
      throw new FilenameNotProvidedError();
    }

    const deletedPath = await storage.deleteImage(decodeFilename(raw));
    logger.info(`File '${deletedPath}' deleted successfully.`);
    const body: DeleteResponse = { message: `File '${deletedPath}' deleted successfully.` };
    res.status(200).json(body);
  };

  return {
    healthCheck: MyRequestHandler(logger, healthCheck),
    listImages: MyRequestHandler(logger, listImages),
    uploadImage: MyRequestHandler(logger, uploadImage),
    deleteImage: MyRequestHandler(logger, deleteImage),
  };
};
