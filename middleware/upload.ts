import multer from 'multer';
import { Request, RequestHandler, Response } from 'express';
import { AppConfig } from '../config';
import {
  ApiError,
  FileTooLargeError,
  MalformedUploadError,
  MultiFilesUploadError,
} from '../Helper/ApiError';

// Any field name is accepted; a second file part aborts the parse.
export const createUploadMiddleware = (config: Pick<AppConfig, 'maxSize'>): RequestHandler => {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      files: 1,
      fileSize: config.maxSize,
    },
  }).any();
};

export const toUploadError = (error: unknown, maxSize: number): ApiError => {
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_COUNT') {
      return new MultiFilesUploadError();
    }
    if (error.code === 'LIMIT_FILE_SIZE') {
      return new FileTooLargeError(maxSize);
    }
    return new MalformedUploadError(error.message);
  }
  if (error instanceof ApiError) {
    return error;
  }
  return new MalformedUploadError(error instanceof Error ? error.message : String(error));
};

// Wrap multer middleware in a Promise
export const receiveFiles = (
  middleware: RequestHandler,
  maxSize: number,
  req: Request,
  res: Response
): Promise<Express.Multer.File[]> => {
  return new Promise((resolve, reject) => {
    middleware(req, res, (error?: unknown) => {
      if (error) {
        reject(toUploadError(error, maxSize));
        return;
      }
      resolve(Array.isArray(req.files) ? req.files : []);
    });
  });
};
