/**
 * An error that already knows how it should be answered. The request boundary
 * sends `statusCode` and `message` to the client unchanged.
 */
export class ApiError extends Error {
  constructor(public readonly statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class RouteNotFoundError extends ApiError {
  constructor() {
    super(404, 'Not found');
  }
}

export class BadContentTypeError extends ApiError {
  constructor() {
    super(400, "Bad request: Expected 'multipart/form-data'.");
  }
}

export class MalformedUploadError extends ApiError {
  constructor(reason: string) {
    super(400, `Bad request: ${reason}`);
  }
}

export class MultiFilesUploadError extends ApiError {
  constructor() {
    super(400, 'Only one file can be uploaded per request.');
  }
}

export class NoFileProvidedError extends ApiError {
  constructor() {
    super(400, 'No file provided.');
  }
}

export class UnsupportedFileFormatError extends ApiError {
  constructor() {
    super(400, 'Unsupported file format.');
  }
}

export class FileTooLargeError extends ApiError {
  constructor(maxSize: number) {
    super(413, `File size exceeds the maximum allowed size of ${maxSize} bytes.`);
  }
}

export class FilenameNotProvidedError extends ApiError {
  constructor() {
    super(400, 'Filename not provided.');
  }
}

export class InvalidFilePathError extends ApiError {
  constructor() {
    super(400, 'Invalid file path.');
  }
}

export class FileNotFoundError extends ApiError {
  constructor() {
    super(404, 'File not found.');
  }
}

export class NoImagesFoundError extends ApiError {
  constructor() {
    super(404, 'No images found.');
  }
}

export class ImagesDirectoryNotFoundError extends ApiError {
  constructor() {
    super(500, 'Images directory not found.');
  }
}

export class PermissionDeniedError extends ApiError {
  constructor() {
    super(500, 'Permission denied.');
  }
}

export class InternalServerError extends ApiError {
  constructor(reason: string) {
    super(500, `Internal server error: ${reason}`);
  }
}

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const hasErrorCode = (error: unknown, ...codes: string[]): boolean =>
  isErrnoException(error) && typeof error.code === 'string' && codes.includes(error.code);
