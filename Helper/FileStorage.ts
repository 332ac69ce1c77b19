import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../config';
import { UploadedFileRecord } from '../types';
import {
  FileNotFoundError,
  FileTooLargeError,
  FilenameNotProvidedError,
  ImagesDirectoryNotFoundError,
  InternalServerError,
  InvalidFilePathError,
  PermissionDeniedError,
  UnsupportedFileFormatError,
  hasErrorCode,
} from './ApiError';

export type StorageConfig = Pick<AppConfig, 'imagesDir' | 'maxSize' | 'supportedFormats' | 'imagesUrlPrefix'>;

export interface IncomingImage {
  originalname: string;
  buffer: Buffer;
  size: number;
}

/**
 * Owns the image directory. Every method either succeeds or throws an
 * `ApiError`; unexpected OS errors from listing are rethrown as they are.
 */
export class FileStorage {
  private readonly imagesDir: string;

  constructor(private readonly config: StorageConfig) {
    this.imagesDir = path.resolve(config.imagesDir);
  }

  async listImages(): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(this.imagesDir, { withFileTypes: true });
      return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      throw this.translateError(error) ?? error;
    }
  }

  async saveImage(file: IncomingImage): Promise<UploadedFileRecord> {
    const ext = path.extname(file.originalname).toLowerCase();
    if (!this.isSupportedFormat(ext)) {
      throw new UnsupportedFileFormatError();
    }
    if (file.size > this.config.maxSize) {
      throw new FileTooLargeError(this.config.maxSize);
    }

    const filename = this.generateUniqueFilename(ext);
    try {
      await fs.promises.writeFile(path.join(this.imagesDir, filename), file.buffer, { flag: 'wx' });
    } catch (error) {
      throw this.translateError(error) ?? new InternalServerError(this.describe(error));
    }

    return {
      filename,
      url: this.getImageUrl(filename),
      size: file.size,
    };
  }

  /**
   * Removes `filename` from the image directory and returns the absolute path
   * that was deleted. The name is checked against the supported formats and
   * must stay inside the image directory, symlinks included.
   */
  async deleteImage(filename: string): Promise<string> {
    if (!filename) {
      throw new FilenameNotProvidedError();
    }

    // path.extname and path.resolve both ignore a trailing separator
    if (/[\\/]$/.test(filename)) {
      throw new UnsupportedFileFormatError();
    }
    const filePath = this.resolveImagePath(filename);
    if (!this.isSupportedFormat(path.extname(filePath))) {
      throw new UnsupportedFileFormatError();
    }

    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) {
        throw new FileNotFoundError();
      }
    } catch (error) {
      if (error instanceof FileNotFoundError || hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        throw new FileNotFoundError();
      }
      throw this.translateError(error) ?? new InternalServerError(this.describe(error));
    }

    await this.assertRealPathInside(filePath);

    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new FileNotFoundError();
      }
      if (hasErrorCode(error, 'EACCES', 'EPERM')) {
        throw new PermissionDeniedError();
      }
      throw new InternalServerError(this.describe(error));
    }

    return filePath;
  }

  resolveImagePath(filename: string): string {
    if (filename.includes('\0')) {
      throw new InvalidFilePathError();
    }
    const filePath = path.resolve(this.imagesDir, filename);
    if (!this.isInside(this.imagesDir, filePath)) {
      throw new InvalidFilePathError();
    }
    return filePath;
  }

  getImageUrl(filename: string): string {
    return `${this.config.imagesUrlPrefix}/${encodeURIComponent(filename)}`;
  }

  isSupportedFormat(ext: string): boolean {
    return this.config.supportedFormats.has(ext.toLowerCase());
  }

  private async assertRealPathInside(filePath: string): Promise<void> {
    try {
      const [realRoot, realFile] = await Promise.all([
        fs.promises.realpath(this.imagesDir),
        fs.promises.realpath(filePath),
      ]);
      if (!this.isInside(realRoot, realFile)) {
        throw new InvalidFilePathError();
      }
    } catch (error) {
      if (error instanceof InvalidFilePathError) {
        throw error;
      }
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        throw new FileNotFoundError();
      }
      throw this.translateError(error) ?? new InternalServerError(this.describe(error));
    }
  }

  private isInside(root: string, target: string): boolean {
    const relative = path.relative(root, target);
    return relative !== ''
      && relative !== '..'
      && !relative.startsWith(`..${path.sep}`)
      && !path.isAbsolute(relative);
  }

  private translateError(error: unknown): ImagesDirectoryNotFoundError | PermissionDeniedError | null {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      return new ImagesDirectoryNotFoundError();
    }
    if (hasErrorCode(error, 'EACCES', 'EPERM')) {
      return new PermissionDeniedError();
    }
    return null;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  private generateUniqueFilename(ext: string): string {
    return `${uuidv4()}${ext}`;
  }
}
