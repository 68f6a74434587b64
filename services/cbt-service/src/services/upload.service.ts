/**
 * Upload Service - validated image storage on local disk
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '@cbt/shared';
import logger from '@cbt/shared/config/logger';
import { UploadConfig } from '../config';

export type ImageKind = 'question' | 'explanation' | 'forum';

/** The parts of a multer file the storage needs. */
export interface UploadedFile {
  originalname: string;
  buffer: Buffer;
  size: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class UploadService {
  constructor(private config: UploadConfig) {}

  directoryFor(kind: ImageKind): string {
    switch (kind) {
      case 'question':
        return this.config.questionImageDir;
      case 'explanation':
        return this.config.explanationImageDir;
      case 'forum':
        return this.config.forumImageDir;
    }
  }

  /**
   * Returns the lower-cased extension when the file is an allowed image within the size limit.
   */
  validateImage(file: UploadedFile): string {
    const extension = path.extname(file.originalname).toLowerCase();
    if (!this.config.allowedExtensions.includes(extension)) {
      throw new ValidationError(
        `File type not allowed. Allowed types: ${this.config.allowedExtensions.join(', ')}`
      );
    }
    if (file.size > this.config.maxFileSize) {
      throw new ValidationError(
        `File too large. Maximum size: ${Math.floor(this.config.maxFileSize / (1024 * 1024))}MB`
      );
    }
    return extension;
  }

  /**
   * Store under a fresh uuid name; returns the stored path (forward slashes).
   */
  async saveImage(kind: ImageKind, file: UploadedFile): Promise<string> {
    const extension = this.validateImage(file);
    const directory = this.directoryFor(kind);
    await fs.mkdir(directory, { recursive: true });

    const storedPath = path.posix.join(directory.split(path.sep).join('/'), `${uuidv4()}${extension}`);
    await fs.writeFile(storedPath, file.buffer);
    logger.debug('Image stored', { kind, path: storedPath, size: file.size });
    return storedPath;
  }

  /**
   * Remove a stored image. A file that is already gone is not an error.
   */
  async removeImage(storedPath: string): Promise<void> {
    try {
      await fs.unlink(storedPath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      logger.warn('Image already removed', { path: storedPath });
    }
  }
}
