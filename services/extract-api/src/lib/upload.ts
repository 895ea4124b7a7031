/**
 * Upload handling
 *
 * Accepts one multipart file under the field "file", checks its name before
 * anything is written, and stores it in the upload directory under a
 * unique name.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer, { type FileFilterCallback } from 'multer';
import { ulid } from 'ulid';
import { AppError, errorMessage, logger, type Config } from '@finsheet/shared';
import { isSupportedExtension } from './text';

export const UPLOAD_FIELD = 'file';

/**
 * Lower-cased text after the last dot, or '' when the name has none.
 */
export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

/**
 * Reject names the service can never process.
 */
export function checkUploadName(filename: string): void {
  if (filename === '') {
    throw new AppError('empty_filename', 'No file selected');
  }
  if (!isSupportedExtension(fileExtension(filename))) {
    throw new AppError('unsupported_type', 'Only PDF, TXT, and DOCX files are supported');
  }
}

function uploadFailure(error: unknown, config: Config): unknown {
  if (!(error instanceof multer.MulterError)) {
    return error;
  }

  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return new AppError(
        'file_too_large',
        `File exceeds the ${Math.round(config.maxUploadBytes / (1024 * 1024))} MB upload limit`,
        { cause: error }
      );
    case 'LIMIT_UNEXPECTED_FILE':
      return new AppError('no_file', 'No file provided', { cause: error });
    default:
      return new AppError('invalid_upload', `Invalid upload: ${error.message}`, { cause: error });
  }
}

export function createUploadMiddleware(config: Config): RequestHandler {
  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, file, cb) => {
      const extension = fileExtension(file.originalname);
      cb(null, `${ulid()}.${extension}`);
    },
  });

  const upload = multer({
    storage,
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
    fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
      try {
        checkUploadName(file.originalname);
        cb(null, true);
      } catch (error) {
        cb(error instanceof Error ? error : new Error(String(error)));
      }
    },
  }).single(UPLOAD_FIELD);

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error?: unknown) => {
      if (error) {
        logger.warn('Upload rejected', {
          error: errorMessage(error),
        });
        next(uploadFailure(error, config));
        return;
      }

      if (!req.file) {
        next(new AppError('no_file', 'No file provided'));
        return;
      }

      logger.info('File uploaded', {
        original_name: req.file.originalname,
        stored_as: req.file.filename,
        size_bytes: req.file.size,
      });

      next();
    });
  };
}
