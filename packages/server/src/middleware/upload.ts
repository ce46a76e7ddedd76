import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import {
  PayloadTooLargeError,
  UnsupportedMediaTypeError,
  ValidationError,
} from '../types/errors.js';

export const IMAGE_CONTENT_TYPES = ['image/png', 'image/jpeg', 'image/gif', 'image/webp'] as const;
export const OCR_CONTENT_TYPES = [...IMAGE_CONTENT_TYPES, 'image/tiff'] as const;

export interface SingleUploadOptions {
  field: string;
  maxBytes: number;
  allowedTypes: readonly string[];
  required: boolean;
}

/**
 * One in-memory file upload. Size and type are checked while the body
 * streams in, so a rejected file never reaches the route handler.
 */
export function singleUpload(options: SingleUploadOptions) {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxBytes, files: 1 },
    fileFilter: (_req, file, callback) => {
      if (options.allowedTypes.includes(file.mimetype)) {
        callback(null, true);
        return;
      }
      callback(new UnsupportedMediaTypeError(file.mimetype, options.allowedTypes));
    },
  }).single(options.field);

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError) {
        next(
          error.code === 'LIMIT_FILE_SIZE'
            ? new PayloadTooLargeError(options.maxBytes)
            : new ValidationError(error.message)
        );
        return;
      }
      if (error) {
        next(error);
        return;
      }
      if (options.required && !req.file) {
        next(new ValidationError(`No file uploaded in field "${options.field}"`));
        return;
      }
      next();
    });
  };
}
