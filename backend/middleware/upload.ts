/**
 * Multipart image upload middleware
 * Keeps the file in memory; it is decoded and fingerprinted, never written to disk.
 */

import multer from 'multer';
import type { RequestHandler } from 'express';
import { BadImageError } from '../utils/errorHandler.js';

export function createImageUpload(maxImageSizeMB: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: Math.floor(maxImageSizeMB * 1024 * 1024), files: 1 },
    fileFilter: (_req, file, cb) => {
      if (file.mimetype.startsWith('image/')) {
        cb(null, true);
      } else {
        cb(new BadImageError(`Only image files are allowed (got ${file.mimetype})`));
      }
    }
  });

  const single = upload.single('image');

  // Multer limit errors are the client's fault
  return (req, res, next) => {
    single(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        next(new BadImageError(err.message, { cause: err }));
        return;
      }
      next(err);
    });
  };
}
