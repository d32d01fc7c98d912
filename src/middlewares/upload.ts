/**
 * Line-item CSV upload
 *
 * Files are stored on disk under UPLOADS_DIR so the batch worker can stream
 * them; the worker removes each file once its batch is done.
 */

import { Request } from 'express';
import multer from 'multer';
import { mkdir } from 'fs/promises';
import { randomUUID } from 'crypto';
import { env } from '../config';
import { AppError } from '../utils';

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const ALLOWED_MIME_TYPES = ['text/csv', 'application/csv', 'text/plain', 'application/vnd.ms-excel'];

const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    mkdir(env.UPLOADS_DIR, { recursive: true }).then(
      () => cb(null, env.UPLOADS_DIR),
      (error: Error) => cb(error, env.UPLOADS_DIR)
    );
  },
  filename: (_req, _file, cb) => {
    cb(null, `line_items_${Date.now()}-${randomUUID()}.csv`);
  },
});

/**
 * Accepts CSV by MIME type or extension; browsers disagree on the MIME type
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  const mimeTypeOk = ALLOWED_MIME_TYPES.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest('Only CSV files are allowed'));
  }
};

/**
 * Single `file` field, CSV only, 50MB max
 */
export const uploadLineItemCsv = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: MAX_UPLOAD_BYTES,
  },
}).single('file');

export default uploadLineItemCsv;
