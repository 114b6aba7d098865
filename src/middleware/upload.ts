import multer from 'multer';
import { Request, Response, NextFunction } from 'express';
import * as path from 'path';
import * as fs from 'fs';
import type { UploadedFile } from '../types/job';
import { httpErrors } from './errorHandler';

export const UPLOAD_PREFIX = 'replay-upload-';

const ALLOWED_MIME_TYPES = [
  'text/csv',
  'text/plain',
  'application/csv',
  'application/vnd.ms-excel', // Some systems report CSV as this
];

const ALLOWED_EXTENSIONS = ['.csv', '.txt'];

/**
 * File filter to accept CSV and TXT files
 */
const fileFilter = (
  req: Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
): void => {
  const ext = path.extname(file.originalname).toLowerCase();

  if (ALLOWED_MIME_TYPES.includes(file.mimetype) || ALLOWED_EXTENSIONS.includes(ext)) {
    cb(null, true);
  } else {
    cb(httpErrors.badRequest('Only CSV and TXT files are allowed'));
  }
};

/**
 * Express middleware storing the `datafile` field under storageDir
 */
export function createUploadMiddleware(storageDir: string) {
  if (!fs.existsSync(storageDir)) {
    fs.mkdirSync(storageDir, { recursive: true });
  }

  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      cb(null, storageDir);
    },
    filename: (req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      const ext = path.extname(file.originalname).toLowerCase() || '.csv';
      cb(null, UPLOAD_PREFIX + uniqueSuffix + ext);
    },
  });

  const upload = multer({
    storage,
    fileFilter,
    limits: {
      fileSize: 1024 * 1024 * 1024, // 1GB limit
    },
  }).single('datafile');

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (err: unknown) => {
      if (err) {
        return next(err);
      }
      if (!req.file) {
        return next(httpErrors.badRequest('No file uploaded'));
      }
      next();
    });
  };
}

/**
 * The file stored by the upload middleware for this request
 */
export function getUploadedFile(req: Request): UploadedFile {
  if (!req.file) {
    throw httpErrors.badRequest('No file uploaded');
  }
  return { filePath: req.file.path, originalName: req.file.originalname };
}

/**
 * Remove uploads older than maxAgeMs (orphans left behind by a crash)
 */
export function cleanupOldUploads(storageDir: string, maxAgeMs: number): number {
  if (!fs.existsSync(storageDir)) {
    return 0;
  }

  const now = Date.now();
  let cleanedCount = 0;

  for (const file of fs.readdirSync(storageDir)) {
    if (!file.startsWith(UPLOAD_PREFIX)) {
      continue; // Skip non-upload files
    }

    const filePath = path.join(storageDir, file);
    try {
      const stats = fs.statSync(filePath);
      if (now - stats.mtimeMs > maxAgeMs) {
        fs.unlinkSync(filePath);
        cleanedCount++;
      }
    } catch (err) {
      console.error(`[Cleanup] Error processing file ${file}:`, err);
    }
  }

  if (cleanedCount > 0) {
    console.log(`[Cleanup] Removed ${cleanedCount} orphaned file(s) from storage`);
  }

  return cleanedCount;
}
