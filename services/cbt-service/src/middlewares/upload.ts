import multer from 'multer';
import type { Request, RequestHandler } from 'express';
import { ValidationError } from '@cbt/shared';
import type { UploadConfig } from '../config';
import type { UploadedFile } from '../services/upload.service';

/** Spreadsheets for bulk imports; parsed in memory, never stored. */
const MAX_SPREADSHEET_SIZE = 10 * 1024 * 1024;

export interface UploadMiddleware {
	/** multipart field `file`; question and explanation images */
	imageFile: RequestHandler;
	/** multipart field `image`, optional; forum posts */
	forumImage: RequestHandler;
	spreadsheet: RequestHandler;
}

export function createUploadMiddleware(config: UploadConfig): UploadMiddleware {
	const storage = multer.memoryStorage();
	const images = multer({ storage, limits: { fileSize: config.maxFileSize, files: 1 } });
	const sheets = multer({ storage, limits: { fileSize: MAX_SPREADSHEET_SIZE, files: 1 } });

	return {
		imageFile: images.single('file'),
		forumImage: images.single('image'),
		spreadsheet: sheets.single('file'),
	};
}

export function getUploadedFile(req: Request): UploadedFile | undefined {
	return req.file;
}

export function requireUploadedFile(req: Request): UploadedFile {
	const file = getUploadedFile(req);
	if (!file) {
		throw new ValidationError('No file uploaded');
	}
	return file;
}
