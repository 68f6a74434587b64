import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import logger from './logger';

/**
 * Walk up from startDir looking for a .env file.
 */
export function findEnvPath(startDir = process.cwd()): string | null {
	let current = startDir;
	while (true) {
		const candidate = path.join(current, '.env');
		if (fs.existsSync(candidate)) {
			return candidate;
		}
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	return null;
}

/**
 * Load the nearest .env into process.env. Variables already set win.
 * Call from runtime entrypoints only.
 */
export function loadEnvironment(startDir?: string): string | null {
	const resolvedEnvPath = findEnvPath(startDir);

	if (!resolvedEnvPath) {
		logger.warn('⚠️ .env file not found in current or parent directories, using process environment');
		return null;
	}

	const result = dotenv.config({ path: resolvedEnvPath });
	if (result.error) {
		logger.warn('⚠️ Failed to load .env file, falling back to process environment', {
			error: result.error.message,
		});
		return null;
	}

	logger.info(`✅ Environment variables loaded from ${resolvedEnvPath}`);
	return resolvedEnvPath;
}
