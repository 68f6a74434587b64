import { configureLogger, loadEnvironment, logServiceStart, logServiceStop } from '@cbt/shared';
import logger from '@cbt/shared/config/logger';
import { loadCbtConfig } from './config';
import { createDatabase, initializeCbtTables } from './config/database';
import { createApp, createServices } from './app';

async function start() {
	loadEnvironment();
	const config = loadCbtConfig();
	configureLogger({ serviceName: config.serviceName, level: config.logLevel, environment: config.nodeEnv });

	const database = createDatabase(config);
	await initializeCbtTables(database.pool);

	const services = createServices(config, database);
	await services.users.ensureAdmin(config.admin);

	const app = createApp(config, database, services);
	const server = app.listen(config.port, () => logServiceStart('CBT Service', config.port));

	server.on('error', (err: NodeJS.ErrnoException) => {
		logger.error(err.code === 'EADDRINUSE' ? `Port ${config.port} is already in use` : 'Server error', {
			port: config.port,
			error: err.message,
			code: err.code,
		});
		process.exit(1);
	});

	// Graceful shutdown handler
	const gracefulShutdown = (signal: string) => {
		logger.info(`Received ${signal}, starting graceful shutdown`);

		server.close(() => {
			logServiceStop('CBT Service', config.port);
			database.pool
				.end()
				.then(() => process.exit(0))
				.catch((error: unknown) => {
					logger.error('Failed to close database pool', {
						error: error instanceof Error ? error.message : String(error),
					});
					process.exit(1);
				});
		});

		// Force shutdown after 30 seconds
		setTimeout(() => {
			logger.error('Forced shutdown after timeout');
			process.exit(1);
		}, 30000).unref();
	};

	process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
	process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((error: unknown) => {
	logger.error('Failed to start CBT Service', {
		error: error instanceof Error ? error.message : String(error),
	});
	process.exit(1);
});
