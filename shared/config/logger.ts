/**
 * Shared Logger Configuration
 * Timestamps, service name, HTTP request context and error details on every line
 */

import winston from "winston";
import { Request, Response } from "express";

type LogMeta = Record<string, unknown>;

// Custom log levels
const logLevels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

// Custom colors for each level
const logColors = {
    error: "red",
    warn: "yellow",
    info: "green",
    http: "magenta",
    debug: "cyan",
};

winston.addColors(logColors);

const RESERVED_KEYS = ["timestamp", "level", "message", "service", "port", "method", "url", "statusCode", "error"];

function describeError(error: unknown): string {
    if (error instanceof Error) {
        let text = `\n  Error: ${error.message}`;
        if (error.stack && process.env.NODE_ENV === "development") {
            text += `\n  Stack: ${error.stack}`;
        }
        return text;
    }
    return `\n  Error: ${JSON.stringify(error)}`;
}

// Custom format for console output
const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.colorize({ all: true }),
    winston.format.printf(({ timestamp, level, message, service, port, method, url, statusCode, error, ...meta }) => {
        let logMessage = `[${String(timestamp)}]`;

        if (service) {
            logMessage += ` [${String(service)}]`;
        }

        if (port) {
            logMessage += ` [Port:${String(port)}]`;
        }

        if (method && url) {
            logMessage += ` [${String(method)} ${String(url)}]`;
        }

        if (statusCode) {
            logMessage += ` [Status:${String(statusCode)}]`;
        }

        logMessage += ` ${level}: ${String(message)}`;

        if (error) {
            logMessage += describeError(error);
        }

        const metaKeys = Object.keys(meta).filter((key) => !RESERVED_KEYS.includes(key));
        if (metaKeys.length > 0) {
            logMessage += `\n  Meta: ${JSON.stringify(Object.fromEntries(metaKeys.map((k) => [k, meta[k]])))}`;
        }

        return logMessage;
    })
);

// Structured format (no colors) for production log shipping
const jsonFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

const outputFormat = process.env.NODE_ENV === "production" ? jsonFormat : consoleFormat;

const logger = winston.createLogger({
    levels: logLevels,
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "production" ? "info" : "debug"),
    format: jsonFormat,
    // Jest sets NODE_ENV=test; keep test output clean
    silent: process.env.NODE_ENV === "test",
    defaultMeta: {
        service: "unknown-service",
        environment: process.env.NODE_ENV || "development",
    },
    transports: [new winston.transports.Console({ format: outputFormat })],
    exceptionHandlers: [new winston.transports.Console({ format: outputFormat })],
    rejectionHandlers: [new winston.transports.Console({ format: outputFormat })],
});

/**
 * Apply service-level settings once the service config has been loaded.
 */
export const configureLogger = (options: { serviceName: string; level: string; environment: string }) => {
    logger.level = options.level;
    logger.defaultMeta = {
        service: options.serviceName,
        environment: options.environment,
    };
};

/**
 * Log service startup
 */
export const logServiceStart = (serviceName: string, port: number) => {
    logger.info(`🚀 ${serviceName} started successfully`, {
        service: serviceName,
        port,
        timestamp: new Date().toISOString(),
    });
};

/**
 * Log service shutdown
 */
export const logServiceStop = (serviceName: string, port: number) => {
    logger.info(`🛑 ${serviceName} stopped`, {
        service: serviceName,
        port,
        timestamp: new Date().toISOString(),
    });
};

/**
 * Log a finished API request
 */
export const logApiRequest = (req: Request, res: Response, responseTime?: number) => {
    const logData: LogMeta = {
        method: req.method,
        url: req.originalUrl || req.url,
        ip: req.ip || req.socket.remoteAddress,
        userAgent: req.get("user-agent"),
        statusCode: res.statusCode,
        correlationId: req.get("x-correlation-id"),
    };

    if (responseTime !== undefined) {
        logData.responseTime = `${responseTime}ms`;
    }

    if (res.statusCode >= 400) {
        logger.warn(`API Request`, logData);
    } else {
        logger.http(`API Request`, logData);
    }
};

/**
 * Log API error
 * Client errors (4xx) are logged as warnings, server errors (5xx) as errors
 */
export const logApiError = (
    error: Error,
    req: Request,
    statusCode: number = 500
) => {
    const logData = {
        method: req.method,
        url: req.originalUrl || req.url,
        statusCode,
        correlationId: req.get("x-correlation-id"),
        error: {
            name: error.name,
            message: error.message,
            stack: process.env.NODE_ENV === "development" ? error.stack : undefined,
        },
        ip: req.ip || req.socket.remoteAddress,
        userAgent: req.get("user-agent"),
    };

    if (statusCode >= 400 && statusCode < 500) {
        logger.warn(`API Error: ${error.message}`, logData);
    } else {
        logger.error(`API Error: ${error.message}`, logData);
    }
};

/**
 * Log database operation
 */
export const logDatabaseOperation = (
    operation: string,
    table?: string,
    details?: LogMeta
) => {
    logger.debug(`Database ${operation}`, {
        operation,
        table,
        ...details,
    });
};

/**
 * Log authentication event
 */
export const logAuthEvent = (
    event: "login" | "register" | "token_refresh" | "token_verify" | "bulk_register",
    username?: string,
    success: boolean = true,
    details?: LogMeta
) => {
    const level = success ? "info" : "warn";
    logger[level](`Auth Event: ${event}`, {
        event,
        username,
        success,
        ...details,
    });
};

export default logger;
