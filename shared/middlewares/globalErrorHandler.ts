// shared/middlewares/globalErrorHandler.ts
import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError } from "../config/errorHandler";
import { logApiError } from "../config/logger";

interface ErrorBody {
    success: false;
    message: string;
    errors?: Array<{ field: string; message: string }>;
    stack?: string;
}

function hasCode(err: Error): err is Error & { code: string } {
    return "code" in err && typeof err.code === "string";
}

/**
 * Maps an error to the status and body the client sees.
 * Unknown errors never leak their message.
 */
export function toErrorResponse(err: Error): { statusCode: number; body: ErrorBody } {
    if (err instanceof ZodError) {
        return {
            statusCode: 400,
            body: {
                success: false,
                message: "Validation error",
                errors: err.errors.map((e) => ({
                    field: e.path.join("."),
                    message: e.message,
                })),
            },
        };
    }

    if (err instanceof AppError) {
        return { statusCode: err.statusCode, body: { success: false, message: err.message } };
    }

    // multer raises MulterError with a LIMIT_* code for oversized or unexpected uploads
    if (err.name === "MulterError" && hasCode(err) && err.code.startsWith("LIMIT_")) {
        return { statusCode: 400, body: { success: false, message: err.message } };
    }

    // body-parser flags malformed JSON with a 4xx status
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
        return { statusCode: 400, body: { success: false, message: "Malformed JSON body" } };
    }

    return { statusCode: 500, body: { success: false, message: "Something went wrong" } };
}

export const globalErrorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    const { statusCode, body } = toErrorResponse(err);

    logApiError(err, req, statusCode);

    return res.status(statusCode).json({
        ...body,
        ...(process.env.NODE_ENV === "development" && statusCode >= 500 && { stack: err.stack }),
    });
};
