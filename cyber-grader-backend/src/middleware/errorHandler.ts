import { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError } from "zod";
import { logger } from "../utils/logger";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
  details?: unknown;
}

export class CustomError extends Error implements AppError {
  statusCode: number;
  code: string;
  isOperational: boolean;
  details?: unknown;

  constructor(message: string, statusCode: number = 500, code?: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code || "INTERNAL_SERVER_ERROR";
    this.isOperational = true;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Common error types
export class ValidationError extends CustomError {
  constructor(message: string, details?: unknown, code: string = "VALIDATION_ERROR") {
    super(message, 400, code, details);
  }
}

export class NotFoundError extends CustomError {
  constructor(resource: string = "Resource", code: string = "NOT_FOUND") {
    super(`${resource} not found`, 404, code);
  }
}

export class DatabaseError extends CustomError {
  constructor(message: string = "Database operation failed") {
    super(message, 500, "DATABASE_ERROR");
  }
}

// Error response interface
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
  timestamp: string;
  path: string;
  requestId?: string;
}

const requestIdOf = (req: Request): string => {
  const header = req.headers["x-request-id"];
  if (typeof header === "string" && header) {
    return header;
  }
  return Math.random().toString(36).substring(2, 15);
};

// Centralized error handling middleware
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = requestIdOf(req);

  let statusCode = err.statusCode || 500;
  let code = err.code || "INTERNAL_SERVER_ERROR";
  let message = err.message || "An unexpected error occurred";
  let details: unknown = err.details;

  if (err instanceof ZodError) {
    statusCode = 400;
    code = "VALIDATION_ERROR";
    message = "Invalid request body";
    details = err.flatten().fieldErrors;
  } else if (err.name === "SyntaxError" && statusCode === 400) {
    // body-parser rejects malformed JSON with a 400 SyntaxError
    code = "INVALID_JSON";
    message = "Malformed JSON body";
  }

  const logData = {
    requestId,
    method: req.method,
    url: req.originalUrl,
    statusCode,
    code,
    message,
    stack: err.stack,
  };

  if (statusCode >= 500) {
    logger.error("Server Error", logData);
  } else {
    logger.warn("Client Error", logData);
  }

  // Don't expose internal error details in production
  if (process.env.NODE_ENV === "production" && statusCode >= 500) {
    message = "Internal server error";
    details = undefined;
  }

  const errorResponse: ErrorResponse = {
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
    requestId,
  };

  res.status(statusCode).json(errorResponse);
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

// 404 handler
export const notFoundHandler = (req: Request, res: Response): void => {
  const errorResponse: ErrorResponse = {
    error: {
      code: "NOT_FOUND",
      message: `Route ${req.originalUrl} not found`,
    },
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
  };

  res.status(404).json(errorResponse);
};
