// Standardized error taxonomy shared by the tool registry, agents and orchestrator

import type { ZodError } from 'zod';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  VALIDATION_ERROR = 'validation_error',
  UPSTREAM_FAILURE = 'upstream_failure',
  PARTIAL_FAILURE = 'partial_failure',
  CONFIGURATION_ERROR = 'configuration_error',
}

/**
 * Serializable error record. Tool results, task results and the orchestrator
 * response all carry errors in this shape.
 */
export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  /** Operation or sub-task the error belongs to, when known. */
  source?: string;
  details?: unknown;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.UPSTREAM_FAILURE]: 502,
  [ErrorCode.PARTIAL_FAILURE]: 207,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
};

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = STATUS_BY_CODE[code],
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static upstreamFailure(message: string = 'Backing store call failed', details?: unknown): AppError {
    return new AppError(ErrorCode.UPSTREAM_FAILURE, message, 502, details);
  }

  static partialFailure(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.PARTIAL_FAILURE, message, 207, details);
  }

  static configuration(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message, 500, details);
  }

  toInfo(source?: string): ErrorInfo {
    const info: ErrorInfo = { code: this.code, message: this.message };
    if (source) info.source = source;
    if (this.details !== undefined) info.details = this.details;
    return info;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function fromZodError(error: ZodError, message: string = 'Validation failed'): AppError {
  return AppError.validationError(message, error.issues);
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: ErrorInfo, includeDetails: boolean = true): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: STATUS_BY_CODE[error.code],
  };

  if (includeDetails && error.details !== undefined) {
    response.details = error.details;
  }

  return response;
}
