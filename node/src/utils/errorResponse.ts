/**
 * Standardized error response format for whatever transport fronts the search core.
 */
import { QueryNotUnderstoodError, SearchValidationError, type FieldIssue } from '@/utils/errors';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldIssue[];
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(message: string, errors?: FieldIssue[], code?: string): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

/** Internal errors are reported without their message. */
export function errorResponseFrom(error: unknown): ErrorResponse {
  if (error instanceof SearchValidationError) {
    return createErrorResponse(error.message, error.issues, error.code);
  }
  if (error instanceof QueryNotUnderstoodError) {
    return createErrorResponse(error.message, undefined, error.code);
  }
  return createErrorResponse('Internal server error', undefined, 'INTERNAL_ERROR');
}
