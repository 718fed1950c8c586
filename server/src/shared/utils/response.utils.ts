/**
 * Shared response envelope for the dashboard API
 */

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  message?: string;
  meta?: Record<string, unknown>;
}

export class ResponseUtils {
  public static success<T>(data: T, meta?: Record<string, unknown>): ApiResponse<T> {
    return meta ? { ok: true, data, meta } : { ok: true, data };
  }

  public static error(error: string | Error, message?: string, meta?: Record<string, unknown>): ApiResponse<never> {
    return {
      ok: false,
      error: error instanceof Error ? error.message : error,
      message,
      meta
    };
  }

  public static validationError(field: string, message: string): ApiResponse<never> {
    return {
      ok: false,
      error: `Validation failed for ${field}`,
      message
    };
  }

  public static notFound(resource: string): ApiResponse<never> {
    return {
      ok: false,
      error: `${resource} not found`,
      message: `The requested ${resource} could not be found`
    };
  }

  public static internalError(message = 'Internal server error'): ApiResponse<never> {
    return {
      ok: false,
      error: 'Internal server error',
      message
    };
  }
}
