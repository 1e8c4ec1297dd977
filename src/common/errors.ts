// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

/**
 * An error whose `code` is safe to show to the caller. Anything that is not an
 * ApiError is reported to clients as `internal_error` only.
 */
export class ApiError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string
  ) {
    super(code);
    this.name = "ApiError";
  }

  static badRequest(code: string): ApiError {
    return new ApiError(400, code);
  }

  static unauthorized(code: string): ApiError {
    return new ApiError(401, code);
  }

  static forbidden(code: string): ApiError {
    return new ApiError(403, code);
  }

  static notFound(code: string): ApiError {
    return new ApiError(404, code);
  }

  static conflict(code: string): ApiError {
    return new ApiError(409, code);
  }

  static tooManyRequests(code: string): ApiError {
    return new ApiError(429, code);
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
