export interface ErrorResponseBody {
  error: string;
  code?: string;
  details?: Record<string, unknown>;
  requestId: string;
}

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true,
    public code?: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(requestId: string): ErrorResponseBody {
    return { error: this.message, code: this.code, details: this.details, requestId };
  }
}
