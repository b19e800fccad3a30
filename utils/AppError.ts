// utils/AppError.ts

/**
 * Operational error: something we expected could go wrong (bad input, unknown id).
 * Anything that is not an AppError is treated as a bug by the error middleware.
 */
class AppError extends Error {
  public readonly statusCode: number;
  public readonly status: 'fail' | 'error';
  public readonly isOperational = true;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.status = statusCode >= 400 && statusCode < 500 ? 'fail' : 'error';
  }
}

export class NarrativeNotFoundError extends AppError {
  public readonly kind = 'NotFound';

  constructor(public readonly narrativeId: string) {
    super(`Unknown narrative: "${narrativeId}"`, 404);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, 500);
  }
}

export default AppError;
