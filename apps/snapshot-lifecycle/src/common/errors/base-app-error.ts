import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Base application error class.
 * All custom errors should extend this class.
 */
export class BaseAppError extends HttpException {
  constructor(
    message: string,
    public readonly statusCode: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly errorCode?: string,
  ) {
    super(message, statusCode);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      statusCode: this.statusCode,
      message: this.message,
      error: this.errorCode || this.name,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Formats anything thrown by a provider SDK as `<name>: <message>`, keeping
 * the provider's error code (carried in `name` by the AWS SDK) visible.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
};
