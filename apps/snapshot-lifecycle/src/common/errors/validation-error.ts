import { HttpStatus } from '@nestjs/common';
import type { ValidationError as ClassValidationError } from 'class-validator';
import { BaseAppError } from './base-app-error';

export interface ValidationField {
  field: string;
  message: string;
}

export class ValidationError extends BaseAppError {
  constructor(
    message: string,
    public readonly fields?: ValidationField[],
    errorCode = 'VALIDATION_ERROR',
  ) {
    super(message, HttpStatus.BAD_REQUEST, errorCode);
  }

  toJSON() {
    const base = super.toJSON();
    return {
      ...base,
      ...(this.fields && { fields: this.fields }),
    };
  }
}

export const toValidationFields = (errors: ClassValidationError[]): ValidationField[] =>
  errors.map((error) => ({
    field: error.property,
    message: Object.values(error.constraints || {}).join(', ') || 'is invalid',
  }));
