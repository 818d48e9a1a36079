import { ValidationError, ValidationField } from './validation-error';

/** Raised while loading settings; the invocation cannot start. */
export class ConfigurationError extends ValidationError {
  constructor(message: string, fields?: ValidationField[]) {
    super(message, fields, 'CONFIGURATION_INVALID');
  }
}
