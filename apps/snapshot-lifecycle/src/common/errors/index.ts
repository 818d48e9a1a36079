export { BaseAppError, describeError } from './base-app-error';
export { ValidationError, toValidationFields } from './validation-error';
export type { ValidationField } from './validation-error';
export { ConfigurationError } from './configuration-error';
export { CreateSnapshotError, DeleteSnapshotError, ListSnapshotsError } from './snapshot-errors';
