// Logger
export { default as logger } from './logger';

// Configuration
export { config, loadConfig } from './config';
export type { Config, LogLevel } from './config';

// Units
export { ServiceBase } from './base';
export type { AddErrorsOptions, UnitType, ValidationHook } from './base';
export { Service } from './service';
export type { AnyServiceMethod, ServiceMethod } from './service';
export { ServiceObject } from './serviceObject';
export type { Callable, PerformCallback } from './serviceObject';
export type { AttributeInput } from './attributes';

// Validation
export {
  RuleValidator,
  absence,
  exclusion,
  format,
  inclusion,
  isBlank,
  length,
  presence,
  rule,
  schema,
} from './validation';
export type { LengthOptions, Validatable, ValidationRule, Validator } from './validation';

// Errors
export { ErrorList } from './errorList';
export type { ErrorDetail, ErrorEntry, ErrorMessage, ErrorOptions } from './errorList';
export { DEFAULT_MESSAGES, humanize } from './messages';
export type { ErrorType } from './messages';
export {
  ConfigurationError,
  FailureError,
  InvalidError,
  NotImplementedError,
  OutcomeError,
  ServiceError,
  UnknownAttributeError,
  UnsupportedOperationError,
} from './errors';
