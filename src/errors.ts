import type { ServiceBase } from './base';

/**
 * Base class for every error thrown by this package.
 */
export class ServiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Construction input named a key that the unit type never declared.
 */
export class UnknownAttributeError extends ServiceError {
  readonly attribute: string;
  readonly unitName: string;

  constructor(attribute: string, unitName: string) {
    super(`unknown attribute '${attribute}' for ${unitName}.`);
    this.attribute = attribute;
    this.unitName = unitName;
  }
}

/**
 * Thrown by raising forms. Carries the unit and its full error messages.
 */
export class OutcomeError<T extends ServiceBase = ServiceBase> extends ServiceError {
  readonly target: T;
  readonly messages: string[];

  constructor(target: T, messages: string[]) {
    super(messages.join(', '));
    this.target = target;
    this.messages = messages;
  }
}

/** The unit's input did not pass validation. */
export class InvalidError<T extends ServiceBase = ServiceBase> extends OutcomeError<T> {}

/** Validation passed but the operation reported errors. */
export class FailureError<T extends ServiceBase = ServiceBase> extends OutcomeError<T> {}

/** An abstract operation was invoked without a concrete implementation. */
export class NotImplementedError extends ServiceError {
  readonly method: string;

  constructor(method: string) {
    super(`#${method} must be implemented.`);
    this.method = method;
  }
}

/** A capability that this unit kind disables was invoked. */
export class UnsupportedOperationError extends ServiceError {
  readonly method: string;

  constructor(method: string, unitName: string) {
    super(`${method} is not available on ${unitName}`);
    this.method = method;
  }
}

export class ConfigurationError extends ServiceError {
  readonly keys: string[];

  constructor(keys: string[]) {
    super(`Invalid configuration: ${keys.join(', ')}`);
    this.keys = keys;
  }
}
