import logger from './logger';
import { ServiceBase } from './base';
import type { AttributeInput } from './attributes';
import { FailureError, InvalidError } from './errors';

/**
 * A registered operation. Calling it is the non-raising form: it runs the
 * implementation only when the unit is valid and always returns the unit.
 * `orThrow` is the raising form: it returns the captured value or throws.
 */
export interface ServiceMethod<U, A extends unknown[], V> {
  (...args: A): U;
  orThrow(...args: A): V | undefined;
}

/** Any ServiceMethod, whatever its receiver, arguments or value. */
export interface AnyServiceMethod {
  (...args: never): unknown;
  orThrow(...args: never): unknown;
}

/**
 * A unit with any number of named operations.
 *
 * Operations are declared as fields so that their implementations close over
 * the defining scope. Parameters need explicit types: an unannotated parameter
 * is typed `unknown`, even when it has a default.
 *
 * @example
 * const GREETING = 'hello';
 *
 * class Greeter extends Service<string> {
 *   declare name: string | undefined;
 *
 *   static {
 *     this.attribute('name');
 *     this.validates(presence('name'));
 *   }
 *
 *   readonly greet = this.operation('greet', (punctuation: string = '!') => `${GREETING} ${this.name}${punctuation}`);
 * }
 *
 * new Greeter({ name: 'Ada' }).greet().value;      // 'hello Ada!'
 * new Greeter({}).greet.orThrow();                 // throws InvalidError
 */
export class Service<V = unknown> extends ServiceBase<V> {
  /**
   * Whether operations store their return value in `value`. An instance's own
   * `captureReturnValue` wins when set.
   */
  static captureReturnValue = true;

  captureReturnValue: boolean | undefined = undefined;

  private readonly serviceType: typeof Service;
  private readonly operationTable = new Map<string, AnyServiceMethod>();

  constructor(input?: AttributeInput) {
    super(input);
    this.serviceType = new.target;
  }

  /** Names of the registered operations, in registration order. */
  operationNames(): string[] {
    return [...this.operationTable.keys()];
  }

  /**
   * Wrap `impl` into a validity-gated, value-capturing operation. Registering
   * the same name again replaces the earlier entry.
   */
  protected operation<A extends unknown[]>(name: string, impl: (...args: A) => V | undefined): ServiceMethod<this, A, V> {
    const invoke = (...args: A): this => {
      if (!this.isValid()) {
        logger.debug({ unit: this.modelName, operation: name }, 'Skipping operation on invalid unit');
        return this;
      }

      const result = impl(...args);
      if (this.capturesReturnValue()) {
        this.value = result;
      }
      return this;
    };

    const orThrow = (...args: A): V | undefined => {
      invoke(...args);
      return this.settle(name);
    };

    const method: ServiceMethod<this, A, V> = Object.assign(invoke, { orThrow });
    this.operationTable.delete(name);
    this.operationTable.set(name, method);
    return method;
  }

  /**
   * Convert the unit's state into a thrown error, or return the captured value.
   */
  protected settle(operation: string): V | undefined {
    if (!this.isValid()) {
      logger.debug({ unit: this.modelName, operation, errors: this.errors.size }, 'Raising invalid');
      throw new InvalidError(this, this.errors.fullMessages());
    }
    if (!this.succeeded()) {
      logger.debug({ unit: this.modelName, operation, errors: this.errors.size }, 'Raising failure');
      throw new FailureError(this, this.errors.fullMessages());
    }
    return this.value;
  }

  private capturesReturnValue(): boolean {
    return this.captureReturnValue ?? this.serviceType.captureReturnValue;
  }
}
