import { Service } from './service';
import type { ServiceMethod } from './service';
import type { AttributeInput } from './attributes';
import { NotImplementedError, UnsupportedOperationError } from './errors';

/** Anything invokable with one input and an optional continuation. */
export interface Callable<I, R, C = never> {
  call(input: I, callback?: C): R;
}

/** Continuation handed to `perform`; its result becomes the unit's value. */
export type PerformCallback<U, V> = (unit: U) => V;

type ServiceObjectType<T> = new (input?: AttributeInput) => T;

/**
 * A unit with exactly one operation, `perform`, exposed through `call` and
 * `callOrThrow`.
 *
 * @example
 * class Reverse extends ServiceObject<string> {
 *   declare text: string | undefined;
 *
 *   static {
 *     this.attribute('text');
 *     this.validates(presence('text'));
 *   }
 *
 *   protected perform(): string {
 *     return [...(this.text ?? '')].reverse().join('');
 *   }
 * }
 *
 * Reverse.callOrThrow({ text: 'abc' }); // 'cba'
 */
export class ServiceObject<V = unknown> extends Service<V> {
  /** Construct from `input`, then `call`. */
  static call<V, T extends ServiceObject<V>>(
    this: ServiceObjectType<T>,
    input?: AttributeInput,
    callback?: PerformCallback<T, V>
  ): T {
    return new this(input).call(callback);
  }

  /** Construct from `input`, then `callOrThrow`. */
  static callOrThrow<V, T extends ServiceObject<V>>(
    this: ServiceObjectType<T>,
    input?: AttributeInput,
    callback?: PerformCallback<T, V>
  ): V | undefined {
    return new this(input).callOrThrow(callback);
  }

  /**
   * Runs `perform` when valid and stores its result. Always returns the unit.
   */
  call(callback?: PerformCallback<this, V>): this {
    if (this.isValid()) {
      this.value = this.perform(callback);
    }
    return this;
  }

  /**
   * Returns the captured value.
   * @throws InvalidError when validation failed
   * @throws FailureError when `perform` or the callback left errors behind
   */
  callOrThrow(callback?: PerformCallback<this, V>): V | undefined {
    this.call(callback);
    return this.settle('call');
  }

  protected operation<A extends unknown[]>(name: string, _impl: (...args: A) => V | undefined): ServiceMethod<this, A, V> {
    throw new UnsupportedOperationError(`operation('${name}')`, this.modelName);
  }

  protected perform(_callback?: PerformCallback<this, V>): V {
    throw new NotImplementedError('perform');
  }
}
