import logger from './logger';
import { assignAttributes, declaredAttributes, lineage, registerAttributes } from './attributes';
import type { AttributeInput } from './attributes';
import { ErrorList } from './errorList';
import { humanize, snakeCase } from './messages';
import { RuleValidator, rule } from './validation';
import type { Validatable, ValidationRule, Validator } from './validation';

/** Constructor of a unit type, used to type static DSL methods by their receiver. */
export type UnitType<T> = abstract new (...args: never) => T;

/** Runs around a validation pass. */
export interface ValidationHook<T extends Validatable = Validatable> {
  run(unit: T): void;
}

export interface AddErrorsOptions {
  /** Attribute to file every copied error under. */
  key?: string;
  /** Copy formatted full messages instead of raw entries. */
  fullMessages?: boolean;
}

const rules = new WeakMap<object, ValidationRule[]>();
const beforeHooks = new WeakMap<object, ValidationHook[]>();
const afterHooks = new WeakMap<object, ValidationHook[]>();

const append = <T>(registry: WeakMap<object, T[]>, type: object, items: readonly T[]): void => {
  registry.set(type, [...(registry.get(type) ?? []), ...items]);
};

/** Items registered on `type` and its ancestors, ancestors first. */
const collect = <T>(registry: WeakMap<object, T[]>, type: object): T[] =>
  lineage(type).flatMap(current => registry.get(current) ?? []);

/**
 * Foundation for every unit: declared attributes, a validation pass that runs
 * once per instance, and a live error list.
 *
 * Validity is memoized while the error list stays mutable, so `succeeded()`
 * can turn false after validation passed but `isValid()` will not change
 * until `reset()`.
 *
 * Type attributes with `declare` fields. A plain field (`name?: string`) is
 * defined on the instance after construction and hides the accessor, so the
 * value passed in is lost.
 *
 * @example
 * class Signup extends Service {
 *   declare email: string | undefined;
 *
 *   static {
 *     this.attribute('email');
 *     this.validates(presence('email'));
 *   }
 * }
 */
export abstract class ServiceBase<V = unknown> implements Validatable {
  /** Collaborator that runs the declared rules. Override per class to swap engines. */
  static validator: Validator = new RuleValidator();

  /**
   * Declare attributes. Names already declared here or on an ancestor are
   * ignored; each new name gets an accessor on the prototype.
   */
  static attribute(...names: string[]): void {
    for (const name of registerAttributes(this, names)) {
      Object.defineProperty(this.prototype, name, {
        configurable: true,
        get(this: ServiceBase): unknown {
          return this.values.get(name);
        },
        set(this: ServiceBase, value: unknown) {
          this.values.set(name, value);
        },
      });
    }
  }

  static attributeNames(): string[] {
    return declaredAttributes(this);
  }

  static validates<T extends ServiceBase>(this: UnitType<T>, ...newRules: ValidationRule<T>[]): void {
    append(rules, this, newRules);
  }

  /** Register a check written as a function of the unit. */
  static validate<T extends ServiceBase>(this: UnitType<T>, check: (unit: T) => void): void {
    append(rules, this, [rule(check)]);
  }

  static beforeValidation<T extends ServiceBase>(this: UnitType<T>, hook: (unit: T) => void): void {
    append(beforeHooks, this, [{ run: hook }]);
  }

  static afterValidation<T extends ServiceBase>(this: UnitType<T>, hook: (unit: T) => void): void {
    append(afterHooks, this, [{ run: hook }]);
  }

  static humanAttributeName(attribute: string): string {
    return humanize(attribute);
  }

  readonly errors: ErrorList;
  value: V | undefined = undefined;

  private readonly values = new Map<string, unknown>();
  private readonly unitType: typeof ServiceBase;
  private validity: boolean | undefined = undefined;

  constructor(input: AttributeInput = {}) {
    const type = new.target;
    this.unitType = type;
    this.errors = new ErrorList(attribute => type.humanAttributeName(attribute));

    assignAttributes(input, declaredAttributes(type), type.name, (name, value) => {
      this.values.set(name, value);
    });
  }

  get modelName(): string {
    return this.unitType.name;
  }

  /**
   * Run validations on first call and remember the result. Later calls return
   * the remembered result even if the error list changed in between.
   */
  isValid(): boolean {
    if (this.validity === undefined) {
      this.validity = this.runValidations();
    }
    return this.validity;
  }

  isInvalid(): boolean {
    return !this.isValid();
  }

  /** Valid, and nothing has added errors since. */
  succeeded(): boolean {
    return this.isValid() && this.errors.isEmpty();
  }

  failed(): boolean {
    return !this.succeeded();
  }

  /** Back to the post-construction state. Attribute values are kept. */
  reset(): this {
    this.errors.clear();
    this.validity = undefined;
    this.value = undefined;
    return this;
  }

  /** Declared attribute values in declaration order. */
  attributes(): Record<string, unknown> {
    const snapshot: Record<string, unknown> = {};
    for (const name of declaredAttributes(this.unitType)) {
      snapshot[name] = this.readAttribute(name);
    }
    return snapshot;
  }

  readAttribute(name: string): unknown {
    const value: unknown = Reflect.get(this, name);
    return value;
  }

  /**
   * Copy another unit's errors into this one, typically after delegating work
   * to a nested unit.
   */
  protected addErrorsFrom(other: ServiceBase, { key, fullMessages = false }: AddErrorsOptions = {}): this {
    if (fullMessages) {
      const attribute = key ?? snakeCase(other.modelName);
      for (const message of other.errors.fullMessages()) {
        this.errors.add(attribute, message);
      }
      return this;
    }

    for (const entry of other.errors) {
      this.errors.add(key ?? entry.attribute, entry.message, entry.options);
    }
    return this;
  }

  private runValidations(): boolean {
    const type = this.unitType;
    this.errors.clear();

    for (const hook of collect(beforeHooks, type)) hook.run(this);
    const passed = type.validator.validate(this, collect(rules, type));
    for (const hook of collect(afterHooks, type)) hook.run(this);

    logger.debug({ unit: this.modelName, valid: passed, errors: this.errors.size }, 'Validation ran');
    return passed;
  }
}
