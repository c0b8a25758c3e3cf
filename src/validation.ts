import type { ZodTypeAny } from 'zod';
import type { ErrorList } from './errorList';
import { BASE_ATTRIBUTE } from './messages';

/**
 * What a Validator and its rules can see of a unit.
 */
export interface Validatable {
  readonly errors: ErrorList;
  readAttribute(name: string): unknown;
  attributes(): Record<string, unknown>;
}

/**
 * A single declared check. Rules report problems by adding to `unit.errors`.
 */
export interface ValidationRule<T extends Validatable = Validatable> {
  validate(unit: T): void;
}

/**
 * Runs a unit's rules and reports whether it passed. Errors are appended to
 * the unit's error list as a side effect.
 */
export interface Validator {
  validate(unit: Validatable, rules: readonly ValidationRule[]): boolean;
}

export class RuleValidator implements Validator {
  validate(unit: Validatable, rules: readonly ValidationRule[]): boolean {
    for (const current of rules) {
      current.validate(unit);
    }
    return unit.errors.isEmpty();
  }
}

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

export const isBlank = (value: unknown): boolean => {
  if (value === undefined || value === null || value === false) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (typeof value === 'object' && isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
};

const isMissing = (value: unknown): value is null | undefined => value === undefined || value === null;

export const rule = <T extends Validatable>(check: (unit: T) => void): ValidationRule<T> => ({
  validate: check,
});

export const presence = (...attributes: string[]): ValidationRule =>
  rule(unit => {
    for (const attribute of attributes) {
      if (isBlank(unit.readAttribute(attribute))) unit.errors.add(attribute, 'blank');
    }
  });

export const absence = (...attributes: string[]): ValidationRule =>
  rule(unit => {
    for (const attribute of attributes) {
      if (!isBlank(unit.readAttribute(attribute))) unit.errors.add(attribute, 'present');
    }
  });

export interface LengthOptions {
  minimum?: number;
  maximum?: number;
  is?: number;
}

const lengthOf = (value: unknown): number | undefined => {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  return undefined;
};

export const length = (attribute: string, options: LengthOptions): ValidationRule =>
  rule(unit => {
    const value = unit.readAttribute(attribute);
    if (isMissing(value)) return;

    const size = lengthOf(value);
    if (size === undefined) {
      unit.errors.add(attribute, 'invalid');
      return;
    }

    if (options.is !== undefined && size !== options.is) {
      unit.errors.add(attribute, 'wrong_length', { count: options.is });
    }
    if (options.minimum !== undefined && size < options.minimum) {
      unit.errors.add(attribute, 'too_short', { count: options.minimum });
    }
    if (options.maximum !== undefined && size > options.maximum) {
      unit.errors.add(attribute, 'too_long', { count: options.maximum });
    }
  });

export const inclusion = (attribute: string, values: readonly unknown[]): ValidationRule =>
  rule(unit => {
    const value = unit.readAttribute(attribute);
    if (!isMissing(value) && !values.includes(value)) {
      unit.errors.add(attribute, 'inclusion', { value });
    }
  });

export const exclusion = (attribute: string, values: readonly unknown[]): ValidationRule =>
  rule(unit => {
    const value = unit.readAttribute(attribute);
    if (!isMissing(value) && values.includes(value)) {
      unit.errors.add(attribute, 'exclusion', { value });
    }
  });

export const format = (attribute: string, pattern: RegExp): ValidationRule =>
  rule(unit => {
    const value = unit.readAttribute(attribute);
    if (isMissing(value)) return;
    // global and sticky patterns carry lastIndex between calls
    pattern.lastIndex = 0;
    if (typeof value !== 'string' || !pattern.test(value)) {
      unit.errors.add(attribute, 'format', { value });
    }
  });

/**
 * Check one attribute, or the whole attribute snapshot when `attribute` is
 * omitted, against a zod schema. Each issue becomes one error entry; snapshot
 * issues are keyed by their first path segment.
 */
export const schema = (zodType: ZodTypeAny, attribute?: string): ValidationRule =>
  rule(unit => {
    const input = attribute === undefined ? unit.attributes() : unit.readAttribute(attribute);
    const parsed = zodType.safeParse(input);
    if (parsed.success) return;

    for (const issue of parsed.error.issues) {
      const head = issue.path[0];
      const key = attribute ?? (head === undefined ? BASE_ATTRIBUTE : String(head));
      unit.errors.add(key, issue.message, { code: issue.code, path: issue.path });
    }
  });
