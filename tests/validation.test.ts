import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ErrorList,
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
} from '../src/index';
import type { Validatable, ValidationRule } from '../src/index';

const unitWith = (values: Record<string, unknown>): Validatable => ({
  errors: new ErrorList(),
  readAttribute: name => values[name],
  attributes: () => ({ ...values }),
});

const check = (current: ValidationRule, values: Record<string, unknown>): ErrorList => {
  const unit = unitWith(values);
  current.validate(unit);
  return unit.errors;
};

describe('isBlank', () => {
  it.each([undefined, null, false, '', '   ', [], new Map(), new Set(), {}])('should treat %s as blank', value => {
    expect(isBlank(value)).toBe(true);
  });

  it.each([0, 'a', [1], true, new Date(0), { a: 1 }])('should treat %s as present', value => {
    expect(isBlank(value)).toBe(false);
  });
});

describe('rules', () => {
  it('presence should flag blank attributes only', () => {
    const errors = check(presence('a', 'b'), { a: 'x', b: ' ' });
    expect(errors.messages()).toEqual({ b: ["can't be blank"] });
  });

  it('absence should flag present attributes', () => {
    const errors = check(absence('a'), { a: 'x' });
    expect(errors.get('a')).toEqual(['must be blank']);
  });

  describe('length', () => {
    it('should enforce minimum and maximum', () => {
      expect(check(length('name', { minimum: 3, maximum: 5 }), { name: 'ab' }).get('name')).toEqual([
        'is too short (minimum is 3 characters)',
      ]);
      expect(check(length('name', { minimum: 3, maximum: 5 }), { name: 'abcdef' }).get('name')).toEqual([
        'is too long (maximum is 5 characters)',
      ]);
      expect(check(length('name', { minimum: 3, maximum: 5 }), { name: 'abcd' }).isEmpty()).toBe(true);
    });

    it('should enforce an exact length', () => {
      expect(check(length('code', { is: 2 }), { code: 'abc' }).get('code')).toEqual([
        'is the wrong length (should be 2 characters)',
      ]);
    });

    it('should skip missing values and reject values without a length', () => {
      expect(check(length('name', { minimum: 1 }), {}).isEmpty()).toBe(true);
      expect(check(length('name', { minimum: 1 }), { name: 42 }).get('name')).toEqual(['is invalid']);
    });
  });

  it('inclusion should require one of the listed values', () => {
    expect(check(inclusion('size', ['s', 'm']), { size: 'xl' }).get('size')).toEqual(['is not included in the list']);
    expect(check(inclusion('size', ['s', 'm']), { size: 'm' }).isEmpty()).toBe(true);
    expect(check(inclusion('size', ['s', 'm']), {}).isEmpty()).toBe(true);
  });

  it('exclusion should reject the listed values', () => {
    expect(check(exclusion('name', ['admin']), { name: 'admin' }).get('name')).toEqual(['is reserved']);
  });

  describe('format', () => {
    it('should match strings against the pattern', () => {
      const errors = check(format('code', /^[A-Z]{3}$/), { code: 'abc' });
      expect(errors.details()[0]?.type).toBe('format');
      expect(errors.get('code')).toEqual(['is invalid']);
      expect(check(format('code', /^[A-Z]{3}$/), { code: 'ABC' }).isEmpty()).toBe(true);
    });

    it('should give the same answer on repeated passes with a global pattern', () => {
      const current = format('code', /^A/g);
      expect(check(current, { code: 'ABC' }).isEmpty()).toBe(true);
      expect(check(current, { code: 'ABC' }).isEmpty()).toBe(true);
    });
  });

  describe('schema', () => {
    it('should check a single attribute', () => {
      const errors = check(schema(z.string().min(3, 'is too brief'), 'name'), { name: 'ab' });

      expect(errors.get('name')).toEqual(['is too brief']);
      expect(errors.entries()[0]?.options.code).toBe('too_small');
    });

    it('should key snapshot issues by their first path segment', () => {
      const errors = check(schema(z.object({ age: z.number().int('must be whole') })), { age: 1.5 });
      expect(errors.messages()).toEqual({ age: ['must be whole'] });
    });

    it('should file issues without a path under base', () => {
      const shape = z.object({ a: z.string(), b: z.string() }).refine(value => value.a !== value.b, 'must differ');
      const errors = check(schema(shape), { a: 'x', b: 'x' });

      expect(errors.fullMessages()).toEqual(['must differ']);
    });
  });

  it('rule should wrap a custom check', () => {
    const even = rule((unit: Validatable) => {
      const count = unit.readAttribute('count');
      if (typeof count === 'number' && count % 2 !== 0) unit.errors.add('count', 'must be even');
    });

    expect(check(even, { count: 3 }).fullMessages()).toEqual(['Count must be even']);
  });
});

describe('RuleValidator', () => {
  it('should run every rule and pass only with no errors', () => {
    const validator = new RuleValidator();
    const unit = unitWith({ a: '', b: '' });

    expect(validator.validate(unit, [presence('a'), presence('b')])).toBe(false);
    expect(unit.errors.size).toBe(2);
  });

  it('should pass when no rules are given', () => {
    expect(new RuleValidator().validate(unitWith({}), [])).toBe(true);
  });
});
