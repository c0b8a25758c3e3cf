import { UnknownAttributeError } from './errors';

/** Construction input: a plain object, a Map, or `[key, value]` pairs. */
export type AttributeInput =
  | Readonly<Record<string, unknown>>
  | ReadonlyMap<string | symbol, unknown>
  | Iterable<readonly [string | symbol, unknown]>;

const registries = new WeakMap<object, string[]>();

/**
 * Walk from the root ancestor down to `type`, yielding each class object.
 */
export const lineage = (type: object): object[] => {
  const chain: object[] = [];
  for (let current: object | null = type; current && current !== Function.prototype; current = Object.getPrototypeOf(current)) {
    chain.unshift(current);
  }
  return chain;
};

export const declaredAttributes = (type: object): string[] =>
  lineage(type).flatMap(current => registries.get(current) ?? []);

/**
 * Append `names` to the registry of `type`, skipping names it already
 * declares or inherits. Returns the names that were newly added.
 */
export const registerAttributes = (type: object, names: readonly string[]): string[] => {
  const known = new Set(declaredAttributes(type));
  const own = registries.get(type) ?? [];
  const added: string[] = [];

  for (const name of names) {
    if (known.has(name)) continue;
    known.add(name);
    own.push(name);
    added.push(name);
  }

  registries.set(type, own);
  return added;
};

const isMap = (input: AttributeInput): input is ReadonlyMap<string | symbol, unknown> => input instanceof Map;

const isIterable = (input: AttributeInput): input is Iterable<readonly [string | symbol, unknown]> =>
  Symbol.iterator in input;

export const inputEntries = (input: AttributeInput): Array<readonly [string | symbol, unknown]> => {
  if (isMap(input)) return [...input.entries()];
  if (isIterable(input)) return [...input];
  return Reflect.ownKeys(input)
    .filter(key => Object.prototype.propertyIsEnumerable.call(input, key))
    .map(key => [key, Reflect.get(input, key)] as const);
};

/**
 * Assign every entry of `input` through `write`, rejecting keys that are not
 * in `declared`. Symbol keys never match.
 */
export const assignAttributes = (
  input: AttributeInput,
  declared: readonly string[],
  unitName: string,
  write: (name: string, value: unknown) => void
): void => {
  const allowed = new Set(declared);
  const entries = inputEntries(input);

  for (const [key] of entries) {
    if (typeof key !== 'string' || !allowed.has(key)) {
      throw new UnknownAttributeError(String(key), unitName);
    }
  }

  for (const [key, value] of entries) {
    write(String(key), value);
  }
};
