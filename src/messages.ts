export const DEFAULT_MESSAGES = {
  invalid: 'is invalid',
  blank: "can't be blank",
  present: 'must be blank',
  too_short: 'is too short (minimum is %{count} characters)',
  too_long: 'is too long (maximum is %{count} characters)',
  wrong_length: 'is the wrong length (should be %{count} characters)',
  inclusion: 'is not included in the list',
  exclusion: 'is reserved',
  format: 'is invalid',
} as const;

export type ErrorType = keyof typeof DEFAULT_MESSAGES;

export const BASE_ATTRIBUTE = 'base';

export const isErrorType = (message: string): message is ErrorType =>
  Object.prototype.hasOwnProperty.call(DEFAULT_MESSAGES, message);

/**
 * Replace `%{name}` placeholders with values from `options`.
 * Placeholders without a matching option are left as they are.
 */
export const interpolate = (template: string, options: Readonly<Record<string, unknown>>): string =>
  template.replace(/%\{(\w+)\}/g, (placeholder, key: string) =>
    key in options ? String(options[key]) : placeholder
  );

/**
 * `trigger_failure`, `triggerFailure` and `trigger.failure` all become
 * `Trigger failure`. A trailing `_id` is dropped.
 */
export const humanize = (attribute: string): string => {
  const words = attribute
    .replace(/\./g, '_')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/_id$/i, '')
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(word => word.toLowerCase());

  const text = words.join(' ');
  return text.charAt(0).toUpperCase() + text.slice(1);
};

export const snakeCase = (name: string): string =>
  name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase();

export const fullMessage = (humanName: string, attribute: string, message: string): string =>
  attribute === BASE_ATTRIBUTE ? message : `${humanName} ${message}`;
