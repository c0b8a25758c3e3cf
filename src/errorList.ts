import { DEFAULT_MESSAGES, fullMessage, humanize, interpolate, isErrorType } from './messages';
import type { ErrorType } from './messages';

/** A known error type key, or a literal message. */
export type ErrorMessage = ErrorType | (string & {});

export interface ErrorOptions {
  message?: string;
  [key: string]: unknown;
}

export interface ErrorEntry {
  readonly attribute: string;
  readonly message: ErrorMessage;
  readonly options: Readonly<ErrorOptions>;
}

export interface ErrorDetail {
  attribute: string;
  type: ErrorType | undefined;
  message: string;
  fullMessage: string;
  options: Readonly<ErrorOptions>;
}

/**
 * Ordered, mutable list of error entries shared by validation rules and
 * business logic.
 */
export class ErrorList implements Iterable<ErrorEntry> {
  private readonly list: ErrorEntry[] = [];

  constructor(private readonly humanAttributeName: (attribute: string) => string = humanize) {}

  add(attribute: string, message: ErrorMessage = 'invalid', options: ErrorOptions = {}): this {
    this.list.push({ attribute, message, options: { ...options } });
    return this;
  }

  clear(): this {
    this.list.length = 0;
    return this;
  }

  isEmpty(): boolean {
    return this.list.length === 0;
  }

  get size(): number {
    return this.list.length;
  }

  entries(): readonly ErrorEntry[] {
    return [...this.list];
  }

  [Symbol.iterator](): Iterator<ErrorEntry> {
    return this.entries()[Symbol.iterator]();
  }

  /** Resolved messages for one attribute. */
  get(attribute: string): string[] {
    return this.list.filter(entry => entry.attribute === attribute).map(entry => this.resolve(entry));
  }

  messages(): Record<string, string[]> {
    const grouped: Record<string, string[]> = {};
    for (const entry of this.list) {
      (grouped[entry.attribute] ??= []).push(this.resolve(entry));
    }
    return grouped;
  }

  fullMessages(): string[] {
    return this.list.map(entry => this.fullMessageFor(entry));
  }

  /**
   * Structured view of every entry, optionally reshaped by `decorate`.
   */
  details(): ErrorDetail[];
  details<T>(decorate: (detail: ErrorDetail) => T): T[];
  details<T>(decorate?: (detail: ErrorDetail) => T): Array<ErrorDetail | T> {
    return this.list.map(entry => {
      const detail: ErrorDetail = {
        attribute: entry.attribute,
        type: isErrorType(entry.message) ? entry.message : undefined,
        message: this.resolve(entry),
        fullMessage: this.fullMessageFor(entry),
        options: entry.options,
      };
      return decorate ? decorate(detail) : detail;
    });
  }

  private resolve(entry: ErrorEntry): string {
    if (entry.options.message !== undefined) {
      return interpolate(entry.options.message, entry.options);
    }
    if (isErrorType(entry.message)) {
      return interpolate(DEFAULT_MESSAGES[entry.message], entry.options);
    }
    return entry.message;
  }

  private fullMessageFor(entry: ErrorEntry): string {
    return fullMessage(this.humanAttributeName(entry.attribute), entry.attribute, this.resolve(entry));
  }
}
