import { ValidationError, ValidatorFailureError } from '../core/errors';
import type { FieldSpec } from '../types';

export type ValidationResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; message: string };

/**
 * Turns a raw extracted value into the stored value. Reject by returning
 * `invalid(message)` or throwing a ValidationError; a bare return value is
 * taken as accepted.
 */
export type Validator<T = unknown> = (raw: unknown) => T | ValidationResult<T>;

export interface FieldOptions<T = unknown> {
  formatHint?: string;
  validator?: Validator<T>;
  optional?: boolean;
}

const OPTIONAL_MARKER = /\(optional\)/i;

export const valid = <T>(value: T): ValidationResult<T> => ({ ok: true, value });
export const invalid = (message: string): ValidationResult<never> => ({ ok: false, message });

function isValidationResult(value: unknown): value is ValidationResult {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  return value.ok === true ? 'value' in value : value.ok === false && 'message' in value;
}

/**
 * True when the model left the slot empty. Such values are skipped rather
 * than validated.
 */
export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

export class Field<T = unknown> {
  readonly formatHint?: string;
  readonly optional: boolean;
  private readonly validator?: Validator<T>;

  constructor(
    readonly name: string,
    readonly description: string,
    options: FieldOptions<T> = {}
  ) {
    this.formatHint = options.formatHint;
    this.validator = options.validator;
    this.optional = options.optional ?? OPTIONAL_MARKER.test(description);
  }

  validate(raw: unknown): ValidationResult {
    if (isBlank(raw)) {
      return invalid(`${this.description} was not provided`);
    }
    if (!this.validator) {
      return valid(raw);
    }

    try {
      const result = this.validator(raw);
      return isValidationResult(result) ? result : valid(result);
    } catch (error) {
      if (error instanceof ValidatorFailureError) throw error;
      if (error instanceof ValidationError) return invalid(error.message);
      throw new ValidatorFailureError(this.name, error);
    }
  }

  toSpec(): FieldSpec {
    return {
      name: this.name,
      description: this.description,
      formatHint: this.formatHint,
      optional: this.optional,
    };
  }
}
