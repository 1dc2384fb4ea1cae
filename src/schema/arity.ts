import { DeclarationError } from '../model/errors.js';
import { declarationErrors } from '../strings/errors.js';

/**
 * Upper bound used by the open-ended arities. Unreachable by any real argv.
 */
export const UNBOUNDED = Number.MAX_SAFE_INTEGER;

/**
 * Inclusive [min, max] range of values a parameter accepts
 */
export class Arity {
  readonly min: number;
  readonly max: number;

  constructor(min: number, max: number) {
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < 0) {
      throw new DeclarationError(declarationErrors.arityNotInteger(min, max), 'INVALID_ARITY');
    }
    if (min > max) {
      throw new DeclarationError(declarationErrors.arityMinAboveMax(min, max), 'INVALID_ARITY');
    }
    this.min = min;
    this.max = max;
  }

  static readonly zero = new Arity(0, 0);
  static readonly zeroOrOne = new Arity(0, 1);
  static readonly zeroOrMore = new Arity(0, UNBOUNDED);
  static readonly exactlyOne = new Arity(1, 1);
  static readonly oneOrMore = new Arity(1, UNBOUNDED);
  static readonly many = new Arity(UNBOUNDED, UNBOUNDED);

  /** Whether `count` values satisfy this arity */
  isSatisfied(count: number): boolean {
    return this.min <= count && count <= this.max;
  }

  isUnbounded(): boolean {
    return this.max === UNBOUNDED;
  }

  equals(other: Arity): boolean {
    return this.min === other.min && this.max === other.max;
  }

  toString(): string {
    const max = this.isUnbounded() ? '*' : String(this.max);
    return `{${this.min},${max}}`;
  }
}
