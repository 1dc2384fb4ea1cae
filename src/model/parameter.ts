import { Arity } from '../schema/arity.js';
import { decodeNamed } from '../schema/value-types.js';
import type { ValueType } from '../schema/value-types.js';
import { DeclarationError, ValueError } from './errors.js';
import { accessErrors, declarationErrors } from '../strings/errors.js';

export type ParameterKind = 'option' | 'argument' | 'flag';

/**
 * Fields shared by every declaration's config object
 */
export interface ParameterConfig<T> {
  description: string;
  type: ValueType<T>;
  arity?: Arity;
  defaults?: readonly T[];
}

/**
 * One declared parameter bound to a single value type.
 *
 * Three value lists are kept apart: raw strings assigned by the most recent
 * parse, typed values set with `setValues`, and defaults. The parser only
 * ever touches the raw list, and clears it when a new parse starts.
 */
export abstract class Parameter<T> {
  abstract readonly kind: ParameterKind;

  readonly description: string;
  readonly type: ValueType<T>;

  private _arity: Arity;
  private defaults?: T[];
  private current?: T[];
  private raw?: string[];

  protected constructor(config: ParameterConfig<T>, arity: Arity) {
    this.description = config.description;
    this.type = config.type;
    this._arity = arity;
  }

  /** Name the parameter is stored under in a ResolutionContext */
  abstract get key(): string;

  /** Name as a user would type it */
  abstract get displayName(): string;

  get arity(): Arity {
    return this._arity;
  }

  protected assignArity(arity: Arity): void {
    for (const values of [this.defaults, this.current]) {
      if (values && !arity.isSatisfied(values.length)) {
        throw new DeclarationError(
          declarationErrors.arityViolation(this.key, values.length, arity.toString()),
          'ARITY_VIOLATION'
        );
      }
    }
    this._arity = arity;
  }

  setDefaults(values: readonly T[]): this {
    if (this.defaults !== undefined) {
      throw new DeclarationError(declarationErrors.defaultAlreadySet(this.key), 'DEFAULT_ALREADY_SET');
    }
    this.checkCount(values.length);
    this.defaults = [...values];
    return this;
  }

  /** Preset values; they take precedence over defaults */
  setValues(values: readonly T[]): this {
    if (this.current !== undefined) {
      throw new DeclarationError(declarationErrors.valueAlreadySet(this.key), 'VALUE_ALREADY_SET');
    }
    this.checkCount(values.length);
    this.current = [...values];
    return this;
  }

  /** Raw strings assigned by the last parse, if it saw this parameter */
  rawValues(): string[] | undefined {
    return this.raw === undefined ? undefined : [...this.raw];
  }

  /** Record parsed raw strings; replaces what an earlier token recorded */
  setRawValues(values: readonly string[]): void {
    this.raw = [...values];
  }

  clearRawValues(): void {
    this.raw = undefined;
  }

  /**
   * Parsed values (decoded) if any, else preset values, else defaults
   *
   * @throws ValueError when none is present
   * @throws DecodeError when a parsed string does not decode
   */
  effectiveValues(): T[] {
    if (this.raw !== undefined) {
      return this.raw.map((value) => decodeNamed(this.key, this.type, value));
    }
    if (this.current !== undefined) {
      return [...this.current];
    }
    if (this.defaults !== undefined) {
      return [...this.defaults];
    }
    throw this.missingValueError();
  }

  protected missingValueError(): ValueError {
    return new ValueError(accessErrors.noValueSet(this.key), 'NO_VALUE_SET', this.key);
  }

  /** A parse assigned this parameter, or values were set directly */
  hasValue(): boolean {
    return this.raw !== undefined || this.current !== undefined;
  }

  hasDefault(): boolean {
    return this.defaults !== undefined;
  }

  isSatisfied(count: number): boolean {
    return this._arity.isSatisfied(count);
  }

  /** Defaults encoded as raw strings, for help text */
  encodedDefaults(): string[] | undefined {
    return this.defaults?.map((value) => this.type.encode(value));
  }

  /**
   * Raw strings used when a parse leaves this parameter unset
   */
  fallbackRawValues(): string[] | undefined {
    return this.fallbackValues()?.map((value) => this.type.encode(value));
  }

  /** Preset values, else defaults */
  protected fallbackValues(): T[] | undefined {
    return this.current ?? this.defaults;
  }

  private checkCount(count: number): void {
    if (!this._arity.isSatisfied(count)) {
      throw new DeclarationError(
        declarationErrors.arityViolation(this.key, count, this._arity.toString()),
        'ARITY_VIOLATION'
      );
    }
  }
}

/**
 * Long/short naming shared by options and flags
 */
export interface NamedConfig {
  long?: string;
  short?: string;
}

export function validateNames(names: NamedConfig, description: string): void {
  if (names.long === undefined && names.short === undefined) {
    throw new DeclarationError(declarationErrors.missingName(description), 'MISSING_NAME');
  }
  if (names.long !== undefined && (names.long.length === 0 || names.long.startsWith('-') || names.long.includes('='))) {
    throw new DeclarationError(declarationErrors.invalidLongName(names.long), 'INVALID_LONG_NAME');
  }
  if (names.short !== undefined && (names.short.length !== 1 || names.short === '-' || names.short === '=')) {
    throw new DeclarationError(declarationErrors.invalidShortName(names.short), 'INVALID_SHORT_NAME');
  }
}

/**
 * Context key for a named declaration: long name, else the short character
 */
export function namedKey(names: NamedConfig): string {
  return names.long ?? names.short ?? '';
}

export function namedDisplay(names: NamedConfig): string {
  return names.long !== undefined ? `--${names.long}` : `-${names.short ?? ''}`;
}
