import { z } from 'zod';
import { DecodeError } from '../model/errors.js';
import { decodeErrors } from '../strings/errors.js';

/**
 * String <-> typed value codec bound to a parameter at declaration time.
 *
 * The parser never looks inside a value type: it only stores raw strings.
 * Decoding happens lazily when an action reads a value back.
 */
export interface ValueType<T> {
  /** Type tag shown in diagnostics and help */
  readonly name: string;
  decode(raw: string): T;
  encode(value: T): string;
}

/** Decoded type of a value type */
export type ValueOf<V> = V extends ValueType<infer T> ? T : never;

const IntegerString = z
  .string()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().int().safe());

const NumberString = z
  .string()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number)
  .pipe(z.number().finite());

const BooleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

/**
 * Summarize zod issues as "path: message" pairs
 */
function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const string: ValueType<string> = {
  name: 'string',
  decode: (raw) => raw,
  encode: (value) => value,
};

const int: ValueType<number> = {
  name: 'int',
  decode(raw) {
    const result = IntegerString.safeParse(raw);
    if (result.success) {
      return result.data;
    }
    const outOfRange = result.error.issues.some((i) => i.code === 'too_big' || i.code === 'too_small');
    if (outOfRange) {
      throw new DecodeError(decodeErrors.outOfRange(raw), 'OUT_OF_RANGE', raw);
    }
    throw new DecodeError(decodeErrors.invalidInteger(raw), 'INVALID_FORMAT', raw);
  },
  encode: (value) => String(value),
};

const float: ValueType<number> = {
  name: 'float',
  decode(raw) {
    const result = NumberString.safeParse(raw);
    if (!result.success) {
      throw new DecodeError(decodeErrors.invalidNumber(raw), 'INVALID_FORMAT', raw);
    }
    return result.data;
  },
  encode: (value) => String(value),
};

const boolean: ValueType<boolean> = {
  name: 'boolean',
  decode(raw) {
    const result = BooleanString.safeParse(raw);
    if (!result.success) {
      throw new DecodeError(decodeErrors.invalidBoolean(raw), 'INVALID_FORMAT', raw);
    }
    return result.data;
  },
  encode: (value) => (value ? 'true' : 'false'),
};

function enumOf<const T extends readonly [string, ...string[]]>(choices: T): ValueType<T[number]> {
  const schema = z.enum(choices);
  return {
    name: 'enum',
    decode(raw) {
      const result = schema.safeParse(raw);
      if (!result.success) {
        throw new DecodeError(decodeErrors.invalidEnumValue(raw, choices), 'INVALID_ENUM_VALUE', raw);
      }
      return result.data;
    },
    encode: (value) => value,
  };
}

/**
 * Struct-typed value carried as a JSON document. Fields the schema does not
 * name are dropped rather than rejected (zod's default object behaviour).
 */
function json<S extends z.ZodTypeAny>(schema: S): ValueType<z.output<S>> {
  return {
    name: 'json',
    decode(raw) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new DecodeError(decodeErrors.invalidJson(message), 'INVALID_JSON', raw);
      }

      const result = schema.safeParse(parsed);
      if (result.success) {
        return result.data;
      }

      const missing = result.error.issues.find(
        (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
      );
      if (missing) {
        throw new DecodeError(decodeErrors.missingField(missing.path.join('.')), 'MISSING_FIELD', raw);
      }
      throw new DecodeError(decodeErrors.invalidField(formatIssues(result.error.issues)), 'INVALID_FORMAT', raw);
    },
    encode: (value) => JSON.stringify(value),
  };
}

/**
 * A caller-supplied codec. `decode` should throw DecodeError on bad input.
 */
function custom<T>(name: string, decode: (raw: string) => T, encode: (value: T) => string = String): ValueType<T> {
  return { name, decode, encode };
}

/**
 * Decode one raw value, tagging codec failures with the parameter name
 */
export function decodeNamed<T>(name: string, type: ValueType<T>, raw: string): T {
  try {
    return type.decode(raw);
  } catch (err) {
    if (err instanceof DecodeError && err.parameter === undefined) {
      throw new DecodeError(decodeErrors.forParameter(name, err.message), err.code, err.raw, name);
    }
    throw err;
  }
}

/**
 * Built-in value types
 */
export const types = {
  string: () => string,
  int: () => int,
  float: () => float,
  boolean: () => boolean,
  enumOf,
  json,
  custom,
} as const;
