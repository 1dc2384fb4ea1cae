/**
 * Tests for the built-in value types
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { types } from '../src/schema/value-types.js';
import type { ValueType } from '../src/schema/value-types.js';
import { DecodeError } from '../src/model/errors.js';

function decodeFailure<T>(type: ValueType<T>, raw: string): DecodeError {
  try {
    type.decode(raw);
  } catch (err) {
    if (err instanceof DecodeError) {
      return err;
    }
    throw err;
  }
  throw new Error(`expected "${raw}" to fail decoding as ${type.name}`);
}

describe('types.string', () => {
  it('should pass values through unchanged', () => {
    expect(types.string().decode('hello world')).toBe('hello world');
    expect(types.string().encode('x')).toBe('x');
  });
});

describe('types.int', () => {
  it('should decode signed integers', () => {
    expect(types.int().decode('42')).toBe(42);
    expect(types.int().decode('-7')).toBe(-7);
    expect(types.int().decode('+3')).toBe(3);
  });

  it('should reject non-integers', () => {
    const err = decodeFailure(types.int(), 'abc');
    expect(err.code).toBe('INVALID_FORMAT');
    expect(err.message).toBe('Invalid integer: "abc"');
    expect(err.raw).toBe('abc');
    expect(decodeFailure(types.int(), '1.5').code).toBe('INVALID_FORMAT');
  });

  it('should report integers outside the safe range', () => {
    const err = decodeFailure(types.int(), '99999999999999999999');
    expect(err.code).toBe('OUT_OF_RANGE');
    expect(err.message).toBe('Integer out of range: "99999999999999999999"');
  });

  it('should encode as decimal text', () => {
    expect(types.int().encode(12)).toBe('12');
  });
});

describe('types.float', () => {
  it('should decode decimal and exponent forms', () => {
    expect(types.float().decode('3.5')).toBe(3.5);
    expect(types.float().decode('1e3')).toBe(1000);
    expect(types.float().decode('.25')).toBe(0.25);
  });

  it('should reject non-numbers', () => {
    expect(decodeFailure(types.float(), 'NaN').message).toBe('Invalid number: "NaN"');
  });
});

describe('types.boolean', () => {
  it('should accept true/false/1/0', () => {
    expect(types.boolean().decode('true')).toBe(true);
    expect(types.boolean().decode('1')).toBe(true);
    expect(types.boolean().decode('false')).toBe(false);
    expect(types.boolean().decode('0')).toBe(false);
  });

  it('should reject anything else', () => {
    expect(decodeFailure(types.boolean(), 'yes').code).toBe('INVALID_FORMAT');
  });

  it('should encode as true/false', () => {
    expect(types.boolean().encode(false)).toBe('false');
  });
});

describe('types.enumOf', () => {
  const level = types.enumOf(['debug', 'info']);

  it('should decode declared choices', () => {
    expect(level.decode('info')).toBe('info');
  });

  it('should list the choices when rejecting a value', () => {
    const err = decodeFailure(level, 'loud');
    expect(err.code).toBe('INVALID_ENUM_VALUE');
    expect(err.message).toBe('Invalid value "loud" (expected one of: debug, info)');
  });
});

describe('types.json', () => {
  const worker = types.json(z.object({ name: z.string(), id: z.number() }));

  it('should decode an object and drop unknown fields', () => {
    expect(worker.decode('{"name":"alpha","id":1,"extra":true}')).toEqual({ name: 'alpha', id: 1 });
  });

  it('should report malformed JSON', () => {
    expect(decodeFailure(worker, '{').code).toBe('INVALID_JSON');
  });

  it('should report a missing field by path', () => {
    const err = decodeFailure(worker, '{"name":"alpha"}');
    expect(err.code).toBe('MISSING_FIELD');
    expect(err.message).toBe('Missing required field: id');
  });

  it('should report a field of the wrong type', () => {
    const err = decodeFailure(worker, '{"name":"alpha","id":"one"}');
    expect(err.code).toBe('INVALID_FORMAT');
    expect(err.message).toBe('Invalid value: id: Expected number, received string');
  });

  it('should encode as JSON', () => {
    expect(worker.encode({ name: 'beta', id: 2 })).toBe('{"name":"beta","id":2}');
  });
});

describe('types.custom', () => {
  it('should use the supplied codec', () => {
    const upper = types.custom('upper', (raw) => raw.toUpperCase());
    expect(upper.name).toBe('upper');
    expect(upper.decode('abc')).toBe('ABC');
    expect(upper.encode('ABC')).toBe('ABC');
  });
});
