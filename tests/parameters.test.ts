/**
 * Tests for option, flag and argument declarations
 */

import { describe, it, expect } from 'vitest';
import { Arity } from '../src/schema/arity.js';
import { types } from '../src/schema/value-types.js';
import { Argument } from '../src/model/argument.js';
import { DecodeError, DeclarationError, ValueError } from '../src/model/errors.js';
import { Flag } from '../src/model/flag.js';
import { Option } from '../src/model/option.js';

function declarationCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof DeclarationError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

describe('Option', () => {
  it('should default to zero-or-one values', () => {
    const option = new Option({ long: 'name', description: 'Name', type: types.string() });
    expect(option.arity.equals(Arity.zeroOrOne)).toBe(true);
    expect(option.key).toBe('name');
    expect(option.displayName).toBe('--name');
  });

  it('should key a short-only option by its character', () => {
    const option = new Option({ short: 'o', description: 'Output', type: types.string() });
    expect(option.key).toBe('o');
    expect(option.displayName).toBe('-o');
  });

  it('should require a long or short name', () => {
    expect(declarationCode(() => new Option({ description: 'Nameless', type: types.string() }))).toBe(
      'MISSING_NAME'
    );
  });

  it('should validate name syntax', () => {
    expect(declarationCode(() => new Option({ short: 'ab', description: 'x', type: types.string() }))).toBe(
      'INVALID_SHORT_NAME'
    );
    expect(declarationCode(() => new Option({ long: '--x', description: 'x', type: types.string() }))).toBe(
      'INVALID_LONG_NAME'
    );
    expect(declarationCode(() => new Option({ long: 'a=b', description: 'x', type: types.string() }))).toBe(
      'INVALID_LONG_NAME'
    );
  });

  it('should return defaults when nothing else is set', () => {
    const option = new Option({
      long: 'nums',
      description: 'Numbers',
      type: types.int(),
      arity: new Arity(0, 3),
      defaults: [3, 1, 2],
    });
    expect(option.effectiveValues()).toEqual([3, 1, 2]);
    expect(option.hasDefault()).toBe(true);
    expect(option.hasValue()).toBe(false);
  });

  it('should prefer preset values over defaults', () => {
    const option = new Option({ long: 'count', description: 'Count', type: types.int(), defaults: [1] });
    option.setValues([5]);
    expect(option.effectiveValues()).toEqual([5]);
    expect(option.hasValue()).toBe(true);
  });

  it('should decode raw parsed values ahead of presets and defaults', () => {
    const option = new Option({ long: 'count', description: 'Count', type: types.int(), defaults: [1] });
    option.setValues([5]);
    option.setRawValues(['7']);
    expect(option.effectiveValues()).toEqual([7]);
    option.clearRawValues();
    expect(option.rawValues()).toBeUndefined();
    expect(option.effectiveValues()).toEqual([5]);
  });

  it('should name the parameter when a raw value fails to decode', () => {
    const option = new Option({ long: 'count', description: 'Count', type: types.int() });
    option.setRawValues(['many']);
    let caught: unknown;
    try {
      option.effectiveValues();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught instanceof DecodeError ? caught.parameter : undefined).toBe('count');
  });

  it('should fail with NO_VALUE_SET when nothing is available', () => {
    const option = new Option({ long: 'count', description: 'Count', type: types.int() });
    expect(() => option.effectiveValues()).toThrow(ValueError);
    expect(() => option.effectiveValues()).toThrow('No value set for "count"');
  });

  it('should reject a second default or value', () => {
    const option = new Option({ long: 'count', description: 'Count', type: types.int(), defaults: [1] });
    expect(declarationCode(() => option.setDefaults([2]))).toBe('DEFAULT_ALREADY_SET');
    option.setValues([3]);
    expect(declarationCode(() => option.setValues([4]))).toBe('VALUE_ALREADY_SET');
  });

  it('should reject values that violate the arity', () => {
    const option = new Option({ long: 'count', description: 'Count', type: types.int() });
    expect(declarationCode(() => option.setDefaults([1, 2]))).toBe('ARITY_VIOLATION');
  });

  it('should reject narrowing the arity below stored defaults', () => {
    const option = new Option({
      long: 'nums',
      description: 'Numbers',
      type: types.int(),
      arity: new Arity(0, 3),
      defaults: [1, 2],
    });
    expect(declarationCode(() => option.withArity(Arity.exactlyOne))).toBe('ARITY_VIOLATION');
    expect(option.withArity(new Arity(2, 2)).arity.toString()).toBe('{2,2}');
  });

  it('should report satisfaction against its arity', () => {
    const option = new Option({ long: 'pair', description: 'Pair', type: types.int(), arity: new Arity(2, 2) });
    expect(option.isSatisfied(1)).toBe(false);
    expect(option.isSatisfied(2)).toBe(true);
  });

  it('should encode defaults for display', () => {
    const option = new Option({ long: 'rate', description: 'Rate', type: types.float(), defaults: [0.5] });
    expect(option.encodedDefaults()).toEqual(['0.5']);
    expect(option.fallbackRawValues()).toEqual(['0.5']);
  });
});

describe('Flag', () => {
  it('should default to false and toggle to true', () => {
    const flag = new Flag({ long: 'verbose', short: 'v', description: 'Verbose' });
    expect(flag.defaultValue).toBe(false);
    expect(flag.presentValue).toBe(true);
    expect(flag.effectiveValues()).toEqual([false]);
    expect(flag.arity.equals(Arity.zeroOrOne)).toBe(true);
  });

  it('should toggle a true default to false', () => {
    const flag = new Flag({ long: 'color', description: 'Colour output', default: true });
    expect(flag.presentValue).toBe(false);
  });

  it('should keep its toggle when a value is preset', () => {
    const flag = new Flag({ short: 'q', description: 'Quiet' });
    flag.setValues([true]);
    expect(flag.effectiveValues()).toEqual([true]);
    expect(flag.presentValue).toBe(true);
    expect(flag.key).toBe('q');
  });
});

describe('Argument', () => {
  it('should take exactly one value when required', () => {
    const argument = new Argument({ name: 'input', description: 'Input', type: types.string(), required: true });
    expect(argument.arity.equals(Arity.exactlyOne)).toBe(true);
    expect(argument.key).toBe('input');
  });

  it('should take zero or one value when optional', () => {
    const argument = new Argument({ name: 'mode', description: 'Mode', type: types.string() });
    expect(argument.required).toBe(false);
    expect(argument.arity.equals(Arity.zeroOrOne)).toBe(true);
  });

  it('should refuse defaults on a required argument', () => {
    const argument = new Argument({ name: 'input', description: 'Input', type: types.string(), required: true });
    expect(declarationCode(() => argument.setDefaults(['x']))).toBe('REQUIRED_WITH_DEFAULT');
  });

  it('should refuse widening a required argument to accept zero values', () => {
    const argument = new Argument({ name: 'input', description: 'Input', type: types.string(), required: true });
    expect(declarationCode(() => argument.withArity(Arity.zeroOrMore))).toBe('REQUIRED_ARITY_WIDENED');
    expect(argument.withArity(Arity.oneOrMore).arity.isUnbounded()).toBe(true);
  });

  it('should refuse an arity that accepts no values', () => {
    const argument = new Argument({ name: 'mode', description: 'Mode', type: types.string() });
    expect(declarationCode(() => argument.withArity(Arity.zero))).toBe('INVALID_ARITY');
  });

  it('should report REQUIRED_MISSING for a required argument with no value', () => {
    const argument = new Argument({ name: 'input', description: 'Input', type: types.string(), required: true });
    try {
      argument.effectiveValues();
      expect.fail('expected ValueError');
    } catch (err) {
      expect(err).toBeInstanceOf(ValueError);
      if (err instanceof ValueError) {
        expect(err.code).toBe('REQUIRED_MISSING');
        expect(err.parameter).toBe('input');
      }
    }
  });

  it('should return defaults in order for an optional argument', () => {
    const argument = new Argument({
      name: 'files',
      description: 'Files',
      type: types.string(),
      arity: Arity.zeroOrMore,
      defaults: ['b.txt', 'a.txt'],
    });
    expect(argument.effectiveValues()).toEqual(['b.txt', 'a.txt']);
  });
});
