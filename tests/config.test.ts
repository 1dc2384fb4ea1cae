/**
 * Tests for parser configuration and debug mode
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { ParserConfigSchema, resolveParserConfig } from '../src/schema/config.js';
import { DeclarationError } from '../src/model/errors.js';
import { isDebugMode } from '../src/utils/debug.js';

describe('resolveParserConfig', () => {
  it('should fill defaults', () => {
    expect(resolveParserConfig()).toEqual({
      allowUnknownOptions: false,
      doubleHyphenDelimiter: true,
      allowOptionsAfterArgs: true,
      debug: false,
    });
  });

  it('should keep given values', () => {
    const config = resolveParserConfig({ allowOptionsAfterArgs: false });
    expect(config.allowOptionsAfterArgs).toBe(false);
    expect(config.doubleHyphenDelimiter).toBe(true);
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(resolveParserConfig({}))).toBe(true);
  });

  it('should reject a wrongly typed field', () => {
    try {
      resolveParserConfig({ allowUnknownOptions: 'yes' });
      expect.fail('expected DeclarationError');
    } catch (err) {
      expect(err).toBeInstanceOf(DeclarationError);
      if (err instanceof DeclarationError) {
        expect(err.code).toBe('INVALID_CONFIG');
        expect(err.message).toBe(
          'Invalid parser configuration: allowUnknownOptions: Expected boolean, received string'
        );
      }
    }
  });

  it('should reject unknown keys', () => {
    expect(() => resolveParserConfig({ allowUnknown: true })).toThrow(DeclarationError);
  });

  it('should describe its input with the schema', () => {
    expect(ParserConfigSchema.safeParse({ debug: true }).success).toBe(true);
  });
});

describe('isDebugMode', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should follow the config flag', () => {
    vi.stubEnv('ARGTREE_DEBUG', '');
    expect(isDebugMode(true)).toBe(true);
    expect(isDebugMode(false)).toBe(false);
    expect(isDebugMode()).toBe(false);
  });

  it('should turn on with ARGTREE_DEBUG=1', () => {
    vi.stubEnv('ARGTREE_DEBUG', '1');
    expect(isDebugMode()).toBe(true);
  });
});
