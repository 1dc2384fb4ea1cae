/**
 * Tests for console output helpers
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { error, isJsonMode, printDiagnostics, setJsonMode } from '../src/cli/output.js';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  setJsonMode(false);
});

describe('text mode', () => {
  it('should prefix errors with a marker', () => {
    error('failed');
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('✗'), 'failed');
  });

  it('should print error details on a second line', () => {
    error('failed', 'at step 2');
    expect(console.error).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenNthCalledWith(2, expect.stringContaining('at step 2'));
  });

  it('should print each diagnostic on its own line', () => {
    printDiagnostics([
      { code: 'REQUIRED_ARGUMENT_MISSING', name: 'input' },
      { code: 'UNEXPECTED_POSITIONAL', token: 'extra', command: 'tool' },
    ]);
    expect(console.error).toHaveBeenNthCalledWith(1, expect.any(String), 'Missing required argument: input');
    expect(console.error).toHaveBeenNthCalledWith(2, expect.any(String), 'Unexpected argument "extra" for command "tool"');
  });
});

describe('JSON mode', () => {
  beforeEach(() => {
    setJsonMode(true);
  });

  it('should report the mode', () => {
    expect(isJsonMode()).toBe(true);
  });

  it('should report errors as JSON on stderr', () => {
    error('failed');
    expect(console.error).toHaveBeenCalledWith(JSON.stringify({ success: false, error: 'failed' }));
  });

  it('should report diagnostics as a single JSON document', () => {
    printDiagnostics([{ code: 'REQUIRED_ARGUMENT_MISSING', name: 'input' }]);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      JSON.stringify({
        success: false,
        diagnostics: [{ code: 'REQUIRED_ARGUMENT_MISSING', name: 'input', message: 'Missing required argument: input' }],
      })
    );
  });
});
