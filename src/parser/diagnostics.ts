import { parseErrors } from '../strings/errors.js';

/**
 * A user input problem found while parsing. The parser keeps scanning after
 * recording one so a single run can report several.
 */
export type ParseDiagnostic =
  | {
      code: 'UNKNOWN_OPTION';
      /** Option name as typed, without dashes */
      name: string;
      token: string;
      suggestion?: string;
    }
  | {
      code: 'INSUFFICIENT_VALUES';
      name: string;
      min: number;
      actual: number;
    }
  | {
      code: 'TOO_MANY_VALUES';
      name: string;
      max: number;
      actual: number;
      token?: string;
    }
  | {
      code: 'UNEXPECTED_POSITIONAL';
      token: string;
      command: string;
    }
  | {
      code: 'REQUIRED_ARGUMENT_MISSING';
      name: string;
    };

export type DiagnosticCode = ParseDiagnostic['code'];

/**
 * One-line message for a diagnostic
 */
export function formatDiagnostic(diagnostic: ParseDiagnostic): string {
  switch (diagnostic.code) {
    case 'UNKNOWN_OPTION':
      return parseErrors.unknownOption(diagnostic.token);
    case 'INSUFFICIENT_VALUES':
      return parseErrors.insufficientValues(diagnostic.name, diagnostic.min, diagnostic.actual);
    case 'TOO_MANY_VALUES':
      return parseErrors.tooManyValues(diagnostic.name, diagnostic.max, diagnostic.actual);
    case 'UNEXPECTED_POSITIONAL':
      return parseErrors.unexpectedPositional(diagnostic.token, diagnostic.command);
    case 'REQUIRED_ARGUMENT_MISSING':
      return parseErrors.requiredArgumentMissing(diagnostic.name);
  }
}
