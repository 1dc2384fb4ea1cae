import chalk from 'chalk';
import { formatDiagnostic } from '../parser/diagnostics.js';
import type { ParseDiagnostic } from '../parser/diagnostics.js';
import { parseErrors } from '../strings/errors.js';

/**
 * Global output format (set by the runner's `json` option)
 */
let globalJsonMode = false;

export function setJsonMode(enabled: boolean): void {
  globalJsonMode = enabled;
}

export function isJsonMode(): boolean {
  return globalJsonMode;
}

/**
 * Output error message
 */
export function error(message: string, details?: unknown): void {
  if (globalJsonMode) {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗'), message);
    if (details) {
      console.error(chalk.gray(String(details)));
    }
  }
}

/**
 * Report every diagnostic from a failed parse
 */
export function printDiagnostics(diagnostics: readonly ParseDiagnostic[]): void {
  if (globalJsonMode) {
    const entries = diagnostics.map((d) => ({ ...d, message: formatDiagnostic(d) }));
    console.error(JSON.stringify({ success: false, diagnostics: entries }));
    return;
  }

  for (const diagnostic of diagnostics) {
    console.error(chalk.red('✗'), formatDiagnostic(diagnostic));
    if (diagnostic.code === 'UNKNOWN_OPTION' && diagnostic.suggestion !== undefined) {
      console.error(chalk.yellow(`  ${parseErrors.didYouMean(diagnostic.suggestion)}`));
    }
  }
}
