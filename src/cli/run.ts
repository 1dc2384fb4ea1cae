/**
 * Runner: parse argv, then show help, report diagnostics or invoke the action
 */

import type { Command } from '../model/command.js';
import { DecodeError } from '../model/errors.js';
import { Parser } from '../parser/engine.js';
import type { ParserConfigInput } from '../schema/config.js';
import { EXIT_CODES } from './exit-codes.js';
import type { ExitCode } from './exit-codes.js';
import { renderHelp } from './help.js';
import { error, printDiagnostics, setJsonMode } from './output.js';

export interface RunOptions {
  config?: ParserConfigInput;
  /** Colour help text (defaults to terminal detection) */
  color?: boolean;
  /** Report errors as JSON for this run */
  json?: boolean;
}

/**
 * Parse `argv` against `root` and run the resulting command.
 *
 * - help requested, or terminal node has no action: help on stdout, SUCCESS
 * - parse diagnostics: diagnostics and help on stderr, USAGE_ERROR
 * - action throws DecodeError: INVALID_VALUE; anything else thrown: ERROR
 */
export async function run(
  root: Command,
  argv: readonly string[] = process.argv.slice(2),
  options: RunOptions = {}
): Promise<ExitCode> {
  setJsonMode(options.json ?? false);

  const parser = new Parser(root, options.config);
  const outcome = parser.parse(argv);
  const helpOptions = { color: options.color };

  try {
    switch (outcome.status) {
      case 'help':
        console.log(renderHelp(outcome.command, helpOptions));
        return EXIT_CODES.SUCCESS;

      case 'error':
        printDiagnostics(outcome.diagnostics);
        console.error(renderHelp(outcome.command, helpOptions));
        return EXIT_CODES.USAGE_ERROR;

      case 'ok':
        if (!outcome.command.isLeaf()) {
          console.log(renderHelp(outcome.command, helpOptions));
          return EXIT_CODES.SUCCESS;
        }
        try {
          await outcome.command.execute(outcome.context);
          return EXIT_CODES.SUCCESS;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          error(message);
          return err instanceof DecodeError ? EXIT_CODES.INVALID_VALUE : EXIT_CODES.ERROR;
        }
    }
  } finally {
    outcome.context.release();
  }
}

/**
 * Run and record the exit code on the process
 */
export async function runAndExit(
  root: Command,
  argv: readonly string[] = process.argv.slice(2),
  options: RunOptions = {}
): Promise<void> {
  process.exitCode = await run(root, argv, options);
}
