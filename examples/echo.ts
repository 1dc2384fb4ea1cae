/**
 * echo: print the given strings, optionally interpreting backslash escapes
 *
 * Usage: echo [-n] [-e] [strings...]
 *
 * Options are only recognized before the first string, so `echo a -n`
 * prints "a -n".
 */

import { realpathSync } from 'node:fs';
import { Arity } from '../src/schema/arity.js';
import type { ParserConfigInput } from '../src/schema/config.js';
import { types } from '../src/schema/value-types.js';
import { Argument } from '../src/model/argument.js';
import { Command } from '../src/model/command.js';
import { Flag } from '../src/model/flag.js';
import { runAndExit } from '../src/cli/run.js';

export type Write = (text: string) => void;

export const ECHO_CONFIG = {
  allowUnknownOptions: false,
  doubleHyphenDelimiter: true,
  allowOptionsAfterArgs: false,
} satisfies ParserConfigInput;

const SIMPLE_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  e: '\x1b',
  E: '\x1b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
};

const HEX_DIGIT = /^[0-9a-fA-F]$/;
const OCTAL_DIGIT = /^[0-7]$/;

/**
 * Read up to `max` digits matching `digit` starting at `start`
 */
function readDigits(input: string, start: number, max: number, digit: RegExp): string {
  let end = start;
  while (end < input.length && end - start < max && digit.test(input[end])) {
    end++;
  }
  return input.slice(start, end);
}

export interface EscapeResult {
  text: string;
  /** `\c` was seen: nothing more, not even the newline, is printed */
  stop: boolean;
}

/**
 * Expand backslash escapes the way `echo -e` does.
 * Unknown escapes and escapes without digits are kept literally.
 */
export function interpretEscapes(input: string): EscapeResult {
  let text = '';
  let i = 0;

  while (i < input.length) {
    const char = input[i];
    if (char !== '\\' || i + 1 >= input.length) {
      text += char;
      i++;
      continue;
    }

    const escape = input[i + 1];
    i += 2;

    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      text += simple;
      continue;
    }

    switch (escape) {
      case 'c':
        return { text, stop: true };

      case 'x': {
        const digits = readDigits(input, i, 2, HEX_DIGIT);
        if (digits.length === 0) {
          text += '\\x';
        } else {
          text += String.fromCharCode(parseInt(digits, 16));
          i += digits.length;
        }
        break;
      }

      case '0': {
        const digits = readDigits(input, i, 3, OCTAL_DIGIT);
        text += String.fromCharCode(digits.length > 0 ? parseInt(digits, 8) & 0xff : 0);
        i += digits.length;
        break;
      }

      case 'u':
      case 'U': {
        const digits = readDigits(input, i, escape === 'u' ? 4 : 8, HEX_DIGIT);
        if (digits.length === 0) {
          text += `\\${escape}`;
          break;
        }
        const codePoint = parseInt(digits, 16);
        // Out-of-range code points print nothing
        if (codePoint <= 0x10ffff) {
          text += String.fromCodePoint(codePoint);
        }
        i += digits.length;
        break;
      }

      default:
        text += `\\${escape}`;
    }
  }

  return { text, stop: false };
}

export function createEchoCommand(write: Write = (text) => process.stdout.write(text)): Command {
  const noNewline = new Flag({ short: 'n', description: 'Do not print the trailing newline' });
  const escapes = new Flag({ short: 'e', description: 'Enable interpretation of backslash escapes' });
  const strings = new Argument({
    name: 'strings',
    description: 'Strings to echo',
    type: types.string(),
    arity: Arity.zeroOrMore,
  });

  return new Command({ name: 'echo', description: 'Echo the input arguments' })
    .addFlag(noNewline)
    .addFlag(escapes)
    .addArgument(strings)
    .withAction((ctx) => {
      const joined = ctx.hasArgument(strings.key) ? ctx.values(strings).join(' ') : '';

      if (ctx.flag(escapes)) {
        const { text, stop } = interpretEscapes(joined);
        write(text);
        if (stop) {
          return;
        }
      } else {
        write(joined);
      }

      if (!ctx.flag(noNewline)) {
        write('\n');
      }
    });
}

// Run only when executed directly, not when imported
const entry = process.argv[1];
if (entry && import.meta.url === `file://${realpathSync(entry)}`) {
  await runAndExit(createEchoCommand(), process.argv.slice(2), { config: ECHO_CONFIG });
}
