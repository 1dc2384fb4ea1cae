/**
 * Help text for a command node
 *
 * The parser only decides when help is shown and for which node; everything
 * about layout lives here.
 */

import chalk, { Chalk } from 'chalk';
import type { ChalkInstance, ColorSupportLevel } from 'chalk';
import type { Command } from '../model/command.js';
import type { Option } from '../model/option.js';
import type { Arity } from '../schema/arity.js';
import { HELP_PADDING, helpHeaders, helpLabels } from '../strings/labels.js';

export interface HelpOptions {
  /** Colour output (defaults to chalk's terminal detection) */
  color?: boolean;
}

function painter(options: HelpOptions): ChalkInstance {
  if (options.color === undefined) {
    return chalk;
  }
  const level: ColorSupportLevel = options.color ? (chalk.level > 0 ? chalk.level : 1) : 0;
  return new Chalk({ level });
}

/**
 * Pad `label` to the description column, wrapping when it is too wide
 */
function row(label: string, description: string, paint: (text: string) => string): string {
  const line = `  ${label}`;
  if (line.length <= HELP_PADDING) {
    return `${paint(line)}${' '.repeat(HELP_PADDING - line.length)}${description}`;
  }
  return `${paint(line)}\n${' '.repeat(HELP_PADDING)}${description}`;
}

function valuePlaceholder(arity: Arity): string {
  if (arity.max === 0) {
    return '';
  }
  const repeat = arity.max > 1 ? helpLabels.repeatMarker : '';
  const placeholder = arity.min === 0 ? helpLabels.valuePlaceholder : helpLabels.requiredValuePlaceholder;
  return `${placeholder}${repeat}`;
}

function optionLabel(option: Option<unknown>): string {
  const value = valuePlaceholder(option.arity);
  if (option.long === undefined) {
    return `-${option.short ?? ''}${value}`;
  }
  const short = option.short !== undefined ? `-${option.short}, ` : '    ';
  return `${short}--${option.long}${value}`;
}

function usageLine(command: Command): string {
  const parts = [command.path().join(' ')];
  if (command.options.length > 0 || command.flags.length > 0) {
    parts.push(helpLabels.optionsPlaceholder);
  }
  if (command.subcommands.length > 0) {
    parts.push(helpLabels.commandPlaceholder);
  }
  for (const argument of command.arguments) {
    const repeat = argument.arity.max > 1 ? helpLabels.repeatMarker : '';
    parts.push(argument.required ? `<${argument.name}>${repeat}` : `[${argument.name}]${repeat}`);
  }
  return parts.join(' ');
}

/**
 * Render help for one command node
 */
export function renderHelp(command: Command, options: HelpOptions = {}): string {
  const c = painter(options);
  const name = (text: string) => c.cyan(text);
  const lines: string[] = [];

  lines.push(`${c.bold(command.name)} - ${command.description}`);
  lines.push('');
  lines.push(c.bold(helpHeaders.usage));
  lines.push(`    ${usageLine(command)}`);

  if (command.arguments.length > 0) {
    lines.push('');
    lines.push(c.bold(helpHeaders.arguments));
    for (const argument of command.arguments) {
      const status = argument.required ? helpLabels.required : helpLabels.optional;
      const defaults = argument.encodedDefaults();
      const suffix = defaults !== undefined ? ` ${helpLabels.defaultValue(defaults.join(', '))}` : '';
      lines.push(row(argument.name, `${argument.description} (${status})${suffix}`, name));
    }
  }

  if (command.options.length > 0) {
    lines.push('');
    lines.push(c.bold(helpHeaders.options));
    for (const option of command.options) {
      const defaults = option.encodedDefaults();
      const suffix = defaults !== undefined ? ` ${helpLabels.defaultValue(defaults.join(', '))}` : '';
      lines.push(row(optionLabel(option), `${option.description}${suffix}`, name));
    }
  }

  lines.push('');
  lines.push(c.bold(helpHeaders.flags));
  for (const flag of command.flags) {
    if (flag.long === 'help') {
      continue;
    }
    const label =
      flag.long === undefined
        ? `-${flag.short ?? ''}`
        : `${flag.short !== undefined ? `-${flag.short}, ` : '    '}--${flag.long}`;
    lines.push(row(label, flag.description, name));
  }
  lines.push(row(helpLabels.helpFlag, helpLabels.helpDescription, name));

  if (command.subcommands.length > 0) {
    lines.push('');
    lines.push(c.bold(helpHeaders.commands));
    for (const subcommand of command.subcommands) {
      lines.push(row(subcommand.name, subcommand.description, name));
    }
  }

  return `${lines.join('\n')}\n`;
}
