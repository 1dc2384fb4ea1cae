/**
 * Section headers and fixed labels used by the help renderer
 */

export const helpHeaders = {
  usage: 'USAGE:',
  arguments: 'ARGUMENTS:',
  options: 'OPTIONS:',
  flags: 'FLAGS:',
  commands: 'COMMANDS:',
} as const;

export const helpLabels = {
  optionsPlaceholder: '[OPTIONS]',
  commandPlaceholder: '<COMMAND>',
  valuePlaceholder: '[=VALUE]',
  requiredValuePlaceholder: '=VALUE',
  repeatMarker: '...',
  required: 'required',
  optional: 'optional',
  helpFlag: '-h, --help',
  helpDescription: 'Print this message and exit',
  defaultValue: (value: string) => `(default: ${value})`,
} as const;

/** Column at which descriptions start */
export const HELP_PADDING = 30;
