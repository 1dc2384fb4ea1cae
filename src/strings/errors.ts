/**
 * Centralized error messages
 *
 * Organizes error messages by category so declaration errors, parse
 * diagnostics and accessor failures read consistently.
 */

/**
 * Programmer errors raised while building a command tree
 */
export const declarationErrors = {
  arityNotInteger: (min: number, max: number) =>
    `Arity bounds must be non-negative integers (got min=${min}, max=${max})`,
  arityMinAboveMax: (min: number, max: number) =>
    `Arity min (${min}) cannot exceed max (${max})`,
  argumentArityZero: (name: string) =>
    `Argument "${name}" must accept at least one value (arity max is 0)`,
  defaultAlreadySet: (name: string) => `Default value already set for "${name}"`,
  valueAlreadySet: (name: string) => `Value already set for "${name}"`,
  arityViolation: (name: string, count: number, arity: string) =>
    `"${name}" accepts ${arity} value(s), got ${count}`,
  requiredWithDefault: (name: string) =>
    `Required argument "${name}" cannot have a default value`,
  requiredArityWidened: (name: string, arity: string) =>
    `Required argument "${name}" must accept at least one value (got arity ${arity})`,
  requiredAfterOptional: (name: string, command: string) =>
    `Required argument "${name}" cannot follow an optional argument on command "${command}"`,
  missingName: (description: string) =>
    `Declaration "${description}" needs a long name or a short name`,
  invalidShortName: (short: string) =>
    `Short name must be a single character other than "-" and "=" (got "${short}")`,
  invalidLongName: (name: string) =>
    `Long name must be non-empty and cannot start with "-" or contain "=" (got "${name}")`,
  duplicateName: (kind: string, name: string, command: string) =>
    `Duplicate ${kind} "${name}" on command "${command}"`,
  parentAlreadySet: (child: string, parent: string) =>
    `Command "${child}" is already a subcommand of "${parent}"`,
  invalidConfig: (issues: string) => `Invalid parser configuration: ${issues}`,
} as const;

/**
 * User input problems reported at the end of a parse
 */
export const parseErrors = {
  unknownOption: (token: string) => `Unknown option: ${token}`,
  didYouMean: (suggestion: string) => `Did you mean --${suggestion}?`,
  insufficientValues: (name: string, min: number, actual: number) =>
    `"${name}" requires at least ${min} value(s), got ${actual}`,
  tooManyValues: (name: string, max: number, actual: number) =>
    `"${name}" accepts at most ${max} value(s), got ${actual}`,
  unexpectedPositional: (token: string, command: string) =>
    `Unexpected argument "${token}" for command "${command}"`,
  requiredArgumentMissing: (name: string) => `Missing required argument: ${name}`,
} as const;

/**
 * Failures raised while reading values back out of a resolution context
 */
export const accessErrors = {
  optionNotFound: (name: string) => `Option not found: ${name}`,
  argumentNotFound: (name: string) => `Argument not found: ${name}`,
  indexOutOfRange: (name: string, requested: number, stored: number) =>
    `Requested ${requested} value(s) of "${name}" but only ${stored} stored`,
  noValueSet: (name: string) => `No value set for "${name}"`,
  requiredMissing: (name: string) => `Required argument "${name}" has no value`,
  noActionDefined: (command: string) => `Command "${command}" has no action`,
} as const;

/**
 * Raw string to typed value failures
 */
export const decodeErrors = {
  invalidInteger: (raw: string) => `Invalid integer: "${raw}"`,
  invalidNumber: (raw: string) => `Invalid number: "${raw}"`,
  invalidBoolean: (raw: string) => `Invalid boolean: "${raw}" (expected true, false, 1 or 0)`,
  outOfRange: (raw: string) => `Integer out of range: "${raw}"`,
  invalidEnumValue: (raw: string, choices: readonly string[]) =>
    `Invalid value "${raw}" (expected one of: ${choices.join(', ')})`,
  invalidJson: (err: string) => `Invalid JSON${err ? `: ${err}` : ''}`,
  missingField: (path: string) => `Missing required field: ${path}`,
  invalidField: (issues: string) => `Invalid value: ${issues}`,
  forParameter: (name: string, message: string) => `${name}: ${message}`,
} as const;
