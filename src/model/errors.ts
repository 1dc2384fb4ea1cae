/**
 * Error types raised by argtree.
 *
 * User input problems found while scanning argv are not errors here; the
 * parser collects them as diagnostics (see parser/diagnostics.ts).
 */

/**
 * A malformed declaration or parser configuration. Raised while the command
 * tree is being built, never while parsing.
 */
export class DeclarationError extends Error {
  constructor(
    message: string,
    public code:
      | 'INVALID_ARITY'
      | 'DEFAULT_ALREADY_SET'
      | 'VALUE_ALREADY_SET'
      | 'ARITY_VIOLATION'
      | 'REQUIRED_WITH_DEFAULT'
      | 'REQUIRED_ARITY_WIDENED'
      | 'ARGUMENT_ORDER'
      | 'MISSING_NAME'
      | 'INVALID_SHORT_NAME'
      | 'INVALID_LONG_NAME'
      | 'DUPLICATE_NAME'
      | 'INVALID_CONFIG'
      | 'PARENT_ALREADY_SET'
  ) {
    super(message);
    this.name = 'DeclarationError';
  }
}

/**
 * A declaration has neither parsed-in values nor defaults
 */
export class ValueError extends Error {
  constructor(
    message: string,
    public code: 'NO_VALUE_SET' | 'REQUIRED_MISSING',
    public parameter: string
  ) {
    super(message);
    this.name = 'ValueError';
  }
}

/**
 * A raw string could not be converted to the declared type
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public code: 'INVALID_FORMAT' | 'INVALID_JSON' | 'MISSING_FIELD' | 'INVALID_ENUM_VALUE' | 'OUT_OF_RANGE',
    public raw: string,
    public parameter?: string
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * A name could not be resolved along a resolution context chain
 */
export class LookupError extends Error {
  constructor(
    message: string,
    public code: 'OPTION_NOT_FOUND' | 'ARGUMENT_NOT_FOUND' | 'INDEX_OUT_OF_RANGE',
    public parameter: string
  ) {
    super(message);
    this.name = 'LookupError';
  }
}

/**
 * Invoking a command that cannot run
 */
export class ActionError extends Error {
  constructor(
    message: string,
    public code: 'NO_ACTION_DEFINED',
    public command: string
  ) {
    super(message);
    this.name = 'ActionError';
  }
}
