import { Arity } from '../schema/arity.js';
import { types } from '../schema/value-types.js';
import { Parameter, namedDisplay, namedKey, validateNames } from './parameter.js';
import type { NamedConfig } from './parameter.js';

export interface FlagConfig extends NamedConfig {
  description: string;
  /** Value when the flag is absent; presence yields the opposite */
  default?: boolean;
}

/**
 * Boolean parameter that never takes a value token
 */
export class Flag extends Parameter<boolean> {
  readonly kind = 'flag' as const;
  readonly long?: string;
  readonly short?: string;
  /** Value when the flag is absent */
  readonly defaultValue: boolean;

  constructor(config: FlagConfig) {
    super({ description: config.description, type: types.boolean() }, Arity.zeroOrOne);
    validateNames(config, config.description);
    this.long = config.long;
    this.short = config.short;
    this.defaultValue = config.default ?? false;
    this.setDefaults([this.defaultValue]);
  }

  get key(): string {
    return namedKey(this);
  }

  get displayName(): string {
    return namedDisplay(this);
  }

  /** Value recorded when the flag appears on the command line */
  get presentValue(): boolean {
    return !this.defaultValue;
  }

  /** Value filled in when the flag does not appear; a preset wins over the default */
  get absentValue(): boolean {
    return this.fallbackValues()?.[0] ?? this.defaultValue;
  }
}
