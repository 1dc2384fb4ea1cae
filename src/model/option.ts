import { Arity } from '../schema/arity.js';
import { Parameter, namedDisplay, namedKey, validateNames } from './parameter.js';
import type { NamedConfig, ParameterConfig } from './parameter.js';

export interface OptionConfig<T> extends ParameterConfig<T>, NamedConfig {}

/**
 * Named, value-bearing parameter (`--name value`, `-n value`).
 * Takes zero or one value unless another arity is given.
 */
export class Option<T> extends Parameter<T> {
  readonly kind = 'option' as const;
  readonly long?: string;
  readonly short?: string;

  constructor(config: OptionConfig<T>) {
    super(config, config.arity ?? Arity.zeroOrOne);
    validateNames(config, config.description);
    this.long = config.long;
    this.short = config.short;
    if (config.defaults !== undefined) {
      this.setDefaults(config.defaults);
    }
  }

  get key(): string {
    return namedKey(this);
  }

  get displayName(): string {
    return namedDisplay(this);
  }

  withArity(arity: Arity): this {
    this.assignArity(arity);
    return this;
  }
}
