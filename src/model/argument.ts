import { Arity } from '../schema/arity.js';
import { DeclarationError, ValueError } from './errors.js';
import { Parameter } from './parameter.js';
import type { ParameterConfig } from './parameter.js';
import { accessErrors, declarationErrors } from '../strings/errors.js';

export interface ArgumentConfig<T> extends ParameterConfig<T> {
  name: string;
  required?: boolean;
}

/**
 * Positional parameter. Its position is its registration order on a command.
 *
 * Required arguments take exactly one value unless widened, and can never
 * be widened to accept zero values or carry defaults.
 */
export class Argument<T> extends Parameter<T> {
  readonly kind = 'argument' as const;
  readonly name: string;
  readonly required: boolean;

  constructor(config: ArgumentConfig<T>) {
    const required = config.required ?? false;
    super(config, required ? Arity.exactlyOne : Arity.zeroOrOne);
    this.name = config.name;
    this.required = required;
    if (config.arity !== undefined) {
      this.withArity(config.arity);
    }
    if (config.defaults !== undefined) {
      this.setDefaults(config.defaults);
    }
  }

  get key(): string {
    return this.name;
  }

  get displayName(): string {
    return this.name;
  }

  withArity(arity: Arity): this {
    if (arity.max === 0) {
      throw new DeclarationError(declarationErrors.argumentArityZero(this.name), 'INVALID_ARITY');
    }
    if (this.required && arity.min === 0) {
      throw new DeclarationError(
        declarationErrors.requiredArityWidened(this.name, arity.toString()),
        'REQUIRED_ARITY_WIDENED'
      );
    }
    this.assignArity(arity);
    return this;
  }

  override setDefaults(values: readonly T[]): this {
    if (this.required) {
      throw new DeclarationError(declarationErrors.requiredWithDefault(this.name), 'REQUIRED_WITH_DEFAULT');
    }
    return super.setDefaults(values);
  }

  protected override missingValueError(): ValueError {
    if (this.required) {
      return new ValueError(accessErrors.requiredMissing(this.name), 'REQUIRED_MISSING', this.name);
    }
    return super.missingValueError();
  }
}
