import { ActionError, DeclarationError } from './errors.js';
import type { Argument } from './argument.js';
import type { Flag } from './flag.js';
import type { Option } from './option.js';
import type { ResolutionContext } from '../parser/context.js';
import { accessErrors, declarationErrors } from '../strings/errors.js';

/**
 * Action run for a terminal command. Throwing (or rejecting) marks the run
 * as failed.
 */
export type ActionFn = (context: ResolutionContext) => void | Promise<void>;

export interface CommandConfig {
  name: string;
  description: string;
  action?: ActionFn;
}

/**
 * One node of the command tree.
 *
 * Declarations are registered before parsing and never change during one.
 * The parent link is only used for scoped lookup and help, never ownership.
 */
export class Command {
  readonly name: string;
  readonly description: string;

  private readonly _options: Option<unknown>[] = [];
  private readonly _flags: Flag[] = [];
  private readonly _arguments: Argument<unknown>[] = [];
  private readonly _subcommands: Command[] = [];
  private _action?: ActionFn;
  private _parent?: Command;

  constructor(config: CommandConfig) {
    this.name = config.name;
    this.description = config.description;
    this._action = config.action;
  }

  get options(): readonly Option<unknown>[] {
    return this._options;
  }

  get flags(): readonly Flag[] {
    return this._flags;
  }

  /** Arguments in positional order */
  get arguments(): readonly Argument<unknown>[] {
    return this._arguments;
  }

  get subcommands(): readonly Command[] {
    return this._subcommands;
  }

  get action(): ActionFn | undefined {
    return this._action;
  }

  get parent(): Command | undefined {
    return this._parent;
  }

  addOption<T>(option: Option<T>): this {
    this.assertNamesFree(option);
    this._options.push(option);
    return this;
  }

  addFlag(flag: Flag): this {
    this.assertNamesFree(flag);
    this._flags.push(flag);
    return this;
  }

  /**
   * Register the next positional argument. Required arguments must all come
   * before the first optional one.
   */
  addArgument<T>(argument: Argument<T>): this {
    if (this._arguments.some((existing) => existing.name === argument.name)) {
      throw new DeclarationError(
        declarationErrors.duplicateName('argument', argument.name, this.name),
        'DUPLICATE_NAME'
      );
    }
    if (argument.required && this._arguments.some((existing) => !existing.required)) {
      throw new DeclarationError(
        declarationErrors.requiredAfterOptional(argument.name, this.name),
        'ARGUMENT_ORDER'
      );
    }
    this._arguments.push(argument);
    return this;
  }

  addSubcommand(subcommand: Command): this {
    if (subcommand._parent !== undefined) {
      throw new DeclarationError(
        declarationErrors.parentAlreadySet(subcommand.name, subcommand._parent.name),
        'PARENT_ALREADY_SET'
      );
    }
    if (this.findSubcommand(subcommand.name)) {
      throw new DeclarationError(
        declarationErrors.duplicateName('subcommand', subcommand.name, this.name),
        'DUPLICATE_NAME'
      );
    }
    subcommand._parent = this;
    this._subcommands.push(subcommand);
    return this;
  }

  withAction(action: ActionFn): this {
    this._action = action;
    return this;
  }

  /** A node with an action can be invoked; one without shows help */
  isLeaf(): boolean {
    return this._action !== undefined;
  }

  isRoot(): boolean {
    return this._parent === undefined;
  }

  /** Command names from the root down to this node */
  path(): string[] {
    const names: string[] = [];
    for (let node: Command | undefined = this; node; node = node._parent) {
      names.unshift(node.name);
    }
    return names;
  }

  // Lookups search this node first, then each ancestor. This is what lets a
  // subcommand's argv set options declared on the root.

  findOption(long: string): Option<unknown> | undefined {
    return this._options.find((o) => o.long === long) ?? this._parent?.findOption(long);
  }

  findOptionByShort(short: string): Option<unknown> | undefined {
    return this._options.find((o) => o.short === short) ?? this._parent?.findOptionByShort(short);
  }

  findFlag(long: string): Flag | undefined {
    return this._flags.find((f) => f.long === long) ?? this._parent?.findFlag(long);
  }

  findFlagByShort(short: string): Flag | undefined {
    return this._flags.find((f) => f.short === short) ?? this._parent?.findFlagByShort(short);
  }

  /** Direct children only */
  findSubcommand(name: string): Command | undefined {
    return this._subcommands.find((s) => s.name === name);
  }

  /** Long option and flag names visible from this node */
  visibleLongNames(): string[] {
    const names: string[] = [];
    for (let node: Command | undefined = this; node; node = node._parent) {
      for (const param of [...node._options, ...node._flags]) {
        if (param.long !== undefined && !names.includes(param.long)) {
          names.push(param.long);
        }
      }
    }
    return names;
  }

  /**
   * Forget raw values recorded by a previous parse, on this node and below
   */
  clearParsedValues(): void {
    for (const param of [...this._options, ...this._flags, ...this._arguments]) {
      param.clearRawValues();
    }
    for (const subcommand of this._subcommands) {
      subcommand.clearParsedValues();
    }
  }

  /**
   * Run this node's action with a resolved context
   */
  async execute(context: ResolutionContext): Promise<void> {
    if (!this._action) {
      throw new ActionError(accessErrors.noActionDefined(this.name), 'NO_ACTION_DEFINED', this.name);
    }
    await this._action(context);
  }

  private assertNamesFree(param: Option<unknown> | Flag): void {
    for (const existing of [...this._options, ...this._flags]) {
      const clash =
        (param.long !== undefined && existing.long === param.long) ||
        (param.short !== undefined && existing.short === param.short) ||
        existing.key === param.key;
      if (clash) {
        throw new DeclarationError(
          declarationErrors.duplicateName(param.kind, param.displayName, this.name),
          'DUPLICATE_NAME'
        );
      }
    }
  }
}
