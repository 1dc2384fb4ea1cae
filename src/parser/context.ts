import type { Argument } from '../model/argument.js';
import type { Command } from '../model/command.js';
import { LookupError } from '../model/errors.js';
import type { Flag } from '../model/flag.js';
import type { Option } from '../model/option.js';
import { decodeNamed } from '../schema/value-types.js';
import type { ValueType } from '../schema/value-types.js';
import { accessErrors } from '../strings/errors.js';

type Store = 'option' | 'argument';

/**
 * Plain snapshot of one context, used for JSON output
 */
export interface ContextSnapshot {
  command: string;
  options: Record<string, string[]>;
  arguments: Record<string, string[]>;
  flags: Record<string, boolean>;
}

/**
 * Raw values resolved for one command node during a parse.
 *
 * Values are stored as strings and decoded on access. A lookup that misses
 * here continues in the parent context, so a subcommand sees options set on
 * (or defaulted by) its ancestors.
 */
export class ResolutionContext {
  readonly command: Command;
  readonly parent?: ResolutionContext;

  private child?: ResolutionContext;
  private readonly options = new Map<string, string[]>();
  private readonly arguments = new Map<string, string[]>();
  private readonly flags = new Map<string, boolean>();
  private readonly provided = new Set<string>();

  constructor(command: Command, parent?: ResolutionContext) {
    this.command = command;
    this.parent = parent;
  }

  /** Context for a subcommand the parse descended into */
  createChild(command: Command): ResolutionContext {
    const child = new ResolutionContext(command, this);
    this.child = child;
    return child;
  }

  /** Contexts from the root down to this one */
  chain(): ResolutionContext[] {
    const contexts: ResolutionContext[] = [];
    for (let ctx: ResolutionContext | undefined = this; ctx; ctx = ctx.parent) {
      contexts.unshift(ctx);
    }
    return contexts;
  }

  // --- writes (parser only) ---

  /** Append values given on the command line; returns the new total */
  appendOption(key: string, values: readonly string[]): number {
    return this.append('option', key, values);
  }

  appendArgument(key: string, value: string): number {
    return this.append('argument', key, [value]);
  }

  setFlag(key: string, value: boolean): void {
    this.flags.set(key, value);
    this.provided.add(`flag:${key}`);
  }

  /** Store a default; explicit values are never overwritten */
  fillOption(key: string, values: readonly string[]): void {
    if (!this.options.has(key)) {
      this.options.set(key, [...values]);
    }
  }

  fillArgument(key: string, values: readonly string[]): void {
    if (!this.arguments.has(key)) {
      this.arguments.set(key, [...values]);
    }
  }

  fillFlag(key: string, value: boolean): void {
    if (!this.flags.has(key)) {
      this.flags.set(key, value);
    }
  }

  hasLocalOption(key: string): boolean {
    return this.options.has(key);
  }

  localOptionCount(key: string): number {
    return this.options.get(key)?.length ?? 0;
  }

  /** Raw values stored on this context only */
  localOptionValues(key: string): string[] {
    return [...(this.options.get(key) ?? [])];
  }

  localArgumentValues(key: string): string[] {
    return [...(this.arguments.get(key) ?? [])];
  }

  localArgumentCount(key: string): number {
    return this.arguments.get(key)?.length ?? 0;
  }

  // --- raw reads ---

  getRawOption(name: string): string[] {
    return [...this.lookup('option', name)];
  }

  getRawArgument(name: string): string[] {
    return [...this.lookup('argument', name)];
  }

  hasOption(name: string): boolean {
    return this.find('option', name) !== undefined;
  }

  hasArgument(name: string): boolean {
    return this.find('argument', name) !== undefined;
  }

  /**
   * Whether the nearest context holding `name` got it from argv rather than
   * from a default
   */
  wasProvided(name: string): boolean {
    for (let ctx: ResolutionContext | undefined = this; ctx; ctx = ctx.parent) {
      for (const kind of ['option', 'argument', 'flag'] as const) {
        const key = `${kind}:${name}`;
        if (ctx.provided.has(key)) {
          return true;
        }
      }
      if (ctx.options.has(name) || ctx.arguments.has(name) || ctx.flags.has(name)) {
        return false;
      }
    }
    return false;
  }

  // --- typed reads ---

  /** First value of an option, decoded */
  getOption<T>(name: string, type: ValueType<T>): T {
    return this.decodeAt('option', name, type, 0);
  }

  /**
   * Option values, decoded in order. With `count`, exactly that many are
   * returned and asking for more than are stored is an error.
   */
  getOptions<T>(name: string, type: ValueType<T>, count?: number): T[] {
    return this.decodeAll('option', name, type, count);
  }

  getArgument<T>(name: string, type: ValueType<T>): T {
    return this.decodeAt('argument', name, type, 0);
  }

  getArguments<T>(name: string, type: ValueType<T>, count?: number): T[] {
    return this.decodeAll('argument', name, type, count);
  }

  /** Flag value; false when no context on the chain knows the flag */
  getFlag(name: string): boolean {
    for (let ctx: ResolutionContext | undefined = this; ctx; ctx = ctx.parent) {
      const value = ctx.flags.get(name);
      if (value !== undefined) {
        return value;
      }
    }
    return false;
  }

  /** First value of a declaration, decoded with its own value type */
  value<T>(param: Option<T> | Argument<T>): T {
    return this.decodeAt(param.kind, param.key, param.type, 0);
  }

  values<T>(param: Option<T> | Argument<T>): T[] {
    return this.decodeAll(param.kind, param.key, param.type);
  }

  flag(param: Flag): boolean {
    return this.getFlag(param.key);
  }

  snapshot(): ContextSnapshot {
    return {
      command: this.command.name,
      options: Object.fromEntries(this.options),
      arguments: Object.fromEntries(this.arguments),
      flags: Object.fromEntries(this.flags),
    };
  }

  /**
   * Tear down the whole chain this context belongs to, deepest first
   */
  release(): void {
    let deepest: ResolutionContext = this;
    while (deepest.child) {
      deepest = deepest.child;
    }
    for (let ctx: ResolutionContext | undefined = deepest; ctx; ctx = ctx.parent) {
      ctx.options.clear();
      ctx.arguments.clear();
      ctx.flags.clear();
      ctx.provided.clear();
      ctx.child = undefined;
    }
  }

  private append(kind: Store, key: string, values: readonly string[]): number {
    const store = kind === 'option' ? this.options : this.arguments;
    const existing = store.get(key) ?? [];
    const next = [...existing, ...values];
    store.set(key, next);
    this.provided.add(`${kind}:${key}`);
    return next.length;
  }

  private find(kind: Store, name: string): string[] | undefined {
    for (let ctx: ResolutionContext | undefined = this; ctx; ctx = ctx.parent) {
      const values = (kind === 'option' ? ctx.options : ctx.arguments).get(name);
      if (values !== undefined) {
        return values;
      }
    }
    return undefined;
  }

  private lookup(kind: Store, name: string): string[] {
    const values = this.find(kind, name);
    if (values === undefined) {
      throw kind === 'option'
        ? new LookupError(accessErrors.optionNotFound(name), 'OPTION_NOT_FOUND', name)
        : new LookupError(accessErrors.argumentNotFound(name), 'ARGUMENT_NOT_FOUND', name);
    }
    return values;
  }

  private decodeAt<T>(kind: Store, name: string, type: ValueType<T>, index: number): T {
    const values = this.lookup(kind, name);
    const raw = values[index];
    if (raw === undefined) {
      throw new LookupError(accessErrors.indexOutOfRange(name, index + 1, values.length), 'INDEX_OUT_OF_RANGE', name);
    }
    return decodeNamed(name, type, raw);
  }

  private decodeAll<T>(kind: Store, name: string, type: ValueType<T>, count?: number): T[] {
    const values = this.lookup(kind, name);
    if (count !== undefined && count > values.length) {
      throw new LookupError(accessErrors.indexOutOfRange(name, count, values.length), 'INDEX_OUT_OF_RANGE', name);
    }
    const selected = count === undefined ? values : values.slice(0, count);
    return selected.map((raw) => decodeNamed(name, type, raw));
  }
}

