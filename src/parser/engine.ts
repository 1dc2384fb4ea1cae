import type { Command } from '../model/command.js';
import type { Flag } from '../model/flag.js';
import type { Option } from '../model/option.js';
import { resolveParserConfig } from '../schema/config.js';
import type { ParserConfig, ParserConfigInput } from '../schema/config.js';
import { debugLog, isDebugMode } from '../utils/debug.js';
import { findClosestName } from '../utils/suggest.js';
import { ResolutionContext } from './context.js';
import type { ParseDiagnostic } from './diagnostics.js';

/**
 * Result of one parse.
 *
 * `command` is always the deepest node reached by subcommand words; help
 * and diagnostics are meant to be shown for it.
 */
export type ParseOutcome =
  | { status: 'ok'; command: Command; context: ResolutionContext }
  | { status: 'help'; command: Command; context: ResolutionContext }
  | { status: 'error'; command: Command; context: ResolutionContext; diagnostics: ParseDiagnostic[] };

/**
 * Mutable state threaded through a single scan
 */
interface ScanState {
  readonly tokens: readonly string[];
  index: number;
  command: Command;
  context: ResolutionContext;
  /** Next declared argument to fill on the current command */
  positional: number;
  /** Set by a bare `--`; everything after is positional */
  forcedPositional: boolean;
  /** A positional was consumed on the current command */
  seenPositional: boolean;
  help: boolean;
  diagnostics: ParseDiagnostic[];
}

/**
 * Turns an argv token list into a resolved context chain for a command tree.
 *
 * Token rules:
 *   --name / --name=value     long flag or option
 *   -x / -x value / -x=value  short flag or option
 *   -abc / -xVALUE            short cluster
 *   --                        end of options (when enabled)
 *   word                      subcommand of the current node, else positional
 *
 * User errors never throw. They are collected and reported once every token
 * has been consumed.
 */
export class Parser {
  readonly root: Command;
  readonly config: Readonly<ParserConfig>;
  private readonly debug: boolean;

  constructor(root: Command, config: ParserConfigInput = {}) {
    this.root = root;
    this.config = resolveParserConfig(config);
    this.debug = isDebugMode(this.config.debug);
  }

  /**
   * Parse tokens (argv without the program name)
   */
  parse(tokens: readonly string[]): ParseOutcome {
    this.root.clearParsedValues();
    const state: ScanState = {
      tokens,
      index: 0,
      command: this.root,
      context: new ResolutionContext(this.root),
      positional: 0,
      forcedPositional: false,
      seenPositional: false,
      help: false,
      diagnostics: [],
    };

    while (state.index < tokens.length) {
      const token = tokens[state.index];
      state.index++;
      this.scanToken(state, token);
    }

    return this.finalize(state);
  }

  private scanToken(state: ScanState, token: string): void {
    if (state.forcedPositional) {
      this.assignPositional(state, token);
      return;
    }

    if (this.config.doubleHyphenDelimiter && token === '--') {
      this.trace('delimiter: remaining tokens are positional');
      state.forcedPositional = true;
      return;
    }

    const optionsAllowed = this.config.allowOptionsAfterArgs || !state.seenPositional;
    if (optionsAllowed && token.length > 1 && token.startsWith('-')) {
      if (token.startsWith('--') && token.length > 2) {
        this.parseLong(state, token);
      } else {
        this.parseShort(state, token);
      }
      return;
    }

    const subcommand = state.command.findSubcommand(token);
    if (subcommand) {
      this.trace(`descend into "${subcommand.name}"`);
      state.command = subcommand;
      state.context = state.context.createChild(subcommand);
      state.positional = 0;
      state.seenPositional = false;
      return;
    }

    this.assignPositional(state, token);
  }

  private parseLong(state: ScanState, token: string): void {
    const body = token.slice(2);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const seed = eq === -1 ? undefined : body.slice(eq + 1);

    if (name === 'help') {
      state.help = true;
      return;
    }

    const flag = state.command.findFlag(name);
    if (flag) {
      this.setFlag(state, flag);
      return;
    }

    const option = state.command.findOption(name);
    if (option) {
      this.gather(state, option, seed, true);
      return;
    }

    this.unknownOption(state, name, token);
  }

  private parseShort(state: ScanState, token: string): void {
    const body = token.slice(1);
    const eq = body.indexOf('=');

    // -x=value: exactly one value, never pulls more tokens
    if (eq !== -1) {
      const name = body.slice(0, eq);
      if (name.length === 1) {
        const flag = state.command.findFlagByShort(name);
        if (flag) {
          this.setFlag(state, flag);
          return;
        }
        const option = state.command.findOptionByShort(name);
        if (option) {
          this.gather(state, option, body.slice(eq + 1), false);
          return;
        }
      }
      this.unknownOption(state, name, token);
      return;
    }

    if (body.length === 1) {
      const flag = state.command.findFlagByShort(body);
      if (flag) {
        this.setFlag(state, flag);
        return;
      }
      const option = state.command.findOptionByShort(body);
      if (option) {
        this.gather(state, option, undefined, true);
        return;
      }
      if (body === 'h') {
        state.help = true;
        return;
      }
      if (!this.config.allowOptionsAfterArgs) {
        this.assignPositional(state, token);
        return;
      }
      this.unknownOption(state, body, token);
      return;
    }

    // -abc: every character is a flag, except that an option character
    // takes the rest of the cluster (or the following tokens) as its value
    for (let i = 0; i < body.length; i++) {
      const ch = body[i];
      const flag = state.command.findFlagByShort(ch);
      if (flag) {
        this.setFlag(state, flag);
        continue;
      }
      const option = state.command.findOptionByShort(ch);
      if (option) {
        const rest = body.slice(i + 1);
        if (rest.length > 0) {
          this.gather(state, option, rest, false);
        } else {
          this.gather(state, option, undefined, true);
        }
        return;
      }
      if (ch === 'h') {
        state.help = true;
        continue;
      }
      this.unknownOption(state, ch, `-${ch}`);
    }
  }

  private setFlag(state: ScanState, flag: Flag): void {
    this.trace(`flag ${flag.displayName} = ${flag.presentValue}`);
    state.context.setFlag(flag.key, flag.presentValue);
    flag.setRawValues([flag.type.encode(flag.presentValue)]);
  }

  /**
   * Collect option values: the seed (if any), then following tokens up to
   * arity.max, stopping at the first token that starts with "-".
   */
  private gather(state: ScanState, option: Option<unknown>, seed: string | undefined, pull: boolean): void {
    const { min, max } = option.arity;
    const values = seed === undefined ? [] : [seed];

    if (pull) {
      while (values.length < max && state.index < state.tokens.length) {
        const next = state.tokens[state.index];
        if (next.startsWith('-')) {
          break;
        }
        values.push(next);
        state.index++;
      }
    }

    if (values.length < min) {
      state.diagnostics.push({ code: 'INSUFFICIENT_VALUES', name: option.key, min, actual: values.length });
      return;
    }
    if (values.length > max) {
      state.diagnostics.push({ code: 'TOO_MANY_VALUES', name: option.key, max, actual: values.length });
      return;
    }
    // Nothing recorded: absence stays distinguishable from a default
    if (values.length === 0) {
      return;
    }

    const total = state.context.localOptionCount(option.key) + values.length;
    if (total > max) {
      state.diagnostics.push({ code: 'TOO_MANY_VALUES', name: option.key, max, actual: total });
      return;
    }

    this.trace(`option ${option.displayName} += ${JSON.stringify(values)}`);
    state.context.appendOption(option.key, values);
    option.setRawValues(state.context.localOptionValues(option.key));
  }

  /**
   * Append a bare token to the argument under the cursor. The cursor only
   * moves once that argument holds arity.max values.
   */
  private assignPositional(state: ScanState, token: string): void {
    state.seenPositional = true;
    const declared = state.command.arguments;

    if (state.positional >= declared.length) {
      state.diagnostics.push({ code: 'UNEXPECTED_POSITIONAL', token, command: state.command.name });
      return;
    }

    const argument = declared[state.positional];
    const count = state.context.localArgumentCount(argument.key);
    if (count >= argument.arity.max) {
      state.diagnostics.push({
        code: 'TOO_MANY_VALUES',
        name: argument.key,
        max: argument.arity.max,
        actual: count + 1,
        token,
      });
      return;
    }

    const total = state.context.appendArgument(argument.key, token);
    argument.setRawValues(state.context.localArgumentValues(argument.key));
    this.trace(`argument ${argument.key}[${total - 1}] = ${JSON.stringify(token)}`);
    if (total >= argument.arity.max) {
      state.positional++;
    }
  }

  private unknownOption(state: ScanState, name: string, token: string): void {
    if (this.config.allowUnknownOptions) {
      this.trace(`ignoring unknown option ${token}`);
      return;
    }
    const suggestion = name.length > 1 ? findClosestName(name, state.command.visibleLongNames()) : null;
    state.diagnostics.push({
      code: 'UNKNOWN_OPTION',
      name,
      token,
      ...(suggestion !== null && { suggestion }),
    });
  }

  private finalize(state: ScanState): ParseOutcome {
    const { command, context } = state;

    if (state.help) {
      return { status: 'help', command, context };
    }

    for (const argument of command.arguments) {
      const count = context.localArgumentCount(argument.key);
      if (count === 0) {
        const fallback = argument.fallbackRawValues();
        if (fallback !== undefined) {
          this.trace(`argument ${argument.key} defaults to ${JSON.stringify(fallback)}`);
          context.fillArgument(argument.key, fallback);
          continue;
        }
      }
      if (count < argument.arity.min) {
        state.diagnostics.push(
          argument.required
            ? { code: 'REQUIRED_ARGUMENT_MISSING', name: argument.key }
            : { code: 'INSUFFICIENT_VALUES', name: argument.key, min: argument.arity.min, actual: count }
        );
      }
    }

    // Each context gets its own node's defaults; nothing is copied between
    // contexts, so explicit values further down still shadow them
    for (let ctx: ResolutionContext | undefined = context; ctx; ctx = ctx.parent) {
      for (const option of ctx.command.options) {
        if (ctx.hasLocalOption(option.key)) {
          continue;
        }
        const fallback = option.fallbackRawValues();
        if (fallback !== undefined) {
          this.trace(`option ${option.displayName} defaults to ${JSON.stringify(fallback)} on "${ctx.command.name}"`);
          ctx.fillOption(option.key, fallback);
        }
      }
      for (const flag of ctx.command.flags) {
        ctx.fillFlag(flag.key, flag.absentValue);
      }
    }

    if (state.diagnostics.length > 0) {
      return { status: 'error', command, context, diagnostics: state.diagnostics };
    }
    return { status: 'ok', command, context };
  }

  private trace(message: string): void {
    if (this.debug) {
      debugLog('parser', message);
    }
  }
}
