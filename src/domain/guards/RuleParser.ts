/**
 * @fileoverview Rule-string parser
 *
 * @module @tessera/core/domain/guards
 *
 * ## Grammar
 *
 * ```
 * statement := rule ("|" rule)*
 * rule      := ["!"] NAME [ "[" args "]" | "(" args ")" ]
 * args      := ε | arg ("," arg)*
 * arg       := list | regex | quoted | bare
 * list      := "[" args "]" | "(" args ")"
 * regex     := 'r"' chars '"'        backslashes kept, \" is a quote
 * quoted    := '"' chars '"'         \" and \\ unescape
 * bare      := chars up to , ] ) [ ( | "
 * NAME      := [A-Za-z_][A-Za-z0-9_]*
 * ```
 *
 * Bare arguments are coerced: `true`/`false` to booleans, `null`/`none` to
 * null, `18` / `-3` / `2.5` to numbers, anything else to a trimmed string.
 * An integer outside the safe range (±2^53 - 1) is malformed rather than
 * rounded. Whitespace around tokens is ignored.
 *
 * @example
 * ```typescript
 * new RuleParser().parse('required|!in[[admin, root]]|regex[r"^[a-z]+$"]');
 * // [
 * //   { name: 'required', negate: false, args: [], position: 0 },
 * //   { name: 'in', negate: true, args: [{ kind: 'list', items: [...] }], position: 9 },
 * //   { name: 'regex', negate: false, args: [{ kind: 'regex', pattern: '^[a-z]+$' }], position: 28 },
 * // ]
 * ```
 */

import { MalformedRuleError } from '../exceptions';
import type { GuardArgument } from './IGuard';

/**
 * Argument literal as written in the rule-string.
 */
export type RuleArgument =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'regex'; readonly pattern: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'null' }
  | { readonly kind: 'list'; readonly items: readonly RuleArgument[] };

/**
 * One guard invocation of a rule chain.
 */
export interface GuardRule {
  readonly name: string;
  readonly negate: boolean;
  readonly args: readonly RuleArgument[];
  /** Offset of the rule in its statement */
  readonly position: number;
}

export const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const BARE_TERMINATORS = new Set([',', ']', ')', '[', '(', '|', '"']);
const CLOSING: Record<string, string> = { '[': ']', '(': ')' };

/**
 * Plain value handed to guard factories.
 */
export function toGuardArgument(arg: RuleArgument): GuardArgument {
  switch (arg.kind) {
    case 'number':
    case 'string':
    case 'boolean':
      return arg.value;
    case 'regex':
      return arg.pattern;
    case 'null':
      return null;
    case 'list':
      return arg.items.map(toGuardArgument);
  }
}

/**
 * Single-use cursor over one statement.
 */
class Cursor {
  pos = 0;

  constructor(readonly statement: string) {}

  get done(): boolean {
    return this.pos >= this.statement.length;
  }

  peek(length = 1): string {
    return this.statement.slice(this.pos, this.pos + length);
  }

  skipWhitespace(): void {
    while (!this.done && /\s/.test(this.peek())) {
      this.pos++;
    }
  }

  fail(expected: string): never {
    throw new MalformedRuleError(this.statement, this.pos, expected);
  }
}

export interface RuleParserOptions {
  /** Most statements kept parsed; the least recently used is evicted (default: 256) */
  cacheSize?: number;
}

export const DEFAULT_PARSE_CACHE_SIZE = 256;

export class RuleParser {
  private readonly cache = new Map<string, readonly GuardRule[]>();
  private readonly cacheSize: number;

  constructor(options: RuleParserOptions = {}) {
    this.cacheSize = Math.max(0, Math.floor(options.cacheSize ?? DEFAULT_PARSE_CACHE_SIZE));
  }

  /** Number of statements currently cached */
  get cachedCount(): number {
    return this.cache.size;
  }

  /**
   * Parse a statement into its rules. Results are cached per statement.
   *
   * @throws {MalformedRuleError} when the statement does not follow the grammar
   */
  parse(statement: string): readonly GuardRule[] {
    const cached = this.cache.get(statement);
    if (cached) {
      // Re-insert to mark as most recently used.
      this.cache.delete(statement);
      this.cache.set(statement, cached);
      return cached;
    }

    const cursor = new Cursor(statement);
    const rules: GuardRule[] = [];

    cursor.skipWhitespace();
    rules.push(this.parseRule(cursor));
    cursor.skipWhitespace();

    while (!cursor.done) {
      if (cursor.peek() !== '|') {
        cursor.fail('"|" or end of rule');
      }
      cursor.pos++;
      cursor.skipWhitespace();
      rules.push(this.parseRule(cursor));
      cursor.skipWhitespace();
    }

    const frozen = Object.freeze(rules);
    this.remember(statement, frozen);
    return frozen;
  }

  private remember(statement: string, rules: readonly GuardRule[]): void {
    if (this.cacheSize === 0) {
      return;
    }
    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(statement, rules);
  }

  private parseRule(cursor: Cursor): GuardRule {
    const position = cursor.pos;
    let negate = false;

    if (cursor.peek() === '!') {
      negate = true;
      cursor.pos++;
      cursor.skipWhitespace();
    }

    const name = this.parseName(cursor);
    cursor.skipWhitespace();

    let args: RuleArgument[] = [];
    const open = cursor.peek();
    if (open === '[' || open === '(') {
      cursor.pos++;
      args = this.parseArgs(cursor, CLOSING[open]);
    }

    return { name, negate, args, position };
  }

  private parseName(cursor: Cursor): string {
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(cursor.statement.slice(cursor.pos));
    if (!match) {
      return cursor.fail('guard name');
    }
    cursor.pos += match[0].length;
    return match[0];
  }

  /**
   * Arguments up to and including `close`; the opening bracket is consumed.
   */
  private parseArgs(cursor: Cursor, close: string): RuleArgument[] {
    const args: RuleArgument[] = [];

    cursor.skipWhitespace();
    if (cursor.peek() === close) {
      cursor.pos++;
      return args;
    }

    for (;;) {
      args.push(this.parseArg(cursor));
      cursor.skipWhitespace();

      const next = cursor.peek();
      if (next === ',') {
        cursor.pos++;
        cursor.skipWhitespace();
      } else if (next === close) {
        cursor.pos++;
        return args;
      } else {
        cursor.fail(`"," or "${close}"`);
      }
    }
  }

  private parseArg(cursor: Cursor): RuleArgument {
    const next = cursor.peek();

    if (next === '[' || next === '(') {
      cursor.pos++;
      return { kind: 'list', items: this.parseArgs(cursor, CLOSING[next]) };
    }
    if (cursor.peek(2) === 'r"') {
      cursor.pos += 2;
      return { kind: 'regex', pattern: this.parseQuoted(cursor, true) };
    }
    if (next === '"') {
      cursor.pos++;
      return { kind: 'string', value: this.parseQuoted(cursor, false) };
    }
    return this.parseBare(cursor);
  }

  /**
   * Body of a quoted literal after its opening quote. Regex literals keep
   * their backslashes so `\d` reaches the RegExp intact.
   */
  private parseQuoted(cursor: Cursor, raw: boolean): string {
    let value = '';

    for (;;) {
      if (cursor.done) {
        cursor.fail('closing \'"\'');
      }
      const char = cursor.peek();

      if (char === '\\') {
        const escaped = cursor.statement.charAt(cursor.pos + 1);
        if (escaped === '') {
          cursor.pos++;
          cursor.fail('closing \'"\'');
        }
        if (escaped === '"') {
          value += '"';
        } else {
          value += raw ? char + escaped : escaped;
        }
        cursor.pos += 2;
        continue;
      }

      cursor.pos++;
      if (char === '"') {
        return value;
      }
      value += char;
    }
  }

  private parseBare(cursor: Cursor): RuleArgument {
    const start = cursor.pos;
    while (!cursor.done && !BARE_TERMINATORS.has(cursor.peek())) {
      cursor.pos++;
    }

    const token = cursor.statement.slice(start, cursor.pos).trim();
    if (token === '') {
      cursor.pos = start;
      cursor.fail('argument');
    }

    switch (token.toLowerCase()) {
      case 'true':
        return { kind: 'boolean', value: true };
      case 'false':
        return { kind: 'boolean', value: false };
      case 'null':
      case 'none':
        return { kind: 'null' };
    }

    if (/^-?\d+$/.test(token)) {
      const value = Number(token);
      if (!Number.isSafeInteger(value)) {
        cursor.pos = start;
        cursor.fail(`integer between ${Number.MIN_SAFE_INTEGER} and ${Number.MAX_SAFE_INTEGER}`);
      }
      return { kind: 'number', value };
    }
    if (/^-?\d+\.\d+$/.test(token)) {
      return { kind: 'number', value: Number(token) };
    }
    return { kind: 'string', value: token };
  }
}
