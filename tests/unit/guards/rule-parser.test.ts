/**
 * @fileoverview Unit tests for the rule-string parser
 */

import {
  DEFAULT_PARSE_CACHE_SIZE,
  GuardRule,
  MalformedRuleError,
  RuleParser,
  toGuardArgument,
} from '../../../src';

function parseError(statement: string): MalformedRuleError {
  try {
    new RuleParser().parse(statement);
  } catch (error) {
    if (error instanceof MalformedRuleError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected "${statement}" to be rejected`);
}

describe('RuleParser', () => {
  let parser: RuleParser;

  beforeEach(() => {
    parser = new RuleParser();
  });

  // ==========================================================================
  // RULE CHAINS
  // ==========================================================================

  describe('Rule chains', () => {
    it('should parse a single rule without arguments', () => {
      expect(parser.parse('required')).toEqual([{ name: 'required', negate: false, args: [], position: 0 }]);
    });

    it('should parse a chain in order with positions', () => {
      const rules = parser.parse('required|lt[18]|!empty');

      expect(rules.map((rule) => rule.name)).toEqual(['required', 'lt', 'empty']);
      expect(rules.map((rule) => rule.position)).toEqual([0, 9, 16]);
      expect(rules.map((rule) => rule.negate)).toEqual([false, false, true]);
    });

    it('should ignore whitespace around tokens', () => {
      const rules = parser.parse('  required | ! lt [ 18 ] ');

      expect(rules).toEqual<GuardRule[]>([
        { name: 'required', negate: false, args: [], position: 2 },
        { name: 'lt', negate: true, args: [{ kind: 'number', value: 18 }], position: 13 },
      ]);
    });

    it('should accept parentheses as argument brackets', () => {
      expect(parser.parse('between(1, 10)')[0]?.args).toEqual([
        { kind: 'number', value: 1 },
        { kind: 'number', value: 10 },
      ]);
    });

    it('should accept an empty argument list', () => {
      expect(parser.parse('required[]')[0]?.args).toEqual([]);
    });

    it('should cache parsed statements', () => {
      expect(parser.parse('required|lt[18]')).toBe(parser.parse('required|lt[18]'));
    });

    it('should return frozen rule lists', () => {
      expect(Object.isFrozen(parser.parse('required'))).toBe(true);
    });
  });

  // ==========================================================================
  // PARSE CACHE
  // ==========================================================================

  describe('Parse cache', () => {
    it('should hold at most the default number of statements', () => {
      for (let max = 0; max < DEFAULT_PARSE_CACHE_SIZE * 4; max++) {
        parser.parse(`lt[${max}]`);
      }

      expect(parser.cachedCount).toBe(DEFAULT_PARSE_CACHE_SIZE);
    });

    it('should evict the least recently used statement', () => {
      const small = new RuleParser({ cacheSize: 2 });
      const first = small.parse('lt[1]');
      const second = small.parse('lt[2]');

      small.parse('lt[1]');
      small.parse('lt[3]');

      expect(small.cachedCount).toBe(2);
      expect(small.parse('lt[1]')).toBe(first);
      expect(small.parse('lt[2]')).not.toBe(second);
    });

    it('should not cache when the size is zero', () => {
      const uncached = new RuleParser({ cacheSize: 0 });

      expect(uncached.parse('required')).not.toBe(uncached.parse('required'));
      expect(uncached.cachedCount).toBe(0);
    });
  });

  // ==========================================================================
  // ARGUMENTS
  // ==========================================================================

  describe('Arguments', () => {
    const argsOf = (statement: string) => parser.parse(statement)[0]?.args ?? [];

    it('should coerce bare numbers', () => {
      expect(argsOf('between[-3, 2.5]')).toEqual([
        { kind: 'number', value: -3 },
        { kind: 'number', value: 2.5 },
      ]);
    });

    it('should coerce booleans and null', () => {
      expect(argsOf('in[true, FALSE, null, None]')).toEqual([
        { kind: 'boolean', value: true },
        { kind: 'boolean', value: false },
        { kind: 'null' },
        { kind: 'null' },
      ]);
    });

    it('should keep other bare words as trimmed strings', () => {
      expect(argsOf('in[ red , dark blue ]')).toEqual([
        { kind: 'string', value: 'red' },
        { kind: 'string', value: 'dark blue' },
      ]);
    });

    it('should keep quoted numbers as strings and unescape quotes', () => {
      expect(argsOf('eq["18"]')).toEqual([{ kind: 'string', value: '18' }]);
      expect(argsOf('eq["say \\"hi\\", a\\\\b"]')).toEqual([{ kind: 'string', value: 'say "hi", a\\b' }]);
    });

    it('should keep backslashes in regex literals', () => {
      expect(argsOf('regex[r"^\\d+\\.\\d+$"]')).toEqual([{ kind: 'regex', pattern: '^\\d+\\.\\d+$' }]);
    });

    it('should unescape quotes in regex literals', () => {
      expect(argsOf('regex[r"^\\"[a-z]+\\"$"]')).toEqual([{ kind: 'regex', pattern: '^"[a-z]+"$' }]);
    });

    it('should keep "|" and "," inside quoted literals', () => {
      expect(argsOf('regex[r"^(a|b),c$"]')).toEqual([{ kind: 'regex', pattern: '^(a|b),c$' }]);
    });

    it('should parse nested lists', () => {
      expect(argsOf('in[[admin, (1, 2)]]')).toEqual([
        {
          kind: 'list',
          items: [
            { kind: 'string', value: 'admin' },
            {
              kind: 'list',
              items: [
                { kind: 'number', value: 1 },
                { kind: 'number', value: 2 },
              ],
            },
          ],
        },
      ]);
    });

    it('should convert arguments to plain guard values', () => {
      const args = argsOf('in[[a, 1, true, null], r"x"]').map(toGuardArgument);

      expect(args).toEqual([['a', 1, true, null], 'x']);
    });
  });

  // ==========================================================================
  // MALFORMED STATEMENTS
  // ==========================================================================

  describe('Malformed statements', () => {
    it('should report an unclosed argument list', () => {
      const error = parseError('lt[18');

      expect(error.position).toBe(5);
      expect(error.expected).toBe('"," or "]"');
      expect(error.message).toBe('Expected "," or "]" at position 5:\nlt[18\n     ^');
    });

    it('should report a missing rule after "|"', () => {
      const error = parseError('required|');

      expect(error.position).toBe(9);
      expect(error.expected).toBe('guard name');
    });

    it('should reject an empty statement', () => {
      const error = parseError('');

      expect(error.position).toBe(0);
      expect(error.expected).toBe('guard name');
    });

    it('should reject trailing text after a rule', () => {
      const error = parseError('lt[18]x');

      expect(error.position).toBe(6);
      expect(error.expected).toBe('"|" or end of rule');
    });

    it('should reject a name starting with a digit', () => {
      expect(parseError('1st').position).toBe(0);
    });

    it('should reject an empty argument', () => {
      const error = parseError('between[1,,2]');

      expect(error.position).toBe(10);
      expect(error.expected).toBe('argument');
    });

    it('should reject an unterminated string', () => {
      const error = parseError('eq["open');

      expect(error.position).toBe(8);
      expect(error.expected).toBe('closing \'"\'');
    });

    it('should reject a mismatched closing bracket', () => {
      expect(parseError('lt[18)').expected).toBe('"," or "]"');
    });

    it('should reject an integer that a number cannot hold exactly', () => {
      const error = parseError('eq[12345678901234567890]');

      expect(error.position).toBe(3);
      expect(error.expected).toBe('integer between -9007199254740991 and 9007199254740991');
    });

    it('should accept the largest exact integers', () => {
      const rules = new RuleParser().parse('between[-9007199254740991, 9007199254740991]');

      expect(rules[0]?.args).toEqual([
        { kind: 'number', value: -9007199254740991 },
        { kind: 'number', value: 9007199254740991 },
      ]);
    });

    it('should keep the statement on the error', () => {
      expect(parseError('lt[18').statement).toBe('lt[18');
    });
  });
});
