/**
 * FHIRPath Parser Tests
 * AST shape, precedence, literals and syntax errors
 */

import { describe, expect, it } from 'vitest';

import {
  LexerError,
  ParseError,
  formatTypeSpecifier,
  parse,
  parseTypeName,
  tokenize,
} from '../../src/index.js';

function parseFailure(text: string): unknown {
  try {
    parse(text);
  } catch (error) {
    return error;
  }
  throw new Error(`expected ${text} to fail`);
}

describe('Parser', () => {
  describe('idempotence', () => {
    const expressions = [
      "Patient.name.where(use = 'official').given.first()",
      '(1 | 2 | 3).aggregate($this + $total, 0)',
      "Observation.value.as(Quantity).value > 70 'kg'",
      '@2014-01-25T14:30:14.559+01:00 - 3 days',
      "%`vs-administrative-gender`.exists() implies name[0].family != 'x'",
      '-5.abs() div 2 mod 3',
    ];

    for (const expression of expressions) {
      it(`parses ${expression} to the same tree twice`, () => {
        expect(parse(expression)).toEqual(parse(expression));
      });
    }
  });

  describe('paths', () => {
    it('builds a left-nested invocation chain', () => {
      expect(parse('Patient.name.given')).toMatchObject({
        type: 'Invocation',
        target: {
          type: 'Invocation',
          target: { type: 'Member', name: 'Patient' },
          invocation: { type: 'Member', name: 'name' },
        },
        invocation: { type: 'Member', name: 'given' },
      });
    });

    it('keeps function arguments as expressions', () => {
      expect(parse('name.where(use = $this.use)')).toMatchObject({
        type: 'Invocation',
        invocation: {
          type: 'FunctionCall',
          name: 'where',
          args: [{ type: 'BinaryExpr', op: '=' }],
        },
      });
    });

    it('parses toString() after a member, a paren and a literal', () => {
      expect(parse('x.toString()')).toMatchObject({
        type: 'Invocation',
        target: { type: 'Member', name: 'x' },
        invocation: { type: 'FunctionCall', name: 'toString', args: [] },
      });
      expect(parse("(1 'm').toString()")).toMatchObject({
        type: 'Invocation',
        target: { type: 'Parenthesized' },
        invocation: { type: 'FunctionCall', name: 'toString' },
      });
      expect(parse('1.toString()')).toMatchObject({
        type: 'Invocation',
        target: { type: 'Literal' },
        invocation: { type: 'FunctionCall', name: 'toString' },
      });
      expect(parse('name.first().constructor')).toMatchObject({
        type: 'Invocation',
        invocation: { type: 'Member', name: 'constructor' },
      });
    });

    it('accepts keywords as names after a dot', () => {
      expect(parse("name.contains('x')")).toMatchObject({
        invocation: { type: 'FunctionCall', name: 'contains' },
      });
      expect(parse('value.as(Quantity)')).toMatchObject({
        invocation: { type: 'FunctionCall', name: 'as' },
      });
    });

    it('parses indexers after invocations', () => {
      expect(parse('name[1].given')).toMatchObject({
        type: 'Invocation',
        target: {
          type: 'Indexer',
          target: { type: 'Member', name: 'name' },
          index: { type: 'Literal', literal: { kind: 'integer', value: 1n } },
        },
      });
    });

    it('reads delimited identifiers and constants', () => {
      expect(parse('`given name`')).toMatchObject({
        type: 'Member',
        name: 'given name',
      });
      expect(parse("%'vs-x'")).toMatchObject({
        type: 'ExternalConstant',
        name: 'vs-x',
      });
    });
  });

  describe('precedence', () => {
    it('binds * tighter than +', () => {
      expect(parse('1 + 2 * 3')).toMatchObject({
        type: 'BinaryExpr',
        op: '+',
        left: { type: 'Literal', literal: { kind: 'integer', value: 1n } },
        right: { type: 'BinaryExpr', op: '*' },
      });
    });

    it('puts implies below or', () => {
      expect(parse('a implies b or c')).toMatchObject({
        op: 'implies',
        right: { type: 'BinaryExpr', op: 'or' },
      });
    });

    it('puts union lowest', () => {
      expect(parse('a = b | c')).toMatchObject({
        op: '|',
        left: { type: 'BinaryExpr', op: '=' },
      });
    });

    it('is left associative', () => {
      expect(parse('10 - 4 - 3')).toMatchObject({
        op: '-',
        left: { type: 'BinaryExpr', op: '-' },
        right: { type: 'Literal' },
      });
    });

    it('applies polarity to the whole invocation chain', () => {
      expect(parse('-x.y')).toMatchObject({
        type: 'Polarity',
        op: '-',
        operand: { type: 'Invocation' },
      });
    });

    it('reads a type specifier after is', () => {
      expect(parse('x is FHIR.Patient')).toMatchObject({
        type: 'TypeExpr',
        op: 'is',
        typeSpecifier: { namespace: 'FHIR', name: 'Patient' },
      });
    });
  });

  describe('literals', () => {
    it('keeps decimal text as written', () => {
      expect(parse('1.50')).toMatchObject({
        literal: { kind: 'decimal', value: '1.50' },
      });
    });

    it('reads long integers', () => {
      expect(parse('12L')).toMatchObject({
        literal: { kind: 'long', value: 12n },
      });
    });

    it('reads quantities with string and calendar units', () => {
      expect(parse("5 'mg'")).toMatchObject({
        literal: { kind: 'quantity', value: '5', unit: 'mg', calendar: false },
      });
      expect(parse('3 days')).toMatchObject({
        literal: { kind: 'quantity', value: '3', unit: 'days', calendar: true },
      });
    });

    it('reads temporal literals without the @', () => {
      expect(parse('@2014-01-25')).toMatchObject({
        literal: { kind: 'date', value: '2014-01-25' },
      });
      expect(parse('@T14:30')).toMatchObject({
        literal: { kind: 'time', value: '14:30' },
      });
    });

    it('reads the empty literal', () => {
      expect(parse('{}')).toMatchObject({ literal: { kind: 'empty' } });
    });

    it('skips comments', () => {
      expect(parse('1 // one\n + /* two */ 2')).toMatchObject({
        type: 'BinaryExpr',
        op: '+',
      });
    });
  });

  describe('type names', () => {
    it('splits qualified names', () => {
      expect(parseTypeName('System.String')).toEqual({
        namespace: 'System',
        name: 'String',
      });
      expect(parseTypeName('Quantity')).toEqual({ name: 'Quantity' });
    });

    it('formats specifiers back to text', () => {
      expect(formatTypeSpecifier({ namespace: 'FHIR', name: 'Patient' })).toBe(
        'FHIR.Patient'
      );
      expect(formatTypeSpecifier({ name: 'Quantity' })).toBe('Quantity');
    });
  });

  describe('tokenizer', () => {
    it('ends every token stream with EOF', () => {
      expect(tokenize('a.b').map((token) => token.type)).toEqual([
        'IDENTIFIER',
        'DOT',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('reads built-in object method names as identifiers', () => {
      const names = ['toString', 'constructor', 'valueOf', 'hasOwnProperty'];
      for (const name of names) {
        expect(tokenize(name).map((token) => token.type)).toEqual([
          'IDENTIFIER',
          'EOF',
        ]);
      }
    });

    it('records 1-based line and column', () => {
      const tokens = tokenize('a\n  and b');
      expect(tokens[1]?.type).toBe('AND');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
    });
  });

  describe('errors', () => {
    it('reports an unterminated string', () => {
      const error = parseFailure("name = 'Jim");
      expect(error).toBeInstanceOf(LexerError);
      expect(error).toMatchObject({ errorId: 'FP-L001' });
    });

    it('reports an invalid character', () => {
      expect(parseFailure('a # b')).toMatchObject({
        errorId: 'FP-L002',
        location: { line: 1, column: 3 },
      });
    });

    it('reports an unknown special variable', () => {
      expect(parseFailure('$foo')).toMatchObject({ errorId: 'FP-L006' });
      expect(parseFailure('$constructor')).toMatchObject({
        errorId: 'FP-L006',
      });
    });

    it('reports a malformed date literal', () => {
      expect(parseFailure('@2020-13')).toMatchObject({ errorId: 'FP-L005' });
    });

    it('reports an unterminated comment', () => {
      expect(parseFailure('1 /* open')).toMatchObject({ errorId: 'FP-L004' });
    });

    it('reports a dangling operator at end of input', () => {
      const error = parseFailure('a.b +');
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ errorId: 'FP-P002' });
    });

    it('hints at an unclosed parenthesis', () => {
      const error = parseFailure('(1 + 2');
      expect(error).toMatchObject({ errorId: 'FP-P003' });
      expect(error instanceof Error ? error.message : '').toContain(
        'Hint: Check for unclosed parenthesis'
      );
    });

    it('rejects trailing input', () => {
      expect(parseFailure('1 + 2)')).toMatchObject({ errorId: 'FP-P001' });
    });

    it('hints at == used for equality', () => {
      const error = parseFailure('a == b');
      expect(error).toMatchObject({
        errorId: 'FP-P001',
        location: { line: 1, column: 4 },
      });
      expect(error instanceof Error ? error.message : '').toContain(
        "Hint: Use '=' for equality, not '=='"
      );
    });
  });
});
