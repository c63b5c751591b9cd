import { describe, it, expect } from '@jest/globals';

import { BUNDLED_ALIAS_SOURCES, buildAliasRegistry, getDefaultAliasRegistry } from '../../aliases/AliasRegistry.js';
import { FilterParser, parseFilterExpression, parseFilterString } from '../FilterParser.js';
import { tokenize } from '../Lexer.js';
import { compileFilter } from '../QueryCompiler.js';
import {
  LexicalGapError,
  QuerySyntaxError,
  UnknownIdentifierError,
} from '../QueryCompilerError.js';
import {
  ageLeaf,
  and,
  booleanLeaf,
  countFilterNodes,
  dateLeaf,
  nihssLeaf,
  not,
  or,
  sexLeaf,
  strokeLeaf,
} from '../types.js';

function syntaxErrorOf(run: () => unknown): QuerySyntaxError {
  try {
    run();
  } catch (error) {
    if (error instanceof QuerySyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a QuerySyntaxError');
}

describe('parseFilterString', () => {
  describe('conditions', () => {
    it('should parse age and sex conditions under AND', () => {
      expect(parseFilterString('AND(AGE>=50, SEX==MALE)')).toEqual(
        and(ageLeaf('GE', 50), sexLeaf('MALE'))
      );
    });

    it('should parse NIHSS conditions', () => {
      expect(parseFilterString('OR(NIHSS<5, NIHSS>20)')).toEqual(
        or(nihssLeaf('LT', 5), nihssLeaf('GT', 20))
      );
    });

    it('should parse discharge dates', () => {
      expect(parseFilterString('NOT(DISCHARGEDATE<2024-01-01)')).toEqual(
        not(dateLeaf('LT', '2024-01-01'))
      );
    });

    it('should resolve stroke values through their aliases', () => {
      expect(parseFilterString('OR(STROKE==ISCHEMIC, STROKE==TIA)')).toEqual(
        or(strokeLeaf('ISCHEMIC'), strokeLeaf('TRANSIENT_ISCHEMIC'))
      );
    });

    it('should parse boolean properties by identifier', () => {
      expect(parseFilterString('AND(THROMBECTOMY==TRUE, THROMBOLYSIS==FALSE)')).toEqual(
        and(booleanLeaf('THROMBECTOMY', true), booleanLeaf('THROMBOLYSIS', false))
      );
      expect(parseFilterString('AND(TPA==TRUE)')).toEqual(and(booleanLeaf('THROMBOLYSIS', true)));
    });

    it('should key sex and stroke leaves on the value, ignoring identifier and comparison', () => {
      expect(parseFilterString('AND(FOO==MALE)')).toEqual(and(sexLeaf('MALE')));
      expect(parseFilterString('AND(SEX!=MALE)')).toEqual(and(sexLeaf('MALE')));
    });

    it('should try numeric identifiers before any enum lookup', () => {
      const registry = buildAliasRegistry({
        ...BUNDLED_ALIAS_SOURCES,
        sex: [
          { canonical: 'MALE', aliases: ['50'] },
          { canonical: 'FEMALE' },
          { canonical: 'OTHER' },
          { canonical: 'UNKNOWN' },
        ],
      });

      expect(parseFilterExpression('AGE>=50', registry)).toEqual(ageLeaf('GE', 50));
    });

    it('should match identifiers case-insensitively in the dispatch table', () => {
      const tokens = [
        { kind: 'OPERATOR' as const, text: 'AND', offset: 0 },
        { kind: 'LPAREN' as const, text: '(', offset: 3 },
        { kind: 'IDENT' as const, text: 'age', offset: 4 },
        { kind: 'COMPARISON' as const, text: '<', offset: 7 },
        { kind: 'NUMBER' as const, text: '30', offset: 8 },
        { kind: 'RPAREN' as const, text: ')', offset: 10 },
        { kind: 'EOF' as const, text: '', offset: 11 },
      ];

      expect(new FilterParser(tokens, getDefaultAliasRegistry()).parse()).toEqual(and(ageLeaf('LT', 30)));
    });
  });

  describe('nesting', () => {
    it('should build one logical node per operator', () => {
      const filter = parseFilterString('OR(AND(AGE>=18, AGE<=65), NOT(STROKE==ICH))');

      expect(filter).toEqual(
        or(and(ageLeaf('GE', 18), ageLeaf('LE', 65)), not(strokeLeaf('INTRACEREBRAL_HEMORRHAGE')))
      );
      expect(countFilterNodes(filter)).toBe(6);
    });
  });

  describe('errors', () => {
    it('should reject an empty argument list expecting an expression', () => {
      const error = syntaxErrorOf(() => parseFilterString('AND()'));

      expect(error.expected).toBe('expr');
      expect(error.found).toEqual({ kind: 'RPAREN', text: ')', offset: 4 });
      expect(error.position).toBe(2);
      expect(error.message).toBe("Expected expr, got RPAREN ')' at token 2");
    });

    it('should report a missing closing parenthesis at end of input', () => {
      const error = syntaxErrorOf(() => parseFilterString('AND(AGE>=50'));

      expect(error.expected).toBe('RPAREN');
      expect(error.message).toBe('Expected RPAREN, got end of input at token 5');
    });

    it('should reject trailing tokens', () => {
      const error = syntaxErrorOf(() => parseFilterString('AND(AGE>=50) SEX'));

      expect(error.message).toBe("Expected EOF, got IDENT 'SEX' at token 6");
    });

    it('should require an operator at the top level', () => {
      const error = syntaxErrorOf(() => parseFilterString('AGE>=50'));

      expect(error.message).toBe("Expected OPERATOR, got IDENT 'AGE' at token 0");
    });

    it('should require a number for age and NIHSS', () => {
      const error = syntaxErrorOf(() => parseFilterString('AND(AGE>=OLD)'));

      expect(error.expected).toBe('NUMBER');
      expect(error.position).toBe(4);
    });

    it('should require a date for discharge date', () => {
      expect(syntaxErrorOf(() => parseFilterString('AND(DISCHARGEDATE>5)')).expected).toBe('STRING');
    });

    it('should require a value token after the comparison', () => {
      const error = syntaxErrorOf(() => parseFilterString('AND(AGE>=,)'));

      expect(error.expected).toBe('value');
      expect(error.message).toBe("Expected value, got COMMA ',' at token 4");
    });

    it('should require a comparison after the identifier', () => {
      expect(syntaxErrorOf(() => parseFilterString('AND(AGE 50)')).message).toBe(
        "Expected COMPARISON, got NUMBER '50' at token 3"
      );
    });

    it('should reject conditions that match no leaf kind', () => {
      expect.assertions(3);
      try {
        parseFilterString('AND(FOO==BAR)');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownIdentifierError);
        if (error instanceof UnknownIdentifierError) {
          expect(error.identifier).toBe('FOO');
          expect(error.message).toBe('Unknown identifier or unsupported filter: FOO==BAR');
        }
      }
    });

    it('should report the comparison as written', () => {
      expect.assertions(2);
      try {
        parseFilterString('AND(FOO!=BAR)');
      } catch (error) {
        if (error instanceof UnknownIdentifierError) {
          expect(error.comparison).toBe('!=');
          expect(error.message).toBe('Unknown identifier or unsupported filter: FOO!=BAR');
        }
      }
    });

    it('should fail on lexical gaps only when strict', () => {
      const registry = getDefaultAliasRegistry();

      expect(() => parseFilterString('AND(AGE>=50; SEX==MALE)', registry, { strict: true })).toThrow(
        LexicalGapError
      );
      expect(syntaxErrorOf(() => parseFilterString('AND(AGE>=50; SEX==MALE)', registry)).message).toBe(
        "Expected RPAREN, got IDENT 'SEX' at token 5"
      );
    });
  });
});

describe('parseFilterExpression', () => {
  it('should accept a bare condition', () => {
    expect(parseFilterExpression('NIHSS>=10')).toEqual(nihssLeaf('GE', 10));
  });

  it('should accept a full filter', () => {
    expect(parseFilterExpression('NOT(SEX==FEMALE)')).toEqual(not(sexLeaf('FEMALE')));
  });
});

describe('parse then compile', () => {
  it.each([
    'AND(AGE>=50, SEX==MALE)',
    'OR(AND(AGE>=18, AGE<=65), NOT(STROKE==ICH))',
    'AND(THROMBECTOMY==TRUE, OR(SEX==F, SEX==M), DISCHARGEDATE>=2023-06-30, NIHSS<4)',
    'NOT(OR(STROKE==SAH, STROKE==CVT))',
  ])('should emit one leaf or node object per tree node for %s', (text) => {
    const filter = parseFilterString(text);
    const compiled = compileFilter(filter);

    expect(compiled.match(/\{ (?:leaf|node): /g)?.length).toBe(countFilterNodes(filter));
  });

  it('should tokenize once and parse deterministically', () => {
    const tokens = tokenize('AND(AGE>=50, SEX==MALE)');
    const registry = getDefaultAliasRegistry();

    expect(new FilterParser(tokens, registry).parse()).toEqual(new FilterParser(tokens, registry).parse());
  });
});
