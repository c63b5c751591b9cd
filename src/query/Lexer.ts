/**
 * Filter expression lexer.
 *
 * Turns `AND(AGE>=50, SEX==MALE)` into a flat token stream. Each position is matched
 * against an ordered rule list and the first rule that matches wins; there is no
 * backtracking. Identifiers and enum values are upper-case only.
 *
 * Characters no rule matches are lexical gaps. In strict mode the first gap raises
 * {@link LexicalGapError}; otherwise gaps are skipped and reported through the logger.
 */

import { debugLog, logger } from '../utils/logger.js';
import { LexicalGapError } from './QueryCompilerError.js';
import type { Token, TokenKind } from './types.js';

interface TokenRule {
  kind: TokenKind | 'SKIP';
  pattern: RegExp;
}

// Sticky patterns, matched at the current offset only
const TOKEN_RULES: readonly TokenRule[] = [
  { kind: 'LPAREN', pattern: /\(/y },
  { kind: 'RPAREN', pattern: /\)/y },
  { kind: 'COMMA', pattern: /,/y },
  { kind: 'OPERATOR', pattern: /\b(?:AND|OR|NOT)\b/y },
  { kind: 'COMPARISON', pattern: /==|!=|>=|<=|>|</y },
  { kind: 'IDENT', pattern: /[A-Z_]+/y },
  { kind: 'STRING', pattern: /\d{4}-\d{2}-\d{2}/y },
  { kind: 'NUMBER', pattern: /\d+/y },
  { kind: 'SKIP', pattern: /\s+/y },
];

export interface LexicalGap {
  character: string;
  offset: number;
}

export interface ScanResult {
  tokens: Token[];
  gaps: LexicalGap[];
}

export interface TokenizeOptions {
  /** Fail on the first unrecognized character instead of skipping it */
  strict?: boolean;
}

function matchRule(input: string, offset: number): { kind: TokenRule['kind']; text: string } | undefined {
  for (const rule of TOKEN_RULES) {
    rule.pattern.lastIndex = offset;
    const match = rule.pattern.exec(input);
    if (match && match[0].length > 0) {
      return { kind: rule.kind, text: match[0] };
    }
  }
  return undefined;
}

/**
 * Tokenize the whole input, collecting every lexical gap. The returned stream always
 * ends with an `EOF` token.
 */
export function scan(input: string): ScanResult {
  const tokens: Token[] = [];
  const gaps: LexicalGap[] = [];
  let offset = 0;

  while (offset < input.length) {
    const matched = matchRule(input, offset);

    if (!matched) {
      const codePoint = input.codePointAt(offset) ?? 0;
      const character = String.fromCodePoint(codePoint);
      gaps.push({ character, offset });
      offset += character.length;
      continue;
    }

    if (matched.kind !== 'SKIP') {
      tokens.push({ kind: matched.kind, text: matched.text, offset });
    }
    offset += matched.text.length;
  }

  tokens.push({ kind: 'EOF', text: '', offset: input.length });
  return { tokens, gaps };
}

export function tokenize(input: string, options: TokenizeOptions = {}): Token[] {
  const { tokens, gaps } = scan(input);

  if (gaps.length > 0) {
    if (options.strict) {
      throw new LexicalGapError(gaps[0].character, gaps[0].offset);
    }

    logger.warn('Skipped unrecognized characters in filter expression', {
      input,
      gaps,
    });
  }

  debugLog('lexer', 'Tokenized filter expression', {
    tokenCount: tokens.length - 1,
    kinds: tokens.map((token) => token.kind).join(' '),
  });

  return tokens;
}
