import type { AliasFamilyName } from '../aliases/families.js';
import type { Token, TokenKind } from './types.js';

export type CompilerStage = 'lexer' | 'parser' | 'resolver' | 'metrics' | 'model' | 'compiler';

/**
 * Base class for every failure raised while lexing, parsing, resolving or compiling.
 * Nothing in the compiler retries or recovers; callers decide how to present these.
 */
export class QueryCompilerError extends Error {
  /** Stage where the error occurred */
  public readonly stage: CompilerStage;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(options: { message: string; stage: CompilerStage; hint?: string }) {
    super(options.message);
    this.name = 'QueryCompilerError';
    this.stage = options.stage;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * An input character no token rule matches. Only raised when strict lexing is on;
 * otherwise the character is skipped and logged.
 */
export class LexicalGapError extends QueryCompilerError {
  public readonly character: string;
  public readonly offset: number;

  constructor(character: string, offset: number) {
    super({
      message: `Unexpected character '${character}' at offset ${offset}`,
      stage: 'lexer',
      hint: 'Identifiers and enum values are upper-case ([A-Z_]+); comparisons are == != >= <= > <',
    });
    this.name = 'LexicalGapError';
    this.character = character;
    this.offset = offset;
  }
}

export class QuerySyntaxError extends QueryCompilerError {
  /** Token kind (or production name, e.g. `expr`) the parser wanted */
  public readonly expected: TokenKind | 'expr' | 'value';
  public readonly found: Token;
  /** Ordinal index of the offending token in the token stream */
  public readonly position: number;

  constructor(expected: TokenKind | 'expr' | 'value', found: Token, position: number) {
    const shown = found.kind === 'EOF' ? 'end of input' : `${found.kind} '${found.text}'`;
    super({
      message: `Expected ${expected}, got ${shown} at token ${position}`,
      stage: 'parser',
      hint: 'Filters look like AND(AGE>=50, SEX==MALE); every OPERATOR( needs at least one condition',
    });
    this.name = 'QuerySyntaxError';
    this.expected = expected;
    this.found = found;
    this.position = position;
  }
}

export class UnknownAliasError extends QueryCompilerError {
  public readonly family: AliasFamilyName;
  public readonly text: string;

  constructor(family: AliasFamilyName, text: string, message?: string) {
    super({
      message: message ?? `Unknown ${family} value '${text}'`,
      stage: 'resolver',
      hint: `Use a canonical ${family} name or one of its aliases`,
    });
    this.name = 'UnknownAliasError';
    this.family = family;
    this.text = text;
  }
}

/**
 * A condition whose identifier and value matched no leaf kind: not a numeric or date
 * field, the value is not a sex or stroke type, and the identifier is not a boolean
 * property.
 */
export class UnknownIdentifierError extends UnknownAliasError {
  public readonly identifier: string;
  /** Comparison as written, e.g. `!=` */
  public readonly comparison: string;
  public readonly value: string;

  constructor(identifier: string, comparison: string, value: string) {
    super('boolean', identifier, `Unknown identifier or unsupported filter: ${identifier}${comparison}${value}`);
    this.name = 'UnknownIdentifierError';
    this.identifier = identifier;
    this.comparison = comparison;
    this.value = value;
  }
}

export class UnknownKpiError extends UnknownAliasError {
  constructor(text: string) {
    super('kpi', text, `Unknown KPI/metric '${text}'`);
    this.name = 'UnknownKpiError';
  }
}

export class UnknownGroupByError extends UnknownAliasError {
  constructor(text: string) {
    super('groupBy', text, `Unknown group: ${text}`);
    this.name = 'UnknownGroupByError';
  }
}

export class InvalidDistributionSpecError extends QueryCompilerError {
  public readonly spec: string;

  constructor(spec: string, reason: string) {
    super({
      message: `Invalid distribution spec '${spec}': ${reason}`,
      stage: 'metrics',
      hint: 'Distributions are written KPI:bins:lower:upper, e.g. DTN:12:0:120',
    });
    this.name = 'InvalidDistributionSpecError';
    this.spec = spec;
  }
}

export class InvariantViolationError extends QueryCompilerError {
  constructor(message: string, stage: CompilerStage = 'model') {
    super({ message, stage });
    this.name = 'InvariantViolationError';
  }
}
