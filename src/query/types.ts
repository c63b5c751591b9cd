import type {
  BooleanProperty,
  Comparison,
  GroupBy,
  KpiId,
  LogicalOperator,
  Sex,
  StrokeType,
} from '../aliases/families.js';
import { InvariantViolationError } from './QueryCompilerError.js';

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind =
  | 'LPAREN'
  | 'RPAREN'
  | 'COMMA'
  | 'OPERATOR'
  | 'COMPARISON'
  | 'IDENT'
  | 'NUMBER'
  | 'STRING'
  | 'EOF';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Character offset in the source text */
  offset: number;
}

// ============================================================================
// Filter AST
// ============================================================================

export type FilterNode =
  | LogicalNode
  | AgeLeaf
  | NihssLeaf
  | DateLeaf
  | SexLeaf
  | StrokeLeaf
  | BooleanLeaf;

export type FilterLeaf = Exclude<FilterNode, LogicalNode>;

export interface LogicalNode {
  readonly type: 'logical';
  readonly operator: LogicalOperator;
  readonly children: readonly FilterNode[];
}

export interface AgeLeaf {
  readonly type: 'age';
  readonly operator: Comparison;
  readonly value: number;
}

/** Admission NIHSS score, conventionally 0-42 */
export interface NihssLeaf {
  readonly type: 'nihss';
  readonly operator: Comparison;
  readonly value: number;
}

/** Discharge date; `value` is an ISO-8601 calendar date (YYYY-MM-DD) */
export interface DateLeaf {
  readonly type: 'date';
  readonly operator: Comparison;
  readonly value: string;
}

export interface SexLeaf {
  readonly type: 'sex';
  readonly value: Sex;
}

export interface StrokeLeaf {
  readonly type: 'stroke';
  readonly value: StrokeType;
}

export interface BooleanLeaf {
  readonly type: 'boolean';
  readonly property: BooleanProperty;
  readonly value: boolean;
}

// ============================================================================
// Metrics
// ============================================================================

export interface DistributionSpec {
  readonly binCount: number;
  readonly lower: number;
  readonly upper: number;
}

export interface MetricSpec {
  readonly kpi: KpiId;
  readonly stats: boolean;
  readonly distribution?: DistributionSpec;
}

export interface MetricsCollection {
  readonly metrics: readonly MetricSpec[];
  readonly groupBy?: GroupBy;
}

// ============================================================================
// Constructors
// ============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function requireInteger(value: number, what: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvariantViolationError(`${what} must be an integer, got ${value}`);
  }
}

/** True for a real calendar date written YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(2000, month - 1, day));
  date.setUTCFullYear(year);

  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

export function logical(operator: LogicalOperator, children: readonly FilterNode[]): LogicalNode {
  if (operator === 'NOT' && children.length !== 1) {
    throw new InvariantViolationError(`NOT takes exactly one child, got ${children.length}`);
  }
  if (children.length === 0) {
    throw new InvariantViolationError(`${operator} needs at least one child`);
  }

  return { type: 'logical', operator, children: [...children] };
}

export function and(...children: FilterNode[]): LogicalNode {
  return logical('AND', children);
}

export function or(...children: FilterNode[]): LogicalNode {
  return logical('OR', children);
}

export function not(child: FilterNode): LogicalNode {
  return logical('NOT', [child]);
}

export function ageLeaf(operator: Comparison, value: number): AgeLeaf {
  requireInteger(value, 'Age');
  return { type: 'age', operator, value };
}

export function nihssLeaf(operator: Comparison, value: number): NihssLeaf {
  requireInteger(value, 'NIHSS');
  return { type: 'nihss', operator, value };
}

export function dateLeaf(operator: Comparison, value: string): DateLeaf {
  if (!isIsoDate(value)) {
    throw new InvariantViolationError(`Date must be an ISO calendar date (YYYY-MM-DD), got '${value}'`);
  }
  return { type: 'date', operator, value };
}

export function sexLeaf(value: Sex): SexLeaf {
  return { type: 'sex', value };
}

export function strokeLeaf(value: StrokeType): StrokeLeaf {
  return { type: 'stroke', value };
}

export function booleanLeaf(property: BooleanProperty, value: boolean): BooleanLeaf {
  return { type: 'boolean', property, value };
}

/**
 * Histogram request. Fails rather than clamping when `lower >= upper` or
 * `binCount <= 0`.
 */
export function createDistribution(binCount: number, lower: number, upper: number): DistributionSpec {
  requireInteger(binCount, 'Bin count');
  requireInteger(lower, 'Lower bound');
  requireInteger(upper, 'Upper bound');

  if (lower >= upper) {
    throw new InvariantViolationError(
      `Lower bound must be less than upper bound (got lower=${lower}, upper=${upper})`
    );
  }
  if (binCount <= 0) {
    throw new InvariantViolationError(`Bin count must be greater than 0 (got ${binCount})`);
  }

  return { binCount, lower, upper };
}

export function createMetric(
  kpi: KpiId,
  options: { stats?: boolean; distribution?: DistributionSpec } = {}
): MetricSpec {
  const metric: MetricSpec = { kpi, stats: options.stats ?? false };
  return options.distribution ? { ...metric, distribution: options.distribution } : metric;
}

export function createMetricsCollection(
  metrics: readonly MetricSpec[],
  groupBy?: GroupBy
): MetricsCollection {
  return groupBy ? { metrics: [...metrics], groupBy } : { metrics: [...metrics] };
}

/** Number of nodes (logical and leaf) in a filter tree. */
export function countFilterNodes(node: FilterNode): number {
  if (node.type !== 'logical') {
    return 1;
  }
  return node.children.reduce((total, child) => total + countFilterNodes(child), 1);
}
