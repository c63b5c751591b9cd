/**
 * Filter tree and metric list to `getMetrics` query text.
 *
 * Output is a single line. Enum values (operators, KPI ids, stroke and sex values,
 * group-by dimensions) are written bare; property names, comparison operators and
 * dates are quoted string literals.
 *
 * **Example:**
 * ```
 * query { getMetrics(filter: { timePeriod: { startDate: "1000-01-01", endDate: "9999-12-31" } ,
 *   dataOrigin: { providerGroupId: [1] } } ) { metric_AGE: metric(metricId: AGE) {
 *   kpiGroup { kpi1: kpi { caseCount } } } } }
 * ```
 */

import type { GroupBy } from '../aliases/families.js';
import { DEFAULT_END_DATE, DEFAULT_PROVIDER_GROUP_IDS, DEFAULT_START_DATE } from '../config/compiler.js';
import { debugLog } from '../utils/logger.js';
import { InvariantViolationError } from './QueryCompilerError.js';
import type { FilterNode, MetricSpec, MetricsCollection } from './types.js';

export interface TimeWindow {
  startDate: string;
  endDate: string;
}

export interface DataOrigin {
  providerGroupIds: readonly number[];
}

export interface CompileQueryInput {
  metrics: readonly MetricSpec[];
  filter?: FilterNode;
  /** Segments every metric server-side and turns on its `groupedBy` selection */
  groupBy?: GroupBy;
  timeWindow?: TimeWindow;
  dataOrigin?: DataOrigin;
  /** Append the cases-in-period block */
  includeGeneralStats?: boolean;
}

export type CompileOptions = Omit<CompileQueryInput, 'metrics' | 'filter' | 'groupBy'>;

const STATS_FIELDS = [
  'percents',
  'normalizedPercents',
  'cohortSize',
  'normalizedCohortSize',
  'median',
  'mean',
  'variance',
  'confidenceIntervalMean',
  'confidenceIntervalMedian',
  'interquartileRange',
  'quartiles',
] as const;

const GENERAL_STATS_FIELD =
  'generalStatsGroup { generalStatistics { casesInPeriod filteredCasesInPeriod } }';

const INTEGER_PROPERTIES = {
  age: 'AGE',
  nihss: 'ADMISSION_NIHSS',
} as const;

const DATE_PROPERTY = 'DISCHARGE_DATE';

const GRAPHQL_NAME = /^[_A-Za-z][_0-9A-Za-z]*$/;

function quote(value: string): string {
  return JSON.stringify(value);
}

function enumValue(value: string): string {
  if (!GRAPHQL_NAME.test(value)) {
    throw new InvariantViolationError(`'${value}' cannot be written as a bare enum value`, 'compiler');
  }
  return value;
}

function integerValue(value: number): string {
  if (!Number.isSafeInteger(value)) {
    throw new InvariantViolationError(`Expected an integer, got ${value}`, 'compiler');
  }
  return String(value);
}

/**
 * Collapse whitespace runs and give every brace exactly one space on each side.
 */
export function cleanQuery(text: string): string {
  return text
    .replace(/\s*([{}])\s*/g, ' $1 ')
    .replace(/\s+/g, ' ')
    .trim();
}

function renderFilter(node: FilterNode): string {
  switch (node.type) {
    case 'logical':
      return `{ node: { logicalOperator: ${enumValue(node.operator)}, children: [ ${node.children
        .map(renderFilter)
        .join(', ')} ] } }`;
    case 'age':
    case 'nihss':
      return `{ leaf: { integerCaseFilter: { property: ${quote(INTEGER_PROPERTIES[node.type])}, operator: ${quote(
        node.operator
      )}, value: ${integerValue(node.value)} } } }`;
    case 'date':
      return `{ leaf: { dateCaseFilter: { property: ${quote(DATE_PROPERTY)}, operator: ${quote(
        node.operator
      )}, value: ${quote(node.value)} } } }`;
    case 'sex':
      return `{ leaf: { enumCaseFilter: { sexType: { values: [${enumValue(node.value)}], contains: true } } } }`;
    case 'stroke':
      return `{ leaf: { enumCaseFilter: { strokeType: { values: [${enumValue(node.value)}], contains: true } } } }`;
    case 'boolean':
      return `{ leaf: { booleanCaseFilter: { property: ${quote(node.property)}, value: ${node.value} } } }`;
    default: {
      const unreachable: never = node;
      throw new InvariantViolationError(`Unhandled filter node ${JSON.stringify(unreachable)}`, 'compiler');
    }
  }
}

function renderMetric(metric: MetricSpec, grouped: boolean): string {
  const kpi = enumValue(metric.kpi);
  const { distribution } = metric;

  const kpiArguments = distribution
    ? `(kpiOptions: { lowerBoundary: ${integerValue(distribution.lower)}, upperBoundary: ${integerValue(
        distribution.upper
      )} })`
    : '';

  const kpiFields: string[] = ['caseCount'];
  if (metric.stats) {
    kpiFields.push(...STATS_FIELDS);
  }
  if (distribution) {
    kpiFields.push(
      `d1: distribution(binCount: ${integerValue(
        distribution.binCount
      )}) { edges caseCount percents normalizedPercents }`
    );
  }

  const groupFields = [`kpi1: kpi${kpiArguments} { ${kpiFields.join(' ')} }`];
  if (grouped) {
    groupFields.push('groupedBy { groupItemName }');
  }

  return `metric_${kpi}: metric(metricId: ${kpi}) { kpiGroup { ${groupFields.join(' ')} } }`;
}

/**
 * Render a filter tree as a `caseFilter` argument value.
 */
export function compileFilter(node: FilterNode): string {
  return cleanQuery(renderFilter(node));
}

/**
 * Compile a complete query document. Output depends only on the input, so equal
 * inputs always give byte-identical text.
 *
 * @throws {InvariantViolationError} No metrics, or a value that is not a valid bare name or integer
 */
export function compileQuery(input: CompileQueryInput): string {
  if (input.metrics.length === 0) {
    throw new InvariantViolationError('A query needs at least one metric', 'compiler');
  }

  const timeWindow = input.timeWindow ?? { startDate: DEFAULT_START_DATE, endDate: DEFAULT_END_DATE };
  const providerGroupIds = input.dataOrigin?.providerGroupIds ?? DEFAULT_PROVIDER_GROUP_IDS;

  const filterArguments = [
    `timePeriod: { startDate: ${quote(timeWindow.startDate)}, endDate: ${quote(timeWindow.endDate)} }`,
    `dataOrigin: { providerGroupId: [${providerGroupIds.map(integerValue).join(', ')}] }`,
  ];
  if (input.filter) {
    filterArguments.push(`caseFilter: ${renderFilter(input.filter)}`);
  }

  const queryArguments = [`filter: { ${filterArguments.join(', ')} }`];
  if (input.groupBy) {
    queryArguments.push(`groupBy: ${enumValue(input.groupBy)}`);
  }

  const grouped = input.groupBy !== undefined;
  const fields = input.metrics.map((metric) => renderMetric(metric, grouped));
  if (input.includeGeneralStats) {
    fields.push(GENERAL_STATS_FIELD);
  }

  const query = cleanQuery(`query { getMetrics(${queryArguments.join(', ')}) { ${fields.join(' ')} } }`);

  debugLog('compiler', 'Compiled metrics query', {
    metrics: input.metrics.map((metric) => metric.kpi),
    hasFilter: input.filter !== undefined,
    groupBy: input.groupBy,
    length: query.length,
  });

  return query;
}

export function compileMetricsCollection(
  collection: MetricsCollection,
  filter?: FilterNode,
  options: CompileOptions = {}
): string {
  return compileQuery({
    ...options,
    metrics: collection.metrics,
    filter,
    groupBy: collection.groupBy,
  });
}
