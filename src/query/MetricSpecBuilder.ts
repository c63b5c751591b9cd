import { getDefaultAliasRegistry, type AliasRegistry } from '../aliases/AliasRegistry.js';
import type { GroupBy, KpiId } from '../aliases/families.js';
import { debugLog, logger } from '../utils/logger.js';
import { parseFilterString } from './FilterParser.js';
import type { TokenizeOptions } from './Lexer.js';
import {
  InvalidDistributionSpecError,
  UnknownGroupByError,
  UnknownKpiError,
} from './QueryCompilerError.js';
import {
  createDistribution,
  createMetric,
  createMetricsCollection,
  type DistributionSpec,
  type LogicalNode,
  type MetricsCollection,
} from './types.js';

/**
 * Flags of a `/query` command, e.g.
 * `/query AGE DTN -filter AND(AGE>=50, SEX==MALE) -stats -distribution DTN:12:0:120`.
 */
export interface MetricCommand {
  metrics: string[];
  filter?: string;
  group?: string;
  distribution: string[];
  stats: boolean;
}

export interface MetricRequest {
  metrics: MetricsCollection;
  filter?: LogicalNode;
}

const COMMAND_PREFIX = '/query';
const INTEGER = /^[+-]?\d+$/;

function flagArgument(chunk: string, flag: string): string | undefined {
  if (!chunk.startsWith(flag)) {
    return undefined;
  }
  return chunk.slice(flag.length).trim();
}

/**
 * Split a command into its bare metric words and flags. Flags start at ` -`; unknown
 * flags are ignored, and a repeated flag keeps its last value.
 */
export function parseMetricCommand(command: string): MetricCommand {
  let text = command.trim();
  if (text.startsWith(COMMAND_PREFIX)) {
    text = text.slice(COMMAND_PREFIX.length).trim();
  }

  const [head = '', ...flags] = text.split(/(?= -)/);
  const parsed: MetricCommand = {
    metrics: head.trim().split(/\s+/).filter(Boolean),
    distribution: [],
    stats: false,
  };

  for (const raw of flags) {
    const chunk = raw.trim();

    const filter = flagArgument(chunk, '-filter');
    if (filter !== undefined) {
      parsed.filter = filter;
      continue;
    }

    const group = flagArgument(chunk, '-group');
    if (group !== undefined) {
      parsed.group = group;
      continue;
    }

    const distribution = flagArgument(chunk, '-distribution');
    if (distribution !== undefined) {
      parsed.distribution = distribution.split(/\s+/).filter(Boolean);
      continue;
    }

    if (chunk.startsWith('-stats')) {
      parsed.stats = true;
      continue;
    }

    debugLog('metrics', 'Ignoring unknown command flag', { flag: chunk });
  }

  return parsed;
}

function resolveKpi(registry: AliasRegistry, text: string): KpiId {
  const kpi = registry.tryResolve('kpi', text);
  if (kpi === undefined) {
    throw new UnknownKpiError(text);
  }
  return kpi;
}

function parseInteger(spec: string, field: string, value: string): number {
  const parsed = Number(value);
  if (!INTEGER.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidDistributionSpecError(spec, `${field} must be an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Parse a `KPI:bins:lower:upper` histogram request.
 *
 * @throws {InvalidDistributionSpecError} Wrong field count or non-integer fields
 * @throws {UnknownKpiError} The KPI field names no known KPI
 * @throws {InvariantViolationError} `lower >= upper` or `bins <= 0`
 */
export function parseDistributionSpec(
  spec: string,
  registry: AliasRegistry = getDefaultAliasRegistry()
): { kpi: KpiId; distribution: DistributionSpec } {
  const fields = spec.split(':');
  if (fields.length !== 4) {
    throw new InvalidDistributionSpecError(spec, `expected 4 fields, got ${fields.length}`);
  }

  const [kpiText, bins, lower, upper] = fields;
  const binCount = parseInteger(spec, 'bins', bins);
  const lowerBound = parseInteger(spec, 'lower', lower);
  const upperBound = parseInteger(spec, 'upper', upper);

  return {
    kpi: resolveKpi(registry, kpiText),
    distribution: createDistribution(binCount, lowerBound, upperBound),
  };
}

export function buildMetricsCollection(
  input: Pick<MetricCommand, 'metrics' | 'distribution' | 'stats' | 'group'>,
  registry: AliasRegistry = getDefaultAliasRegistry()
): MetricsCollection {
  const distributions = new Map<KpiId, DistributionSpec>();
  for (const spec of input.distribution) {
    const { kpi, distribution } = parseDistributionSpec(spec, registry);
    distributions.set(kpi, distribution);
  }

  const metrics = input.metrics.map((word) => {
    const kpi = resolveKpi(registry, word);
    return createMetric(kpi, { stats: input.stats, distribution: distributions.get(kpi) });
  });

  const requested = new Set(metrics.map((metric) => metric.kpi));
  for (const kpi of distributions.keys()) {
    if (!requested.has(kpi)) {
      logger.warn('Distribution requested for a KPI that is not in the metric list; ignoring it', {
        kpi,
      });
    }
  }

  let groupBy: GroupBy | undefined;
  if (input.group) {
    groupBy = registry.tryResolve('groupBy', input.group);
    if (groupBy === undefined) {
      throw new UnknownGroupByError(input.group);
    }
  }

  const collection = createMetricsCollection(metrics, groupBy);
  debugLog('metrics', 'Built metrics collection', {
    kpis: metrics.map((metric) => metric.kpi),
    groupBy,
  });
  return collection;
}

/**
 * Parse a full `/query` command into its metrics and optional filter tree.
 */
export function parseMetricRequest(
  command: string,
  registry: AliasRegistry = getDefaultAliasRegistry(),
  options: TokenizeOptions = {}
): MetricRequest {
  const args = parseMetricCommand(command);
  const metrics = buildMetricsCollection(args, registry);

  if (!args.filter) {
    return { metrics };
  }
  return { metrics, filter: parseFilterString(args.filter, registry, options) };
}
