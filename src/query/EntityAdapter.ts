/**
 * Entity list to filter tree and metrics.
 *
 * Entities come from an upstream extractor as `{ entity, value, role }` records. Unlike
 * the text parser this adapter is lenient: a value that does not resolve is dropped,
 * logged and reported in `diagnostics`, never thrown.
 */

import { getDefaultAliasRegistry, type AliasRegistry } from '../aliases/AliasRegistry.js';
import type { Comparison, GroupBy, KpiId } from '../aliases/families.js';
import { debugLog, logger } from '../utils/logger.js';
import {
  ageLeaf,
  and,
  booleanLeaf,
  createDistribution,
  createMetric,
  createMetricsCollection,
  dateLeaf,
  isIsoDate,
  logical,
  nihssLeaf,
  not,
  sexLeaf,
  strokeLeaf,
  type DistributionSpec,
  type FilterNode,
  type LogicalNode,
  type MetricSpec,
  type MetricsCollection,
  type SexLeaf,
  type StrokeLeaf,
} from './types.js';

export type EntityType =
  | 'age'
  | 'nihss'
  | 'date'
  | 'sex'
  | 'stroke_type'
  | 'boolean_type'
  | 'kpi'
  | 'group_by'
  | 'chart_type';

export interface ExtractedEntity {
  entity: string;
  value: unknown;
  role?: string | null;
}

export interface EntityDiagnostic {
  entity: string;
  value: string;
  reason: string;
}

export interface EntityTranslation {
  filter?: LogicalNode;
  metrics: MetricsCollection;
  diagnostics: EntityDiagnostic[];
}

export interface ComplexityAssessment {
  tooComplex: boolean;
  reason: string;
  confidence: number;
}

type RangeRole = 'lower' | 'upper';

const RANGE_COMPARISONS: Record<RangeRole, Comparison> = {
  lower: 'GE',
  upper: 'LE',
};

/** KPIs that get summary statistics and a histogram without being asked */
const DEFAULT_DISTRIBUTIONS: Readonly<Record<string, DistributionSpec>> = {
  AGE: createDistribution(10, 0, 100),
  DTN: createDistribution(12, 0, 120),
  DIDO: createDistribution(20, 0, 200),
  ADMISSION_NIHSS: createDistribution(21, 0, 21),
  DTI: createDistribution(10, 0, 100),
};

const EXCLUSION_KEYWORDS = [
  'exclude',
  'excluding',
  'but not',
  'except',
  'without',
  'not',
  'dont',
  "don't",
  'remove',
  'skip',
];

const LOGICAL_WORDS = ['and', 'or', 'but', 'except', 'excluding', 'not', 'however', 'although'];
const NEGATION_WORDS = ['not', 'dont', "don't", 'never', 'no', 'exclude', 'without'];
const AMBIGUOUS_WORDS = ['it', 'that', 'this', 'them', 'those', 'they'];

const MIN_CONFIDENCE = 0.6;
const MAX_LOGICAL_WORDS = 2;
const MAX_NEGATIONS = 1;
const MAX_WORDS = 25;
const MAX_UNMAPPABLE_SHARE = 0.3;

const INTEGER = /^[+-]?\d+$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsPhrase(message: string, phrase: string): boolean {
  return new RegExp(`(?:^|[^a-z'])${escapeRegExp(phrase)}(?![a-z'])`).test(message);
}

function countPhrases(message: string, phrases: readonly string[]): number {
  return phrases.filter((phrase) => containsPhrase(message, phrase)).length;
}

/** True when the message asks to leave something out ("without", "except", "don't", ...). */
export function hasExclusionContext(message: string): boolean {
  const lowered = message.toLowerCase();
  return EXCLUSION_KEYWORDS.some((keyword) => containsPhrase(lowered, keyword));
}

function entityText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function parseInteger(text: string): number | undefined {
  if (!INTEGER.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

function isRangeRole(role: string | null | undefined): role is RangeRole {
  return role === 'lower' || role === 'upper';
}

class EntityCollector {
  readonly diagnostics: EntityDiagnostic[] = [];

  readonly ages: Partial<Record<RangeRole, number>> = {};
  readonly nihss: Partial<Record<RangeRole, number>> = {};
  readonly dates: Partial<Record<RangeRole, string>> = {};
  readonly sexes: SexLeaf[] = [];
  readonly strokes: StrokeLeaf[] = [];
  readonly booleans: FilterNode[] = [];
  readonly kpis: KpiId[] = [];
  groupBy?: GroupBy;

  constructor(private readonly registry: AliasRegistry) {}

  private drop(entity: string, value: string, reason: string): void {
    logger.warn('Dropping entity', { entity, value, reason });
    this.diagnostics.push({ entity, value, reason });
  }

  add(entity: ExtractedEntity): void {
    const text = entityText(entity.value);
    if (text === undefined || text === '') {
      this.drop(entity.entity, String(entity.value), 'Missing or non-scalar value');
      return;
    }

    switch (entity.entity) {
      case 'age':
      case 'nihss': {
        if (!isRangeRole(entity.role)) {
          this.drop(entity.entity, text, `Range role must be 'lower' or 'upper', got '${entity.role ?? ''}'`);
          return;
        }
        const value = parseInteger(text);
        if (value === undefined) {
          this.drop(entity.entity, text, 'Not an integer');
          return;
        }
        const range = entity.entity === 'age' ? this.ages : this.nihss;
        range[entity.role] = value;
        return;
      }
      case 'date': {
        if (!isRangeRole(entity.role)) {
          this.drop(entity.entity, text, `Range role must be 'lower' or 'upper', got '${entity.role ?? ''}'`);
          return;
        }
        if (!isIsoDate(text)) {
          this.drop(entity.entity, text, 'Not an ISO calendar date');
          return;
        }
        this.dates[entity.role] = text;
        return;
      }
      case 'sex': {
        const sex = this.registry.tryResolve('sex', text);
        if (sex === undefined) {
          this.drop(entity.entity, text, 'Unknown sex value');
          return;
        }
        this.sexes.push(sexLeaf(sex));
        return;
      }
      case 'stroke_type': {
        const stroke = this.registry.tryResolve('stroke', text);
        if (stroke === undefined) {
          this.drop(entity.entity, text, 'Unknown stroke type');
          return;
        }
        this.strokes.push(strokeLeaf(stroke));
        return;
      }
      case 'boolean_type': {
        const property = this.registry.tryResolve('boolean', text);
        if (property === undefined) {
          this.drop(entity.entity, text, 'Unknown boolean property');
          return;
        }
        this.booleans.push(booleanLeaf(property, true));
        return;
      }
      case 'kpi': {
        const kpi = this.registry.tryResolve('kpi', text);
        if (kpi === undefined) {
          this.drop(entity.entity, text, 'Unknown KPI');
          return;
        }
        this.kpis.push(kpi);
        return;
      }
      case 'group_by': {
        const groupBy = this.registry.tryResolve('groupBy', text);
        if (groupBy === undefined) {
          this.drop(entity.entity, text, 'Unknown group-by dimension');
          return;
        }
        this.groupBy = groupBy;
        return;
      }
      case 'chart_type':
        debugLog('entities', 'Ignoring chart type entity', { value: text });
        return;
      default:
        this.drop(entity.entity, text, 'Unsupported entity type');
    }
  }

  buildFilter(exclusionContext: boolean): LogicalNode | undefined {
    const leaves: FilterNode[] = [];

    for (const role of ['lower', 'upper'] as const) {
      const age = this.ages[role];
      if (age !== undefined) {
        leaves.push(ageLeaf(RANGE_COMPARISONS[role], age));
      }
    }
    for (const role of ['lower', 'upper'] as const) {
      const score = this.nihss[role];
      if (score !== undefined) {
        leaves.push(nihssLeaf(RANGE_COMPARISONS[role], score));
      }
    }
    for (const role of ['lower', 'upper'] as const) {
      const date = this.dates[role];
      if (date !== undefined) {
        leaves.push(dateLeaf(RANGE_COMPARISONS[role], date));
      }
    }

    if (this.sexes.length === 1) {
      leaves.push(this.sexes[0]);
    } else if (this.sexes.length > 1) {
      leaves.push(logical('OR', this.sexes));
    }

    if (exclusionContext) {
      leaves.push(...this.strokes.map((stroke) => not(stroke)));
    } else if (this.strokes.length === 1) {
      leaves.push(this.strokes[0]);
    } else if (this.strokes.length > 1) {
      leaves.push(logical('OR', this.strokes));
    }

    leaves.push(...this.booleans);

    return leaves.length > 0 ? and(...leaves) : undefined;
  }

  buildMetrics(): MetricsCollection {
    const metrics: MetricSpec[] = this.kpis.map((kpi) => {
      const distribution = DEFAULT_DISTRIBUTIONS[kpi];
      return distribution ? createMetric(kpi, { stats: true, distribution }) : createMetric(kpi);
    });
    return createMetricsCollection(metrics, this.groupBy);
  }
}

/**
 * Build a filter tree and metrics from extracted entities.
 *
 * Leaves are ordered age, NIHSS, date, sex, stroke, boolean and always combined under
 * one top-level `AND`. Several sex or stroke values become one `OR`; under
 * `exclusionContext` each stroke value is instead wrapped in its own `NOT`.
 * For ranges the last value given per role wins.
 */
export function fromEntities(
  entities: readonly ExtractedEntity[],
  exclusionContext: boolean,
  registry: AliasRegistry = getDefaultAliasRegistry()
): EntityTranslation {
  const collector = new EntityCollector(registry);
  for (const entity of entities) {
    collector.add(entity);
  }

  const filter = collector.buildFilter(exclusionContext);
  const metrics = collector.buildMetrics();

  debugLog('entities', 'Translated entities', {
    entityCount: entities.length,
    exclusionContext,
    hasFilter: filter !== undefined,
    kpis: metrics.metrics.map((metric) => metric.kpi),
    dropped: collector.diagnostics.length,
  });

  const translation: EntityTranslation = { metrics, diagnostics: collector.diagnostics };
  if (filter) {
    translation.filter = filter;
  }
  return translation;
}

/** {@link fromEntities} with the exclusion context read from the user's message. */
export function translateEntities(
  entities: readonly ExtractedEntity[],
  message: string,
  registry: AliasRegistry = getDefaultAliasRegistry()
): EntityTranslation {
  return fromEntities(entities, hasExclusionContext(message), registry);
}

function canMapEntity(entity: ExtractedEntity, registry: AliasRegistry): boolean {
  const text = entityText(entity.value);
  if (text === undefined) {
    return false;
  }

  switch (entity.entity) {
    case 'kpi':
      return registry.tryResolve('kpi', text) !== undefined;
    case 'sex':
      return registry.tryResolve('sex', text) !== undefined;
    case 'stroke_type':
      return registry.tryResolve('stroke', text) !== undefined;
    case 'group_by':
      return registry.tryResolve('groupBy', text) !== undefined;
    case 'boolean_type':
      return registry.tryResolve('boolean', text) !== undefined;
    case 'age':
    case 'nihss':
      return parseInteger(text) !== undefined;
    default:
      return true;
  }
}

/**
 * Decide whether an extraction is simple enough for {@link translateEntities}, or should
 * go to a more capable parser. Checks run in order and the first failing one wins.
 */
export function assessComplexity(
  entities: readonly ExtractedEntity[],
  message: string,
  confidence = 1,
  registry: AliasRegistry = getDefaultAliasRegistry()
): ComplexityAssessment {
  if (confidence < MIN_CONFIDENCE) {
    return { tooComplex: true, reason: 'Low extraction confidence', confidence };
  }

  if (entities.length === 0) {
    return { tooComplex: true, reason: 'No entities extracted', confidence: 0 };
  }

  if (!entities.some((entity) => entity.entity === 'kpi')) {
    return { tooComplex: true, reason: 'No metrics/KPIs identified', confidence: 0.3 };
  }

  const lowered = message.toLowerCase();

  const logicalCount = countPhrases(lowered, LOGICAL_WORDS);
  if (logicalCount > MAX_LOGICAL_WORDS) {
    return { tooComplex: true, reason: `Too many logical operators (${logicalCount})`, confidence: 0.4 };
  }

  const negationCount = countPhrases(lowered, NEGATION_WORDS);
  if (negationCount > MAX_NEGATIONS) {
    return { tooComplex: true, reason: `Multiple negations (${negationCount})`, confidence: 0.4 };
  }

  const wordCount = message.split(/\s+/).filter(Boolean).length;
  if (wordCount > MAX_WORDS) {
    return { tooComplex: true, reason: `Query too long (${wordCount} words)`, confidence: 0.5 };
  }

  const words = lowered.split(/\s+/);
  if (AMBIGUOUS_WORDS.some((word) => words.includes(word))) {
    return { tooComplex: true, reason: 'Contains ambiguous references', confidence: 0.6 };
  }

  const unmappable = entities.filter((entity) => !canMapEntity(entity, registry)).length;
  if (unmappable > entities.length * MAX_UNMAPPABLE_SHARE) {
    return {
      tooComplex: true,
      reason: `Too many unmappable entities (${unmappable}/${entities.length})`,
      confidence: 0.5,
    };
  }

  return { tooComplex: false, reason: 'Query appears suitable for rule-based handling', confidence };
}
