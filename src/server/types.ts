import type { AliasFamilyName } from '../aliases/families.js';
import type { EntityDiagnostic, ExtractedEntity } from '../query/EntityAdapter.js';
import type { FilterNode, MetricsCollection } from '../query/types.js';

/**
 * MCP tool argument shapes, after validation.
 */

export interface CompileQueryToolArgs {
  /** `/query AGE DTN -filter AND(AGE>=50, SEX==MALE) -stats -distribution DTN:12:0:120` */
  command: string;
  includeGeneralStats?: boolean;
}

export interface ParseFilterToolArgs {
  expression: string;
  /** Accept a single condition such as `AGE>=50` without an enclosing operator */
  allowBareCondition?: boolean;
}

export interface CompileEntitiesToolArgs {
  entities: ExtractedEntity[];
  /** Original user message; used to detect exclusion wording and assess complexity */
  message?: string;
  /** Overrides exclusion detection from `message` */
  exclusionContext?: boolean;
  /** Extractor confidence in [0, 1] */
  confidence?: number;
  includeGeneralStats?: boolean;
}

export interface DescribeAliasesToolArgs {
  family?: AliasFamilyName;
}

// ============================================================================
// Tool results
// ============================================================================

export interface CompileQueryResult {
  status: 'ok';
  query: string;
  metrics: MetricsCollection;
  filter?: FilterNode;
}

export interface ParseFilterResult {
  status: 'ok';
  filter: FilterNode;
  caseFilter: string;
  nodeCount: number;
}

export interface CompileEntitiesResult {
  status: 'ok' | 'too_complex';
  reason?: string;
  exclusionContext: boolean;
  filter?: FilterNode;
  metrics: MetricsCollection;
  query?: string;
  diagnostics: EntityDiagnostic[];
}

export interface DescribeAliasesResult {
  status: 'ok';
  families: Partial<Record<AliasFamilyName, string>>;
}

export interface ToolErrorResult {
  status: 'error';
  error: string;
  message: string;
  stage?: string;
  hint?: string;
}
