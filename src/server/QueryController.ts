import type { AliasRegistry } from '../aliases/AliasRegistry.js';
import { ALIAS_FAMILIES, type AliasFamilyName } from '../aliases/families.js';
import type { CompilerConfig } from '../config/compiler.js';
import { assessComplexity, fromEntities, hasExclusionContext } from '../query/EntityAdapter.js';
import { FilterParser } from '../query/FilterParser.js';
import { tokenize } from '../query/Lexer.js';
import { parseMetricRequest } from '../query/MetricSpecBuilder.js';
import { compileFilter, compileQuery, type CompileOptions } from '../query/QueryCompiler.js';
import { QueryCompilerError } from '../query/QueryCompilerError.js';
import { countFilterNodes } from '../query/types.js';
import { logger } from '../utils/logger.js';
import { ToolArgsValidator, ValidationError } from '../validators/ToolArgsValidator.js';
import type {
  CompileEntitiesResult,
  CompileQueryResult,
  DescribeAliasesResult,
  ParseFilterResult,
  ToolErrorResult,
} from './types.js';

/**
 * MCP Content format for responses
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * QueryController - MCP tool layer over the query compiler.
 *
 * Validates tool arguments, runs the lexer/parser/builder/compiler pipeline with the
 * configured time window, provider groups and lexing mode, and formats results as MCP
 * text content. Compiler and validation failures come back as `isError` content;
 * anything else propagates to the server.
 */
export class QueryController {
  constructor(
    private readonly registry: AliasRegistry,
    private readonly config: CompilerConfig
  ) {}

  private compileOptions(includeGeneralStats?: boolean): CompileOptions {
    return {
      timeWindow: { startDate: this.config.startDate, endDate: this.config.endDate },
      dataOrigin: { providerGroupIds: this.config.providerGroupIds },
      includeGeneralStats: includeGeneralStats ?? this.config.includeGeneralStats,
    };
  }

  private formatResponse(result: unknown, summary?: string, isError = false): McpContent {
    const text = summary
      ? `${summary}\n\n${JSON.stringify(result, null, 2)}`
      : JSON.stringify(result, null, 2);

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
      isError,
    };
  }

  private formatError(tool: string, error: unknown): McpContent {
    if (error instanceof QueryCompilerError) {
      const result: ToolErrorResult = {
        status: 'error',
        error: error.name,
        message: error.message,
        stage: error.stage,
        hint: error.hint,
      };
      logger.warn(`${tool} rejected input`, { error: error.name, stage: error.stage, message: error.message });
      return this.formatResponse(result, `Error: ${error.message}`, true);
    }

    if (error instanceof ValidationError) {
      const result: ToolErrorResult = { status: 'error', error: error.name, message: error.message };
      return this.formatResponse(result, `Error: ${error.message}`, true);
    }

    throw error;
  }

  /**
   * Handle COMPILE_QUERY tool
   */
  handleCompileQueryTool(rawArgs: unknown): McpContent {
    try {
      const args = ToolArgsValidator.compileQuery(rawArgs);
      const request = parseMetricRequest(args.command, this.registry, {
        strict: this.config.strictLexing,
      });

      const query = compileQuery({
        ...this.compileOptions(args.includeGeneralStats),
        metrics: request.metrics.metrics,
        groupBy: request.metrics.groupBy,
        filter: request.filter,
      });

      const result: CompileQueryResult = { status: 'ok', query, metrics: request.metrics };
      if (request.filter) {
        result.filter = request.filter;
      }

      const count = request.metrics.metrics.length;
      return this.formatResponse(result, `Compiled query for ${count} metric${count === 1 ? '' : 's'}.`);
    } catch (error) {
      return this.formatError('compile_query', error);
    }
  }

  /**
   * Handle PARSE_FILTER tool
   */
  handleParseFilterTool(rawArgs: unknown): McpContent {
    try {
      const args = ToolArgsValidator.parseFilter(rawArgs);
      const parser = new FilterParser(
        tokenize(args.expression, { strict: this.config.strictLexing }),
        this.registry
      );
      const filter = args.allowBareCondition ? parser.parseExpression() : parser.parse();

      const result: ParseFilterResult = {
        status: 'ok',
        filter,
        caseFilter: compileFilter(filter),
        nodeCount: countFilterNodes(filter),
      };
      return this.formatResponse(result, `Parsed filter with ${result.nodeCount} nodes.`);
    } catch (error) {
      return this.formatError('parse_filter', error);
    }
  }

  /**
   * Handle COMPILE_ENTITIES tool
   *
   * Extractions judged too complex for rule-based translation are still translated,
   * but reported with status `too_complex` and no query.
   */
  handleCompileEntitiesTool(rawArgs: unknown): McpContent {
    try {
      const args = ToolArgsValidator.compileEntities(rawArgs);
      const message = args.message ?? '';
      const exclusionContext = args.exclusionContext ?? hasExclusionContext(message);

      const translation = fromEntities(args.entities, exclusionContext, this.registry);
      const base = {
        exclusionContext,
        metrics: translation.metrics,
        diagnostics: translation.diagnostics,
        ...(translation.filter ? { filter: translation.filter } : {}),
      };

      if (args.message !== undefined) {
        const complexity = assessComplexity(args.entities, message, args.confidence, this.registry);
        if (complexity.tooComplex) {
          const result: CompileEntitiesResult = { ...base, status: 'too_complex', reason: complexity.reason };
          return this.formatResponse(result, `Too complex for rule-based handling: ${complexity.reason}`);
        }
      }

      if (translation.metrics.metrics.length === 0) {
        const result: CompileEntitiesResult = { ...base, status: 'too_complex', reason: 'No metrics/KPIs identified' };
        return this.formatResponse(result, 'No metrics identified; nothing to compile.');
      }

      const query = compileQuery({
        ...this.compileOptions(args.includeGeneralStats),
        metrics: translation.metrics.metrics,
        groupBy: translation.metrics.groupBy,
        filter: translation.filter,
      });

      const result: CompileEntitiesResult = { ...base, status: 'ok', query };
      const dropped = translation.diagnostics.length;
      return this.formatResponse(
        result,
        dropped > 0 ? `Compiled query; dropped ${dropped} entities.` : 'Compiled query.'
      );
    } catch (error) {
      return this.formatError('compile_entities', error);
    }
  }

  /**
   * Handle DESCRIBE_ALIASES tool
   */
  handleDescribeAliasesTool(rawArgs: unknown): McpContent {
    try {
      const args = ToolArgsValidator.describeAliases(rawArgs);
      const families: readonly AliasFamilyName[] = args.family ? [args.family] : ALIAS_FAMILIES;

      const result: DescribeAliasesResult = { status: 'ok', families: {} };
      for (const family of families) {
        result.families[family] = this.registry.describe(family);
      }
      return this.formatResponse(result);
    } catch (error) {
      return this.formatError('describe_aliases', error);
    }
  }
}
