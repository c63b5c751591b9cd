import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { getDefaultAliasRegistry, loadAliasRegistry, type AliasRegistry } from '../aliases/AliasRegistry.js';
import { ALIAS_FAMILIES } from '../aliases/families.js';
import { loadCompilerConfig, type CompilerConfig } from '../config/compiler.js';
import { logger } from '../utils/logger.js';
import { QueryController, type McpContent } from './QueryController.js';

export const SERVER_NAME = 'stroke-metrics-query';
export const SERVER_VERSION = '0.1.0';

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'compile_query',
    description:
      'Compile a /query command (KPI words plus -filter, -group, -distribution and -stats flags) into a getMetrics query document.',
    inputSchema: {
      type: 'object',
      properties: {
        command: {
          type: 'string',
          description:
            'For example: /query AGE DTN -filter AND(AGE>=50, SEX==MALE) -stats -distribution DTN:12:0:120',
        },
        includeGeneralStats: {
          type: 'boolean',
          description: 'Append the cases-in-period block. Defaults to QUERY_GENERAL_STATS.',
        },
      },
      required: ['command'],
    },
  },
  {
    name: 'parse_filter',
    description:
      'Parse a filter expression such as AND(AGE>=50, SEX==MALE) and return its filter tree and caseFilter text.',
    inputSchema: {
      type: 'object',
      properties: {
        expression: { type: 'string', description: 'Filter expression to parse.' },
        allowBareCondition: {
          type: 'boolean',
          description: 'Accept a single condition without an enclosing AND/OR/NOT.',
        },
      },
      required: ['expression'],
    },
  },
  {
    name: 'compile_entities',
    description:
      'Translate extracted entities ({entity, value, role}) into a filter tree and metrics, then compile a query. Unresolvable values are dropped and reported.',
    inputSchema: {
      type: 'object',
      properties: {
        entities: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              entity: { type: 'string' },
              value: {},
              role: { type: ['string', 'null'] },
            },
            required: ['entity', 'value'],
          },
          description: 'Entity types: age, nihss, date, sex, stroke_type, boolean_type, kpi, group_by.',
        },
        message: {
          type: 'string',
          description: 'Original user message, used for exclusion wording and complexity checks.',
        },
        exclusionContext: {
          type: 'boolean',
          description: 'Force exclusion handling of stroke types instead of detecting it.',
        },
        confidence: { type: 'number', description: 'Extractor confidence between 0 and 1.' },
        includeGeneralStats: { type: 'boolean' },
      },
      required: ['entities'],
    },
  },
  {
    name: 'describe_aliases',
    description: 'List canonical values and accepted aliases for one alias family, or all of them.',
    inputSchema: {
      type: 'object',
      properties: {
        family: { type: 'string', enum: [...ALIAS_FAMILIES] },
      },
    },
  },
];

export function createQueryServer(config?: {
  compiler?: CompilerConfig;
  registry?: AliasRegistry;
}): Server {
  const compilerConfig = config?.compiler ?? loadCompilerConfig();
  const registry =
    config?.registry ??
    (compilerConfig.aliasDirectory
      ? loadAliasRegistry({ directory: compilerConfig.aliasDirectory })
      : getDefaultAliasRegistry());

  logger.info('configuration-loaded', {
    startDate: compilerConfig.startDate,
    endDate: compilerConfig.endDate,
    providerGroupIds: compilerConfig.providerGroupIds,
    strictLexing: compilerConfig.strictLexing,
    aliasDirectory: compilerConfig.aliasDirectory,
  });

  const controller = new QueryController(registry, compilerConfig);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const argsSize = args ? JSON.stringify(args).length : 0;
    const timer = logger.startTimer(`tool:${name}`, { tool: name });

    logger.info('request:start', { tool: name, argumentsSize: argsSize });

    try {
      let result: McpContent;
      switch (name) {
        case 'compile_query':
          result = controller.handleCompileQueryTool(args);
          break;
        case 'parse_filter':
          result = controller.handleParseFilterTool(args);
          break;
        case 'compile_entities':
          result = controller.handleCompileEntitiesTool(args);
          break;
        case 'describe_aliases':
          result = controller.handleDescribeAliasesTool(args);
          break;
        default:
          throw new Error(`Unknown tool: ${name}`);
      }

      timer.end({ status: result.isError ? 'rejected' : 'success' });
      return result;
    } catch (error) {
      timer.end({ status: 'error' });

      logger.error('request:error', { tool: name, error });

      const message = error instanceof Error ? error.message : String(error);
      return {
        content: [
          {
            type: 'text',
            text: `Error: ${message}`,
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}
