import { isAliasFamily } from '../aliases/families.js';
import type { ExtractedEntity } from '../query/EntityAdapter.js';
import type {
  CompileEntitiesToolArgs,
  CompileQueryToolArgs,
  DescribeAliasesToolArgs,
  ParseFilterToolArgs,
} from '../server/types.js';

type ArgRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ArgRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates raw MCP tool arguments and narrows them to the tool's argument type.
 * Throws ValidationError naming the offending field.
 */
export class ToolArgsValidator {
  private static record(args: unknown): ArgRecord {
    if (args === undefined || args === null) {
      return {};
    }
    if (!isRecord(args)) {
      throw new ValidationError('Tool arguments must be an object');
    }
    return args;
  }

  private static requiredString(args: ArgRecord, field: string): string {
    const value = args[field];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ValidationError(`"${field}" is required and must be a non-empty string`);
    }
    return value;
  }

  private static optionalString(args: ArgRecord, field: string): string | undefined {
    const value = args[field];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ValidationError(`"${field}" must be a string`);
    }
    return value;
  }

  private static optionalBoolean(args: ArgRecord, field: string): boolean | undefined {
    const value = args[field];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ValidationError(`"${field}" must be a boolean`);
    }
    return value;
  }

  static compileQuery(raw: unknown): CompileQueryToolArgs {
    const args = this.record(raw);
    return {
      command: this.requiredString(args, 'command'),
      includeGeneralStats: this.optionalBoolean(args, 'includeGeneralStats'),
    };
  }

  static parseFilter(raw: unknown): ParseFilterToolArgs {
    const args = this.record(raw);
    return {
      expression: this.requiredString(args, 'expression'),
      allowBareCondition: this.optionalBoolean(args, 'allowBareCondition'),
    };
  }

  static compileEntities(raw: unknown): CompileEntitiesToolArgs {
    const args = this.record(raw);

    const entities = args.entities;
    if (!Array.isArray(entities)) {
      throw new ValidationError('"entities" is required and must be an array');
    }

    const confidence = args.confidence;
    if (confidence !== undefined && (typeof confidence !== 'number' || confidence < 0 || confidence > 1)) {
      throw new ValidationError('"confidence" must be a number between 0 and 1');
    }

    return {
      entities: entities.map((entity: unknown, index) => this.entity(entity, index)),
      message: this.optionalString(args, 'message'),
      exclusionContext: this.optionalBoolean(args, 'exclusionContext'),
      confidence,
      includeGeneralStats: this.optionalBoolean(args, 'includeGeneralStats'),
    };
  }

  static describeAliases(raw: unknown): DescribeAliasesToolArgs {
    const args = this.record(raw);
    const family = this.optionalString(args, 'family');
    if (family === undefined) {
      return {};
    }
    if (!isAliasFamily(family)) {
      throw new ValidationError(`Unknown alias family: "${family}"`);
    }
    return { family };
  }

  private static entity(raw: unknown, index: number): ExtractedEntity {
    if (!isRecord(raw)) {
      throw new ValidationError(`entities[${index}] must be an object`);
    }

    const entity = raw.entity;
    if (typeof entity !== 'string' || entity === '') {
      throw new ValidationError(`entities[${index}].entity must be a non-empty string`);
    }

    const role = raw.role;
    if (role !== undefined && role !== null && typeof role !== 'string') {
      throw new ValidationError(`entities[${index}].role must be a string or null`);
    }

    return { entity, value: raw.value, role };
  }
}

/**
 * Custom error for tool argument validation failures
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
