import { describe, it, expect } from '@jest/globals';
import { ToolArgsValidator, ValidationError } from '../ToolArgsValidator.js';

describe('ToolArgsValidator', () => {
  describe('ValidationError', () => {
    it('should have correct name and message', () => {
      const error = new ValidationError('test message');
      expect(error.name).toBe('ValidationError');
      expect(error.message).toBe('test message');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('compileQuery', () => {
    it('should accept a command with optional flags', () => {
      expect(ToolArgsValidator.compileQuery({ command: '/query DTN', includeGeneralStats: true })).toEqual({
        command: '/query DTN',
        includeGeneralStats: true,
      });
    });

    it('should require a non-empty command', () => {
      expect(() => ToolArgsValidator.compileQuery({})).toThrow(
        '"command" is required and must be a non-empty string'
      );
      expect(() => ToolArgsValidator.compileQuery({ command: '   ' })).toThrow(ValidationError);
      expect(() => ToolArgsValidator.compileQuery(undefined)).toThrow(ValidationError);
    });

    it('should reject non-boolean flags', () => {
      expect(() => ToolArgsValidator.compileQuery({ command: 'DTN', includeGeneralStats: 'yes' })).toThrow(
        '"includeGeneralStats" must be a boolean'
      );
    });

    it('should reject non-object arguments', () => {
      expect(() => ToolArgsValidator.compileQuery(['DTN'])).toThrow('Tool arguments must be an object');
      expect(() => ToolArgsValidator.compileQuery('DTN')).toThrow('Tool arguments must be an object');
    });
  });

  describe('parseFilter', () => {
    it('should accept an expression', () => {
      expect(ToolArgsValidator.parseFilter({ expression: 'AGE>=50', allowBareCondition: true })).toEqual({
        expression: 'AGE>=50',
        allowBareCondition: true,
      });
    });

    it('should require the expression', () => {
      expect(() => ToolArgsValidator.parseFilter({ expression: 42 })).toThrow(
        '"expression" is required and must be a non-empty string'
      );
    });
  });

  describe('compileEntities', () => {
    it('should accept entities with optional roles', () => {
      const args = ToolArgsValidator.compileEntities({
        entities: [
          { entity: 'age', value: 40, role: 'lower' },
          { entity: 'kpi', value: 'DTN', role: null },
          { entity: 'sex', value: 'male' },
        ],
        message: 'show DTN for men over 40',
        confidence: 0.8,
      });

      expect(args.entities).toEqual([
        { entity: 'age', value: 40, role: 'lower' },
        { entity: 'kpi', value: 'DTN', role: null },
        { entity: 'sex', value: 'male', role: undefined },
      ]);
      expect(args.message).toBe('show DTN for men over 40');
      expect(args.confidence).toBe(0.8);
    });

    it('should require an entity array', () => {
      expect(() => ToolArgsValidator.compileEntities({ entities: 'DTN' })).toThrow(
        '"entities" is required and must be an array'
      );
    });

    it('should name the offending entity', () => {
      expect(() => ToolArgsValidator.compileEntities({ entities: [{ entity: 'kpi', value: 'DTN' }, 7] })).toThrow(
        'entities[1] must be an object'
      );
      expect(() => ToolArgsValidator.compileEntities({ entities: [{ entity: '', value: 'DTN' }] })).toThrow(
        'entities[0].entity must be a non-empty string'
      );
      expect(() =>
        ToolArgsValidator.compileEntities({ entities: [{ entity: 'age', value: 40, role: 1 }] })
      ).toThrow('entities[0].role must be a string or null');
    });

    it('should bound the confidence', () => {
      expect(() => ToolArgsValidator.compileEntities({ entities: [], confidence: 1.5 })).toThrow(
        '"confidence" must be a number between 0 and 1'
      );
      expect(() => ToolArgsValidator.compileEntities({ entities: [], confidence: '0.5' })).toThrow(
        ValidationError
      );
    });

    it('should type-check the message and exclusion override', () => {
      expect(() => ToolArgsValidator.compileEntities({ entities: [], message: 3 })).toThrow(
        '"message" must be a string'
      );
      expect(() => ToolArgsValidator.compileEntities({ entities: [], exclusionContext: 'no' })).toThrow(
        '"exclusionContext" must be a boolean'
      );
    });
  });

  describe('describeAliases', () => {
    it('should accept no arguments', () => {
      expect(ToolArgsValidator.describeAliases(undefined)).toEqual({});
      expect(ToolArgsValidator.describeAliases({})).toEqual({});
    });

    it('should accept known families only', () => {
      expect(ToolArgsValidator.describeAliases({ family: 'stroke' })).toEqual({ family: 'stroke' });
      expect(() => ToolArgsValidator.describeAliases({ family: 'colour' })).toThrow(
        'Unknown alias family: "colour"'
      );
    });
  });
});
