import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import {
  BUNDLED_ALIAS_SOURCES,
  buildAliasRegistry,
  getDefaultAliasRegistry,
  loadAliasRegistry,
} from '../AliasRegistry.js';
import { GROUP_BY_DIMENSIONS, STROKE_TYPES } from '../families.js';
import { UnknownAliasError } from '../../query/QueryCompilerError.js';

describe('AliasRegistry', () => {
  const registry = getDefaultAliasRegistry();

  describe('resolve', () => {
    it.each(['at least', '>=', '=>', 'no less than', '≥', 'GE'])(
      'should resolve "%s" to GE',
      (text) => {
        expect(registry.resolve('comparison', text)).toBe('GE');
      }
    );

    it('should ignore case and surrounding whitespace', () => {
      expect(registry.resolve('comparison', '  AT LEAST ')).toBe('GE');
      expect(registry.resolve('sex', 'Female')).toBe('FEMALE');
      expect(registry.resolve('stroke', 'TIA')).toBe('TRANSIENT_ISCHEMIC');
    });

    it('should resolve KPIs by canonical id and alias', () => {
      expect(registry.resolve('kpi', 'dtn')).toBe('DTN');
      expect(registry.resolve('kpi', 'door to needle')).toBe('DTN');
      expect(registry.resolve('kpi', 'nihss')).toBe('ADMISSION_NIHSS');
    });

    it('should resolve logical operator symbols', () => {
      expect(registry.resolve('logical', '&&')).toBe('AND');
      expect(registry.resolve('logical', '|')).toBe('OR');
      expect(registry.resolve('logical', '!')).toBe('NOT');
    });

    it('should throw UnknownAliasError with family and text', () => {
      expect.assertions(4);
      try {
        registry.resolve('sex', 'martian');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownAliasError);
        if (error instanceof UnknownAliasError) {
          expect(error.family).toBe('sex');
          expect(error.text).toBe('martian');
          expect(error.message).toBe("Unknown sex value 'martian'");
        }
      }
    });
  });

  describe('tryResolve', () => {
    it('should return undefined instead of throwing', () => {
      expect(registry.tryResolve('sex', 'martian')).toBeUndefined();
      expect(registry.tryResolve('boolean', 'tpa')).toBe('THROMBOLYSIS');
    });
  });

  describe('members and describe', () => {
    it('should list canonical members in declaration order', () => {
      expect(registry.members('groupBy')).toEqual([...GROUP_BY_DIMENSIONS]);
      expect(registry.members('stroke')).toEqual([...STROKE_TYPES]);
    });

    it('should render each member with its sorted aliases', () => {
      expect(registry.describe('logical')).toBe(
        'AND (aliases: AND, &, &&, all of); OR (aliases: OR, any of, |, ||); NOT (aliases: NOT, !, !!, =!, none of)'
      );
    });
  });

  describe('getDefaultAliasRegistry', () => {
    it('should build the bundled tables once', () => {
      expect(getDefaultAliasRegistry()).toBe(registry);
    });
  });
});

describe('buildAliasRegistry', () => {
  const allSexes = [
    { canonical: 'MALE' },
    { canonical: 'FEMALE' },
    { canonical: 'OTHER' },
    { canonical: 'UNKNOWN' },
  ];

  it('should let the first member win when two share an alias', () => {
    const registry = buildAliasRegistry({
      ...BUNDLED_ALIAS_SOURCES,
      sex: [
        { canonical: 'MALE', aliases: ['x'] },
        { canonical: 'FEMALE', aliases: ['x'] },
        { canonical: 'OTHER' },
        { canonical: 'UNKNOWN' },
      ],
    });

    expect(registry.resolve('sex', 'x')).toBe('MALE');
  });

  it('should reject a closed family missing a member', () => {
    expect(() =>
      buildAliasRegistry({ ...BUNDLED_ALIAS_SOURCES, sex: allSexes.slice(0, 3) })
    ).toThrow('Alias table "sex" is missing members: UNKNOWN');
  });

  it('should reject a closed family naming an unknown member', () => {
    expect(() =>
      buildAliasRegistry({ ...BUNDLED_ALIAS_SOURCES, sex: [...allSexes, { canonical: 'ALIEN' }] })
    ).toThrow('Alias table "sex" names unknown member "ALIEN"');
  });

  it('should reject duplicate members', () => {
    expect(() =>
      buildAliasRegistry({ ...BUNDLED_ALIAS_SOURCES, kpi: [{ canonical: 'DTN' }, { canonical: 'DTN' }] })
    ).toThrow('Alias table "kpi" lists "DTN" more than once');
  });

  it('should reject malformed tables', () => {
    expect(() => buildAliasRegistry({ ...BUNDLED_ALIAS_SOURCES, kpi: { DTN: [] } })).toThrow(
      'Alias table "kpi" must be a JSON array'
    );
    expect(() =>
      buildAliasRegistry({ ...BUNDLED_ALIAS_SOURCES, boolean: [{ canonical: 'X', aliases: 'y' }] })
    ).toThrow('Alias table "boolean" entry "X" has non-array aliases');
  });
});

describe('loadAliasRegistry', () => {
  let directory: string;

  beforeAll(() => {
    directory = mkdtempSync(join(tmpdir(), 'alias-overlay-'));
    writeFileSync(
      join(directory, 'stroke.json'),
      JSON.stringify([
        { canonical: 'ISCHEMIC' },
        { canonical: 'INTRACEREBRAL_HEMORRHAGE', aliases: ['big bleed'] },
        { canonical: 'TRANSIENT_ISCHEMIC' },
        { canonical: 'SUBARACHNOID_HEMORRHAGE' },
        { canonical: 'CEREBRAL_VENOUS_THROMBOSIS' },
        { canonical: 'STROKE_MIMICS' },
        { canonical: 'UNDETERMINED' },
      ])
    );
  });

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should replace families that have an overlay file', () => {
    const registry = loadAliasRegistry({ directory });

    expect(registry.resolve('stroke', 'big bleed')).toBe('INTRACEREBRAL_HEMORRHAGE');
    expect(registry.tryResolve('stroke', 'ich')).toBeUndefined();
  });

  it('should keep bundled tables for the other families', () => {
    const registry = loadAliasRegistry({ directory });

    expect(registry.resolve('sex', 'women')).toBe('FEMALE');
  });

  it('should fall back to the bundled tables without a directory', () => {
    expect(loadAliasRegistry().resolve('stroke', 'ich')).toBe('INTRACEREBRAL_HEMORRHAGE');
  });

  it('should report unreadable overlay files', () => {
    const broken = mkdtempSync(join(tmpdir(), 'alias-broken-'));
    writeFileSync(join(broken, 'kpi.json'), '{ not json');

    try {
      expect(() => loadAliasRegistry({ directory: broken })).toThrow(
        `Failed to read alias table ${join(broken, 'kpi.json')}`
      );
    } finally {
      rmSync(broken, { recursive: true, force: true });
    }
  });
});
