import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

import {
  ALIAS_FAMILIES,
  COMPARISONS,
  GROUP_BY_DIMENSIONS,
  LOGICAL_OPERATORS,
  SEXES,
  STROKE_TYPES,
  isAnyString,
  memberOf,
  type AliasFamilyName,
  type FamilyMembers,
} from './families.js';
import { UnknownAliasError } from '../query/QueryCompilerError.js';
import comparisonTable from './data/comparison.json';
import logicalTable from './data/logical.json';
import sexTable from './data/sex.json';
import strokeTable from './data/stroke.json';
import booleanTable from './data/boolean.json';
import kpiTable from './data/kpi.json';
import groupByTable from './data/groupBy.json';

export interface AliasEntry<T extends string> {
  readonly canonical: T;
  readonly aliases: readonly string[];
}

/**
 * One family's lookup table. Matching is exact on the trimmed, lower-cased text against
 * each member's canonical value and aliases; the first member in declaration order wins
 * when two members share an alias.
 */
export class AliasTable<T extends string> {
  private readonly index = new Map<string, T>();

  constructor(
    public readonly family: AliasFamilyName,
    public readonly entries: readonly AliasEntry<T>[]
  ) {
    for (const entry of entries) {
      for (const key of [entry.canonical, ...entry.aliases]) {
        const normalized = key.trim().toLowerCase();
        if (!this.index.has(normalized)) {
          this.index.set(normalized, entry.canonical);
        }
      }
    }
  }

  lookup(text: string): T | undefined {
    return this.index.get(text.trim().toLowerCase());
  }

  members(): T[] {
    return this.entries.map((entry) => entry.canonical);
  }

  describe(): string {
    return this.entries
      .map((entry) => {
        const aliases = [...new Set(entry.aliases.map((alias) => alias.toLowerCase()))].sort();
        return `${entry.canonical} (aliases: ${[entry.canonical, ...aliases].join(', ')})`;
      })
      .join('; ');
  }
}

export type AliasTables = { [F in AliasFamilyName]: AliasTable<FamilyMembers[F]> };

/**
 * Immutable set of alias tables, built once and shared by reference with the parser,
 * metric builder, entity adapter and server.
 */
export class AliasRegistry {
  constructor(private readonly tables: AliasTables) {}

  resolve<F extends AliasFamilyName>(family: F, text: string): FamilyMembers[F] {
    const member = this.tryResolve(family, text);
    if (member === undefined) {
      throw new UnknownAliasError(family, text);
    }
    return member;
  }

  tryResolve<F extends AliasFamilyName>(family: F, text: string): FamilyMembers[F] | undefined {
    return this.tables[family].lookup(text);
  }

  members<F extends AliasFamilyName>(family: F): FamilyMembers[F][] {
    return this.tables[family].members();
  }

  /** Renders every member and its aliases, for prompts and diagnostics. */
  describe(family: AliasFamilyName): string {
    return this.tables[family].describe();
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate one family's raw JSON table. Closed families pass their full member list
 * as `expected`; the table must then name each member exactly once.
 */
export function parseAliasEntries<T extends string>(
  family: AliasFamilyName,
  raw: unknown,
  isMember: (value: string) => value is T,
  expected?: readonly T[]
): AliasEntry<T>[] {
  if (!Array.isArray(raw)) {
    throw new Error(`Alias table "${family}" must be a JSON array`);
  }

  const entries: AliasEntry<T>[] = [];
  const seen = new Set<string>();

  raw.forEach((item: unknown, index) => {
    if (typeof item !== 'object' || item === null || !('canonical' in item)) {
      throw new Error(`Alias table "${family}" entry ${index} must be an object with a "canonical" field`);
    }

    const canonical = item.canonical;
    if (typeof canonical !== 'string' || canonical.trim() === '') {
      throw new Error(`Alias table "${family}" entry ${index} has an empty or non-string canonical value`);
    }
    if (!isMember(canonical)) {
      throw new Error(`Alias table "${family}" names unknown member "${canonical}"`);
    }
    if (seen.has(canonical)) {
      throw new Error(`Alias table "${family}" lists "${canonical}" more than once`);
    }
    seen.add(canonical);

    const rawAliases: unknown = 'aliases' in item ? item.aliases : [];
    if (!Array.isArray(rawAliases)) {
      throw new Error(`Alias table "${family}" entry "${canonical}" has non-array aliases`);
    }
    const aliases = rawAliases.map((alias: unknown) => {
      if (typeof alias !== 'string') {
        throw new Error(`Alias table "${family}" entry "${canonical}" has a non-string alias`);
      }
      return alias;
    });

    entries.push({ canonical, aliases });
  });

  const missing = (expected ?? []).filter((member) => !seen.has(member));
  if (missing.length > 0) {
    throw new Error(`Alias table "${family}" is missing members: ${missing.join(', ')}`);
  }

  return entries;
}

export type AliasSources = Record<AliasFamilyName, unknown>;

export const BUNDLED_ALIAS_SOURCES: Readonly<AliasSources> = {
  comparison: comparisonTable,
  logical: logicalTable,
  sex: sexTable,
  stroke: strokeTable,
  boolean: booleanTable,
  kpi: kpiTable,
  groupBy: groupByTable,
};

export function buildAliasRegistry(sources: AliasSources): AliasRegistry {
  return new AliasRegistry({
    comparison: new AliasTable(
      'comparison',
      parseAliasEntries('comparison', sources.comparison, memberOf(COMPARISONS), COMPARISONS)
    ),
    logical: new AliasTable(
      'logical',
      parseAliasEntries('logical', sources.logical, memberOf(LOGICAL_OPERATORS), LOGICAL_OPERATORS)
    ),
    sex: new AliasTable('sex', parseAliasEntries('sex', sources.sex, memberOf(SEXES), SEXES)),
    stroke: new AliasTable(
      'stroke',
      parseAliasEntries('stroke', sources.stroke, memberOf(STROKE_TYPES), STROKE_TYPES)
    ),
    boolean: new AliasTable('boolean', parseAliasEntries('boolean', sources.boolean, isAnyString)),
    kpi: new AliasTable('kpi', parseAliasEntries('kpi', sources.kpi, isAnyString)),
    groupBy: new AliasTable(
      'groupBy',
      parseAliasEntries('groupBy', sources.groupBy, memberOf(GROUP_BY_DIMENSIONS), GROUP_BY_DIMENSIONS)
    ),
  });
}

/**
 * Build a registry from the bundled tables, replacing each family for which
 * `<directory>/<family>.json` exists.
 */
export function loadAliasRegistry(options: { directory?: string } = {}): AliasRegistry {
  const sources: AliasSources = { ...BUNDLED_ALIAS_SOURCES };
  const { directory } = options;

  if (directory) {
    for (const family of ALIAS_FAMILIES) {
      const path = join(directory, `${family}.json`);
      if (!existsSync(path)) {
        continue;
      }

      try {
        sources[family] = JSON.parse(readFileSync(path, 'utf8'));
      } catch (error) {
        throw new Error(`Failed to read alias table ${path}`, { cause: error });
      }
    }
  }

  return buildAliasRegistry(sources);
}

let defaultRegistry: AliasRegistry | undefined;

/** The bundled tables, built on first use and cached for the life of the process. */
export function getDefaultAliasRegistry(): AliasRegistry {
  if (!defaultRegistry) {
    defaultRegistry = buildAliasRegistry(BUNDLED_ALIAS_SOURCES);
  }
  return defaultRegistry;
}
