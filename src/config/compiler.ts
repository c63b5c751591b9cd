import { isAbsolute, resolve } from 'path';

export interface CompilerConfig {
  startDate: string;
  endDate: string;
  providerGroupIds: number[];
  strictLexing: boolean;
  includeGeneralStats: boolean;
  aliasDirectory?: string;
}

export const DEFAULT_START_DATE = '1000-01-01';
export const DEFAULT_END_DATE = '9999-12-31';
export const DEFAULT_PROVIDER_GROUP_IDS: readonly number[] = [1];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const boolFromEnv = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

function dateFromEnv(name: string, fallback: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    return fallback;
  }

  if (!ISO_DATE.test(value)) {
    throw new Error(`${name} must be an ISO calendar date (YYYY-MM-DD), got "${value}"`);
  }

  return value;
}

function providerGroupsFromEnv(): number[] {
  const value = process.env.QUERY_PROVIDER_GROUP_IDS?.trim();
  if (!value) {
    return [...DEFAULT_PROVIDER_GROUP_IDS];
  }

  return value.split(',').map((part) => {
    const trimmed = part.trim();
    const parsed = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
      throw new Error(
        `QUERY_PROVIDER_GROUP_IDS must be a comma-separated list of positive integers, got "${value}"`
      );
    }
    return parsed;
  });
}

/**
 * Load query defaults from the environment.
 *
 * Relative `QUERY_ALIAS_DIR` values resolve against the working directory.
 */
export function loadCompilerConfig(): CompilerConfig {
  const startDate = dateFromEnv('QUERY_START_DATE', DEFAULT_START_DATE);
  const endDate = dateFromEnv('QUERY_END_DATE', DEFAULT_END_DATE);

  if (startDate > endDate) {
    throw new Error(`QUERY_START_DATE (${startDate}) must not be after QUERY_END_DATE (${endDate})`);
  }

  const aliasDirEnv = process.env.QUERY_ALIAS_DIR?.trim();
  const aliasDirectory = aliasDirEnv
    ? isAbsolute(aliasDirEnv)
      ? aliasDirEnv
      : resolve(process.cwd(), aliasDirEnv)
    : undefined;

  return {
    startDate,
    endDate,
    providerGroupIds: providerGroupsFromEnv(),
    strictLexing: boolFromEnv(process.env.QUERY_STRICT_LEXING, false),
    includeGeneralStats: boolFromEnv(process.env.QUERY_GENERAL_STATS, false),
    aliasDirectory,
  };
}
