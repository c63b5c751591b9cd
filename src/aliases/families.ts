/**
 * Alias families and their member types.
 *
 * Families with a fixed member set are declared here so their canonical values are
 * string-literal types; the alias tables loaded from JSON must cover exactly these
 * members. Boolean properties and KPIs are open-ended tables, typed as strings.
 */

export const COMPARISONS = ['GE', 'LE', 'LT', 'GT', 'EQ', 'NE'] as const;
export type Comparison = (typeof COMPARISONS)[number];

export const LOGICAL_OPERATORS = ['AND', 'OR', 'NOT'] as const;
export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

export const SEXES = ['MALE', 'FEMALE', 'OTHER', 'UNKNOWN'] as const;
export type Sex = (typeof SEXES)[number];

export const STROKE_TYPES = [
  'ISCHEMIC',
  'INTRACEREBRAL_HEMORRHAGE',
  'TRANSIENT_ISCHEMIC',
  'SUBARACHNOID_HEMORRHAGE',
  'CEREBRAL_VENOUS_THROMBOSIS',
  'STROKE_MIMICS',
  'UNDETERMINED',
] as const;
export type StrokeType = (typeof STROKE_TYPES)[number];

export const GROUP_BY_DIMENSIONS = [
  'EMS_PRENOTIFICATION',
  'FIRST_CONTACT_PLACE',
  'IVT_APPLICATION_DEPARTMENT',
  'INR_MODE',
] as const;
export type GroupBy = (typeof GROUP_BY_DIMENSIONS)[number];

export type BooleanProperty = string;
export type KpiId = string;

export interface FamilyMembers {
  comparison: Comparison;
  logical: LogicalOperator;
  sex: Sex;
  stroke: StrokeType;
  boolean: BooleanProperty;
  kpi: KpiId;
  groupBy: GroupBy;
}

export type AliasFamilyName = keyof FamilyMembers;

export const ALIAS_FAMILIES: readonly AliasFamilyName[] = [
  'comparison',
  'logical',
  'sex',
  'stroke',
  'boolean',
  'kpi',
  'groupBy',
];

export function isAliasFamily(value: string): value is AliasFamilyName {
  return ALIAS_FAMILIES.some((family) => family === value);
}

/** Builds a type guard for membership in a fixed list of literals. */
export function memberOf<T extends string>(members: readonly T[]): (value: string) => value is T {
  return (value: string): value is T => members.some((member) => member === value);
}

export const isAnyString = (_value: string): _value is string => true;
