/**
 * Type definitions for dataset profiles
 *
 * A profile is produced upstream by a profiler. `RawFieldProfile` mirrors the
 * on-disk `*.profile.json` shape; `FieldStatistics` is the normalized record the
 * classifier consumes.
 */

export const STORAGE_HINTS = ['string', 'text', 'int', 'float', 'bool', 'json'] as const;

export type StorageHint = (typeof STORAGE_HINTS)[number];

export interface StringLengthRange {
  min: number;
  max: number;
}

/**
 * One field entry of a profile document, as written by the profiler
 */
export interface RawFieldProfile {
  /** Value types observed while profiling (e.g. 'string', 'array', 'null') */
  types: string[];
  storageHint: StorageHint;
  total: number;
  nulls: number;
  distinct: number;
  distinctCapReached: boolean;
  /** Either bound may be null when the field held no strings */
  stringLengths?: {
    min?: number | null;
    max?: number | null;
  };
  booleanLike: boolean;
  facetCandidate: boolean;
  urlLike: boolean;
  imageLike: boolean;
  jsonLike: boolean;
  naturalLanguageLike: boolean;
  distribution?: {
    values: Record<string, number>;
  };
  example?: string | number | boolean;
}

export interface DatasetProfile {
  input: string;
  output: string | null;
  recordCount: number;
  tags: string[];
  /** Declared primary key, if the profiler knew one */
  pk?: string;
  /** Ordered unique-field hints */
  uniqueFields?: string[];
  fields: Record<string, RawFieldProfile>;
}

export interface FieldStatistics {
  name: string;
  storageHint: StorageHint;
  observedTypes: readonly string[];
  total: number;
  nulls: number;
  distinctCount: number;
  /** When true, distinctCount is a lower bound */
  distinctCapReached: boolean;
  stringLengthRange?: StringLengthRange;
  booleanLike: boolean;
  facetCandidate: boolean;
  urlLike: boolean;
  imageLike: boolean;
  jsonLike: boolean;
  naturalLanguageLike: boolean;
  topOrExampleValue?: string;
}

/** Field name -> statistics, in source field order */
export type DatasetStatistics = ReadonlyMap<string, FieldStatistics>;
