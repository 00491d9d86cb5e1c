/**
 * Field Classifier
 *
 * Maps per-field profile statistics to a storage type, a primary-key decision
 * and the facet roles a search index should grant the field. Pure: no I/O, no
 * state between calls, inputs are never mutated.
 */

import { z } from 'zod';
import { STORAGE_HINTS, type DatasetStatistics, type FieldStatistics } from '../types/profile.js';
import type {
  ClassificationResult,
  DatasetClassification,
  FacetRole,
  PrimaryKeySource,
  ResolvedType
} from '../types/classification.js';
import { AmbiguityError, ConfigurationError, InputError } from './errors.js';
import { DEFAULT_CLASSIFIER_RULES, withDefaultRules, type ClassifierRules } from './rules.js';
import { createLogger, type Logger } from '../utils/logger.js';

const FieldStatisticsSchema = z
  .object({
    name: z.string().min(1),
    storageHint: z.enum(STORAGE_HINTS),
    observedTypes: z.array(z.string()),
    total: z.number().int().nonnegative(),
    nulls: z.number().int().nonnegative(),
    distinctCount: z.number().int().nonnegative(),
    distinctCapReached: z.boolean(),
    stringLengthRange: z
      .object({
        min: z.number().nonnegative(),
        max: z.number().nonnegative()
      })
      .optional(),
    booleanLike: z.boolean(),
    facetCandidate: z.boolean(),
    urlLike: z.boolean(),
    imageLike: z.boolean(),
    jsonLike: z.boolean(),
    naturalLanguageLike: z.boolean(),
    topOrExampleValue: z.string().optional()
  })
  .refine(stats => stats.nulls <= stats.total, {
    message: 'nulls cannot exceed total',
    path: ['nulls']
  });

/**
 * Reject statistics missing required attributes or carrying impossible counts
 */
export function assertValidStatistics(stats: unknown, fieldName: string): void {
  const result = FieldStatisticsSchema.safeParse(stats);
  if (result.success) {
    return;
  }

  const issue = result.error.issues[0];
  const where = issue.path.length > 0 ? issue.path.join('.') : 'statistics';
  throw new InputError(
    'malformed-input',
    fieldName,
    `Malformed statistics for field "${fieldName}": ${where}: ${issue.message}`
  );
}

export interface TypeResolution {
  resolvedType: ResolvedType;
  length?: number;
}

function hasListName(fieldName: string, rules: ClassifierRules): boolean {
  const lower = fieldName.toLowerCase();
  if (lower.endsWith('s') && !lower.endsWith('ss')) {
    return true;
  }
  return rules.listNameHints.includes(lower);
}

/**
 * A string field whose name reads plural and whose example value is a short
 * delimited list ("Action,Drama")
 */
export function isListLike(fieldName: string, stats: FieldStatistics, rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES): boolean {
  if (stats.storageHint !== 'string' && stats.storageHint !== 'text') {
    return false;
  }
  if (stats.naturalLanguageLike || stats.urlLike || stats.imageLike) {
    return false;
  }
  if (!hasListName(fieldName, rules)) {
    return false;
  }

  const example = stats.topOrExampleValue;
  if (!example) {
    return false;
  }

  for (const delimiter of rules.listDelimiters) {
    if (!example.includes(delimiter)) {
      continue;
    }
    const parts = example.split(delimiter).map(part => part.trim());
    if (parts.length >= 2 && parts.every(part => part.length > 0 && part.length <= rules.maxListItemLength)) {
      return true;
    }
  }

  return false;
}

/**
 * Storage type resolution; the first matching rule wins
 */
export function resolveType(
  fieldName: string,
  stats: FieldStatistics,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): TypeResolution {
  if (stats.storageHint === 'json' || stats.observedTypes.includes('array') || isListLike(fieldName, stats, rules)) {
    return { resolvedType: 'array' };
  }

  switch (stats.storageHint) {
    case 'bool':
      return { resolvedType: 'bool' };
    case 'int':
      return { resolvedType: 'int' };
    case 'float':
      return { resolvedType: 'float' };
    default:
      break;
  }

  const maxLength = stats.stringLengthRange?.max;
  if (stats.storageHint === 'text' || (maxLength !== undefined && maxLength > rules.maxStringLength)) {
    return { resolvedType: 'text' };
  }

  const length = maxLength !== undefined && maxLength > 0
    ? Math.min(maxLength, rules.maxStringLength)
    : rules.maxStringLength;

  return { resolvedType: 'string', length };
}

/**
 * URLs, images and JSON blobs are never faceted
 */
export function isPayloadish(
  fieldName: string,
  stats: FieldStatistics,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): boolean {
  if (stats.urlLike || stats.imageLike || stats.jsonLike) {
    return true;
  }
  const lower = fieldName.toLowerCase();
  return rules.payloadNamePatterns.some(pattern => lower.includes(pattern));
}

export function isHighCardinality(stats: FieldStatistics, rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES): boolean {
  if (stats.distinctCount >= rules.highCardinalityCount) {
    return true;
  }
  return stats.total > 0 && stats.distinctCount / stats.total >= rules.highCardinalityRatio;
}

/**
 * Advisory uniqueness: every value seen so far was distinct. With a capped
 * counter, reaching the cap means no duplicate was seen before sampling stopped.
 */
export function isProbablyUnique(
  stats: FieldStatistics,
  resolvedType: ResolvedType,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): boolean {
  if (stats.nulls > 0 || stats.booleanLike || stats.total === 0) {
    return false;
  }
  if (resolvedType === 'array' || resolvedType === 'json') {
    return false;
  }
  if (!stats.distinctCapReached) {
    return stats.distinctCount === stats.total;
  }
  return stats.distinctCount >= rules.distinctCap;
}

export function isSearchable(
  fieldName: string,
  stats: FieldStatistics,
  resolvedType: ResolvedType,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): boolean {
  if (resolvedType !== 'string' && resolvedType !== 'text') {
    return false;
  }
  if (!stats.naturalLanguageLike || stats.booleanLike || stats.facetCandidate) {
    return false;
  }
  if (isPayloadish(fieldName, stats, rules)) {
    return false;
  }
  const lower = fieldName.toLowerCase();
  return !rules.unsearchableNamePatterns.some(pattern => lower.includes(pattern));
}

export function resolveFacetRoles(
  fieldName: string,
  stats: FieldStatistics,
  resolvedType: ResolvedType,
  isPrimaryKey: boolean,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): Set<FacetRole> {
  const roles = new Set<FacetRole>();
  if (isPrimaryKey || isPayloadish(fieldName, stats, rules)) {
    return roles;
  }

  const countable = resolvedType === 'int' && !stats.booleanLike;

  if (
    !isHighCardinality(stats, rules) &&
    (stats.booleanLike || stats.facetCandidate || resolvedType === 'array' || countable)
  ) {
    roles.add('filterable');
  }

  if (countable || resolvedType === 'float') {
    roles.add('sortable');
  }

  if (isSearchable(fieldName, stats, resolvedType, rules)) {
    roles.add('searchable');
  }

  return roles;
}

export interface ClassifyDatasetOptions {
  /** Explicit primary key; must name a field of the dataset */
  primaryKey?: string;
  /** Ordered unique-field hints declared by the dataset */
  uniqueFieldHints?: readonly string[];
  /** Fall back to uniqueness detection when no override or hint exists */
  heuristicPrimaryKey?: boolean;
}

export interface PrimaryKeyResolution {
  field: string;
  source: PrimaryKeySource;
}

export class FieldClassifier {
  private readonly rules: ClassifierRules;
  private readonly logger: Logger;

  constructor(rules: Partial<ClassifierRules> = {}, logger: Logger = createLogger('FieldClassifier')) {
    this.rules = withDefaultRules(rules);
    this.logger = logger;
  }

  getRules(): ClassifierRules {
    return this.rules;
  }

  /**
   * Classify a single field
   */
  classify(
    stats: FieldStatistics,
    fieldName: string,
    isDeclaredPrimaryKey: boolean,
    uniqueFieldHints: readonly string[] = []
  ): ClassificationResult {
    assertValidStatistics(stats, fieldName);

    const { resolvedType, length } = resolveType(fieldName, stats, this.rules);

    const result: ClassificationResult = {
      name: fieldName,
      resolvedType,
      nullable: !isDeclaredPrimaryKey,
      isPrimaryKey: isDeclaredPrimaryKey,
      unique: !isDeclaredPrimaryKey && uniqueFieldHints.includes(fieldName),
      probablyUnique: isProbablyUnique(stats, resolvedType, this.rules),
      facetRoles: resolveFacetRoles(fieldName, stats, resolvedType, isDeclaredPrimaryKey, this.rules)
    };
    if (length !== undefined) {
      result.length = length;
    }

    return result;
  }

  /**
   * Pick the dataset's primary key: override, then hints, then (opt-in) heuristics
   */
  resolvePrimaryKey(statistics: DatasetStatistics, options: ClassifyDatasetOptions = {}): PrimaryKeyResolution {
    const { primaryKey, uniqueFieldHints = [], heuristicPrimaryKey = false } = options;

    if (primaryKey !== undefined) {
      if (!statistics.has(primaryKey)) {
        throw new ConfigurationError(
          'field-not-found',
          primaryKey,
          `Primary key field "${primaryKey}" not found among ${statistics.size} profiled fields`
        );
      }
      return { field: primaryKey, source: 'override' };
    }

    if (uniqueFieldHints.length > 0) {
      const hinted = uniqueFieldHints.find(hint => statistics.has(hint));
      if (hinted === undefined) {
        throw new ConfigurationError(
          'unique-hint-missing',
          uniqueFieldHints[0],
          `Declared unique field "${uniqueFieldHints[0]}" is absent from the profile statistics`
        );
      }
      return { field: hinted, source: 'hint' };
    }

    if (heuristicPrimaryKey) {
      const candidates: string[] = [];
      for (const [name, stats] of statistics) {
        const { resolvedType } = resolveType(name, stats, this.rules);
        if (isProbablyUnique(stats, resolvedType, this.rules)) {
          candidates.push(name);
        }
      }

      const field = candidates.includes('id') ? 'id' : candidates[0];
      if (field !== undefined) {
        return { field, source: 'heuristic' };
      }
    }

    throw new AmbiguityError(
      heuristicPrimaryKey
        ? 'No primary key determinable: no override, no unique-field hints and no field with all-distinct values'
        : 'No primary key determinable: supply one explicitly or enable heuristic primary-key detection'
    );
  }

  /**
   * Classify every field of a dataset. Exactly one field comes back as the primary key.
   */
  classifyDataset(statistics: DatasetStatistics, options: ClassifyDatasetOptions = {}): DatasetClassification {
    if (statistics.size === 0) {
      throw new InputError('empty-input', null, 'Cannot classify an empty set of field statistics');
    }

    for (const [name, stats] of statistics) {
      assertValidStatistics(stats, name);
    }

    const { field: primaryKey, source } = this.resolvePrimaryKey(statistics, options);
    this.logger.debug(`Primary key resolved to "${primaryKey}"`, { source });

    const hints = options.uniqueFieldHints ?? [];
    const fields: ClassificationResult[] = [];
    for (const [name, stats] of statistics) {
      fields.push(this.classify(stats, name, name === primaryKey, hints));
    }

    return { primaryKey, primaryKeySource: source, fields };
  }
}

/**
 * Key a list of statistics by field name, keeping order
 */
export function toStatisticsMap(statistics: Iterable<FieldStatistics>): DatasetStatistics {
  const map = new Map<string, FieldStatistics>();
  for (const stats of statistics) {
    map.set(stats.name, stats);
  }
  return map;
}
