/**
 * Tests for field classification
 */
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  FieldClassifier,
  isHighCardinality,
  isListLike,
  resolveType,
  toStatisticsMap
} from './field-classifier.js';
import { AmbiguityError, ClassificationError, ConfigurationError, InputError } from './errors.js';
import { withDefaultRules } from './rules.js';
import { setLogLevel } from '../utils/logger.js';
import type { FieldStatistics } from '../types/profile.js';

function makeStats(overrides: Partial<FieldStatistics> & Pick<FieldStatistics, 'name'>): FieldStatistics {
  return {
    storageHint: 'string',
    observedTypes: ['string'],
    total: 100,
    nulls: 0,
    distinctCount: 10,
    distinctCapReached: false,
    booleanLike: false,
    facetCandidate: false,
    urlLike: false,
    imageLike: false,
    jsonLike: false,
    naturalLanguageLike: false,
    ...overrides
  };
}

function captureError(fn: () => unknown): ClassificationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ClassificationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ClassificationError');
}

const idStats = makeStats({ name: 'id', storageHint: 'int', observedTypes: ['int'], total: 100, distinctCount: 100 });

describe('FieldClassifier.classifyDataset', () => {
  const classifier = new FieldClassifier();

  it('should take the primary key from a unique-field hint and give it no facet roles', () => {
    const result = classifier.classifyDataset(toStatisticsMap([idStats]), { uniqueFieldHints: ['id'] });

    expect(result.primaryKey).toBe('id');
    expect(result.primaryKeySource).toBe('hint');
    expect(result.fields).toHaveLength(1);

    const [id] = result.fields;
    expect(id.resolvedType).toBe('int');
    expect(id.isPrimaryKey).toBe(true);
    expect(id.nullable).toBe(false);
    expect(id.unique).toBe(false);
    expect(id.probablyUnique).toBe(true);
    expect(id.facetRoles.size).toBe(0);
  });

  it('should fail with a configuration error naming a missing override', () => {
    const statistics = toStatisticsMap([idStats, makeStats({ name: 'title' })]);

    const error = captureError(() => classifier.classifyDataset(statistics, { primaryKey: 'sku' }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.kind).toBe('configuration');
    expect(error.rule).toBe('field-not-found');
    expect(error.field).toBe('sku');
    expect(error.message).toBe('Primary key field "sku" not found among 2 profiled fields');
  });

  it('should prefer an explicit override over hints', () => {
    const statistics = toStatisticsMap([idStats, makeStats({ name: 'sku', distinctCount: 100 })]);

    const result = classifier.classifyDataset(statistics, { primaryKey: 'sku', uniqueFieldHints: ['id'] });

    expect(result.primaryKey).toBe('sku');
    expect(result.primaryKeySource).toBe('override');
    expect(result.fields.map(field => [field.name, field.isPrimaryKey, field.unique])).toEqual([
      ['id', false, true],
      ['sku', true, false]
    ]);
  });

  it('should use the first hint present in the statistics', () => {
    const result = classifier.classifyDataset(toStatisticsMap([idStats]), { uniqueFieldHints: ['uuid', 'id'] });

    expect(result.primaryKey).toBe('id');
    expect(result.primaryKeySource).toBe('hint');
  });

  it('should fail when no hinted field is present', () => {
    const error = captureError(() =>
      classifier.classifyDataset(toStatisticsMap([idStats]), { uniqueFieldHints: ['uuid', 'slug'] })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.rule).toBe('unique-hint-missing');
    expect(error.field).toBe('uuid');
  });

  it('should refuse to guess a primary key unless heuristics are enabled', () => {
    const error = captureError(() => classifier.classifyDataset(toStatisticsMap([idStats])));

    expect(error).toBeInstanceOf(AmbiguityError);
    expect(error.kind).toBe('ambiguity');
    expect(error.rule).toBe('no-primary-key');
    expect(error.field).toBeNull();
  });

  it('should prefer "id" among all-distinct fields in heuristic mode', () => {
    const statistics = toStatisticsMap([makeStats({ name: 'slug', distinctCount: 100 }), idStats]);

    const result = classifier.classifyDataset(statistics, { heuristicPrimaryKey: true });

    expect(result.primaryKey).toBe('id');
    expect(result.primaryKeySource).toBe('heuristic');
  });

  it('should fall back to the first all-distinct field in heuristic mode', () => {
    const statistics = toStatisticsMap([
      makeStats({ name: 'genre', distinctCount: 4 }),
      makeStats({ name: 'slug', distinctCount: 100 }),
      makeStats({ name: 'isbn', distinctCount: 100 })
    ]);

    const result = classifier.classifyDataset(statistics, { heuristicPrimaryKey: true });

    expect(result.primaryKey).toBe('slug');
  });

  it('should not pick a field with nulls in heuristic mode', () => {
    const statistics = toStatisticsMap([makeStats({ name: 'slug', nulls: 1, distinctCount: 99 })]);

    const error = captureError(() => classifier.classifyDataset(statistics, { heuristicPrimaryKey: true }));

    expect(error).toBeInstanceOf(AmbiguityError);
  });

  it('should reject an empty statistics set', () => {
    const error = captureError(() => classifier.classifyDataset(new Map()));

    expect(error).toBeInstanceOf(InputError);
    expect(error.rule).toBe('empty-input');
    expect(error.field).toBeNull();
  });

  it('should report malformed statistics before resolving the primary key', () => {
    const statistics = toStatisticsMap([makeStats({ name: 'title', total: 3, nulls: 5 })]);

    const error = captureError(() => classifier.classifyDataset(statistics, { primaryKey: 'sku' }));

    expect(error).toBeInstanceOf(InputError);
    expect(error.rule).toBe('malformed-input');
    expect(error.field).toBe('title');
    expect(error.message).toBe('Malformed statistics for field "title": nulls: nulls cannot exceed total');
  });

  it('should mark exactly one field as primary key', () => {
    const statistics = toStatisticsMap([
      makeStats({ name: 'title', naturalLanguageLike: true, distinctCount: 90 }),
      idStats,
      makeStats({ name: 'year', storageHint: 'int', observedTypes: ['int'], distinctCount: 30 })
    ]);

    const result = classifier.classifyDataset(statistics, { primaryKey: 'id' });

    expect(result.fields.filter(field => field.isPrimaryKey).map(field => field.name)).toEqual(['id']);
    expect(result.fields.map(field => field.name)).toEqual(['title', 'id', 'year']);
  });

  it('should return equal results for identical input without mutating it', () => {
    const statistics = toStatisticsMap([
      idStats,
      makeStats({ name: 'genres', topOrExampleValue: 'Action,Drama', distinctCount: 40, total: 200 })
    ]);
    const before = JSON.stringify([...statistics]);

    const first = classifier.classifyDataset(statistics, { uniqueFieldHints: ['id'] });
    const second = classifier.classifyDataset(statistics, { uniqueFieldHints: ['id'] });

    expect(second).toEqual(first);
    expect(JSON.stringify([...statistics])).toBe(before);
  });
});

describe('FieldClassifier.classify', () => {
  const classifier = new FieldClassifier();

  it('should turn a plural field with a delimited example into a filterable array', () => {
    const genres = makeStats({ name: 'genres', total: 200, distinctCount: 40, topOrExampleValue: 'Action,Drama' });

    const result = classifier.classify(genres, 'genres', false);

    expect(result.resolvedType).toBe('array');
    expect(result.length).toBeUndefined();
    expect([...result.facetRoles]).toEqual(['filterable']);
  });

  it('should give URL fields no facet roles', () => {
    const imageUrl = makeStats({
      name: 'imageUrl',
      urlLike: true,
      facetCandidate: true,
      naturalLanguageLike: true,
      stringLengthRange: { min: 20, max: 80 }
    });

    const result = classifier.classify(imageUrl, 'imageUrl', false);

    expect(result.resolvedType).toBe('string');
    expect(result.length).toBe(80);
    expect(result.facetRoles.size).toBe(0);
  });

  it('should never facet url, image or json fields', () => {
    for (const flag of ['urlLike', 'imageLike', 'jsonLike'] as const) {
      const stats = makeStats({
        name: 'payload',
        facetCandidate: true,
        naturalLanguageLike: true,
        urlLike: flag === 'urlLike',
        imageLike: flag === 'imageLike',
        jsonLike: flag === 'jsonLike'
      });

      const roles = classifier.classify(stats, 'payload', false).facetRoles;

      expect(roles.has('filterable')).toBe(false);
      expect(roles.has('searchable')).toBe(false);
    }
  });

  it('should treat payload-looking names as payload', () => {
    const stats = makeStats({ name: 'thumbnail_path', facetCandidate: true, distinctCount: 3 });

    expect(classifier.classify(stats, 'thumbnail_path', false).facetRoles.size).toBe(0);
  });

  it('should resolve json hints to arrays', () => {
    const stats = makeStats({ name: 'metadata', storageHint: 'json', observedTypes: ['object'], jsonLike: true });

    const result = classifier.classify(stats, 'metadata', false);

    expect(result.resolvedType).toBe('array');
    expect(result.facetRoles.size).toBe(0);
  });

  it('should resolve observed arrays to arrays', () => {
    const stats = makeStats({ name: 'cast', observedTypes: ['array', 'null'], nulls: 4 });

    expect(classifier.classify(stats, 'cast', false).resolvedType).toBe('array');
  });

  it('should make booleans filterable but not sortable', () => {
    const stats = makeStats({ name: 'adult', storageHint: 'bool', observedTypes: ['bool'], booleanLike: true, distinctCount: 2 });

    const result = classifier.classify(stats, 'adult', false);

    expect(result.resolvedType).toBe('bool');
    expect(result.probablyUnique).toBe(false);
    expect([...result.facetRoles]).toEqual(['filterable']);
  });

  it('should make low-cardinality integers filterable and sortable', () => {
    const stats = makeStats({ name: 'rating', storageHint: 'int', observedTypes: ['int'], distinctCount: 10 });

    expect([...classifier.classify(stats, 'rating', false).facetRoles]).toEqual(['filterable', 'sortable']);
  });

  it('should keep high-cardinality integers sortable only', () => {
    const stats = makeStats({ name: 'year', storageHint: 'int', observedTypes: ['int'], distinctCount: 50 });

    expect([...classifier.classify(stats, 'year', false).facetRoles]).toEqual(['sortable']);
  });

  it('should not make floats filterable unless they are facet candidates', () => {
    const price = makeStats({ name: 'price', storageHint: 'float', observedTypes: ['float'], distinctCount: 5 });
    const stars = makeStats({ ...price, name: 'stars', facetCandidate: true });

    expect([...classifier.classify(price, 'price', false).facetRoles]).toEqual(['sortable']);
    expect([...classifier.classify(stars, 'stars', false).facetRoles]).toEqual(['filterable', 'sortable']);
  });

  it('should apply the absolute distinct-count threshold', () => {
    const stats = makeStats({ name: 'city', facetCandidate: true, total: 5000, distinctCount: 600 });

    expect(classifier.classify(stats, 'city', false).facetRoles.size).toBe(0);
  });

  it('should make natural-language strings searchable', () => {
    const stats = makeStats({
      name: 'overview',
      naturalLanguageLike: true,
      distinctCount: 95,
      stringLengthRange: { min: 10, max: 200 }
    });

    const result = classifier.classify(stats, 'overview', false);

    expect(result.resolvedType).toBe('string');
    expect(result.length).toBe(200);
    expect([...result.facetRoles]).toEqual(['searchable']);
  });

  it('should keep names containing "id" or "code" out of search', () => {
    const provider = makeStats({ name: 'provider', naturalLanguageLike: true, distinctCount: 95 });
    const zipCode = makeStats({ name: 'zipCode', naturalLanguageLike: true, distinctCount: 95 });

    expect(classifier.classify(provider, 'provider', false).facetRoles.has('searchable')).toBe(false);
    expect(classifier.classify(zipCode, 'zipCode', false).facetRoles.has('searchable')).toBe(false);
  });

  it('should mark hinted non-key fields unique and every non-key field nullable', () => {
    const email = makeStats({ name: 'email', distinctCount: 100 });

    const result = classifier.classify(email, 'email', false, ['id', 'email']);

    expect(result.unique).toBe(true);
    expect(result.nullable).toBe(true);
    expect(result.probablyUnique).toBe(true);
  });

  it('should treat a field that reached the distinct cap as probably unique', () => {
    const stats = makeStats({ name: 'uuid', total: 5000, distinctCount: 1000, distinctCapReached: true });

    expect(classifier.classify(stats, 'uuid', false).probablyUnique).toBe(true);
    expect(new FieldClassifier({ distinctCap: 2000 }).classify(stats, 'uuid', false).probablyUnique).toBe(false);
  });

  it('should reject negative counts', () => {
    const error = captureError(() => classifier.classify(makeStats({ name: 'title', total: -1 }), 'title', false));

    expect(error).toBeInstanceOf(InputError);
    expect(error.rule).toBe('malformed-input');
    expect(error.field).toBe('title');
  });

  it('should honor rule overrides', () => {
    const custom = new FieldClassifier({ highCardinalityRatio: 0.9 });
    const stats = makeStats({ name: 'year', storageHint: 'int', observedTypes: ['int'], distinctCount: 50 });

    expect(custom.getRules().highCardinalityRatio).toBe(0.9);
    expect(custom.getRules().highCardinalityCount).toBe(500);
    expect(custom.getRules()).toEqual(withDefaultRules({ highCardinalityRatio: 0.9 }));
    expect([...custom.classify(stats, 'year', false).facetRoles]).toEqual(['filterable', 'sortable']);
  });
});

describe('resolveType', () => {
  it('should fall back to the maximum string length when none was measured', () => {
    expect(resolveType('title', makeStats({ name: 'title' }))).toEqual({ resolvedType: 'string', length: 255 });
    expect(
      resolveType('title', makeStats({ name: 'title', stringLengthRange: { min: 0, max: 0 } }))
    ).toEqual({ resolvedType: 'string', length: 255 });
  });

  it('should resolve long strings and text hints to text', () => {
    expect(resolveType('body', makeStats({ name: 'body', stringLengthRange: { min: 3, max: 300 } }))).toEqual({
      resolvedType: 'text'
    });
    expect(resolveType('body', makeStats({ name: 'body', storageHint: 'text' }))).toEqual({ resolvedType: 'text' });
  });
});

describe('isListLike', () => {
  it('should accept singular tag-style names', () => {
    expect(isListLike('genre', makeStats({ name: 'genre', topOrExampleValue: 'Drama|Comedy' }))).toBe(true);
  });

  it('should reject names ending in "ss"', () => {
    expect(isListLike('address', makeStats({ name: 'address', topOrExampleValue: 'Main St, Springfield' }))).toBe(false);
  });

  it('should reject natural-language values', () => {
    const notes = makeStats({ name: 'notes', naturalLanguageLike: true, topOrExampleValue: 'Bought milk, eggs' });

    expect(isListLike('notes', notes)).toBe(false);
  });

  it('should reject undelimited or long parts', () => {
    expect(isListLike('status', makeStats({ name: 'status', topOrExampleValue: 'active' }))).toBe(false);
    expect(isListLike('titles', makeStats({ name: 'titles', topOrExampleValue: `${'a'.repeat(41)},b` }))).toBe(false);
  });
});

describe('isHighCardinality', () => {
  it('should count a ratio of exactly one half as high', () => {
    expect(isHighCardinality(makeStats({ name: 'x', total: 100, distinctCount: 50 }))).toBe(true);
    expect(isHighCardinality(makeStats({ name: 'x', total: 100, distinctCount: 49 }))).toBe(false);
  });

  it('should not divide by zero', () => {
    expect(isHighCardinality(makeStats({ name: 'x', total: 0, distinctCount: 0 }))).toBe(false);
  });
});

describe('primary key logging', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should log the resolved primary key at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setLogLevel('debug');

    new FieldClassifier().classifyDataset(toStatisticsMap([idStats]), { uniqueFieldHints: ['id'] });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toMatch(
      /\[DEBUG\] \[FieldClassifier\] Primary key resolved to "id" \{"source":"hint"\}$/
    );
  });
});
