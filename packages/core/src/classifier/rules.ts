/**
 * Thresholds and name lists used by the field classifier.
 */

export interface ClassifierRules {
  /** distinct/total at or above this is high-cardinality */
  highCardinalityRatio: number;
  /** distinct count at or above this is high-cardinality */
  highCardinalityCount: number;
  /** Sampling limit of the profiler's distinct counter */
  distinctCap: number;
  /** Longest value stored as a short string */
  maxStringLength: number;
  /** Longest part of a delimited value still counted as a list item */
  maxListItemLength: number;
  /** Lower-case substrings marking a field as payload (never faceted) */
  payloadNamePatterns: readonly string[];
  /** Lower-case substrings that keep a field out of full-text search */
  unsearchableNamePatterns: readonly string[];
  /** Singular names that still read as lists */
  listNameHints: readonly string[];
  listDelimiters: readonly string[];
}

export const DEFAULT_CLASSIFIER_RULES: ClassifierRules = {
  highCardinalityRatio: 0.5,
  highCardinalityCount: 500,
  distinctCap: 1000,
  maxStringLength: 255,
  maxListItemLength: 40,
  payloadNamePatterns: ['url', 'image', 'media', 'thumbnail', 'link', 'href'],
  unsearchableNamePatterns: ['id', 'code'],
  listNameHints: ['genre', 'tag', 'category', 'keyword', 'label'],
  listDelimiters: [',', '|', ';']
};

export function withDefaultRules(overrides: Partial<ClassifierRules> = {}): ClassifierRules {
  return { ...DEFAULT_CLASSIFIER_RULES, ...overrides };
}
