/**
 * Type definitions for facetsmith configuration
 */

export interface FacetsmithConfig {
  classification: ClassificationConfig;
  entity: EntityGenerationConfig;
}

export interface ClassificationConfig {
  /** Fall back to uniqueness detection when neither override nor hints name a key */
  heuristic_primary_key: boolean;
  /** Sampling limit the profiler used for distinct counting */
  distinct_cap: number;
  high_cardinality_ratio: number;
  high_cardinality_count: number;
  max_string_length: number;
  /** Name substrings that mark a field as payload */
  payload_name_patterns: string[];
}

export interface Psr4Config {
  /** Namespace prefix, e.g. "App\\" */
  prefix: string;
  /** Directory the prefix maps to, relative to the project */
  dir: string;
}

export interface EntityGenerationConfig {
  /** Emit ApiResource / ApiFilter attributes */
  api_resource: boolean;
  /** Mark an integer primary key as generated */
  generated_id: boolean;
  psr4: Psr4Config;
}
