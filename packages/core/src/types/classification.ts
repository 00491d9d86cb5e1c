/**
 * Type definitions for classifier output
 */

export type ResolvedType = 'string' | 'text' | 'int' | 'float' | 'bool' | 'array' | 'json';

export type FacetRole = 'filterable' | 'sortable' | 'searchable';

export interface ClassificationResult {
  name: string;
  resolvedType: ResolvedType;
  /** True unless the field is the primary key */
  nullable: boolean;
  /** Declared max length, only for 'string' */
  length?: number;
  isPrimaryKey: boolean;
  /** Named in the unique-field hints without being the primary key */
  unique: boolean;
  /** Advisory: every observed value was distinct */
  probablyUnique: boolean;
  facetRoles: ReadonlySet<FacetRole>;
}

export type PrimaryKeySource = 'override' | 'hint' | 'heuristic';

export interface DatasetClassification {
  primaryKey: string;
  primaryKeySource: PrimaryKeySource;
  fields: ClassificationResult[];
}
