import type { DatasetClassification, FacetRole } from '../types/classification.js';
import { resolvePropertyNames, toPropertyName } from './naming.js';

/**
 * Search index settings derived from facet roles
 */
export interface IndexSettings {
  primaryKey: string;
  filterableAttributes: string[];
  sortableAttributes: string[];
  searchableAttributes: string[];
}

export class IndexSettingsGenerator {
  static generate(classification: DatasetClassification): IndexSettings {
    const properties = resolvePropertyNames(classification.fields.map(field => field.name));
    const attributeOf = (name: string): string => properties.get(name) ?? toPropertyName(name);

    const withRole = (role: FacetRole): string[] =>
      classification.fields
        .filter(field => field.facetRoles.has(role))
        .map(field => attributeOf(field.name));

    return {
      primaryKey: attributeOf(classification.primaryKey),
      filterableAttributes: withRole('filterable'),
      sortableAttributes: withRole('sortable'),
      searchableAttributes: withRole('searchable')
    };
  }
}
