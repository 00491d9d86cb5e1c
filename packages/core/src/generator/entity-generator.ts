/**
 * Entity Generator
 *
 * Emits a Doctrine entity class, with optional API Platform resource and
 * filter attributes, from a dataset classification. Returns source text;
 * writing it is up to the caller.
 */

import type { ClassificationResult, DatasetClassification } from '../types/classification.js';
import type { FacetsmithConfig, Psr4Config } from '../types/config.js';
import { guessOutputPath, guessRepositoryClass, parseClassName, phpString, resolvePropertyNames } from './naming.js';
import { resolveStorageType } from './storage-types.js';

export interface EntityGeneratorOptions {
  /** Fully-qualified entity class name */
  className: string;
  /** Defaults to the sibling Repository namespace */
  repositoryClass?: string;
  /** Where the statistics came from, mentioned in the class doc comment */
  source?: string;
  /** Emit ApiResource / ApiFilter attributes (default: true) */
  apiResource?: boolean;
  /** Mark an integer primary key as generated (default: true) */
  generatedId?: boolean;
  psr4?: Psr4Config;
}

export interface GeneratedPhpClass {
  className: string;
  /** Project-relative output path */
  path: string;
  source: string;
}

const INDENT = '    ';

const API_PLATFORM = {
  apiResource: 'ApiPlatform\\Metadata\\ApiResource',
  get: 'ApiPlatform\\Metadata\\Get',
  getCollection: 'ApiPlatform\\Metadata\\GetCollection',
  apiFilter: 'ApiPlatform\\Metadata\\ApiFilter',
  searchFilter: 'ApiPlatform\\Doctrine\\Orm\\Filter\\SearchFilter',
  booleanFilter: 'ApiPlatform\\Doctrine\\Orm\\Filter\\BooleanFilter',
  rangeFilter: 'ApiPlatform\\Doctrine\\Orm\\Filter\\RangeFilter',
  orderFilter: 'ApiPlatform\\Doctrine\\Orm\\Filter\\OrderFilter'
} as const;

/**
 * Render a PHP file header: strict types, namespace, sorted use statements
 */
export function renderPhpHeader(namespace: string, uses: Iterable<string>): string[] {
  const lines = ['<?php', '', 'declare(strict_types=1);', '', `namespace ${namespace};`, ''];
  const sorted = [...new Set(uses)].sort();
  if (sorted.length > 0) {
    lines.push(...sorted.map(use => `use ${use};`), '');
  }
  return lines;
}

function shortNameOf(fqcn: string): string {
  return fqcn.slice(fqcn.lastIndexOf('\\') + 1);
}

interface ApiFilters {
  search: string[];
  boolean: string[];
  range: string[];
  order: string[];
}

function collectApiFilters(fields: ClassificationResult[], properties: ReadonlyMap<string, string>): ApiFilters {
  const filters: ApiFilters = { search: [], boolean: [], range: [], order: [] };

  for (const field of fields) {
    const property = properties.get(field.name) ?? field.name;
    if (field.facetRoles.has('filterable')) {
      switch (field.resolvedType) {
        case 'bool':
          filters.boolean.push(property);
          break;
        case 'int':
        case 'float':
          filters.range.push(property);
          break;
        default:
          filters.search.push(property);
      }
    }
    if (field.facetRoles.has('sortable')) {
      filters.order.push(property);
    }
  }

  return filters;
}

export class EntityGenerator {
  static generate(classification: DatasetClassification, options: EntityGeneratorOptions): GeneratedPhpClass {
    const entity = parseClassName(options.className);
    const repository = parseClassName(options.repositoryClass ?? guessRepositoryClass(entity));
    const apiResource = options.apiResource ?? true;
    const generatedId = options.generatedId ?? true;
    const propertyNames = resolvePropertyNames(classification.fields.map(field => field.name));

    const uses = new Set<string>(['Doctrine\\DBAL\\Types\\Types', 'Doctrine\\ORM\\Mapping as ORM']);
    if (repository.namespace !== entity.namespace) {
      uses.add(repository.fqcn);
    }

    const classAttributes = [
      `#[ORM\\Entity(repositoryClass: ${repository.shortName}::class)]`
    ];

    if (apiResource) {
      uses.add(API_PLATFORM.apiResource);
      uses.add(API_PLATFORM.get);
      uses.add(API_PLATFORM.getCollection);
      classAttributes.push('#[ApiResource(operations: [new Get(), new GetCollection()])]');
      classAttributes.push(...this.renderApiFilters(collectApiFilters(classification.fields, propertyNames), uses));
    }

    const properties = classification.fields.map(field =>
      this.renderProperty(field, propertyNames.get(field.name) ?? field.name, generatedId)
    );

    const lines = [
      ...renderPhpHeader(entity.namespace, uses),
      '/**',
      ` * Generated from ${options.source ?? 'profiled data'}.`,
      ' */',
      ...classAttributes,
      `class ${entity.shortName}`,
      '{',
      properties.map(property => property.join('\n')).join('\n\n'),
      '}',
      ''
    ];

    return {
      className: entity.fqcn,
      path: guessOutputPath(entity, options.psr4),
      source: lines.join('\n')
    };
  }

  private static renderApiFilters(filters: ApiFilters, uses: Set<string>): string[] {
    const attributes: string[] = [];
    const add = (filterClass: string, properties: string) => {
      uses.add(API_PLATFORM.apiFilter);
      uses.add(filterClass);
      attributes.push(`#[ApiFilter(${shortNameOf(filterClass)}::class, properties: [${properties}])]`);
    };

    if (filters.search.length > 0) {
      add(API_PLATFORM.searchFilter, filters.search.map(p => `${phpString(p)} => 'exact'`).join(', '));
    }
    if (filters.boolean.length > 0) {
      add(API_PLATFORM.booleanFilter, filters.boolean.map(phpString).join(', '));
    }
    if (filters.range.length > 0) {
      add(API_PLATFORM.rangeFilter, filters.range.map(phpString).join(', '));
    }
    if (filters.order.length > 0) {
      add(API_PLATFORM.orderFilter, filters.order.map(phpString).join(', '));
    }

    return attributes;
  }

  private static renderProperty(field: ClassificationResult, property: string, generatedId: boolean): string[] {
    const storage = resolveStorageType(field);
    const generated = field.isPrimaryKey && generatedId && field.resolvedType === 'int';

    const columnArgs: string[] = [];
    if (property !== field.name) {
      columnArgs.push(`name: ${phpString(field.name)}`);
    }
    columnArgs.push(`type: Types::${storage.doctrineType}`);
    if (storage.length !== undefined) {
      columnArgs.push(`length: ${storage.length}`);
    }
    if (field.nullable) {
      columnArgs.push('nullable: true');
    }
    if (field.unique) {
      columnArgs.push('unique: true');
    }

    const lines: string[] = [];
    if (field.isPrimaryKey) {
      lines.push(`${INDENT}#[ORM\\Id]`);
    }
    if (generated) {
      lines.push(`${INDENT}#[ORM\\GeneratedValue]`);
    }
    lines.push(`${INDENT}#[ORM\\Column(${columnArgs.join(', ')})]`);

    if (field.nullable || generated) {
      lines.push(`${INDENT}public ?${storage.phpType} $${property} = null;`);
    } else {
      lines.push(`${INDENT}public ${storage.phpType} $${property};`);
    }

    return lines;
  }
}

/**
 * Entity options from the `entity` config section
 */
export function toEntityOptions(
  config: FacetsmithConfig,
  className: string,
  source?: string
): EntityGeneratorOptions {
  return {
    className,
    source,
    apiResource: config.entity.api_resource,
    generatedId: config.entity.generated_id,
    psr4: config.entity.psr4
  };
}
