/**
 * PHP class and property naming helpers
 */

import path from 'path';
import type { Psr4Config } from '../types/config.js';

export class InvalidClassNameError extends Error {
  constructor(className: string, reason: string) {
    super(`Invalid class name "${className}": ${reason}`);
    this.name = 'InvalidClassNameError';
  }
}

export interface PhpClassName {
  namespace: string;
  shortName: string;
  fqcn: string;
}

const PHP_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Split a fully-qualified class name ("App\\Entity\\Movie")
 */
export function parseClassName(className: string): PhpClassName {
  const fqcn = className.replace(/^\\+/, '');
  const separator = fqcn.lastIndexOf('\\');
  if (separator <= 0) {
    throw new InvalidClassNameError(className, 'must be fully-qualified (e.g. "App\\Entity\\Movie")');
  }

  const namespace = fqcn.slice(0, separator);
  const shortName = fqcn.slice(separator + 1);
  for (const segment of [...namespace.split('\\'), shortName]) {
    if (!PHP_IDENTIFIER.test(segment)) {
      throw new InvalidClassNameError(className, `"${segment}" is not a valid PHP identifier`);
    }
  }

  return { namespace, shortName, fqcn };
}

/**
 * App\Entity\Movie -> App\Repository\MovieRepository
 */
export function guessRepositoryClass(entity: PhpClassName): string {
  const segments = entity.namespace.split('\\');
  if (segments[segments.length - 1] === 'Entity') {
    segments[segments.length - 1] = 'Repository';
  } else {
    segments.push('Repository');
  }
  return `${segments.join('\\')}\\${entity.shortName}Repository`;
}

/**
 * Project-relative path of a class file under PSR-4
 */
export function guessOutputPath(phpClass: PhpClassName, psr4: Psr4Config = { prefix: 'App\\', dir: 'src' }): string {
  const root = psr4.prefix.replace(/\\+$/, '');
  const segments = phpClass.namespace.split('\\');

  if (phpClass.namespace === root || phpClass.namespace.startsWith(`${root}\\`)) {
    const relative = segments.slice(root.split('\\').length);
    return path.posix.join(psr4.dir, ...relative, `${phpClass.shortName}.php`);
  }

  const entityIndex = segments.indexOf('Entity');
  if (entityIndex !== -1) {
    return path.posix.join(psr4.dir, ...segments.slice(entityIndex), `${phpClass.shortName}.php`);
  }

  return path.posix.join(psr4.dir, 'Entity', `${phpClass.shortName}.php`);
}

function normalizePart(part: string): string {
  return part === part.toUpperCase() ? part.toLowerCase() : part;
}

/**
 * Profile field name -> camelCase property name ("original_title" -> "originalTitle")
 */
export function toPropertyName(fieldName: string): string {
  const parts = fieldName
    .replace(/[^a-zA-Z0-9_]/g, '_')
    .split('_')
    .filter(part => part.length > 0)
    .map(normalizePart);

  if (parts.length === 0) {
    return 'field';
  }

  const [first, ...rest] = parts;
  const camel = first.charAt(0).toLowerCase() + first.slice(1) +
    rest.map(part => part.charAt(0).toUpperCase() + part.slice(1)).join('');

  return /^[0-9]/.test(camel) ? `_${camel}` : camel;
}

/**
 * Property name for each field, in order. A field whose camelCase name is
 * already taken ("originalTitle" after "original_title") gets a numeric suffix.
 */
export function resolvePropertyNames(fieldNames: Iterable<string>): Map<string, string> {
  const properties = new Map<string, string>();
  const taken = new Set<string>();

  for (const fieldName of fieldNames) {
    const base = toPropertyName(fieldName);
    let property = base;
    for (let suffix = 2; taken.has(property); suffix++) {
      property = `${base}${suffix}`;
    }
    taken.add(property);
    properties.set(fieldName, property);
  }

  return properties;
}

/**
 * "originalTitle" / "original_title" -> "Original Title"
 */
export function humanizeField(field: string): string {
  const spaced = field
    .replace(/(?<!^)[A-Z]/g, match => ` ${match}`)
    .replace(/_/g, ' ')
    .trim()
    .toLowerCase();

  return spaced.replace(/(^|\s)([a-z])/g, (_, lead: string, letter: string) => `${lead}${letter.toUpperCase()}`);
}

/**
 * Names ending in "id" ("movieId", "tmdb_id"), but not "grid"
 */
export function isIdLike(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return lower.endsWith('id') && !lower.endsWith('grid');
}

/**
 * Single-quoted PHP string literal
 */
export function phpString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}
