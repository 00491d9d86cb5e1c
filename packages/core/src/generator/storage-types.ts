import type { ClassificationResult, ResolvedType } from '../types/classification.js';

export type PhpScalarType = 'string' | 'int' | 'float' | 'bool' | 'array';

/** Doctrine\DBAL\Types\Types constant names */
export type DoctrineType = 'STRING' | 'TEXT' | 'INTEGER' | 'FLOAT' | 'BOOLEAN' | 'JSON';

export interface StorageType {
  phpType: PhpScalarType;
  doctrineType: DoctrineType;
  length?: number;
}

const STORAGE_TYPES: Record<ResolvedType, Omit<StorageType, 'length'>> = {
  string: { phpType: 'string', doctrineType: 'STRING' },
  text: { phpType: 'string', doctrineType: 'TEXT' },
  int: { phpType: 'int', doctrineType: 'INTEGER' },
  float: { phpType: 'float', doctrineType: 'FLOAT' },
  bool: { phpType: 'bool', doctrineType: 'BOOLEAN' },
  array: { phpType: 'array', doctrineType: 'JSON' },
  json: { phpType: 'array', doctrineType: 'JSON' }
};

export function resolveStorageType(result: Pick<ClassificationResult, 'resolvedType' | 'length'>): StorageType {
  const storage: StorageType = { ...STORAGE_TYPES[result.resolvedType] };
  if (storage.doctrineType === 'STRING' && result.length !== undefined) {
    storage.length = result.length;
  }
  return storage;
}
