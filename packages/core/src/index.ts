/**
 * @facetsmith/core - profile-driven field classification
 *
 * Classifies profiled dataset fields into storage types and facet roles,
 * and emits Doctrine entities, repositories and search index settings.
 */

// Types
export * from './types/profile.js';
export * from './types/classification.js';
export * from './types/config.js';

// Classification
export {
  FieldClassifier,
  toStatisticsMap,
  type ClassifyDatasetOptions,
  type PrimaryKeyResolution
} from './classifier/field-classifier.js';
export { DEFAULT_CLASSIFIER_RULES, withDefaultRules, type ClassifierRules } from './classifier/rules.js';
export {
  ClassificationError,
  InputError,
  ConfigurationError,
  AmbiguityError,
  type ClassificationErrorKind,
  type ClassificationRule
} from './classifier/errors.js';

// Profiles
export {
  ProfileLoader,
  ProfileError,
  toFieldStatistics,
  toDatasetStatistics,
  uniqueFieldHintsOf
} from './profile/profile-loader.js';
export {
  ProfileResolver,
  PROFILE_EXTENSION,
  RECORDS_EXTENSION,
  type ProfileSource,
  type DataRecord
} from './profile/profile-resolver.js';

// Configuration
export { ConfigLoader, ConfigError, substituteEnv, toClassifierRules, toClassifyOptions } from './config/loader.js';

// Generators
export {
  EntityGenerator,
  renderPhpHeader,
  toEntityOptions,
  type EntityGeneratorOptions,
  type GeneratedPhpClass
} from './generator/entity-generator.js';
export { RepositoryGenerator, type RepositoryGeneratorOptions } from './generator/repository-generator.js';
export { IndexSettingsGenerator, type IndexSettings } from './generator/index-settings-generator.js';
export { resolveStorageType, type StorageType, type PhpScalarType, type DoctrineType } from './generator/storage-types.js';
export {
  InvalidClassNameError,
  parseClassName,
  guessRepositoryClass,
  guessOutputPath,
  toPropertyName,
  resolvePropertyNames,
  humanizeField,
  isIdLike,
  phpString,
  type PhpClassName
} from './generator/naming.js';

// Display
export { buildDisplayConfig, type DisplayConfig, type DisplaySettings } from './display/display-config.js';

// Logging
export {
  Logger,
  createLogger,
  setLogLevel,
  formatLogMessage,
  getLocalTimestamp,
  type LogLevel,
  type LogMeta
} from './utils/logger.js';
