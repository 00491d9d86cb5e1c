/**
 * Configuration Loader
 *
 * Loads and validates facetsmith configuration from YAML files
 */

import { promises as fs } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import type { FacetsmithConfig } from '../types/config.js';
import { DEFAULT_CLASSIFIER_RULES, type ClassifierRules } from '../classifier/rules.js';
import type { ClassifyDatasetOptions } from '../classifier/field-classifier.js';
import type { DatasetProfile } from '../types/profile.js';
import { uniqueFieldHintsOf } from '../profile/profile-loader.js';

export class ConfigError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

const ClassificationConfigSchema = z.object({
  heuristic_primary_key: z.boolean().default(false),
  distinct_cap: z.number().int().positive().default(DEFAULT_CLASSIFIER_RULES.distinctCap),
  high_cardinality_ratio: z.number().gt(0).lte(1).default(DEFAULT_CLASSIFIER_RULES.highCardinalityRatio),
  high_cardinality_count: z.number().int().positive().default(DEFAULT_CLASSIFIER_RULES.highCardinalityCount),
  max_string_length: z.number().int().positive().default(DEFAULT_CLASSIFIER_RULES.maxStringLength),
  payload_name_patterns: z
    .array(z.string().min(1))
    .default([...DEFAULT_CLASSIFIER_RULES.payloadNamePatterns])
});

const Psr4ConfigSchema = z.object({
  prefix: z.string().default('App\\'),
  dir: z.string().default('src')
});

const EntityGenerationConfigSchema = z.object({
  api_resource: z.boolean().default(true),
  generated_id: z.boolean().default(true),
  psr4: Psr4ConfigSchema.default({})
});

const FacetsmithConfigSchema = z.object({
  classification: ClassificationConfigSchema.default({}),
  entity: EntityGenerationConfigSchema.default({})
});

/**
 * Replace ${ENV_VAR} with process.env.ENV_VAR (empty when unset)
 */
export function substituteEnv(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] ?? '');
}

export class ConfigLoader {
  /**
   * Load a configuration file with environment substitution and defaults applied
   */
  static async load(filePath: string): Promise<FacetsmithConfig> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Unable to read config file "${filePath}": ${message}`, filePath);
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(substituteEnv(content));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Config file "${filePath}" is not valid YAML: ${message}`, filePath);
    }

    return this.validate(parsed ?? {}, filePath);
  }

  /**
   * Validate a configuration object, filling defaults
   */
  static validate(config: unknown, source = '<inline>'): FacetsmithConfig {
    const result = FacetsmithConfigSchema.safeParse(config);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigError(
        `Invalid config "${source}": ${issue.path.join('.') || 'root'}: ${issue.message}`,
        source
      );
    }
    return result.data;
  }

  static defaults(): FacetsmithConfig {
    return FacetsmithConfigSchema.parse({});
  }
}

export function toClassifierRules(config: FacetsmithConfig): Partial<ClassifierRules> {
  const { classification } = config;
  return {
    distinctCap: classification.distinct_cap,
    highCardinalityRatio: classification.high_cardinality_ratio,
    highCardinalityCount: classification.high_cardinality_count,
    maxStringLength: classification.max_string_length,
    payloadNamePatterns: classification.payload_name_patterns.map(pattern => pattern.toLowerCase())
  };
}

/**
 * Primary-key options for one profile: its declared hints plus the heuristic switch
 */
export function toClassifyOptions(config: FacetsmithConfig, profile: DatasetProfile): ClassifyDatasetOptions {
  return {
    uniqueFieldHints: uniqueFieldHintsOf(profile),
    heuristicPrimaryKey: config.classification.heuristic_primary_key
  };
}
