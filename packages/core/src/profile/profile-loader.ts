/**
 * Profile Loader
 *
 * Loads and validates `*.profile.json` documents and turns their field
 * entries into the statistics the classifier consumes.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import {
  STORAGE_HINTS,
  type DatasetProfile,
  type DatasetStatistics,
  type FieldStatistics,
  type RawFieldProfile
} from '../types/profile.js';
import { InputError } from '../classifier/errors.js';

/**
 * The profile file itself could not be read or parsed
 */
export class ProfileError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'ProfileError';
    this.path = path;
  }
}

const RawFieldProfileSchema = z
  .object({
    types: z.array(z.string()).default([]),
    storageHint: z.enum(STORAGE_HINTS),
    total: z.number().int().nonnegative(),
    nulls: z.number().int().nonnegative(),
    distinct: z.number().int().nonnegative(),
    distinctCapReached: z.boolean().default(false),
    stringLengths: z
      .object({
        min: z.number().nonnegative().nullable().optional(),
        max: z.number().nonnegative().nullable().optional()
      })
      .optional(),
    booleanLike: z.boolean().default(false),
    facetCandidate: z.boolean().default(false),
    urlLike: z.boolean().default(false),
    imageLike: z.boolean().default(false),
    jsonLike: z.boolean().default(false),
    naturalLanguageLike: z.boolean().default(false),
    distribution: z
      .object({
        values: z.record(z.number())
      })
      .optional(),
    example: z.union([z.string(), z.number(), z.boolean()]).optional()
  })
  .refine(field => field.nulls <= field.total, {
    message: 'nulls cannot exceed total',
    path: ['nulls']
  });

const ProfileDocumentSchema = z.object({
  input: z.string().optional(),
  output: z.string().nullable().optional(),
  recordCount: z.number().int().nonnegative().default(0),
  tags: z.array(z.string()).default([]),
  pk: z.string().optional(),
  uniqueFields: z.array(z.string()).optional(),
  fields: z.record(z.unknown())
});

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue.path.length > 0 ? issue.path.join('.') : 'value';
  return `${where}: ${issue.message}`;
}

function rawFieldsOf(data: unknown): object | undefined {
  if (typeof data !== 'object' || data === null || !('fields' in data)) {
    return undefined;
  }
  const fields = data.fields;
  return typeof fields === 'object' && fields !== null ? fields : undefined;
}

export class ProfileLoader {
  /**
   * Read and validate a profile document from disk
   */
  static async load(filePath: string): Promise<DatasetProfile> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProfileError(`Unable to read profile file "${filePath}": ${message}`, filePath);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProfileError(`Profile file "${filePath}" does not contain valid JSON: ${message}`, filePath);
    }

    return this.validate(data, filePath);
  }

  /**
   * Validate an in-memory profile document. `source` stands in for a missing `input`.
   */
  static validate(data: unknown, source: string): DatasetProfile {
    const document = ProfileDocumentSchema.safeParse(data);
    if (!document.success) {
      throw new InputError('malformed-input', null, `Profile "${source}" is invalid: ${describeIssue(document.error)}`);
    }

    // Field entries come from the raw document so a "__proto__" key stays a field
    const fields: Record<string, RawFieldProfile> = Object.fromEntries(
      Object.entries(rawFieldsOf(data) ?? document.data.fields).map(([name, value]): [string, RawFieldProfile] => [
        name,
        this.validateField(name, value)
      ])
    );

    if (Object.keys(fields).length === 0) {
      throw new InputError('empty-input', null, `Profile "${source}" has no fields`);
    }

    const profile: DatasetProfile = {
      input: document.data.input ?? source,
      output: document.data.output ?? null,
      recordCount: document.data.recordCount,
      tags: document.data.tags,
      fields
    };
    if (document.data.pk !== undefined) {
      profile.pk = document.data.pk;
    }
    if (document.data.uniqueFields !== undefined) {
      profile.uniqueFields = document.data.uniqueFields;
    }

    return profile;
  }

  static validateField(name: string, value: unknown): RawFieldProfile {
    const field = RawFieldProfileSchema.safeParse(value);
    if (!field.success) {
      throw new InputError(
        'malformed-input',
        name,
        `Malformed statistics for field "${name}": ${describeIssue(field.error)}`
      );
    }
    return field.data;
  }
}

/**
 * Most frequent distribution key; the first one wins ties
 */
function mostFrequentValue(values: Record<string, number>): string | undefined {
  let best: string | undefined;
  let bestCount = -Infinity;
  for (const [value, count] of Object.entries(values)) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function toFieldStatistics(name: string, field: RawFieldProfile): FieldStatistics {
  const stats: FieldStatistics = {
    name,
    storageHint: field.storageHint,
    observedTypes: [...field.types],
    total: field.total,
    nulls: field.nulls,
    distinctCount: field.distinct,
    distinctCapReached: field.distinctCapReached,
    booleanLike: field.booleanLike,
    facetCandidate: field.facetCandidate,
    urlLike: field.urlLike,
    imageLike: field.imageLike,
    jsonLike: field.jsonLike,
    naturalLanguageLike: field.naturalLanguageLike
  };

  const min = field.stringLengths?.min;
  const max = field.stringLengths?.max;
  if (typeof min === 'number' && typeof max === 'number') {
    stats.stringLengthRange = { min, max };
  }

  const example = field.example !== undefined
    ? String(field.example)
    : field.distribution
      ? mostFrequentValue(field.distribution.values)
      : undefined;
  if (example !== undefined) {
    stats.topOrExampleValue = example;
  }

  return stats;
}

export function toDatasetStatistics(profile: DatasetProfile): DatasetStatistics {
  const statistics = new Map<string, FieldStatistics>();
  for (const [name, field] of Object.entries(profile.fields)) {
    statistics.set(name, toFieldStatistics(name, field));
  }
  return statistics;
}

/**
 * Declared unique fields, or the declared pk alone
 */
export function uniqueFieldHintsOf(profile: DatasetProfile): string[] {
  if (profile.uniqueFields !== undefined) {
    return [...profile.uniqueFields];
  }
  return profile.pk !== undefined ? [profile.pk] : [];
}
