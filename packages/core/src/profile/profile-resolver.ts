/**
 * Profile Resolver
 *
 * Turns an input path into a validated profile: `*.profile.json` files are
 * loaded as-is, `*.jsonl` record files are handed to a profiler. Profiling
 * itself lives outside this package.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { DatasetProfile } from '../types/profile.js';
import { ProfileError, ProfileLoader } from './profile-loader.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type DataRecord = Record<string, unknown>;

/**
 * Computes per-field statistics (the `fields` section of a profile
 * document) from sample records
 */
export interface ProfileSource {
  profile(records: readonly DataRecord[]): Promise<Record<string, unknown>>;
}

const DataRecordSchema = z.record(z.unknown());

export const PROFILE_EXTENSION = '.profile.json';
export const RECORDS_EXTENSION = '.jsonl';

export class ProfileResolver {
  private readonly profiler?: ProfileSource;
  private readonly logger: Logger;

  constructor(profiler?: ProfileSource, logger: Logger = createLogger('ProfileResolver')) {
    this.profiler = profiler;
    this.logger = logger;
  }

  async resolve(filePath: string): Promise<DatasetProfile> {
    const isFile = await fs.stat(filePath).then(stats => stats.isFile(), () => false);
    if (!isFile) {
      throw new ProfileError(`Input file "${filePath}" does not exist`, filePath);
    }

    if (filePath.endsWith(PROFILE_EXTENSION)) {
      return ProfileLoader.load(filePath);
    }

    if (filePath.endsWith(RECORDS_EXTENSION)) {
      const records = await this.readRecords(filePath);
      return this.profileRecords(records, filePath);
    }

    throw new ProfileError(
      `Unsupported file "${filePath}": only ${PROFILE_EXTENSION} (pre-analyzed) and ${RECORDS_EXTENSION} ` +
        '(analyzed on load) are accepted. Convert CSV or JSON input to JSONL first.',
      filePath
    );
  }

  /**
   * Build a profile from records already in memory (a sample record, a parsed file)
   */
  async profileRecords(records: readonly DataRecord[], input: string): Promise<DatasetProfile> {
    if (!this.profiler) {
      throw new ProfileError(`No profiler configured to analyze "${input}"`, input);
    }

    this.logger.info(`Profiling ${records.length} records`, { input });
    const fields = await this.profiler.profile(records);

    return ProfileLoader.validate(
      {
        input,
        output: null,
        recordCount: records.length,
        tags: [],
        fields
      },
      input
    );
  }

  private async readRecords(filePath: string): Promise<DataRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProfileError(`Unable to read records file "${filePath}": ${message}`, filePath);
    }

    const records: DataRecord[] = [];
    const lines = content.split('\n');
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index].trim();
      if (line.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ProfileError(`Line ${index + 1} of "${filePath}" is not valid JSON: ${message}`, filePath);
      }

      const record = DataRecordSchema.safeParse(parsed);
      if (!record.success) {
        throw new ProfileError(`Line ${index + 1} of "${filePath}" is not a JSON object`, filePath);
      }
      records.push(record.data);
    }

    return records;
  }
}
