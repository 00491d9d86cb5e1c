/**
 * Tests for profile resolution
 */
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ProfileResolver, type DataRecord, type ProfileSource } from './profile-resolver.js';
import { ProfileError } from './profile-loader.js';
import { setLogLevel } from '../utils/logger.js';

class StringFieldProfiler implements ProfileSource {
  public received: readonly DataRecord[] = [];

  async profile(records: readonly DataRecord[]): Promise<Record<string, unknown>> {
    this.received = records;
    const names = new Set(records.flatMap(record => Object.keys(record)));
    const fields: Record<string, unknown> = {};
    for (const name of names) {
      fields[name] = {
        types: ['string'],
        storageHint: 'string',
        total: records.length,
        nulls: 0,
        distinct: records.length
      };
    }
    return fields;
  }
}

describe('ProfileResolver', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'facetsmith-resolver-'));
    setLogLevel('warn');
  });

  afterEach(async () => {
    setLogLevel('info');
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should load a pre-analyzed profile', async () => {
    const file = path.join(tmpDir, 'movies.profile.json');
    await fs.writeFile(
      file,
      JSON.stringify({ fields: { id: { types: ['int'], storageHint: 'int', total: 1, nulls: 0, distinct: 1 } } }),
      'utf-8'
    );

    const profile = await new ProfileResolver().resolve(file);

    expect(profile.input).toBe(file);
    expect(Object.keys(profile.fields)).toEqual(['id']);
  });

  it('should hand JSONL records to the profiler', async () => {
    const file = path.join(tmpDir, 'movies.jsonl');
    await fs.writeFile(file, '{"title":"Night Train"}\n\n{"title":"Blue Hour"}\n', 'utf-8');
    const profiler = new StringFieldProfiler();

    const profile = await new ProfileResolver(profiler).resolve(file);

    expect(profiler.received).toEqual([{ title: 'Night Train' }, { title: 'Blue Hour' }]);
    expect(profile.input).toBe(file);
    expect(profile.output).toBeNull();
    expect(profile.recordCount).toBe(2);
    expect(profile.fields.title.total).toBe(2);
  });

  it('should require a profiler for JSONL input', async () => {
    const file = path.join(tmpDir, 'movies.jsonl');
    await fs.writeFile(file, '{"title":"Night Train"}\n', 'utf-8');

    await expect(new ProfileResolver().resolve(file)).rejects.toThrow(`No profiler configured to analyze "${file}"`);
  });

  it('should name the line that is not a JSON object', async () => {
    const brokenFile = path.join(tmpDir, 'broken.jsonl');
    await fs.writeFile(brokenFile, '{"title":"Night Train"}\nnot json\n', 'utf-8');
    const arrayFile = path.join(tmpDir, 'array.jsonl');
    await fs.writeFile(arrayFile, '[1, 2]\n', 'utf-8');
    const resolver = new ProfileResolver(new StringFieldProfiler());

    await expect(resolver.resolve(brokenFile)).rejects.toThrow(`Line 2 of "${brokenFile}" is not valid JSON:`);
    await expect(resolver.resolve(arrayFile)).rejects.toThrow(`Line 1 of "${arrayFile}" is not a JSON object`);
  });

  it('should reject other formats with conversion guidance', async () => {
    const file = path.join(tmpDir, 'movies.csv');
    await fs.writeFile(file, 'id,title\n1,Night Train\n', 'utf-8');

    const result = new ProfileResolver(new StringFieldProfiler()).resolve(file);

    await expect(result).rejects.toBeInstanceOf(ProfileError);
    await expect(result).rejects.toThrow(
      `Unsupported file "${file}": only .profile.json (pre-analyzed) and .jsonl (analyzed on load) are accepted. ` +
        'Convert CSV or JSON input to JSONL first.'
    );
  });

  it('should reject a missing input file', async () => {
    const file = path.join(tmpDir, 'missing.profile.json');

    await expect(new ProfileResolver().resolve(file)).rejects.toThrow(`Input file "${file}" does not exist`);
  });

  it('should profile a sample record held in memory', async () => {
    const profile = await new ProfileResolver(new StringFieldProfiler()).profileRecords(
      [{ sku: 'A-1', name: 'Lamp' }],
      'sample'
    );

    expect(profile.input).toBe('sample');
    expect(profile.recordCount).toBe(1);
    expect(Object.keys(profile.fields)).toEqual(['sku', 'name']);
  });
});
