/**
 * Integration tests for the profile workflow: dialect detection,
 * frequency scans and field statistics over real files
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Profiler, profileFile } from '../../src/lib/profiler/index.js';
import { createValueClassifier } from '../../src/lib/classifier/index.js';
import { loadProfilerConfig } from '../../src/utils/config-loader.js';
import { ValueType } from '../../src/types/data-model.js';
import { ValidationError } from '../../src/utils/errors.js';
import { createTempDir, generateAssignments, TempDir } from '../utils/fixtures.js';

const MEMBERS = [
  'id,name,score,joined',
  '1,Smith,90,2024-01-05',
  '2,jones,n/a,2023-11-30',
  '3,JONES,85.5,2024-02-29',
  '4,smith,70,unknown',
  '',
].join('\n');

describe('Profile Workflow', () => {
  let temp: TempDir;
  let members: string;

  beforeAll(() => {
    temp = createTempDir();
    members = temp.write('members.csv', MEMBERS);
  });

  afterAll(() => {
    temp.cleanup();
  });

  it('should profile every field of a file with a header', async () => {
    const { profile, metadata } = await new Profiler().profileFile(members);

    expect(profile.filePath).toBe(members);
    expect(profile.dialect).toEqual({
      delimiter: ',',
      quoteChar: '"',
      quoting: false,
      hasHeader: true,
      formatType: 'csv',
      recordCount: 5,
      fieldCount: 4,
    });
    expect(metadata).toEqual({ recordsAnalyzed: 5, fieldsProfiled: 4, truncatedFields: 0 });

    const [id, name, score, joined] = profile.fields;

    expect(id).toEqual({
      fieldNumber: 0,
      name: 'id',
      valueType: ValueType.Integer,
      case: 'n/a',
      min: '1',
      max: '4',
      minLength: 1,
      maxLength: 1,
      uniqueCount: 4,
      unknownCount: 0,
      truncated: false,
      topValues: [
        { value: '1', count: 1 },
        { value: '2', count: 1 },
        { value: '3', count: 1 },
        { value: '4', count: 1 },
      ],
    });

    expect(name).toMatchObject({
      name: 'name',
      valueType: ValueType.String,
      case: 'mixed',
      min: 'JONES',
      max: 'smith',
      minLength: 5,
      maxLength: 5,
    });

    expect(score).toMatchObject({
      valueType: ValueType.Float,
      case: 'n/a',
      min: '70',
      max: '90',
      minLength: 2,
      maxLength: 4,
      uniqueCount: 4,
      unknownCount: 1,
    });

    expect(joined).toMatchObject({
      valueType: ValueType.Timestamp,
      min: '2023-11-30',
      max: '2024-02-29',
      unknownCount: 1,
    });
  });

  it('should apply declared types over inference', async () => {
    const config = loadProfilerConfig({ fields: '0', types: '0:string' });
    const { profile } = await new Profiler(config).profileFile(members);

    expect(profile.fields).toHaveLength(1);
    expect(profile.fields[0]).toMatchObject({
      valueType: ValueType.String,
      case: 'unknown',
      min: '1',
      max: '4',
    });
  });

  it('should truncate fields at the configured cap', async () => {
    const { profile, metadata } = await profileFile(members, { maxFreqSize: 2 });

    expect(metadata.truncatedFields).toBe(4);
    expect(profile.fields.every((field) => field.truncated)).toBe(true);
    expect(profile.fields[0]?.topValues).toEqual([
      { value: '1', count: 1 },
      { value: '2', count: 1 },
    ]);
  });

  it('should limit reported top values', async () => {
    const { profile } = await profileFile(members, { fields: [1], topValues: 2 });

    expect(profile.fields[0]?.topValues).toEqual([
      { value: 'JONES', count: 1 },
      { value: 'Smith', count: 1 },
    ]);
  });

  it('should use custom unknown markers', async () => {
    const classifier = createValueClassifier({ unknownMarkers: ['', 'n/a'] });
    const { profile } = await new Profiler({ fields: [3] }, classifier).profileFile(members);

    // "unknown" is now ordinary text, so the field is no longer all timestamps
    expect(profile.fields[0]).toMatchObject({
      valueType: ValueType.String,
      unknownCount: 0,
      min: '2023-11-30',
      max: 'unknown',
    });
  });

  it('should reject fields outside the detected field count', async () => {
    await expect(profileFile(members, { fields: [9] })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should profile a quoted pipe-delimited file without a header', async () => {
    const path = temp.write('assignments.psv', generateAssignments('|', true, 100));
    const { profile, metadata } = await profileFile(path);

    expect(profile.dialect).toMatchObject({
      delimiter: '|',
      quoting: true,
      hasHeader: false,
      formatType: 'csv',
      recordCount: 100,
      fieldCount: 4,
    });
    expect(metadata.fieldsProfiled).toBe(4);

    const [sequence, project] = profile.fields;
    expect(sequence).toMatchObject({
      name: 'field_num_0',
      valueType: ValueType.Integer,
      min: '0',
      max: '99',
      uniqueCount: 100,
      minLength: 1,
      maxLength: 2,
    });

    expect(project?.valueType).toBe(ValueType.String);
    expect(project?.case).toBe('lower');
    expect(project?.unknownCount).toBe(0);
    const counted = (project?.topValues ?? []).reduce((sum, entry) => sum + entry.count, 0);
    expect(counted).toBe(100);
  });

  it('should report an empty file without fields', async () => {
    const path = temp.write('empty.csv', '');
    const { profile, metadata } = await profileFile(path);

    expect(profile.fields).toEqual([]);
    expect(metadata).toEqual({ recordsAnalyzed: 0, fieldsProfiled: 0, truncatedFields: 0 });
  });
});
