/**
 * Temporary delimited files for scanner, dialect and profiler tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { faker } from '@faker-js/faker';

export interface TempDir {
  dir: string;
  write(name: string, content: string): string;
  cleanup(): void;
}

export function createTempDir(): TempDir {
  const dir = mkdtempSync(join(tmpdir(), 'fieldscope-'));
  return {
    dir,
    write(name, content) {
      const path = join(dir, name);
      writeFileSync(path, content, 'utf-8');
      return path;
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

const SURNAMES = ['garcia', 'okafor', 'lindqvist', 'tanaka'];
const ROLES = ['analyst', 'engineer', 'dba', 'ops', 'qa', 'lead'];
const PROJECTS = ['atlas', 'borealis', 'cobalt7', 'drift-x'];

/**
 * Records of `<seq><d><project><d><role><d><surname>`, optionally quoting
 * every text field
 */
export function generateAssignments(
  delimiter: string,
  quoting: boolean,
  recordCount: number,
  seed = 20240601,
): string {
  faker.seed(seed);
  const quote = (value: string) => (quoting ? `"${value}"` : value);
  const lines: string[] = [];

  for (let i = 0; i < recordCount; i++) {
    const project = quote(faker.helpers.arrayElement(PROJECTS));
    const role = quote(faker.helpers.arrayElement(ROLES));
    const surname = quote(faker.helpers.arrayElement(SURNAMES));
    lines.push([String(i), project, role, surname].join(delimiter));
  }

  return lines.join('\n') + '\n';
}
