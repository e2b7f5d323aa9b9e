import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import { loadEnvFile } from '../Utils/env.js';

const KEY = '__PDFA_ENV_TEST__';

describe('loadEnvFile', () => {
  let packageDir: string;
  let entryUrl: string;

  beforeEach(async () => {
    packageDir = join(tmpdir(), `pdfa-env-test-${randomUUID().slice(0, 8)}`);
    await mkdir(join(packageDir, 'src'), { recursive: true });
    entryUrl = pathToFileURL(join(packageDir, 'src', 'index.ts')).href;
    delete process.env[KEY];
  });

  afterEach(async () => {
    delete process.env[KEY];
    await rm(packageDir, { recursive: true, force: true });
  });

  it('should return null when the package has no .env', () => {
    expect(loadEnvFile(entryUrl)).toBeNull();
    expect(process.env[KEY]).toBeUndefined();
  });

  it('should load .env from the package root', async () => {
    await writeFile(join(packageDir, '.env'), `${KEY}=from-file\n`);

    expect(loadEnvFile(entryUrl)).toBe(join(packageDir, '.env'));
    expect(process.env[KEY]).toBe('from-file');
  });

  it('should not override variables already set', async () => {
    await writeFile(join(packageDir, '.env'), `${KEY}=from-file\n`);
    process.env[KEY] = 'from-env';

    loadEnvFile(entryUrl);
    expect(process.env[KEY]).toBe('from-env');
  });
});
