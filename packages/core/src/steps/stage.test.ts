import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StagingFailure } from '../errors.js';
import { stageAssets } from './stage.js';

describe('stageAssets', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wdl-stage-'));
    mkdirSync(join(dir, 'out'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should copy the entry page into the output directory', async () => {
    writeFileSync(join(dir, 'index.html'), '<!DOCTYPE html><title>simple</title>');

    const dest = await stageAssets({ entryFile: join(dir, 'index.html'), outDir: join(dir, 'out') });

    expect(dest).toBe(join(dir, 'out', 'index.html'));
    expect(readFileSync(dest, 'utf-8')).toBe('<!DOCTYPE html><title>simple</title>');
  });

  it('should overwrite a previously staged page', async () => {
    writeFileSync(join(dir, 'out', 'index.html'), 'stale');
    writeFileSync(join(dir, 'index.html'), 'fresh');

    await stageAssets({ entryFile: join(dir, 'index.html'), outDir: join(dir, 'out') });

    expect(readFileSync(join(dir, 'out', 'index.html'), 'utf-8')).toBe('fresh');
  });

  it('should fail with StagingFailure when the entry page is missing', async () => {
    const failure = await stageAssets({ entryFile: join(dir, 'index.html'), outDir: join(dir, 'out') }).catch(
      (err: unknown) => err
    );

    expect(failure).toBeInstanceOf(StagingFailure);
    if (failure instanceof StagingFailure) {
      expect(failure.step).toBe('stage');
      expect(failure.processExitCode).toBe(1);
      expect(failure.stderr).toContain('ENOENT');
    }
  });
});
