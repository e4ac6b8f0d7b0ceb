import { copyFile } from 'fs/promises';
import path from 'path';
import type { DevLoopConfig } from '../config.js';
import { StagingFailure } from '../errors.js';

/**
 * Copy the static entry page next to the generated glue code
 */
export async function stageAssets(config: Pick<DevLoopConfig, 'entryFile' | 'outDir'>): Promise<string> {
  const dest = path.join(config.outDir, path.basename(config.entryFile));

  try {
    await copyFile(config.entryFile, dest);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StagingFailure(`Cannot copy ${config.entryFile} to ${config.outDir}: ${reason}`, {
      stderr: reason,
      cause: err,
    });
  }

  return dest;
}
