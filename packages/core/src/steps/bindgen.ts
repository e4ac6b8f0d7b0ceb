import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import type { DevLoopConfig } from '../config.js';
import { formatCommand, runCommand, type CommandRunner } from '../command-runner.js';
import { BindingGenerationFailure } from '../errors.js';
import type { Logger } from '../logger.js';

export interface BindgenResult {
  outDir: string;
  duration: number;
}

/**
 * BindgenRunner - turns the compiled module into browser-loadable glue code
 *
 * Output mode is fixed: web target, no TypeScript declarations, debug info kept.
 */
export class BindgenRunner {
  constructor(
    private readonly config: DevLoopConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  args(artifact: string): string[] {
    return [
      artifact,
      '--target',
      'web',
      '--no-typescript',
      '--out-dir',
      this.config.outDir,
      '--out-name',
      this.config.package,
      '--debug',
      '--keep-debug',
    ];
  }

  async run(artifact: string): Promise<BindgenResult> {
    const startTime = Date.now();

    if (!existsSync(artifact)) {
      throw new BindingGenerationFailure(`Compiled module not found at ${artifact}`);
    }

    try {
      await mkdir(this.config.outDir, { recursive: true });
    } catch (err) {
      throw new BindingGenerationFailure(`Cannot create output directory ${this.config.outDir}`, { cause: err });
    }

    const args = this.args(artifact);
    this.logger.debug(`Running: ${formatCommand(this.config.tools.wasmBindgen, args)}`, { step: 'bindgen' });

    const result = await runCommand(this.runner, this.config.tools.wasmBindgen, args, {
      cwd: this.config.projectDir,
      onStdout: (line) => this.logger.debug(line, { step: 'bindgen' }),
      onStderr: (line) => this.logger.debug(line, { step: 'bindgen' }),
    });

    if (result.error) {
      throw new BindingGenerationFailure(`Could not run ${this.config.tools.wasmBindgen}: ${result.error.message}`, {
        stderr: result.stderr,
        cause: result.error,
      });
    }

    if (result.code !== 0) {
      throw new BindingGenerationFailure(`${this.config.tools.wasmBindgen} failed on ${artifact}`, {
        exitCode: result.code,
        stderr: result.stderr.trim(),
      });
    }

    return { outDir: this.config.outDir, duration: Date.now() - startTime };
  }
}
