import { EventEmitter } from 'events';
import path from 'path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { artifactPath, type DevLoopConfig } from './config.js';
import { ProcessCommandRunner, type CommandRunner } from './command-runner.js';
import { StepError, type StepName } from './errors.js';
import { Logger } from './logger.js';
import { Pipeline, type PipelinePhase } from './pipeline.js';
import { BindgenRunner } from './steps/bindgen.js';
import { WasmBuilder } from './steps/build.js';
import { startServer, type ServeSession } from './steps/serve.js';
import { stageAssets } from './steps/stage.js';

export interface DevLoopOptions {
  runner?: CommandRunner;
  logger?: Logger;
  spinner?: Ora;
}

export interface RunOptions {
  /** Aborting stops the server and resolves the run with 0 */
  signal?: AbortSignal;
}

type ServeOutcome = { kind: 'exited'; code: number } | { kind: 'interrupted' };

/**
 * DevLoop - build, generate bindings, stage and serve
 *
 * Workflow:
 * 1. cargo build for the wasm target
 * 2. wasm-bindgen into the output directory
 * 3. Copy the entry page next to the glue code
 * 4. Serve the output directory until interrupted
 *
 * Events: 'state' (phase), 'serving' (url), 'step-failed' (error)
 */
export class DevLoop extends EventEmitter {
  private config: DevLoopConfig;
  private runner: CommandRunner;
  private logger: Logger;
  private spinner: Ora;
  private pipeline: Pipeline | null = null;
  private session: ServeSession | null = null;

  constructor(config: DevLoopConfig, options: DevLoopOptions = {}) {
    super();
    this.config = config;
    this.runner = options.runner ?? new ProcessCommandRunner();
    this.logger = options.logger ?? new Logger({ level: config.logLevel });
    this.spinner = options.spinner ?? ora();
  }

  getPhase(): PipelinePhase {
    return this.pipeline?.getPhase() ?? 'idle';
  }

  /**
   * Run the pipeline. Resolves with the process exit code:
   * 0 after an interrupt, the server's code if it ends by itself,
   * or the failing step's code.
   */
  async run(options: RunOptions = {}): Promise<number> {
    if (this.pipeline) {
      throw new Error('DevLoop has already run');
    }
    const pipeline = this.createPipeline();
    this.pipeline = pipeline;

    try {
      await pipeline.run();
    } catch (err) {
      if (err instanceof StepError) {
        this.reportFailure(err);
        this.emit('step-failed', err);
        return err.processExitCode;
      }
      throw err;
    }

    // Assigned by the serve step, which is the last to complete
    const active = this.session;
    if (!active) {
      throw new Error('Serve step completed without a server');
    }

    const outcome = await this.waitForServer(active, options.signal);

    if (outcome.kind === 'interrupted') {
      pipeline.interrupt();
      const code = await active.stop();
      this.logger.info('Server stopped', { step: 'serve' });
      return code;
    }

    pipeline.terminate();
    this.logger.warn(`Server exited with code ${outcome.code}`, { step: 'serve', exit_code: outcome.code });
    return outcome.code;
  }

  private createPipeline(): Pipeline {
    const builder = new WasmBuilder(this.config, this.runner, this.logger);
    const bindgen = new BindgenRunner(this.config, this.runner, this.logger);
    let artifact = artifactPath(this.config);

    const pipeline = new Pipeline([
      {
        name: 'build',
        phase: 'building',
        run: async () => {
          this.spinner.start(`Building ${this.config.package} for ${this.config.target}...`);
          const result = await builder.build();
          artifact = result.artifact;
          const duration = (result.duration / 1000).toFixed(2);
          this.spinner.succeed(`Build complete ${chalk.gray(`(${duration}s)`)}`);
          if (result.warnings.length > 0) {
            this.logger.warn(`${result.warnings.length} warnings`, { step: 'build' });
            for (const warning of result.warnings) {
              this.logger.debug(warning, { step: 'build' });
            }
          }
        },
      },
      {
        name: 'bindgen',
        phase: 'generating-bindings',
        run: async () => {
          this.spinner.start('Generating bindings...');
          await bindgen.run(artifact);
          this.spinner.succeed(`Bindings written to ${chalk.gray(this.relative(this.config.outDir))}`);
        },
      },
      {
        name: 'stage',
        phase: 'staging',
        run: async () => {
          this.spinner.start('Staging assets...');
          const dest = await stageAssets(this.config);
          this.spinner.succeed(`Staged ${chalk.gray(this.relative(dest))}`);
        },
      },
      {
        name: 'serve',
        phase: 'serving',
        run: async () => {
          this.spinner.start('Starting server...');
          const session = await startServer(this.config, this.runner, this.logger);
          this.spinner.succeed(`Serving ${chalk.gray(this.relative(this.config.outDir))}`);
          this.session = session;
          this.printReadyMessage(session.url);
          this.emit('serving', session.url);
        },
      },
    ]);

    pipeline.on('state', (phase: PipelinePhase) => this.emit('state', phase));
    return pipeline;
  }

  private waitForServer(session: ServeSession, signal?: AbortSignal): Promise<ServeOutcome> {
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'interrupted' });
    }

    return new Promise<ServeOutcome>((resolve) => {
      const onAbort = () => resolve({ kind: 'interrupted' });
      signal?.addEventListener('abort', onAbort, { once: true });

      session.done.then(
        (code) => {
          signal?.removeEventListener('abort', onAbort);
          resolve({ kind: 'exited', code });
        },
        (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          this.logger.error('Server failed', { step: 'serve' }, err instanceof Error ? err : undefined);
          resolve({ kind: 'exited', code: 1 });
        }
      );
    });
  }

  private reportFailure(err: StepError): void {
    this.spinner.fail(`${STEP_LABELS[err.step]} failed`);
    this.logger.error(err.message, { step: err.step, exit_code: err.exitCode });
    const detail = err.stderr.trim();
    if (detail) {
      for (const line of detail.split('\n')) {
        this.logger.error(line, { step: err.step });
      }
    }
  }

  private printReadyMessage(url: string): void {
    this.logger.info(`Ready ${url}`);
    this.logger.info('Press Ctrl+C to stop');
  }

  private relative(file: string): string {
    return path.relative(this.config.projectDir, file) || '.';
  }
}

const STEP_LABELS: Record<StepName, string> = {
  build: 'Build',
  bindgen: 'Binding generation',
  stage: 'Staging',
  serve: 'Server launch',
};
