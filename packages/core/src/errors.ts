/**
 * Error taxonomy for the dev loop. Each pipeline step fails with its own
 * subclass so callers can tell which stage halted the run.
 */

export type StepName = 'build' | 'bindgen' | 'stage' | 'serve';

export interface StepErrorOptions {
  exitCode?: number | null;
  stderr?: string;
  cause?: unknown;
}

/**
 * Base class for pipeline step failures
 */
export class StepError extends Error {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    public readonly step: StepName,
    message: string,
    options: StepErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StepError';
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';

    // Restore prototype chain for proper instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Exit code the runner should terminate with
   */
  get processExitCode(): number {
    return this.exitCode !== null && this.exitCode !== 0 ? this.exitCode : 1;
  }
}

export class BuildFailure extends StepError {
  constructor(message: string, options?: StepErrorOptions) {
    super('build', message, options);
    this.name = 'BuildFailure';
  }
}

export class BindingGenerationFailure extends StepError {
  constructor(message: string, options?: StepErrorOptions) {
    super('bindgen', message, options);
    this.name = 'BindingGenerationFailure';
  }
}

export class StagingFailure extends StepError {
  constructor(message: string, options?: StepErrorOptions) {
    super('stage', message, options);
    this.name = 'StagingFailure';
  }
}

export class ServerLaunchFailure extends StepError {
  constructor(message: string, options?: StepErrorOptions) {
    super('serve', message, options);
    this.name = 'ServerLaunchFailure';
  }
}

/**
 * Invalid or unreadable configuration, raised before any step runs
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
