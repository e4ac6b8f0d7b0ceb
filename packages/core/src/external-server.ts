import type { DevLoopConfig } from './config.js';
import { formatCommand, type CommandResult, type CommandRunner, type RunningCommand } from './command-runner.js';
import { ServerLaunchFailure } from './errors.js';
import type { Logger } from './logger.js';
import { isPortAvailable } from './utils/port.js';

export interface ExternalSession {
  /** Resolves with the exit code once the process ends */
  readonly done: Promise<number>;
}

/**
 * Exit code for a server process result. Termination by an interrupt counts as graceful.
 */
export function serverExitCode(result: CommandResult): number {
  if (result.signal === 'SIGINT' || result.signal === 'SIGTERM') {
    return 0;
  }
  return result.code ?? 1;
}

/**
 * ExternalServer - runs simple-http-server over the output directory
 *
 * Manages the lifecycle of the server process:
 * - Refusing to start when the port is already taken
 * - Spawning with the allow-list, index and isolation flags
 * - Polling the bound address until it answers
 * - Interrupt on stop
 */
export class ExternalServer {
  private process: RunningCommand | null = null;
  private pollDelayMs: number;

  constructor(
    private readonly config: DevLoopConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    options: { pollDelayMs?: number } = {}
  ) {
    this.pollDelayMs = options.pollDelayMs ?? 100;
  }

  args(): string[] {
    const { serve } = this.config;
    return [
      this.config.outDir,
      '-c',
      serve.extensions.join(','),
      ...(serve.directoryIndex ? ['-i'] : []),
      '--coep',
      '--coop',
      '--ip',
      serve.host,
      '-p',
      String(serve.port),
    ];
  }

  /**
   * Start the server and wait until its address answers.
   * An exit within one poll window of answering counts as a failed launch.
   */
  async start(): Promise<ExternalSession> {
    if (this.process) {
      throw new Error('Server process already running');
    }

    const command = this.config.tools.httpServer;
    const args = this.args();
    const { host, port } = this.config.serve;

    if (!(await isPortAvailable(host, port))) {
      throw new ServerLaunchFailure(`${command} did not start: ${host}:${port} is not available`);
    }

    this.logger.debug(`Running: ${formatCommand(command, args)}`, { step: 'serve' });

    const proc = this.runner.start(command, args, {
      cwd: this.config.projectDir,
      onStdout: (line) => this.logger.info(line, { step: 'serve' }),
      onStderr: (line) => this.logger.warn(line, { step: 'serve' }),
    });
    this.process = proc;

    const exitedEarly = await this.waitUntilAnswering(proc);

    if (exitedEarly) {
      this.process = null;
      const reason = exitedEarly.error
        ? exitedEarly.error.message
        : `exited with code ${exitedEarly.code ?? exitedEarly.signal}`;
      throw new ServerLaunchFailure(`${command} did not start: ${reason}`, {
        exitCode: exitedEarly.code,
        stderr: exitedEarly.stderr.trim(),
        cause: exitedEarly.error,
      });
    }

    const done = proc.exited.then((result) => {
      this.process = null;
      return serverExitCode(result);
    });
    return { done };
  }

  /**
   * Interrupt the server and wait for it to exit
   */
  async stop(): Promise<number> {
    const proc = this.process;
    if (!proc) {
      return 0;
    }

    this.logger.debug('Interrupting server process', { step: 'serve' });
    proc.kill('SIGINT');
    const result = await proc.exited;
    this.process = null;
    return serverExitCode(result);
  }

  isRunning(): boolean {
    return this.process !== null;
  }

  /**
   * Poll the bound address. Resolves null once it answers, or the process
   * result if the process exits first.
   */
  private async waitUntilAnswering(proc: RunningCommand): Promise<CommandResult | null> {
    const { host, port } = this.config.serve;
    const exited = proc.exited.then((result) => ({ kind: 'exited' as const, result }));

    const nextPoll = () =>
      new Promise<{ kind: 'waiting' }>((resolve) => setTimeout(() => resolve({ kind: 'waiting' }), this.pollDelayMs));

    for (;;) {
      const answering = await this.isAnswering(host, port);

      const outcome = await Promise.race([exited, nextPoll()]);
      if (outcome.kind === 'exited') {
        return outcome.result;
      }
      if (answering) {
        return null;
      }
    }
  }

  private async isAnswering(host: string, port: number): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 1000);

    try {
      await fetch(`http://${host}:${port}/`, { method: 'HEAD', signal: controller.signal });
      return true;
    } catch {
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }
}
