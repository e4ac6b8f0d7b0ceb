import { spawn } from 'child_process';
import stripAnsi from 'strip-ansi';

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  /** Captured standard error with ANSI escapes removed */
  stderr: string;
  /** Set when the process could not be spawned at all */
  error?: Error;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  onStdout?: (line: string) => void;
  onStderr?: (line: string) => void;
}

export interface RunningCommand {
  readonly pid: number | undefined;
  /** Resolves once the process has exited or failed to spawn; never rejects */
  readonly exited: Promise<CommandResult>;
  kill(signal?: NodeJS.Signals): void;
}

/**
 * Seam between the pipeline and the operating system's processes
 */
export interface CommandRunner {
  start(command: string, args: string[], options?: CommandOptions): RunningCommand;
}

/**
 * Split a chunked stream into lines, holding back a trailing partial line
 */
class LineBuffer {
  private pending = '';

  constructor(private readonly onLine?: (line: string) => void) {}

  push(chunk: string): void {
    if (!this.onLine) return;
    const lines = (this.pending + chunk).split('\n');
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.emit(line);
    }
  }

  flush(): void {
    if (this.pending) {
      this.emit(this.pending);
      this.pending = '';
    }
  }

  private emit(line: string): void {
    const trimmed = line.replace(/\r$/, '');
    if (trimmed && this.onLine) {
      this.onLine(trimmed);
    }
  }
}

/**
 * CommandRunner backed by child_process.spawn
 */
export class ProcessCommandRunner implements CommandRunner {
  start(command: string, args: string[], options: CommandOptions = {}): RunningCommand {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    const stdoutLines = new LineBuffer(options.onStdout);
    const stderrLines = new LineBuffer(options.onStderr ? (line) => options.onStderr?.(stripAnsi(line)) : undefined);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (data: string) => {
      stdout += data;
      stdoutLines.push(data);
    });

    child.stderr.on('data', (data: string) => {
      stderr += data;
      stderrLines.push(data);
    });

    const exited = new Promise<CommandResult>((resolve) => {
      let spawnError: Error | undefined;

      child.once('error', (err) => {
        spawnError = err;
        // 'close' does not follow when the process never started
        if (child.pid === undefined) {
          resolve({ code: null, signal: null, stdout, stderr: stripAnsi(stderr), error: err });
        }
      });

      child.once('close', (code, signal) => {
        stdoutLines.flush();
        stderrLines.flush();
        resolve({ code, signal, stdout, stderr: stripAnsi(stderr), error: spawnError });
      });
    });

    return {
      pid: child.pid,
      exited,
      kill: (signal: NodeJS.Signals = 'SIGTERM') => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill(signal);
        }
      },
    };
  }
}

/**
 * Run a command to completion
 */
export function runCommand(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<CommandResult> {
  return runner.start(command, args, options).exited;
}

/**
 * Render a command line for log output
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}
