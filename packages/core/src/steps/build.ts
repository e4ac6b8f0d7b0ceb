import stripAnsi from 'strip-ansi';
import { artifactPath, type DevLoopConfig } from '../config.js';
import { formatCommand, runCommand, type CommandRunner } from '../command-runner.js';
import { BuildFailure } from '../errors.js';
import type { Logger } from '../logger.js';

export interface BuildResult {
  artifact: string;
  duration: number;
  errors: string[];
  warnings: string[];
}

interface CompilerSpan {
  file_name?: string;
  line_start?: number;
  column_start?: number;
}

interface CompilerMessage {
  level?: string;
  message?: string;
  rendered?: string | null;
  spans?: CompilerSpan[];
}

/**
 * Parse one line of cargo's JSON message stream. Non-JSON lines yield null.
 */
export function parseCargoLine(line: string): { level: string; text: string } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('reason' in parsed) || !('message' in parsed)) {
    return null;
  }
  if (parsed.reason !== 'compiler-message' || typeof parsed.message !== 'object' || parsed.message === null) {
    return null;
  }

  const raw = parsed.message;
  if (!('level' in raw) || typeof raw.level !== 'string') {
    return null;
  }

  const message: CompilerMessage = {
    level: raw.level,
    message: 'message' in raw && typeof raw.message === 'string' ? raw.message : undefined,
    rendered: 'rendered' in raw && typeof raw.rendered === 'string' ? raw.rendered : null,
    spans: 'spans' in raw && Array.isArray(raw.spans) ? raw.spans.filter(isSpan) : [],
  };
  return { level: raw.level, text: formatCompilerMessage(message) };
}

function isSpan(value: unknown): value is CompilerSpan {
  return typeof value === 'object' && value !== null;
}

/**
 * Format a compiler message for display
 */
export function formatCompilerMessage(message: CompilerMessage): string {
  if (message.rendered) {
    return stripAnsi(message.rendered).trimEnd();
  }

  const parts: string[] = [];
  if (message.message) {
    parts.push(message.message);
  }

  const span = message.spans?.[0];
  if (span?.file_name && span.line_start) {
    parts.push(`  --> ${span.file_name}:${span.line_start}:${span.column_start ?? 1}`);
  }

  return parts.join('\n');
}

/**
 * WasmBuilder - compiles the selected cargo package for the wasm target
 */
export class WasmBuilder {
  constructor(
    private readonly config: DevLoopConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  args(): string[] {
    return [
      'build',
      '--target',
      this.config.target,
      '-p',
      this.config.package,
      '--message-format=json-diagnostic-rendered-ansi',
    ];
  }

  async build(): Promise<BuildResult> {
    const startTime = Date.now();
    const args = this.args();
    const errors: string[] = [];
    const warnings: string[] = [];

    this.logger.debug(`Running: ${formatCommand(this.config.tools.cargo, args)}`, { step: 'build' });

    const result = await runCommand(this.runner, this.config.tools.cargo, args, {
      cwd: this.config.projectDir,
      env: {
        CARGO_TARGET_DIR: this.config.targetDir,
        CARGO_TERM_COLOR: 'always',
      },
      onStdout: (line) => {
        const msg = parseCargoLine(line);
        if (!msg) {
          this.logger.debug(line, { step: 'build' });
        } else if (msg.level === 'error') {
          errors.push(msg.text);
        } else if (msg.level === 'warning') {
          warnings.push(msg.text);
        }
      },
      onStderr: (line) => this.logger.debug(line, { step: 'build' }),
    });

    const duration = Date.now() - startTime;

    if (result.error) {
      throw new BuildFailure(`Could not run ${this.config.tools.cargo}: ${result.error.message}`, {
        stderr: result.stderr,
        cause: result.error,
      });
    }

    if (result.code !== 0) {
      const detail = errors.length > 0 ? errors.join('\n\n') : result.stderr.trim();
      throw new BuildFailure(`cargo build failed for package "${this.config.package}"`, {
        exitCode: result.code,
        stderr: detail,
      });
    }

    return {
      artifact: artifactPath(this.config),
      duration,
      errors,
      warnings,
    };
  }
}
