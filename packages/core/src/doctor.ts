import type { DevLoopConfig } from './config.js';
import { runCommand, type CommandRunner } from './command-runner.js';

export interface ToolCheck {
  name: string;
  ok: boolean;
  /** First line of the tool's version output, when it ran */
  detail: string;
  hint: string;
}

interface Probe {
  name: string;
  command: string;
  args: string[];
  hint: string;
  accept: (stdout: string) => boolean;
}

function probes(config: DevLoopConfig): Probe[] {
  const list: Probe[] = [
    {
      name: 'cargo',
      command: config.tools.cargo,
      args: ['--version'],
      hint: 'Install Rust from https://rustup.rs',
      accept: () => true,
    },
    {
      name: `rust target ${config.target}`,
      command: 'rustup',
      args: ['target', 'list', '--installed'],
      hint: `rustup target add ${config.target}`,
      accept: (stdout) => stdout.split('\n').some((line) => line.trim() === config.target),
    },
    {
      name: 'wasm-bindgen',
      command: config.tools.wasmBindgen,
      args: ['--version'],
      hint: 'cargo install -f wasm-bindgen-cli',
      accept: () => true,
    },
  ];

  if (config.serve.mode === 'external') {
    list.push({
      name: 'simple-http-server',
      command: config.tools.httpServer,
      args: ['--version'],
      hint: 'cargo install simple-http-server',
      accept: () => true,
    });
  }

  return list;
}

/**
 * Check that the external tools the pipeline needs are available.
 * Reports only; nothing is installed.
 */
export async function checkTools(config: DevLoopConfig, runner: CommandRunner): Promise<ToolCheck[]> {
  const checks: ToolCheck[] = [];

  for (const probe of probes(config)) {
    const result = await runCommand(runner, probe.command, probe.args, { cwd: config.projectDir });
    const ok = !result.error && result.code === 0 && probe.accept(result.stdout);
    const firstLine = result.stdout.trim().split('\n')[0] ?? '';

    checks.push({
      name: probe.name,
      ok,
      detail: result.error ? result.error.message : firstLine,
      hint: probe.hint,
    });
  }

  return checks;
}
