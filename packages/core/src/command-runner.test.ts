import { describe, it, expect } from 'vitest';
import { ProcessCommandRunner, formatCommand, runCommand } from './command-runner.js';

const node = process.execPath;

describe('ProcessCommandRunner', () => {
  const runner = new ProcessCommandRunner();

  it('should capture exit code, stdout and stderr', async () => {
    const result = await runCommand(runner, node, [
      '-e',
      'process.stdout.write("out\\n"); process.stderr.write("err\\n"); process.exit(3)',
    ]);

    expect(result.code).toBe(3);
    expect(result.signal).toBeNull();
    expect(result.stdout).toBe('out\n');
    expect(result.stderr).toBe('err\n');
    expect(result.error).toBeUndefined();
  });

  it('should deliver output line by line', async () => {
    const stdout: string[] = [];
    const stderr: string[] = [];

    await runCommand(runner, node, ['-e', 'console.log("a\\nb"); console.error("\\u001b[31mred\\u001b[0m")'], {
      onStdout: (line) => stdout.push(line),
      onStderr: (line) => stderr.push(line),
    });

    expect(stdout).toEqual(['a', 'b']);
    expect(stderr).toEqual(['red']);
  });

  it('should pass cwd and extra environment', async () => {
    const result = await runCommand(runner, node, ['-e', 'console.log(process.env.WDL_TEST_VALUE)'], {
      env: { WDL_TEST_VALUE: 'from-test' },
    });

    expect(result.stdout.trim()).toBe('from-test');
  });

  it('should report a command that cannot be spawned', async () => {
    const result = await runCommand(runner, 'wdl-command-that-does-not-exist', []);

    expect(result.code).toBeNull();
    expect(result.error).toBeInstanceOf(Error);
  });

  it('should report the signal of a killed process', async () => {
    const proc = runner.start(node, ['-e', 'setInterval(() => {}, 1000)']);
    proc.kill('SIGTERM');

    const result = await proc.exited;

    expect(result.code).toBeNull();
    expect(result.signal).toBe('SIGTERM');
  });
});

describe('formatCommand', () => {
  it('should quote arguments containing whitespace', () => {
    expect(formatCommand('cp', ['index.html', '/tmp/out dir'])).toBe('cp index.html "/tmp/out dir"');
  });
});
