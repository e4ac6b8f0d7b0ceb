import { describe, it, expect, afterEach } from 'vitest';
import http from 'http';
import { resolveConfig } from './config.js';
import { ServerLaunchFailure } from './errors.js';
import { ExternalServer, serverExitCode } from './external-server.js';
import { silentLogger } from './logger.js';
import { fakeHttpServer, freePort } from './testing/fake-http-server.js';
import { FakeCommandRunner, type FakeOutcome } from './testing/fake-runner.js';

function listen(server: http.Server, port: number): Promise<void> {
  return new Promise<void>((resolve) => server.listen(port, '127.0.0.1', resolve));
}

function close(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise<void>((resolve) => server.close(() => resolve()));
}

async function launchFailure(server: ExternalServer): Promise<ServerLaunchFailure> {
  const failure = await server.start().then(
    () => null,
    (err: unknown) => err
  );
  if (!(failure instanceof ServerLaunchFailure)) {
    throw new Error(`Expected ServerLaunchFailure, got ${String(failure)}`);
  }
  return failure;
}

describe('ExternalServer', () => {
  const listeners: http.Server[] = [];

  afterEach(async () => {
    for (const server of listeners.splice(0)) {
      if (server.listening) {
        await close(server);
      }
    }
  });

  // ============================================================================
  // Arguments
  // ============================================================================

  it('should pass the allow-list, index, isolation and bind flags', () => {
    const config = resolveConfig('/work/simple', { serve: { mode: 'external' } });
    const server = new ExternalServer(config, new FakeCommandRunner(), silentLogger());

    expect(server.args()).toEqual([
      '/work/simple/target/generated',
      '-c',
      'wasm,html,js',
      '-i',
      '--coep',
      '--coop',
      '--ip',
      '127.0.0.1',
      '-p',
      '8000',
    ]);
  });

  it('should omit the index flag when the directory index is off', () => {
    const config = resolveConfig('/work/simple', { serve: { mode: 'external', directoryIndex: false } });

    expect(new ExternalServer(config, new FakeCommandRunner(), silentLogger()).args()).not.toContain('-i');
  });

  // ============================================================================
  // Lifecycle
  // ============================================================================

  it('should wait until the address answers and stop with an interrupt', async () => {
    const port = await freePort();
    const config = resolveConfig('/work/simple', { serve: { mode: 'external', port } });
    const runner = new FakeCommandRunner(fakeHttpServer);
    const server = new ExternalServer(config, runner, silentLogger(), { pollDelayMs: 10 });

    const { done } = await server.start();
    expect(server.isRunning()).toBe(true);
    expect(runner.commands()).toEqual(['simple-http-server']);
    expect((await fetch(`http://127.0.0.1:${port}/`)).status).toBe(200);

    const code = await server.stop();

    expect(code).toBe(0);
    expect(await done).toBe(0);
    expect(server.isRunning()).toBe(false);
  });

  it('should resolve the exit code when the process ends by itself', async () => {
    const port = await freePort();
    const config = resolveConfig('/work/simple', { serve: { mode: 'external', port } });

    let finish: () => void = () => {};
    const runner = new FakeCommandRunner(async (): Promise<FakeOutcome> => {
      const stand = http.createServer((_req, res) => res.end('ok'));
      await listen(stand, port);
      await new Promise<void>((resolve) => {
        finish = resolve;
      });
      await close(stand);
      return { code: 2 };
    });
    const server = new ExternalServer(config, runner, silentLogger(), { pollDelayMs: 10 });

    const { done } = await server.start();
    finish();

    expect(await done).toBe(2);
    expect(server.isRunning()).toBe(false);
  });

  // ============================================================================
  // Launch failures
  // ============================================================================

  it('should not spawn when another process holds the port', async () => {
    const foreign = http.createServer((_req, res) => res.end('someone else'));
    listeners.push(foreign);
    const port = await freePort();
    await listen(foreign, port);

    const config = resolveConfig('/work/simple', { serve: { mode: 'external', port } });
    const runner = new FakeCommandRunner(fakeHttpServer);

    const failure = await launchFailure(new ExternalServer(config, runner, silentLogger(), { pollDelayMs: 10 }));

    expect(failure.message).toBe(`simple-http-server did not start: 127.0.0.1:${port} is not available`);
    expect(runner.commands()).toEqual([]);
  });

  it('should fail when the process exits before answering', async () => {
    const port = await freePort();
    const config = resolveConfig('/work/simple', { serve: { mode: 'external', port } });
    const runner = new FakeCommandRunner(() => ({
      code: 1,
      stderr: 'error: Address already in use\n',
    }));
    const server = new ExternalServer(config, runner, silentLogger(), { pollDelayMs: 10 });

    const failure = await launchFailure(server);

    expect(failure.message).toBe('simple-http-server did not start: exited with code 1');
    expect(failure.stderr).toBe('error: Address already in use');
    expect(failure.processExitCode).toBe(1);
    expect(server.isRunning()).toBe(false);
  });

  it('should fail when the process exits right after answering', async () => {
    const port = await freePort();
    const config = resolveConfig('/work/simple', { serve: { mode: 'external', port } });
    const runner = new FakeCommandRunner(async (): Promise<FakeOutcome> => {
      const stand = http.createServer();
      const answered = new Promise<void>((resolve) => {
        stand.on('request', (_req: http.IncomingMessage, res: http.ServerResponse) => {
          res.end('ok');
          resolve();
        });
      });
      await listen(stand, port);
      await answered;
      await close(stand);
      return { code: 1 };
    });
    const server = new ExternalServer(config, runner, silentLogger(), { pollDelayMs: 500 });

    const failure = await launchFailure(server);

    expect(failure.message).toBe('simple-http-server did not start: exited with code 1');
    expect(server.isRunning()).toBe(false);
  });

  it('should fail when the server is not installed', async () => {
    const port = await freePort();
    const config = resolveConfig('/work/simple', { serve: { mode: 'external', port } });
    const runner = new FakeCommandRunner(() => ({ error: new Error('spawn simple-http-server ENOENT') }));

    const failure = await launchFailure(new ExternalServer(config, runner, silentLogger(), { pollDelayMs: 10 }));

    expect(failure.message).toBe('simple-http-server did not start: spawn simple-http-server ENOENT');
  });
});

describe('serverExitCode', () => {
  it('should count interrupts as graceful', () => {
    expect(serverExitCode({ code: null, signal: 'SIGINT', stdout: '', stderr: '' })).toBe(0);
    expect(serverExitCode({ code: null, signal: 'SIGTERM', stdout: '', stderr: '' })).toBe(0);
    expect(serverExitCode({ code: 0, signal: null, stdout: '', stderr: '' })).toBe(0);
    expect(serverExitCode({ code: 3, signal: null, stdout: '', stderr: '' })).toBe(3);
    expect(serverExitCode({ code: null, signal: 'SIGKILL', stdout: '', stderr: '' })).toBe(1);
  });
});
