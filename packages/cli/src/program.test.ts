import { describe, it, expect, vi } from 'vitest';
import { createProgram } from './program.js';
import type { CommonOptions, DevOptions } from './utils/options.js';

function handlers() {
  return {
    dev: vi.fn<[string | undefined, DevOptions], Promise<void>>(async () => {}),
    doctor: vi.fn<[CommonOptions], Promise<void>>(async () => {}),
  };
}

describe('createProgram', () => {
  it('should run dev by default with the package selector', async () => {
    const h = handlers();

    await createProgram(h).parseAsync(['node', 'wasm-dev-loop', 'simple', '--port', '9000']);

    expect(h.dev).toHaveBeenCalledTimes(1);
    expect(h.dev.mock.calls[0][0]).toBe('simple');
    expect(h.dev.mock.calls[0][1]).toMatchObject({ port: '9000' });
    expect(h.doctor).not.toHaveBeenCalled();
  });

  it('should run dev without a package selector', async () => {
    const h = handlers();

    await createProgram(h).parseAsync(['node', 'wasm-dev-loop', 'dev', '--server', 'external', '-C', 'examples/simple']);

    expect(h.dev.mock.calls[0][0]).toBeUndefined();
    expect(h.dev.mock.calls[0][1]).toMatchObject({ server: 'external', project: 'examples/simple' });
  });

  it('should parse dashed options into camel case', async () => {
    const h = handlers();

    await createProgram(h).parseAsync([
      'node',
      'wasm-dev-loop',
      'dev',
      'simple',
      '--out-dir',
      'out',
      '--log-level',
      'debug',
      '--entry',
      'web/index.html',
    ]);

    expect(h.dev.mock.calls[0][1]).toMatchObject({ outDir: 'out', logLevel: 'debug', entry: 'web/index.html' });
  });

  it('should run doctor', async () => {
    const h = handlers();

    await createProgram(h).parseAsync(['node', 'wasm-dev-loop', 'doctor', '--server', 'external']);

    expect(h.doctor).toHaveBeenCalledTimes(1);
    expect(h.doctor.mock.calls[0][0]).toMatchObject({ server: 'external' });
    expect(h.dev).not.toHaveBeenCalled();
  });
});
