import { describe, it, expect } from 'vitest';
import { toOverrides } from './options.js';

describe('toOverrides', () => {
  it('should return nothing when no option is given', () => {
    expect(toOverrides(undefined, {})).toEqual({});
  });

  it('should map the package and every dev option', () => {
    expect(
      toOverrides('simple', {
        port: '8080',
        host: '0.0.0.0',
        server: 'external',
        outDir: 'dist/web',
        entry: 'web/index.html',
        logLevel: 'debug',
        project: 'ignored-here',
        config: 'ignored-too',
      })
    ).toEqual({
      package: 'simple',
      outDir: 'dist/web',
      entryFile: 'web/index.html',
      logLevel: 'debug',
      serve: { mode: 'external', host: '0.0.0.0', port: '8080' },
    });
  });
});
