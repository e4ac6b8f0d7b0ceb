export interface CommonOptions {
  project?: string;
  config?: string;
  server?: string;
}

export interface DevOptions extends CommonOptions {
  port?: string;
  host?: string;
  outDir?: string;
  entry?: string;
  logLevel?: string;
}

/**
 * Map command line options onto config overrides. Validation happens when
 * the overrides are merged into the config.
 */
export function toOverrides(pkg: string | undefined, options: DevOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const serve: Record<string, unknown> = {};

  if (pkg) overrides.package = pkg;
  if (options.outDir) overrides.outDir = options.outDir;
  if (options.entry) overrides.entryFile = options.entry;
  if (options.logLevel) overrides.logLevel = options.logLevel;
  if (options.server) serve.mode = options.server;
  if (options.host) serve.host = options.host;
  if (options.port !== undefined) serve.port = options.port;

  if (Object.keys(serve).length > 0) {
    overrides.serve = serve;
  }

  return overrides;
}
