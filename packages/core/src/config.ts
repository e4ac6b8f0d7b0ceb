import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export const CONFIG_FILE_NAME = 'wasm-dev-loop.config.json';

export const DEFAULT_TARGET = 'wasm32-unknown-unknown';

export const CROSS_ORIGIN_ISOLATION_HEADERS: Readonly<Record<string, string>> = {
  'Cross-Origin-Embedder-Policy': 'require-corp',
  'Cross-Origin-Opener-Policy': 'same-origin',
};

export type ServeMode = 'builtin' | 'external';

export interface ToolCommands {
  cargo: string;
  wasmBindgen: string;
  httpServer: string;
}

export interface ServeConfig {
  mode: ServeMode;
  host: string;
  port: number;
  /** File extensions the server answers for, without the leading dot */
  extensions: string[];
  directoryIndex: boolean;
  headers: Record<string, string>;
}

/**
 * Fully resolved configuration. All paths are absolute.
 */
export interface DevLoopConfig {
  projectDir: string;
  package: string;
  target: string;
  targetDir: string;
  outDir: string;
  entryFile: string;
  tools: ToolCommands;
  serve: ServeConfig;
  logLevel: LogLevel;
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const portSchema = z.coerce.number().int().min(0).max(65535);

/**
 * Shape of wasm-dev-loop.config.json and of CLI overrides. Every field is optional.
 */
export const configInputSchema = z
  .object({
    package: z.string().min(1),
    target: z.string().min(1),
    targetDir: z.string().min(1),
    outDir: z.string().min(1),
    entryFile: z.string().min(1),
    logLevel: logLevelSchema,
    tools: z
      .object({
        cargo: z.string().min(1),
        wasmBindgen: z.string().min(1),
        httpServer: z.string().min(1),
      })
      .partial()
      .strict(),
    serve: z
      .object({
        mode: z.enum(['builtin', 'external']),
        host: z.string().min(1),
        port: portSchema,
        extensions: z.array(z.string().min(1)).min(1),
        directoryIndex: z.boolean(),
        headers: z.record(z.string()),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type DevLoopConfigInput = z.infer<typeof configInputSchema>;

/**
 * Rules that only hold once every layer is merged
 */
const mergedConfigSchema = configInputSchema.superRefine((input, ctx) => {
  if (input.serve?.mode !== 'external') {
    return;
  }
  if (input.serve.port === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['serve', 'port'],
      message: 'The external server needs a fixed port',
    });
  }
  if (input.serve.headers && Object.keys(input.serve.headers).length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['serve', 'headers'],
      message: 'Extra headers are only supported by the builtin server',
    });
  }
});

export interface LoadConfigOptions {
  projectDir?: string;
  /** Explicit config file; when absent, wasm-dev-loop.config.json in projectDir is used if present */
  configFile?: string;
  /** Raw overrides, validated against the same schema as the file */
  overrides?: Record<string, unknown>;
}

/**
 * Parse a raw value against the config schema
 */
export function parseConfigInput(
  raw: unknown,
  source: string,
  schema: z.ZodType<DevLoopConfigInput, z.ZodTypeDef, unknown> = configInputSchema
): DevLoopConfigInput {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration in ${source}`, issues);
  }
  return result.data;
}

/**
 * Read and validate a config file
 */
export function readConfigFile(file: string): DevLoopConfigInput {
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseConfigInput(raw, file);
}

/**
 * User headers with the isolation headers applied last. Names compare
 * case-insensitively, so a user value never replaces a required one.
 */
function withIsolationHeaders(headers: Record<string, string> = {}): Record<string, string> {
  const required = new Set(Object.keys(CROSS_ORIGIN_ISOLATION_HEADERS).map((name) => name.toLowerCase()));
  const extra = Object.entries(headers).filter(([name]) => !required.has(name.toLowerCase()));
  return { ...Object.fromEntries(extra), ...CROSS_ORIGIN_ISOLATION_HEADERS };
}

/**
 * Merge defaults, the config file and overrides into a resolved config.
 * Relative paths in the file and overrides resolve against projectDir.
 */
export function resolveConfig(projectDir: string, ...layers: DevLoopConfigInput[]): DevLoopConfig {
  const root = path.resolve(projectDir);
  const combined: DevLoopConfigInput = {};

  for (const layer of layers) {
    Object.assign(combined, {
      ...layer,
      tools: { ...combined.tools, ...layer.tools },
      serve: { ...combined.serve, ...layer.serve },
    });
  }
  const merged = parseConfigInput(combined, 'merged configuration', mergedConfigSchema);

  const pkg = merged.package ?? path.basename(root);
  const targetDir = path.resolve(root, merged.targetDir ?? 'target');

  return {
    projectDir: root,
    package: pkg,
    target: merged.target ?? DEFAULT_TARGET,
    targetDir,
    outDir: merged.outDir ? path.resolve(root, merged.outDir) : path.join(targetDir, 'generated'),
    entryFile: path.resolve(root, merged.entryFile ?? 'index.html'),
    tools: {
      cargo: 'cargo',
      wasmBindgen: 'wasm-bindgen',
      httpServer: 'simple-http-server',
      ...merged.tools,
    },
    serve: {
      mode: merged.serve?.mode ?? 'builtin',
      host: merged.serve?.host ?? '127.0.0.1',
      port: merged.serve?.port ?? 8000,
      extensions: (merged.serve?.extensions ?? ['wasm', 'html', 'js']).map(normalizeExtension),
      directoryIndex: merged.serve?.directoryIndex ?? true,
      headers: withIsolationHeaders(merged.serve?.headers),
    },
    logLevel: merged.logLevel ?? 'info',
  };
}

/**
 * Load configuration: defaults, then the config file, then overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): DevLoopConfig {
  const projectDir = path.resolve(options.projectDir ?? process.cwd());
  const layers: DevLoopConfigInput[] = [];

  if (options.configFile) {
    layers.push(readConfigFile(path.resolve(projectDir, options.configFile)));
  } else {
    const defaultFile = path.join(projectDir, CONFIG_FILE_NAME);
    if (existsSync(defaultFile)) {
      layers.push(readConfigFile(defaultFile));
    }
  }

  if (options.overrides) {
    layers.push(parseConfigInput(options.overrides, 'command line options'));
  }

  return resolveConfig(projectDir, ...layers);
}

/**
 * Path of the compiled module cargo writes for this config
 */
export function artifactPath(config: Pick<DevLoopConfig, 'targetDir' | 'target' | 'package'>): string {
  return path.join(config.targetDir, config.target, 'debug', `${config.package}.wasm`);
}

function normalizeExtension(ext: string): string {
  return ext.replace(/^\./, '').toLowerCase();
}
