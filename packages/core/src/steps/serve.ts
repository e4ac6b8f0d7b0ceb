import type { DevLoopConfig } from '../config.js';
import type { CommandRunner } from '../command-runner.js';
import { ServerLaunchFailure, StepError } from '../errors.js';
import { ExternalServer } from '../external-server.js';
import type { Logger } from '../logger.js';
import { StaticServer } from '../static-server.js';

/**
 * A running server over the output directory
 */
export interface ServeSession {
  readonly url: string;
  /** Resolves with the exit code if the server terminates without being stopped */
  readonly done: Promise<number>;
  /** Stop the server; resolves with its exit code once the listener is released */
  stop(): Promise<number>;
}

/**
 * Session over a listening StaticServer. The first server error stops it
 * and resolves done with 1; later errors are only logged.
 */
export function staticServerSession(server: StaticServer, url: string, logger: Logger): ServeSession {
  let stopping = false;
  const done = new Promise<number>((resolve) => {
    server.once('close', () => resolve(0));
    server.on('error', (err: Error) => {
      logger.error('Static server error', { step: 'serve' }, err);
      if (stopping) return;
      stopping = true;
      resolve(1);
      server.stop().catch((stopErr: unknown) => {
        logger.error('Static server did not stop', { step: 'serve' }, stopErr instanceof Error ? stopErr : undefined);
      });
    });
  });

  return {
    url,
    done,
    stop: async () => {
      stopping = true;
      await server.stop();
      return 0;
    },
  };
}

async function startBuiltin(config: DevLoopConfig, logger: Logger): Promise<ServeSession> {
  const server = new StaticServer({
    root: config.outDir,
    host: config.serve.host,
    port: config.serve.port,
    extensions: config.serve.extensions,
    directoryIndex: config.serve.directoryIndex,
    headers: config.serve.headers,
    logger,
  });

  const port = await server.start();
  return staticServerSession(server, `http://${config.serve.host}:${port}/`, logger);
}

async function startExternal(config: DevLoopConfig, runner: CommandRunner, logger: Logger): Promise<ServeSession> {
  const server = new ExternalServer(config, runner, logger);
  const { done } = await server.start();

  return {
    url: `http://${config.serve.host}:${config.serve.port}/`,
    done,
    stop: () => server.stop(),
  };
}

/**
 * Start the configured server. Launch errors surface as ServerLaunchFailure.
 */
export async function startServer(
  config: DevLoopConfig,
  runner: CommandRunner,
  logger: Logger
): Promise<ServeSession> {
  try {
    return config.serve.mode === 'external'
      ? await startExternal(config, runner, logger)
      : await startBuiltin(config, logger);
  } catch (err) {
    if (err instanceof StepError) {
      throw err;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ServerLaunchFailure(
      `Cannot serve ${config.outDir} on ${config.serve.host}:${config.serve.port}: ${reason}`,
      { stderr: reason, cause: err }
    );
  }
}
