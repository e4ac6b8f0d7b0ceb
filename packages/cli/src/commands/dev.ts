import chalk from 'chalk';
import path from 'path';
import { ConfigError, DevLoop, loadConfig } from '@wasm-dev-loop/core';
import { toOverrides, type DevOptions } from '../utils/options.js';

/**
 * Build the package for the web, generate bindings, stage the entry page
 * and serve the result until interrupted
 */
export async function devCommand(pkg: string | undefined, options: DevOptions): Promise<void> {
  try {
    const config = loadConfig({
      projectDir: options.project ? path.resolve(options.project) : process.cwd(),
      configFile: options.config,
      overrides: toOverrides(pkg, options),
    });

    console.log(chalk.cyan(`\nwasm-dev-loop ${chalk.bold(config.package)}\n`));

    const loop = new DevLoop(config);
    const controller = new AbortController();

    // Handle graceful shutdown
    const shutdown = () => controller.abort();
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const code = await loop.run({ signal: controller.signal });
    process.exit(code);
  } catch (error) {
    reportError(error);
    process.exit(1);
  }
}

export function reportError(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`\nError: ${error.message}`));
    for (const issue of error.issues) {
      console.error(chalk.red(`  - ${issue}`));
    }
    console.error();
  } else if (error instanceof Error) {
    console.error(chalk.red(`\nError: ${error.message}\n`));
  } else {
    console.error(chalk.red(`\nError: ${String(error)}\n`));
  }
}
