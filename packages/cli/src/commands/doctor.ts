import chalk from 'chalk';
import path from 'path';
import { ProcessCommandRunner, checkTools, loadConfig, type ToolCheck } from '@wasm-dev-loop/core';
import { toOverrides, type CommonOptions } from '../utils/options.js';
import { reportError } from './dev.js';

export function formatCheck(check: ToolCheck): string {
  if (check.ok) {
    return `${chalk.green('✓')} ${check.name} ${chalk.gray(check.detail)}`.trimEnd();
  }
  return `${chalk.red('✗')} ${check.name}\n    ${chalk.gray('fix:')} ${check.hint}`;
}

/**
 * Report which external tools are missing
 */
export async function doctorCommand(options: CommonOptions): Promise<void> {
  try {
    const config = loadConfig({
      projectDir: options.project ? path.resolve(options.project) : process.cwd(),
      configFile: options.config,
      overrides: toOverrides(undefined, options),
    });

    const checks = await checkTools(config, new ProcessCommandRunner());

    console.log();
    for (const check of checks) {
      console.log(`  ${formatCheck(check)}`);
    }
    console.log();

    const missing = checks.filter((check) => !check.ok).length;
    if (missing > 0) {
      console.log(chalk.yellow(`${missing} of ${checks.length} checks failed\n`));
      process.exit(1);
    }
    console.log(chalk.green('All tools available\n'));
  } catch (error) {
    reportError(error);
    process.exit(1);
  }
}
