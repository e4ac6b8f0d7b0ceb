import { Command } from 'commander';
import { devCommand } from './commands/dev.js';
import { doctorCommand } from './commands/doctor.js';
import type { CommonOptions, DevOptions } from './utils/options.js';

export interface CommandHandlers {
  dev: (pkg: string | undefined, options: DevOptions) => Promise<void>;
  doctor: (options: CommonOptions) => Promise<void>;
}

const defaultHandlers: CommandHandlers = {
  dev: devCommand,
  doctor: doctorCommand,
};

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name('wasm-dev-loop')
    .description('Build a Rust package for the web and serve it with cross-origin isolation')
    .version('0.1.0', '-v, --version')
    .helpOption('-h, --help');

  program
    .command('dev [package]', { isDefault: true })
    .description('Build, generate bindings, stage index.html and serve until interrupted')
    .option('-C, --project <dir>', 'Project directory (defaults to the current directory)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-p, --port <port>', 'Port to serve on')
    .option('--host <host>', 'Address to bind to')
    .option('--server <mode>', 'Static server (builtin|external)')
    .option('--out-dir <dir>', 'Directory for generated glue code')
    .option('--entry <file>', 'Static entry page to stage')
    .option('-l, --log-level <level>', 'Log level (debug|info|warn|error)')
    .action((pkg: string | undefined, options: DevOptions) => handlers.dev(pkg, options));

  program
    .command('doctor')
    .description('Check that cargo, the wasm target and the external tools are installed')
    .option('-C, --project <dir>', 'Project directory (defaults to the current directory)')
    .option('-c, --config <file>', 'Path to config file')
    .option('--server <mode>', 'Static server (builtin|external)')
    .action((options: CommonOptions) => handlers.doctor(options));

  return program;
}
