/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { FatalConfigurationError, GpuWatchError } from '../core/errors.js';
import { createRunCommand } from './commands/run.js';
import { createStatusCommand } from './commands/status.js';
import { createSessionsCommand } from './commands/sessions.js';
import { createPruneCommand } from './commands/prune.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('GPU telemetry poller with idle-process alerts and a live dashboard')
    .option('-c, --config <path>', 'Config file (default: ./gpuwatch.yaml, then ~/.gpuwatch/config.yaml)')
    .option('-l, --log-level <level>', 'Log level: trace, debug, info, warn, error, fatal, silent')
    .option('-v, --verbose', 'Shorthand for --log-level debug')
    .option('--pretty', 'Human-readable log output');

  program.addCommand(createRunCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createSessionsCommand());
  program.addCommand(createPruneCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const prefix = error instanceof FatalConfigurationError ? 'fatal' : 'error';
      const code = error instanceof GpuWatchError ? ` [${error.code}]` : '';
      console.error(`${NAME}: ${prefix}${code}: ${error.message}`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
