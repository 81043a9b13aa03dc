import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createSpidersCommand } from './commands/spiders.js';
import { VERSION } from '../server/routes/health.js';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('crawl-control')
    .description('Control plane for launching, tracking and stopping crawl jobs')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createServeCommand());
  program.addCommand(createSpidersCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createServeCommand } from './commands/serve.js';
export { createSpidersCommand } from './commands/spiders.js';
