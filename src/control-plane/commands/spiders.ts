import { Command } from 'commander';
import { createDefaultSpiders } from '../../orchestrator/index.js';
import { SpiderRegistry } from '../../runtime/spider-registry.js';
import { formatJson, formatSpiderList, print } from '../formatter.js';

/**
 * Create the spiders command: prints the spider catalogue.
 */
export function createSpidersCommand(): Command {
  return new Command('spiders')
    .description('List the spiders this service can launch')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const spiders = new SpiderRegistry(createDefaultSpiders()).list();
      print(options.json ? formatJson(spiders) : formatSpiderList(spiders));
    });
}
