import type { Command } from 'commander';
import { formatModelList, formatPromptList } from '../cli/output.js';
import type { CliContext } from '../cli/shared.js';
import { errorMessage } from '../lib/errors.js';

export function registerCatalogCommands(program: Command, ctx: CliContext): void {
  program
    .command('models')
    .description('List models from the registry')
    .option('--json', 'Output as JSON')
    .action((cmdOpts: { json?: boolean }) => {
      try {
        const registry = ctx.loadRegistry();
        if (cmdOpts.json) {
          console.log(JSON.stringify(registry.getAll(), null, 2));
        } else {
          process.stdout.write(formatModelList(registry.describe()));
        }
      } catch (error) {
        console.error(`${ctx.p('err')}Failed to load models: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  program
    .command('prompts')
    .description('List prompt templates and their formats')
    .option('--json', 'Output as JSON')
    .action((cmdOpts: { json?: boolean }) => {
      try {
        const listing = ctx.loadPrompts().list();
        if (cmdOpts.json) {
          console.log(JSON.stringify(listing, null, 2));
        } else {
          process.stdout.write(formatPromptList(listing));
        }
      } catch (error) {
        console.error(`${ctx.p('err')}Failed to load prompts: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
