#!/usr/bin/env node
import { Command } from 'commander';
import { createCliContext } from './cli/shared.js';
import { registerCatalogCommands } from './commands/catalog.js';
import { registerTranslateCommand } from './commands/translate.js';
import { errorMessage } from './lib/errors.js';
import { loadDotenv } from './lib/env.js';

loadDotenv();

const program = new Command();

program
  .name('lingopipe')
  .description('Translate text, HTML and JSON through LLM and MT backends while protecting URLs and markup')
  .version('0.4.0')
  .option('--plain', 'Plain output prefixes (no emoji)');

const ctx = createCliContext({ plain: process.argv.includes('--plain') });

registerTranslateCommand(program, ctx);
registerCatalogCommands(program, ctx);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`${ctx.p('err')}${errorMessage(error)}`);
  process.exit(1);
});
