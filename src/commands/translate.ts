import { readFile, writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { formatDiagnostics, formatSummary } from '../cli/output.js';
import { type CliContext, parseList, parseVariables } from '../cli/shared.js';
import { env } from '../lib/env.js';
import { errorMessage, isLingopipeError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { translate } from '../lib/translate.js';
import { isDocumentFormat } from '../lib/translation/types.js';
import { REPAIR_MISSING_NULLS, type RepairFeature } from '../lib/validation/index.js';

interface TranslateCommandOptions {
  model?: string;
  format: string;
  source?: string;
  translated?: string;
  filters?: string;
  context?: string;
  promptKey?: string;
  sourceLang?: string;
  targetLang?: string;
  variables?: string;
  proxy?: string;
  validate: boolean;
  repairNulls?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function readInput(ctx: CliContext, source: string | undefined): Promise<string> {
  if (source) {
    try {
      return await readFile(source, 'utf8');
    } catch (error) {
      console.error(`${ctx.p('err')}Cannot read source file: ${source} (${errorMessage(error)})`);
      process.exit(1);
    }
  }
  if (process.stdin.isTTY) {
    console.error(`${ctx.p('warn')}Reading from STDIN; press Ctrl-D to finish input and continue.`);
  }
  return readStdin();
}

export function registerTranslateCommand(program: Command, ctx: CliContext): void {
  program
    .command('translate', { isDefault: true })
    .description('Translate a document through the selected model')
    .option('-m, --model <key>', 'Model key (see `lingopipe models`)')
    .option('-f, --format <format>', 'Document format: text, html or json', 'text')
    .option('-s, --source <path>', 'Input file (default: STDIN)')
    .option('-t, --translated <path>', 'Output file (default: STDOUT)')
    .option('--filters <list>', 'Comma-separated placeholder filters, e.g. url,html_pre,html_code')
    .option('--context <text>', 'Extra context for the system prompt')
    .option('--prompt-key <kind>', 'Prompt group from prompts.yaml', 'translator')
    .option('--source-lang <code>', 'Source language (default: model default, usually auto)')
    .option('--target-lang <code>', 'Target language (default: model default)')
    .option('--variables <list>', 'Model variables as key=value pairs, comma-separated')
    .option('--proxy <uri>', 'Proxy URI (or LINGOPIPE_PROXY)')
    .option('--no-validate', 'Skip syntax, schema and length validation')
    .option('--repair-nulls', 'Restore null JSON values the model dropped')
    .option('--dry-run', 'Build the request without sending it')
    .option('--verbose', 'Print request/response previews and debug logs')
    .option('--json', 'Print the full result record as JSON')
    .action(async (opts: TranslateCommandOptions) => {
      if (!opts.model) {
        console.error(
          `${ctx.p('err')}No model selected. Provide one with --model vendor:name; run \`lingopipe models\` to list them.`,
        );
        process.exit(1);
      }
      if (!isDocumentFormat(opts.format)) {
        console.error(`${ctx.p('err')}Invalid format: '${opts.format}'. Allowed: text, html, json.`);
        process.exit(1);
      }

      let variables: Record<string, string>;
      try {
        variables = parseVariables(opts.variables);
      } catch (error) {
        console.error(`${ctx.p('err')}${errorMessage(error)}`);
        process.exit(1);
      }

      const registry = ctx.loadRegistry();
      const prompts = ctx.loadPrompts();
      const modelKey = opts.model;

      if (!registry.has(modelKey)) {
        console.error(`${ctx.p('err')}Unknown model key: ${modelKey}. Run \`lingopipe models\` to list them.`);
        process.exit(1);
      }

      const { apiKey, envVar } = ctx.resolveApiKey(registry, modelKey);
      if (!apiKey && !opts.dryRun) {
        const helpUrl = registry.getHelpUrl(modelKey);
        console.error(`${ctx.p('err')}API key not found for ${modelKey}.`);
        console.error(`   Please set environment variable: $${envVar ?? '<unknown>'}`);
        if (helpUrl) {
          console.error(`   You can generate a key at: ${helpUrl}`);
        }
        process.exit(1);
      }

      const resolved = ctx.resolveVariables(registry, modelKey, variables);
      for (const { name, envVar: variableEnv } of resolved.missing) {
        console.error(
          `${ctx.p('warn')}Model variable '${name}' is not set (use --variables ${name}=... or $${variableEnv})`,
        );
      }

      const text = await readInput(ctx, opts.source);
      if (text.trim() === '') {
        console.error(`${ctx.p('err')}No input provided. Use --source or pipe text into STDIN.`);
        process.exit(1);
      }

      const repairs: RepairFeature[] = opts.repairNulls ? [REPAIR_MISSING_NULLS] : [];

      try {
        const result = await translate(
          {
            text,
            modelKey,
            format: opts.format,
            // Dry runs never send the key
            apiKey: apiKey ?? 'dry-run',
            filters: parseList(opts.filters),
            dryRun: opts.dryRun ?? false,
            verbose: opts.verbose ?? false,
            context: opts.context ?? null,
            promptKey: opts.promptKey,
            sourceLang: opts.sourceLang ?? null,
            targetLang: opts.targetLang ?? null,
            variables: resolved.variables,
            proxy: opts.proxy ?? env.proxy ?? null,
            validate: opts.validate,
            repairs,
            onFeedback: (message, level) => {
              if (opts.verbose && level !== 'error') {
                console.error(`${ctx.p(level === 'warning' ? 'warn' : 'info')}${message}`);
              }
            },
          },
          {
            registry,
            prompts,
            logger: createLogger(opts.verbose ? 'debug' : env.logLevel),
          },
        );

        if (result.debugRequest) {
          console.error(result.debugRequest);
        }
        if (result.debugResponse) {
          console.error(result.debugResponse);
        }

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (opts.translated) {
          await writeFile(opts.translated, result.result, 'utf8');
          console.error(`${ctx.p('ok')}Translation complete: ${opts.translated}`);
        } else {
          process.stdout.write(result.result);
        }

        process.stderr.write(formatSummary(result));
      } catch (error) {
        console.error(`${ctx.p('err')}${errorMessage(error)}`);
        if (isLingopipeError(error)) {
          const details = formatDiagnostics(error);
          if (details) {
            console.error(details);
          }
        }
        process.exit(1);
      }
    });
}
