#!/usr/bin/env node

// CLI entry point
// - Command name: `hyperenum` with subcommands `generate` (default) and `estimate`.
// - Both take the same selection flags; options come from the CLI, a YAML config
//   file, and defaults, in that order of precedence.
// - `generate` writes one multi-document YAML file per game into --dir and prints a
//   summary of processed and skipped games. `estimate` only prints blast radii.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { stringify } from 'yaml';
import {
  ErrorPresenter,
  checkSelection,
  createLogger,
  estimateBlastRadius,
  loadSchemaFile,
  runEnumeration,
  toHyperEnumError,
  type Logger,
  type SelectionIssue,
} from '@hyperenum/core';
import { renderCLIView } from './render.js';
import { collect, type CliOptions } from './flags.js';
import {
  loadConfigFile,
  requireSchemaPath,
  resolveConfig,
  toTargets,
  type ResolvedConfig,
} from './config/config-file.js';
import { YamlFileWriter } from './output/yaml-writer.js';
import { acceptAll, createPromptGate } from './confirm.js';
import { formatEstimate, formatReport, reportExitCode } from './report.js';

function withSelectionOptions(command: Command): Command {
  return command
    .option('--schema <file>', 'Option schema file (YAML or JSON)')
    .option('-c, --config-file <file>', 'YAML config file, one document per game')
    .option('-g, --game <names>', 'Comma-separated games to enumerate (repeatable)', collect)
    .option(
      '-o, --options <specs>',
      'Comma-separated options to enumerate, e.g. goal,floors=3,mode=a|b; the i-th group applies to the i-th game',
      collect
    )
    .option(
      '--others <behavior>',
      'Fill for options not enumerated: default|random|minimum|maximum (one per game, or one for all)',
      collect
    )
    .option('-i, --ignore <ids>', 'Comma-separated options to leave out entirely', collect)
    .option('-s, --splits <n>', 'Sections to split ranges into; minimum 1')
    .option('-v, --verbose <level>', 'Verbosity; higher prints more')
    .option('--threshold <n>', 'Ask before writing more documents than this');
}

async function loadConfig(options: CliOptions): Promise<ResolvedConfig> {
  const file = options.configFile
    ? await loadConfigFile(options.configFile)
    : undefined;
  return resolveConfig(options, file);
}

function printConfig(config: ResolvedConfig): void {
  process.stdout.write(stringify(config));
}

/**
 * Build a fresh program per invocation; commander keeps parsed option values
 * on the command instances.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('hyperenum')
    .description('Enumerate option configurations for games from an option schema')
    .version('0.1.0');

  withSelectionOptions(
    program.command('generate', { isDefault: true }).description(
      'Write every selected configuration as multi-document YAML'
    )
  )
    .option('-d, --dir <path>', 'Output directory for the YAML files')
    .option('-y, --yes', 'Write oversized expansions without asking')
    .option('--print-config', 'Print the merged configuration and exit')
    .action(async (options: CliOptions) => {
      try {
        const config = await loadConfig(options);
        if (options.printConfig) {
          printConfig(config);
          return;
        }

        const logger = createLogger({ verbosity: config.verbose });
        const provider = await loadSchemaFile(requireSchemaPath(config));
        const report = await runEnumeration({
          provider,
          targets: toTargets(config, logger),
          writer: new YamlFileWriter(config.dir),
          confirm: config.yes ? acceptAll : createPromptGate({ logger }),
          threshold: config.threshold,
          logger,
        });

        process.stdout.write(formatReport(report));
        process.exitCode = reportExitCode(report);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  withSelectionOptions(
    program.command('estimate').description(
      'Print how many configurations each game would produce'
    )
  ).action(async (options: CliOptions) => {
    try {
      const config = await loadConfig(options);
      const logger = createLogger({ verbosity: config.verbose });
      const provider = await loadSchemaFile(requireSchemaPath(config));
      for (const target of toTargets(config, logger)) {
        const schema = provider.optionsOf(target.entity);
        if (!schema) {
          logger.warn(`No option schema for game "${target.entity}"`);
          continue;
        }
        reportIssues(target.entity, checkSelection(schema, target), logger);
        process.stdout.write(
          formatEstimate(
            target.entity,
            estimateBlastRadius({
              options: schema,
              selection: target.selection,
              ignored: target.ignored,
              splits: target.splits,
            })
          )
        );
      }
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

  return program;
}

function reportIssues(
  entity: string,
  issues: readonly SelectionIssue[],
  logger: Logger
): void {
  for (const issue of issues) {
    logger.warn(`game ${entity}: ${issue.severity === 'error' ? 'error: ' : ''}${issue.message}`);
  }
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  const error = toHyperEnumError(err);

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
