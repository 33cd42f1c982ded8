/**
 * ga4-query command line
 *
 * Runs one report and prints it as a table, JSON, or CSV.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { AppConfig } from './config/index.js';
import { errorMessage } from './errors.js';
import { formatResult, OUTPUT_MODES, type OutputMode } from './format/resultFormatter.js';
import { REPORT_NAMES } from './reports/catalog.js';
import type { ReportService } from './reports/reportService.js';
import { logger } from './utils/logger.js';

export interface CliDeps {
  config: AppConfig;
  service: ReportService;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface CliOptions {
  report: string;
  propertyId?: string;
  days: number;
  limit: number;
  start?: string;
  end?: string;
  output: OutputMode;
  metrics?: string;
  dimensions?: string;
  orderBy?: string;
  ascending?: boolean;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

export function createProgram(deps: CliDeps): Command {
  const { config, service } = deps;
  const program = new Command();

  program
    .name('ga4-query')
    .description('Query Google Analytics 4 data')
    .requiredOption('--report <name>', `Report type (${REPORT_NAMES.join(', ')})`)
    .option('--property-id <id>', 'GA4 property ID (overrides GA4_PROPERTY_ID env var)')
    .option('--days <n>', 'Lookback period in days', parseInteger, config.defaults.days)
    .option('--start <date>', 'Start date (YYYY-MM-DD), overrides --days')
    .option('--end <date>', 'End date (YYYY-MM-DD), defaults to today')
    .option('--limit <n>', 'Max rows', parseInteger, config.defaults.limit)
    .addOption(
      new Option('--output <format>', 'Output format')
        .choices(OUTPUT_MODES)
        .default(config.defaults.output)
    )
    .option('--metrics <list>', 'Comma-separated metrics (for custom report)')
    .option('--dimensions <list>', 'Comma-separated dimensions (for custom report)')
    .option('--order-by <field>', 'Metric or dimension to sort by')
    .option('--ascending', 'Sort ascending instead of descending')
    .action(async (options: CliOptions) => {
      logger.debug('CLI invoked', { report: options.report, output: options.output });

      const table = await service.run({
        report: options.report,
        propertyId: options.propertyId,
        days: options.days,
        start: options.start,
        end: options.end,
        limit: options.limit,
        metrics: options.metrics,
        dimensions: options.dimensions,
        orderBy: options.orderBy,
        ascending: options.ascending,
      });

      deps.stdout(formatResult(table, options.output) + '\n');
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries), run the report and
 * return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps)
    .exitOverride()
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    deps.stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}
