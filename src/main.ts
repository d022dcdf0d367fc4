#!/usr/bin/env node
// src/main.ts
// Security alert reporter CLI.
// Collects open code scanning, secret scanning and Dependabot alerts for every
// configured project and writes one report file per project, report and format.

import 'dotenv/config';
import chalk from 'chalk';
import { Command } from 'commander';
import { loadConfig } from './config';
import { ConfigError, UnauthorizedError } from './errors';
import { createConsoleLogger } from './logger';
import { parseReportFormats, parseReportKinds, runReporter } from './run';

type CliOptions = {
  config: string;
  output: string;
  reports: string[];
  formats: string[];
  projects?: string[];
  concurrency: string;
  paginate: boolean;
  legacySecretColumns: boolean;
  mock?: string;
  saveRaw: boolean;
  verbose: boolean;
};

/**
 * Main execution function
 */
async function main() {
  const program = new Command();
  program
    .name('security-alert-reporter')
    .description('Report open code scanning, secret scanning and Dependabot alerts per project')
    .option('-c, --config <file>', 'Configuration file (JSON or YAML)', 'config.json')
    .option('-o, --output <dir>', 'Output directory', './output')
    .option('-r, --reports <kinds...>', 'Reports to produce: counts, code-scanning, secret-scanning, dependabot, all', ['counts'])
    .option('-f, --formats <formats...>', 'Output formats: csv, json, parquet, markdown', ['csv'])
    .option('-p, --projects <names...>', 'Only run these projects')
    .option('--concurrency <n>', 'Number of API requests in flight', '1')
    .option('--no-paginate', 'Read only the first page of alerts per request')
    .option('--legacy-secret-columns', 'Add the payload repository name column to secret scanning reports', false)
    .option('--mock <dir>', 'Read stored responses from a directory instead of calling the API')
    .option('--save-raw', 'Append every API response to raw-responses-<timestamp>.jsonl', false)
    .option('-v, --verbose', 'Verbose output', false)
    .parse(process.argv);

  const options = program.opts<CliOptions>();
  const logger = createConsoleLogger(options.verbose);

  const concurrency = Number.parseInt(options.concurrency, 10);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`--concurrency must be a positive integer, got "${options.concurrency}"`);
  }

  console.log(chalk.blue.bold('🚀 Security Alert Report'));
  console.log(chalk.gray('─'.repeat(50)));

  const config = await loadConfig(options.config);
  const reports = parseReportKinds(options.reports);
  const formats = parseReportFormats(options.formats);

  logger.info(`📂 Config:  ${options.config} (${config.projects.length} projects)`);
  logger.info(`📁 Output:  ${options.output}`);
  logger.info(`🔧 Mode:    ${options.mock ? `Mock (${options.mock})` : `Live API (${config.api.baseUrl})`}`);
  logger.info(`📊 Reports: ${reports.join(', ')}`);

  const summary = await runReporter(
    config,
    {
      outputDir: options.output,
      reports,
      formats,
      projects: options.projects,
      concurrency,
      paginate: options.paginate,
      legacySecretScanningLayout: options.legacySecretColumns,
      mockDir: options.mock,
      saveRaw: options.saveRaw,
    },
    logger
  );

  console.log(chalk.blue.bold('\n✨ Report complete.'));
  console.log(chalk.gray(`Files written: ${summary.written.length}, skipped targets/alerts: ${summary.skipped}`));

  if (summary.failedWrites > 0) {
    console.error(chalk.red(`${summary.failedWrites} report(s) could not be written`));
    process.exitCode = 1;
  }
}

main().catch((error) => {
  if (error instanceof ConfigError || error instanceof UnauthorizedError) {
    console.error(chalk.red.bold(`❌ ${error.message}`));
  } else {
    console.error(chalk.red.bold('An unexpected error occurred:'), error);
  }
  process.exit(1);
});
