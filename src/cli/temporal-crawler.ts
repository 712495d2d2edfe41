#!/usr/bin/env node
/**
 * CLI entry point for the temporal Wayback crawler
 */

import { Command } from 'commander';
import { CrawlController } from '../domain/crawler/CrawlController';
import { ConfigError, WriteError, errorMessage } from '../domain/errors';
import { RunSummary } from '../domain/models/types';
import { DEFAULTS, RunOptions, buildRunConfig, defaultWorkerCount } from '../utils/ConfigLoader';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_WRITE_ERROR = 3;

/**
 * Exit code for an error that ended a run
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return EXIT_CONFIG_ERROR;
  }
  if (error instanceof WriteError) {
    return EXIT_WRITE_ERROR;
  }
  return EXIT_FAILURE;
}

function addRunOptions(command: Command): Command {
  return command
    .option('--output-json-path <path>', 'Base path of the output JSON chunks', DEFAULTS.outputJsonPath)
    .option('--start-date <yyyymmdd>', 'Start date in YYYYMMDD format', DEFAULTS.startDate)
    .option('--end-date <yyyymmdd>', 'End date in YYYYMMDD format', DEFAULTS.endDate)
    .option('--frequency <frequency>', 'Snapshot frequency: daily, monthly or annually', DEFAULTS.frequency)
    .option('--site-type <type>', 'Site type: tos, robots or main', DEFAULTS.siteType)
    .option('--snapshots-path <dir>', 'Directory of the raw snapshot cache', DEFAULTS.snapshotsPath)
    .option('--max-chunk-size <mb>', 'Chunk size (MB) of output JSON files', String(DEFAULTS.maxChunkSizeMb))
    .option('--extract-text', 'Reduce HTML snapshots to their visible text')
    .option('--failure-log <path>', 'Append-only log of failed requests', DEFAULTS.failureLogPath)
    .option('--log-file <path>', 'Detailed log file', DEFAULTS.logFile)
    .option('--log-level <level>', 'Log level: error, warn, info or debug', DEFAULTS.logLevel);
}

function printSummary(summary: RunSummary): void {
  console.log(`\n  - URLs processed: ${summary.completed}/${summary.tasks}`);
  if (summary.skipped > 0) {
    console.log(`  - URLs skipped (interrupted): ${summary.skipped}`);
  }
  console.log(`  - Snapshots written: ${summary.snapshotsWritten}`);
  console.log(`  - Change records: ${summary.changeRecords}`);
  if (summary.outputFiles.length > 0) {
    console.log('\nParsed data saved to:');
    summary.outputFiles.forEach((file) => console.log(`- ${file}`));
  }
  if (summary.failures > 0) {
    console.log(`\n${summary.failures} failed requests; details in ${summary.failureLogPath}`);
  }
}

async function execute(options: RunOptions, mode: 'crawl' | 'export'): Promise<number> {
  let controller: CrawlController | undefined;

  try {
    const config = buildRunConfig(options);
    controller = new CrawlController(config);
    const active = controller;

    // First interrupt drains in-flight work; a second one exits immediately
    let interrupted = false;
    process.on('SIGINT', () => {
      if (interrupted) {
        process.exit(130);
      }
      interrupted = true;
      console.log('\nShutting down crawler, waiting for in-flight URLs...');
      active.stop();
    });

    console.log(mode === 'crawl' ? 'Starting temporal crawl...' : 'Exporting cached snapshots...');
    console.log(`Detailed logs will be saved to ${config.logFile}`);

    const summary = mode === 'crawl' ? await controller.crawl() : controller.exportSnapshots();
    printSummary(summary);
    console.log('\n✓ Done');
    return EXIT_OK;
  } catch (error) {
    console.error(`\n✗ ${mode === 'crawl' ? 'Crawl' : 'Export'} failed: ${errorMessage(error)}`);
    return exitCodeFor(error);
  } finally {
    await controller?.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('temporal-crawler')
    .description('Collect sampled Wayback Machine snapshots of robots.txt, terms-of-service and main pages')
    .version('1.0.0');

  addRunOptions(
    program
      .command('crawl', { isDefault: true })
      .description('Query the CDX index and fetch one snapshot per period for every input URL')
      .option('--input-path <path>', 'CSV file containing the URLs to process')
      .option('--url-column <name>', 'CSV column holding the URLs')
      .option('--num-workers <n>', 'Number of concurrent workers', String(defaultWorkerCount()))
      .option('--stats-path <dir>', 'Directory for rate-of-change stats', DEFAULTS.statsPath)
      .option('--count-changes', 'Count content changes for each URL in the date range')
      .option('--save-snapshots', 'Save fetched snapshots to the snapshot cache')
      .option('--process-to-json', 'Write fetched snapshots to the output JSON chunks')
  ).action(async (options) => {
    process.exitCode = await execute(options, 'crawl');
  });

  addRunOptions(
    program.command('export').description('Write cached snapshots to the output JSON chunks without network access')
  ).action(async (options) => {
    process.exitCode = await execute(options, 'export');
  });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('Crawler error:', error);
      process.exit(EXIT_FAILURE);
    });
}
