#!/usr/bin/env node
/**
 * Check URL CLI Script
 *
 * Runs the site-facing half of the pipeline from the terminal, without the model or
 * the database: the standalone permission check, or a dry-run content extraction.
 *
 * @example
 * ```
 * npm run check-url -- permission https://example.org
 * npm run check-url -- extract https://example.org/about --verbose
 * ```
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config from '../config';
import { AppError } from '../middleware/errorHandler';
import { createScraperServices } from '../services/service.factory';
import { LoggingUtils, LogLevel } from '../services/scraper/utils/LoggingUtils';
import logger from '../utils/logger';

async function main() {
  const argv = yargs(hideBin(process.argv))
    .scriptName('check-url')
    .usage('Usage: $0 <command> <url> [options]')
    .command('permission <url>', 'Run robots.txt, HTTP and terms-of-service checks for a URL', (y) =>
      y.positional('url', { type: 'string', demandOption: true, describe: 'Page to check' })
    )
    .command('extract <url>', 'Fetch a page and print the text the pipeline would send to the model', (y) =>
      y.positional('url', { type: 'string', demandOption: true, describe: 'Page to extract' })
    )
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable more detailed logging'
    })
    .demandCommand(1)
    .strict()
    .help()
    .alias('help', 'h')
    .parseSync();

  LoggingUtils.configure(config.logging);
  if (argv.verbose) {
    logger.level = 'debug';
    LoggingUtils.setLogLevel(LogLevel.DEBUG);
    logger.debug('Verbose logging enabled');
  }

  // Positionals declared inside a command builder are not reflected in the parsed type
  const url = argv.url;
  if (typeof url !== 'string') {
    console.error('Error: a URL is required');
    process.exit(1);
  }

  const services = createScraperServices(config);
  const [command] = argv._;

  if (command === 'permission') {
    const decision = await services.permissionEvaluator.evaluate(url);
    console.log(JSON.stringify({ url, scraping_allowed: decision.allowed, message: decision.reason }, null, 2));
    process.exit(decision.allowed ? 0 : 1);
  }

  try {
    const document = await services.contentExtractor.extract(url);
    console.log(JSON.stringify(document, null, 2));
    process.exit(0);
  } catch (error) {
    if (error instanceof AppError) {
      console.error(`Error: ${error.message}${error.retryable ? ' (retryable)' : ''}`);
      process.exit(1);
    }
    throw error;
  }
}

// Execute the main function
main().catch(error => {
  logger.error('Unhandled error in check-url script:', error);
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'Unknown error'}`);
  process.exit(1);
});
