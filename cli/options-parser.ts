/**
 * Command line argument parser
 */
import { Command, InvalidArgumentError } from 'commander';
import { CliOptions } from '../src/types/options';
import { VERSION, MODULE_NAME } from '../src';
import { MAX_PAGE_SIZE } from '../src/config';
import { isValidModifiedSince } from '../src/utils/time-utils';

/**
 * Parses the command line
 * @param args process.argv
 * @returns parsed options
 */
export function parseOptions(args: string[]): CliOptions {
  const program = new Command();

  program
    .name(MODULE_NAME)
    .description('Extract the full character catalog into a flat dataset')
    .version(VERSION);

  program
    .option(
      '-c, --config-file <path>',
      'config file',
      process.env.CATALOG_CONFIG_PATH || './config.yaml'
    )
    .option(
      '-l, --page-size <number>',
      `records per request (1-${MAX_PAGE_SIZE})`,
      parsePageSize
    )
    .option(
      '-m, --modified-since <date>',
      'only characters modified since this date (YYYY-MM-DD or ISO 8601)',
      parseModifiedSince
    )
    .option(
      '-o, --output-dir <path>',
      'write characters.csv into this directory'
    )
    .option(
      '--base-url <url>',
      'API base URL'
    )
    .option(
      '-v, --verbose',
      'log every request',
      false
    );

  program.addHelpText('after', `
Environment:
  PUBLIC_KEY, PRIVATE_KEY   API keys (required)

Examples:
  $ ${MODULE_NAME}
  $ ${MODULE_NAME} --modified-since 2014-01-01 --output-dir ./data
  $ ${MODULE_NAME} --config-file ./custom.yaml --page-size 50 --verbose
  `);

  program.parse(args);
  return program.opts<CliOptions>();
}

/**
 * @throws when the value is not an integer in 1..MAX_PAGE_SIZE
 */
export function parsePageSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(`--page-size must be an integer between 1 and ${MAX_PAGE_SIZE}, got "${value}"`);
  }
  return parsed;
}

/**
 * @throws when the value is not a valid date
 */
export function parseModifiedSince(value: string): string {
  if (!isValidModifiedSince(value)) {
    throw new InvalidArgumentError(`--modified-since must be YYYY-MM-DD or an ISO 8601 date-time, got "${value}"`);
  }
  return value;
}
