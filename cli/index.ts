#!/usr/bin/env node
/**
 * Fetcher CLI entry point
 */
import chalk from 'chalk';
import { parseOptions } from './options-parser';
import { extractCharacters, loadConfig } from '../src';
import { FetcherConfig } from '../src/types/config';
import { CliOptions, RuntimeOptions } from '../src/types/options';

/**
 * Applies command line overrides to the loaded settings
 * @param config settings from the config file
 * @param options command line options
 * @returns updated settings
 */
export function overrideConfig(config: FetcherConfig, options: CliOptions): FetcherConfig {
  return {
    catalog_api: {
      ...config.catalog_api,
      ...(options.baseUrl ? { base_url: options.baseUrl } : {}),
      ...(options.pageSize ? { page_size: options.pageSize } : {})
    },
    output: options.outputDir
      ? { ...config.output, enabled: true, directory: options.outputDir }
      : config.output
  };
}

/**
 * Main
 */
async function main(): Promise<void> {
  const cliOptions = parseOptions(process.argv);
  const config = overrideConfig(await loadConfig(cliOptions.configFile), cliOptions);

  // Ctrl+C / docker stop abort the walk between or during requests
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(chalk.yellow(`\nReceived ${signal}, aborting extraction...`));
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const runtimeOptions: RuntimeOptions = {
    page_size: config.catalog_api.page_size,
    modified_since: cliOptions.modifiedSince,
    verbose: cliOptions.verbose,
    signal: controller.signal
  };

  console.log(chalk.blue(`Fetching ${config.catalog_api.endpoint} from ${config.catalog_api.base_url}`));

  const result = await extractCharacters({ config, options: runtimeOptions });

  process.removeListener('SIGINT', onSignal);
  process.removeListener('SIGTERM', onSignal);

  if (!result.success) {
    console.error(chalk.red(`❌ ${result.error.name}: ${result.error.message}`));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.green('✅ Extraction complete'));
  console.log(`  Characters: ${chalk.yellow(String(result.stats.totalRecords))}`);
  console.log(`  Pages: ${chalk.yellow(String(result.stats.pages))}`);
  console.log(`  Duration: ${chalk.yellow(String(result.stats.duration / 1000))} s`);
  if (result.outputFile) {
    console.log(`  Output file: ${result.outputFile}`);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('Unexpected error:'), error);
    process.exit(1);
  });
}
