#!/usr/bin/env node
import { envOverrides, parseArgs, USAGE } from './cliArgs.js';
import { loadConfig } from './config.js';
import { AppError, describeError } from './errors.js';
import { formatSummary } from './pipeline/RunStats.js';
import { Pipeline } from './pipeline/Pipeline.js';
import { readCompanies } from './storage/InputReader.js';
import { buildRows, formatFromPath, ResultStore } from './storage/ResultStore.js';
import { logger } from './utils/logger.js';

async function main() {
  let pipeline: Pipeline | undefined;
  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.help || !options.input) {
      console.log(USAGE);
      if (!options.help) process.exitCode = 1;
      return;
    }

    const companies = await readCompanies(options.input);
    const config = loadConfig(
      { ...process.env, ...envOverrides(options) },
      { requireSearchCredentials: companies.some((company) => !company.domain) }
    );

    const format = options.format ?? (options.output ? formatFromPath(options.output) : 'xlsx');
    const outputPath = options.output ?? `output/results.${format}`;

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupt received, finishing in-flight companies (press Ctrl+C again to force quit).');
      controller.abort();
    });

    pipeline = new Pipeline(config);
    const outcome = await pipeline.run(companies, { signal: controller.signal });

    const rows = buildRows(outcome.results, { includeWithoutEmail: config.saveDomainOnly && !options.emailsOnly });
    await new ResultStore().save(rows, outputPath, format);

    console.log(formatSummary(pipeline.stats.snapshot()));
    if (outcome.interrupted > 0) {
      logger.warn(`${outcome.interrupted} compan${outcome.interrupted === 1 ? 'y' : 'ies'} left unprocessed.`);
    }
  } catch (error) {
    if (error instanceof AppError && (error.code === 'CONFIGURATION' || error.code === 'INPUT')) {
      logger.error(error.message);
    } else {
      logger.error(`Run failed: ${describeError(error)}`);
    }
    process.exitCode = 1;
  } finally {
    pipeline?.close();
  }
}

await main();
