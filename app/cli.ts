#!/usr/bin/env node
import yargs from 'yargs';
import { getCatalogProducts } from './models/catalog';
import { dropSchema, initSchema, isSchemaInitialised } from './models/schema';
import SummaryGenerator, { GenerateResult } from './summary/generate';
import db from './util/db';
import { SchemaNotInitialisedError } from './util/errors';
import logger from './util/log';

interface CubedashGenArgv {
  verbose: number;
  init: boolean;
  'drop-database': boolean;
  all: boolean;
  'force-refresh': boolean;
  'refresh-stats': boolean;
  'reset-incremental-position': boolean;
  'recreate-dataset-extents': boolean;
}

export interface Output {
  write(text: string): unknown;
}

export interface CliStreams {
  stdout: Output;
  stderr: Output;
}

const VERBOSITY_LEVELS = ['warn', 'info', 'debug'];

// exit code of a command line that names nothing to do
const USAGE_ERROR = 2;

/**
 * Builds and returns the CLI argument parser
 * @returns the CLI argument parser
 */
export function parser(): yargs.Argv<CubedashGenArgv> {
  return yargs()
    .scriptName('cubedash-gen')
    .usage('Usage: cubedash-gen [options] [product...]')
    .option('verbose', {
      alias: 'v',
      describe: 'log more; repeat for more detail',
      type: 'count',
      default: 0,
    })
    .option('init', {
      alias: 'init-database',
      describe: 'create the summary tables if they do not exist',
      type: 'boolean',
      default: false,
    })
    .option('drop-database', {
      describe: 'drop the summary tables, and every summary in them',
      type: 'boolean',
      default: false,
    })
    .option('all', {
      describe: 'refresh every product of the catalog',
      type: 'boolean',
      default: false,
    })
    .option('force-refresh', {
      describe: 'regenerate every period, not only the changed ones',
      type: 'boolean',
      default: false,
    })
    .option('refresh-stats', {
      describe: 'rebuild the spatial quality statistics afterwards (--no-refresh-stats to skip)',
      type: 'boolean',
      default: true,
    })
    .option('reset-incremental-position', {
      describe: 'restart the incremental scan from the newest dataset already indexed',
      type: 'boolean',
      default: false,
    })
    .option('recreate-dataset-extents', {
      describe: 'rescan every active dataset of the catalog',
      type: 'boolean',
      default: false,
    })
    .strictOptions()
    .help();
}

/**
 * Runs the refresh described by the parsed arguments
 *
 * @param argv - the parsed arguments
 * @param products - the product names given on the command line
 * @param streams - where to write results and errors
 * @returns the exit code
 */
async function run(argv: CubedashGenArgv, products: string[], streams: CliStreams): Promise<number> {
  const cliLogger = logger.child({ application: 'cubedash-gen' });
  if (argv['drop-database']) {
    await dropSchema(db);
    cliLogger.warn('Dropped the summary tables');
  }
  if (argv.init) {
    await initSchema(db);
    cliLogger.info('Created the summary tables');
  }
  if (products.length === 0 && !argv.all) {
    if (argv.init || argv['drop-database']) return 0;
    streams.stderr.write('Error: Specify the products to refresh, or --all\n');
    return USAGE_ERROR;
  }
  if (!await isSchemaInitialised(db)) {
    streams.stderr.write(`Error: ${new SchemaNotInitialisedError().message}\n`);
    return 1;
  }

  const names = argv.all ? (await getCatalogProducts(db)).map((product) => product.name) : products;
  const generator = new SummaryGenerator({ db, logger: cliLogger });
  let failed = false;
  for (const name of names) {
    const result = await generator.refreshProduct(name, {
      force: argv['force-refresh'],
      resetIncrementalPosition: argv['reset-incremental-position'],
      recreateDatasetExtents: argv['recreate-dataset-extents'],
    });
    streams.stdout.write(`${name} ${result}\n`);
    if (result === GenerateResult.ERROR) failed = true;
  }
  if (argv['refresh-stats']) {
    await generator.refreshStats();
  }
  return failed ? 1 : 0;
}

/**
 * Entrypoint which does CLI parsing.  Run `cubedash-gen --help` for usage.
 *
 * @param args - The command line arguments to parse, absent any program name
 * @param streams - where to write results and errors
 * @returns the exit code: 1 if any product failed to refresh
 */
export default async function main(
  args: string[],
  streams: CliStreams = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  const argv = await parser().parseAsync(args);
  const products = argv._.map(String);
  const previousLevel = logger.level;
  logger.level = VERBOSITY_LEVELS[Math.min(argv.verbose, VERBOSITY_LEVELS.length - 1)];
  try {
    return await run(argv, products, streams);
  } finally {
    logger.level = previousLevel;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => { process.exitCode = code; })
    .catch((e) => {
      logger.error(e);
      process.exitCode = 1;
    })
    .finally(() => db.destroy().catch((e) => logger.error(e)));
}
