/**
 * csv-sampler CLI
 *
 * Draws a seeded random sample of rows from a delimited file and writes it
 * as CSV with the chosen columns replaced by synthetic values.
 *
 * @module csv-sampler/cli
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { loadConfig, parseLogLevel, DEFAULTS } from '../runtime/config.js';
import { toSamplerError, type ErrorCode } from '../runtime/errors.js';
import { createCliLogger, type Logger } from '../telemetry/logger.js';
import {
  DataSamplingAnonymizer,
  type PipelineDependencies,
} from '../sampler/data-sampling-anonymizer.js';
import { formatSummary } from './formatters.js';

const VERSION = DEFAULTS.serviceVersion;

/**
 * Parsed command-line options
 */
export type CliOptions = {
  input_file: string;
  output_file: string;
  sample_size: number;
  columns: string[];
  no_header?: boolean;
  encoding?: string;
  delimiter: string;
  seed?: number;
  summary?: boolean;
  logLevel?: string;
};

/**
 * Where the CLI sends its output
 */
export interface CliIO {
  /** Builds the logger once the log level is known */
  createLogger: (logLevel: string | undefined) => Logger;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  generator?: PipelineDependencies['generator'];
}

/**
 * Log line used for each failure kind
 */
const FAILURE_MESSAGES: Record<ErrorCode, string> = {
  INVALID_PARAMETER: 'Invalid parameter',
  FILE_NOT_FOUND: 'Input file missing',
  COLUMN_NOT_FOUND: 'Unknown column',
  DATA_LOAD_ERROR: 'Could not load input',
  ANONYMIZATION_ERROR: 'Could not anonymize data',
  DATA_SAVE_ERROR: 'Could not save output',
  UNEXPECTED_ERROR: 'Unexpected failure',
};

/**
 * Blank input reads as NaN so the range check rejects it
 */
function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function defaultIO(): CliIO {
  return {
    createLogger: (logLevel) => {
      const config = loadConfig();
      return createCliLogger(
        logLevel === undefined ? config : { ...config, logLevel: parseLogLevel(logLevel) }
      );
    },
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
  };
}

/**
 * Builds the program. `setExitCode` receives the outcome of the action.
 */
export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('csv-sampler')
    .description(chalk.bold('CSV sampler') + '\n\nRandomly sample rows from a CSV file and anonymize selected columns.')
    .version(VERSION, '-V, --version', 'Display version information')
    .requiredOption('-i, --input_file <path>', 'Path to the input CSV file')
    .requiredOption('-o, --output_file <path>', 'Path to the output CSV file')
    .requiredOption('-s, --sample_size <fraction>', 'Fraction of rows to sample (0.0 to 1.0)', parseNumber)
    .requiredOption('-c, --columns <names...>', 'Column names to anonymize')
    .option('--no_header', 'The input file has no header row')
    .option('-e, --encoding <name>', 'Input encoding (e.g. utf-8, latin1); detected when omitted')
    .option('-d, --delimiter <char>', 'Field delimiter of the input file', ',')
    .option('--seed <int>', 'Seed for the synthetic value generator', parseNumber)
    .option('--summary', 'Print a summary table after the run')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)')
    .configureOutput({
      writeOut: io.writeOut,
      writeErr: io.writeErr,
    })
    .exitOverride()
    .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Keep half the rows, replace three columns')}
  $ csv-sampler -i input.csv -o output.csv -s 0.5 -c name email phone

  ${chalk.dim('# Headerless input: columns are column_0, column_1, ...')}
  $ csv-sampler -i input.csv -o output.csv -s 0.2 -c column_0 column_1 --no_header

  ${chalk.dim('# Latin-1 input separated by semicolons')}
  $ csv-sampler -i input.csv -o output.csv -s 0.75 -c Name Surname -e latin1 -d ";"
`)
    .action(() => {
      const options = program.opts<CliOptions>();
      const logger = io.createLogger(options.logLevel);

      try {
        const anonymizer = new DataSamplingAnonymizer(
          {
            inputFile: options.input_file,
            outputFile: options.output_file,
            sampleSize: options.sample_size,
            columnsToAnonymize: options.columns,
            header: options.no_header !== true,
            encoding: options.encoding,
            delimiter: options.delimiter,
            syntheticSeed: options.seed,
          },
          { logger, generator: io.generator }
        );

        const result = anonymizer.run();
        if (!result.success) {
          throw result.error;
        }

        logger.info(
          { output: result.summary.outputFile, rows: result.summary.outputRows },
          `Data sampled and anonymized successfully. Output saved to ${result.summary.outputFile}`
        );
        if (options.summary) {
          io.writeOut(formatSummary(result.summary) + '\n');
        }
        setExitCode(0);
      } catch (err) {
        const error = toSamplerError(err);
        logger.error({ err: error.toJSON() }, `${FAILURE_MESSAGES[error.code]}: ${error.message}`);
        setExitCode(1);
      }
    });

  return program;
}

/**
 * Parses `args` (without the node and script entries) and runs the
 * pipeline. Returns the process exit code.
 */
export function runCli(args: string[], io: CliIO = defaultIO()): number {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version exit with 0, argument errors with 1
      return err.exitCode === 0 ? 0 : 1;
    }
    throw err;
  }

  return exitCode;
}
