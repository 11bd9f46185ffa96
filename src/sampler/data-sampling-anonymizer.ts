/**
 * Sampling and anonymization pipeline
 *
 * Detect encoding → load → sample and anonymize → save. Each step logs
 * its failure where it happens and raises a typed error; `run()` turns the
 * outcome into a result the caller can match on.
 *
 * @module sampler/data-sampling-anonymizer
 */

import * as fs from 'fs';
import {
  SamplerOptionsSchema,
  type SamplerOptions,
  type SamplerOptionsInput,
} from '../contracts/options.js';
import { DEFAULTS } from '../runtime/config.js';
import {
  AnonymizationError,
  ColumnNotFoundError,
  DataLoadError,
  DataSaveError,
  InputFileNotFoundError,
  InvalidParameterError,
  SamplerError,
  errorMessage,
  toSamplerError,
} from '../runtime/errors.js';
import type { Table } from '../table/types.js';
import { createLogger, type Logger } from '../telemetry/logger.js';
import { anonymizeColumns, createFakerGenerator, type SyntheticGenerator } from './anonymizer.js';
import { detectEncoding } from './encoding.js';
import { loadTable } from './loader.js';
import { sampleRows } from './sampler.js';
import { saveTable } from './writer.js';

/**
 * Collaborators, replaceable in tests
 */
export interface PipelineDependencies {
  logger?: Logger;
  generator?: SyntheticGenerator;
}

/**
 * Figures reported after a successful run
 */
export interface RunSummary {
  inputFile: string;
  outputFile: string;
  encoding: string;
  inputRows: number;
  outputRows: number;
  columns: string[];
  anonymizedColumns: string[];
  durationMs: number;
}

export type PipelineResult =
  | { success: true; summary: RunSummary }
  | { success: false; error: SamplerError };

export class DataSamplingAnonymizer {
  readonly options: SamplerOptions;
  private readonly logger: Logger;
  private readonly generator: SyntheticGenerator;
  private encoding: string | undefined;
  private data: Table | undefined;
  private anonymizedData: Table | undefined;

  /**
   * @throws InvalidParameterError when an option is rejected (before any I/O)
   * @throws InputFileNotFoundError when the input path does not exist
   */
  constructor(options: SamplerOptionsInput, deps: PipelineDependencies = {}) {
    this.logger =
      deps.logger ??
      createLogger({ service_name: DEFAULTS.serviceName, version: DEFAULTS.serviceVersion });

    const parsed = SamplerOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const error = new InvalidParameterError(issue?.message ?? 'Invalid options');
      this.logger.error({ err: error.toJSON(), field: issue?.path.join('.') }, error.message);
      throw error;
    }
    this.options = parsed.data;

    if (!fs.existsSync(this.options.inputFile)) {
      const error = new InputFileNotFoundError(this.options.inputFile);
      this.logger.error({ err: error.toJSON() }, error.message);
      throw error;
    }

    this.encoding = this.options.encoding;
    this.generator = deps.generator ?? createFakerGenerator(this.options.syntheticSeed);
  }

  /**
   * Loads the input and checks that every target column exists
   */
  loadData(): Table {
    let table: Table;
    try {
      if (this.encoding === undefined) {
        this.encoding = detectEncoding(this.options.inputFile);
        this.logger.debug({ encoding: this.encoding }, 'Detected input encoding');
      }

      table = loadTable(this.options.inputFile, {
        encoding: this.encoding,
        delimiter: this.options.delimiter,
        header: this.options.header,
      });
    } catch (err) {
      const error = new DataLoadError(errorMessage(err), err);
      this.logger.error({ err: error.toJSON(), file: this.options.inputFile }, error.message);
      throw error;
    }

    for (const column of this.options.columnsToAnonymize) {
      if (!table.columns.includes(column)) {
        const error = new ColumnNotFoundError(column);
        this.logger.error({ err: error.toJSON(), columns: table.columns }, error.message);
        throw error;
      }
    }

    this.logger.debug(
      { rows: table.rows.length, columns: table.columns.length },
      'Loaded input table'
    );
    this.data = table;
    return table;
  }

  /**
   * Samples the loaded table and replaces the target columns
   */
  anonymizeData(): Table {
    let anonymized: Table;
    try {
      if (!this.data) {
        throw new Error('no data loaded');
      }

      const sampled = sampleRows(this.data, this.options.sampleSize, this.options.samplingSeed);
      anonymized = anonymizeColumns(sampled, this.options.columnsToAnonymize, this.generator);
    } catch (err) {
      const error = new AnonymizationError(errorMessage(err), err);
      this.logger.error({ err: error.toJSON() }, error.message);
      throw error;
    }

    this.logger.debug({ rows: anonymized.rows.length }, 'Sampled and anonymized rows');
    this.anonymizedData = anonymized;
    return anonymized;
  }

  /**
   * Writes the anonymized table to the output path
   */
  saveData(): void {
    try {
      if (!this.anonymizedData) {
        throw new Error('no anonymized data to save');
      }
      saveTable(this.anonymizedData, this.options.outputFile);
    } catch (err) {
      const error = new DataSaveError(errorMessage(err), err);
      this.logger.error({ err: error.toJSON(), file: this.options.outputFile }, error.message);
      throw error;
    }
  }

  /**
   * Runs every step in order, stopping at the first failure
   */
  run(): PipelineResult {
    const startTime = Date.now();

    try {
      const input = this.loadData();
      const output = this.anonymizeData();
      this.saveData();

      return {
        success: true,
        summary: {
          inputFile: this.options.inputFile,
          outputFile: this.options.outputFile,
          encoding: this.encoding ?? '',
          inputRows: input.rows.length,
          outputRows: output.rows.length,
          columns: output.columns,
          anonymizedColumns: this.options.columnsToAnonymize,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (err) {
      return { success: false, error: toSamplerError(err) };
    }
  }
}
