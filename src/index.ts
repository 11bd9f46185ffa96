/**
 * csv-sampler
 *
 * Seeded row sampling and synthetic-value anonymization for CSV files.
 *
 * @module csv-sampler
 */

export {
  DataSamplingAnonymizer,
  type PipelineDependencies,
  type PipelineResult,
  type RunSummary,
} from './sampler/data-sampling-anonymizer.js';
export {
  anonymizeColumns,
  createFakerGenerator,
  substituteCell,
  type SyntheticGenerator,
} from './sampler/anonymizer.js';
export { detectEncoding, detectBufferEncoding, decodeBuffer } from './sampler/encoding.js';
export { loadTable, parseTable, normalizeHeader, type LoadOptions } from './sampler/loader.js';
export { sampleRows, sampleSize, roundHalfEven, DEFAULT_SAMPLING_SEED } from './sampler/sampler.js';
export { saveTable, serializeTable } from './sampler/writer.js';
export { buildTable, inferColumn, renderCell } from './table/cells.js';
export type { CellValue, CellKind, Table } from './table/types.js';
export {
  SamplerOptionsSchema,
  type SamplerOptions,
  type SamplerOptionsInput,
} from './contracts/options.js';
export * from './runtime/errors.js';
export { loadConfig } from './runtime/config.js';
export { createLogger, type Logger } from './telemetry/logger.js';
export * from './cli/index.js';
