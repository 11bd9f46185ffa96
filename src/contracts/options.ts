/**
 * Pipeline option contracts
 *
 * @module contracts/options
 */

import { z } from 'zod';
import { DEFAULT_SAMPLING_SEED } from '../sampler/sampler.js';

/**
 * Options accepted by DataSamplingAnonymizer
 */
export const SamplerOptionsSchema = z.object({
  inputFile: z.string().min(1, 'Input file path must not be empty'),
  outputFile: z.string().min(1, 'Output file path must not be empty'),
  sampleSize: z
    .number({ invalid_type_error: 'Sample size must be a number' })
    .finite()
    .min(0, 'Sample size must be between 0.0 and 1.0')
    .max(1, 'Sample size must be between 0.0 and 1.0'),
  columnsToAnonymize: z.array(z.string(), {
    invalid_type_error: 'Columns to anonymize must be a list',
  }),
  header: z.boolean().default(true),
  encoding: z.string().min(1).optional(),
  delimiter: z.string().min(1, 'Delimiter must not be empty').default(','),
  samplingSeed: z.number().int().default(DEFAULT_SAMPLING_SEED),
  syntheticSeed: z.number().int().optional(),
});

/** Options as given by the caller, defaults not yet applied */
export type SamplerOptionsInput = z.input<typeof SamplerOptionsSchema>;

/** Options after validation, defaults applied */
export type SamplerOptions = z.output<typeof SamplerOptionsSchema>;
