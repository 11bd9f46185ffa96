#!/usr/bin/env node
/**
 * Executable entry for csv-sampler
 *
 * @module csv-sampler/cli/main
 */

import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
