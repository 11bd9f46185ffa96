/**
 * Shared fixtures for the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SyntheticGenerator } from '../src/sampler/anonymizer.js';
import { createLogger, type Logger } from '../src/telemetry/logger.js';

export interface LogRecord {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger writing into an array of parsed JSON lines
 */
export function createCaptureLogger(level: 'debug' | 'info' = 'debug'): {
  logger: Logger;
  records: LogRecord[];
} {
  const records: LogRecord[] = [];
  const logger = createLogger(
    { service_name: 'csv-sampler-test', version: '0.0.0', log_level: level, run_id: 'test-run' },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );
  return { logger, records };
}

/**
 * Predictable generator: Person 1, Person 2, ... and 1, 2, ...
 */
export function createStubGenerator(): SyntheticGenerator {
  let names = 0;
  let numbers = 0;
  return {
    name: () => `Person ${++names}`,
    randomNumber: () => ++numbers,
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'csv-sampler-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFixture(dir: string, name: string, content: string | Buffer): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

/**
 * Output lines without the trailing empty entry
 */
export function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, 'utf-8').split('\n').slice(0, -1);
}
