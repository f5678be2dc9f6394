/**
 * Tester configuration and outcome types
 */

import { DEFAULT_READ_TIMEOUT_MS } from '../utils/constants.js';

/**
 * Outcome of a single test script
 */
export type TestOutcome = 'pass' | 'fail' | 'not checked' | 'omitted';

/**
 * Tester configuration
 */
export interface TesterConfig {
  /** Server command, started as `<groonga> -n <db>` */
  groonga: string;
  /** Base for relative include paths */
  baseDirectory: string;
  diff: string;
  diffOptions: string[];
  /** Directory for the file log, null disables it */
  logDir: string | null;
  /** First-byte timeout of each response drain */
  readTimeoutMs: number;
}

/**
 * Default tester configuration (diff detection applied separately)
 */
export const DEFAULT_CONFIG: TesterConfig = {
  groonga: 'groonga',
  baseDirectory: '.',
  diff: 'diff',
  diffOptions: ['-u'],
  logDir: null,
  readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  config: Partial<TesterConfig>;
  /** Test files or directories */
  targets: string[];
}
