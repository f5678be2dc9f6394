/**
 * Types for parsed script lines
 */

import type { OutputFormat } from '../types/result.js';

/**
 * A comment that changes how the script runs
 */
export type Directive =
  | { type: 'disable-logging' }
  | { type: 'enable-logging' }
  | { type: 'include'; path: string }
  | { type: 'on-error'; policy: string }
  | { type: 'omit'; reason: string };

/**
 * What the executer needs to know about a command line
 */
export interface CommandInfo {
  name: string | null;
  outputFormat: OutputFormat | null;
}
