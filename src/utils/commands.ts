/**
 * External command lookup
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Check whether an executable named `name` exists on PATH
 */
export function commandExists(
  name: string,
  envPath: string = process.env['PATH'] ?? ''
): boolean {
  return envPath
    .split(path.delimiter)
    .filter((dir) => dir !== '')
    .some((dir) => {
      try {
        fs.accessSync(path.join(dir, name), fs.constants.X_OK);
        return true;
      } catch {
        return false;
      }
    });
}

/**
 * Prefer cut-diff when installed, plain unified diff otherwise
 */
export function detectSuitableDiff(envPath?: string): {
  diff: string;
  diffOptions: string[];
} {
  if (commandExists('cut-diff', envPath)) {
    return { diff: 'cut-diff', diffOptions: ['--context-lines', '10'] };
  }
  return { diff: 'diff', diffOptions: ['-u'] };
}
