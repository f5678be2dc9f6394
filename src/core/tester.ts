/**
 * Runs every test script named by the targets
 */

import * as fs from 'fs';
import * as path from 'path';

import { formatDuration } from '../output/colors.js';
import { TEST_FILE_EXTENSION } from '../utils/constants.js';
import { type RunnerContext, runTest } from './runner.js';

/**
 * All test scripts below `directory`, sorted by path
 */
export async function findTestFiles(directory: string): Promise<string[]> {
  const found: string[] = [];
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findTestFiles(entryPath)));
    } else if (entry.isFile() && entry.name.endsWith(TEST_FILE_EXTENSION)) {
      found.push(entryPath);
    }
  }
  return found.sort();
}

/**
 * Expand targets into script paths; missing targets are skipped
 */
export async function collectTestScripts(targets: string[]): Promise<string[]> {
  const scripts: string[] = [];
  for (const target of targets) {
    if (!fs.existsSync(target)) {
      continue;
    }
    const stat = await fs.promises.stat(target);
    if (stat.isDirectory()) {
      scripts.push(...(await findTestFiles(target)));
    } else {
      scripts.push(target);
    }
  }
  return scripts;
}

/**
 * Run all targets, returning false when any test failed
 */
export async function runTargets(
  targets: string[],
  context: RunnerContext
): Promise<boolean> {
  if (targets.length === 0) {
    return true;
  }

  const { reporter, logger } = context;
  let succeeded = true;
  const startedAt = Date.now();

  reporter.start();
  for (const scriptPath of await collectTestScripts(targets)) {
    const outcome = await runTest(scriptPath, context);
    if (outcome === 'fail') {
      succeeded = false;
    }
  }
  reporter.finish();
  logger.logEvent({
    event: 'run_finish',
    succeeded,
    duration: formatDuration(Date.now() - startedAt),
  });

  return succeeded;
}
