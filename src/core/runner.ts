/**
 * Runs one test script against a fresh server and checks its result
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { Logger } from '../output/logger.js';
import { normalizeResult } from '../output/normalizer.js';
import type { OutputChannel } from '../process/channel.js';
import { withGroonga } from '../process/groonga.js';
import { Executer } from '../script/executer.js';
import type { Reporter } from '../types/reporter.js';
import type { TestOutcome, TesterConfig } from '../types/tester.js';
import { ExecutionContext } from './context.js';
import type { ResultLog } from './result-log.js';

/**
 * Start a server on `dbPath` and run `fn` against it
 */
export type ServerLauncher = (
  dbPath: string,
  fn: (channel: OutputChannel) => Promise<ResultLog>
) => Promise<ResultLog>;

export interface RunnerContext {
  config: TesterConfig;
  reporter: Reporter;
  logger: Logger;
  /** Defaults to spawning the configured groonga command */
  launchServer?: ServerLauncher | undefined;
}

/**
 * Path of a file next to the script with its extension swapped, null
 * when the script has no extension or already has this one
 */
export function relatedFilePath(
  scriptPath: string,
  extension: string
): string | null {
  const currentExtension = path.extname(scriptPath);
  if (currentExtension === '') {
    return null;
  }
  const related =
    scriptPath.slice(0, -currentExtension.length) + `.${extension}`;
  return related === scriptPath ? null : related;
}

async function readExpectedResult(scriptPath: string): Promise<string | null> {
  const resultPath = relatedFilePath(scriptPath, 'expected');
  if (resultPath === null || !fs.existsSync(resultPath)) {
    return null;
  }
  return fs.promises.readFile(resultPath, 'latin1');
}

async function removeRejectFile(scriptPath: string): Promise<void> {
  const rejectPath = relatedFilePath(scriptPath, 'reject');
  if (rejectPath !== null) {
    await fs.promises.rm(rejectPath, { force: true });
  }
}

async function outputActualResult(
  scriptPath: string,
  actualResult: string,
  suffix: 'reject' | 'actual'
): Promise<void> {
  const resultPath = relatedFilePath(scriptPath, suffix);
  if (resultPath !== null) {
    await fs.promises.writeFile(resultPath, actualResult, 'latin1');
  }
}

async function withTemporaryDirectory<T>(
  fn: (directory: string) => Promise<T>
): Promise<T> {
  const directory = await fs.promises.mkdtemp(
    path.join(os.tmpdir(), 'grntest-')
  );
  try {
    return await fn(directory);
  } finally {
    await fs.promises.rm(directory, { recursive: true, force: true });
  }
}

async function runGroongaScript(
  scriptPath: string,
  context: RunnerContext
): Promise<{ result: ResultLog; executionContext: ExecutionContext }> {
  const { config, logger } = context;
  const launchServer: ServerLauncher =
    context.launchServer ??
    ((dbPath, fn) =>
      withGroonga({ command: config.groonga, dbPath, logger }, fn));

  return withTemporaryDirectory(async (directory) => {
    const executionContext = new ExecutionContext({
      baseDirectory: config.baseDirectory,
    });
    const result = await launchServer(path.join(directory, 'db'), (channel) => {
      const executer = new Executer(channel, executionContext, {
        readTimeoutMs: config.readTimeoutMs,
      });
      return executer.execute(scriptPath);
    });
    return { result, executionContext };
  });
}

/**
 * Run one script and report pass, fail, not checked or omitted
 */
export async function runTest(
  scriptPath: string,
  context: RunnerContext
): Promise<TestOutcome> {
  const { reporter, logger } = context;
  const startedAt = Date.now();

  reporter.startTest(scriptPath);
  logger.logEvent({ event: 'test_start', path: scriptPath });

  const { result, executionContext } = await runGroongaScript(
    scriptPath,
    context
  );

  let outcome: TestOutcome;
  if (executionContext.omitted) {
    reporter.omitTest(executionContext.omissionReason);
    outcome = 'omitted';
  } else {
    const actualResult = normalizeResult(result);
    const expectedResult = await readExpectedResult(scriptPath);
    if (expectedResult === null) {
      reporter.noCheckTest(actualResult);
      await outputActualResult(scriptPath, actualResult, 'actual');
      outcome = 'not checked';
    } else if (actualResult === expectedResult) {
      reporter.passTest();
      await removeRejectFile(scriptPath);
      outcome = 'pass';
    } else {
      await reporter.failTest(expectedResult, actualResult);
      await outputActualResult(scriptPath, actualResult, 'reject');
      outcome = 'fail';
    }
  }

  reporter.finishTest();
  logger.logEvent({
    event: 'test_result',
    path: scriptPath,
    outcome,
    durationMs: Date.now() - startedAt,
  });
  return outcome;
}
