#!/usr/bin/env node
/**
 * grntest - drives a groonga server through test scripts and compares
 * the normalized responses with recorded expectations
 */

import { parseArgs } from './cli/args.js';
import { errorMessage } from './core/errors.js';
import { runTargets } from './core/tester.js';
import { printTester } from './output/colors.js';
import { createLogger } from './output/logger.js';
import { ConsoleReporter } from './output/reporter.js';
import { DEFAULT_CONFIG, type TesterConfig } from './types/tester.js';
import { detectSuitableDiff } from './utils/commands.js';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  const config: TesterConfig = {
    ...DEFAULT_CONFIG,
    ...detectSuitableDiff(),
    ...parsed.config,
  };

  const logger = createLogger(
    config.logDir !== null,
    config.logDir ?? '',
    'grntest'
  );
  if (logger.filePath) {
    printTester(`Log: ${logger.filePath}`);
  }
  logger.logEvent({ event: 'run_start', targets: parsed.targets });

  const reporter = new ConsoleReporter({
    diff: config.diff,
    diffOptions: config.diffOptions,
    color: process.stdout.isTTY,
    logger,
  });

  try {
    const succeeded = await runTargets(parsed.targets, {
      config,
      reporter,
      logger,
    });
    process.exitCode = succeeded ? 0 : 1;
  } finally {
    logger.close();
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
