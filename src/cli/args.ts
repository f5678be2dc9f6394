/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import type { ParsedArgs, TesterConfig } from '../types/tester.js';
import { MS_PER_SECOND } from '../utils/constants.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE = 'Usage: grntest [options] TEST_FILE_OR_DIRECTORY...';

const VALUE_OPTIONS = [
  '--groonga',
  '--base-directory',
  '--diff',
  '--diff-option',
  '--log-dir',
  '--read-timeout',
] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((option) => option === name);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    fail(`invalid --read-timeout value '${value}'`);
  }
  return Math.round(seconds * MS_PER_SECOND);
}

/**
 * Parse CLI arguments into config overrides and test targets
 */
export function parseArgs(args: string[]): ParsedArgs {
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const config: Partial<TesterConfig> = {};
  const targets: string[] = [];
  let diffOptionSpecified = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      targets.push(arg);
      continue;
    }

    const equalIndex = arg.indexOf('=');
    const name = equalIndex === -1 ? arg : arg.slice(0, equalIndex);
    if (!isValueOption(name)) {
      fail(`unknown option '${arg}'`);
    }

    let value: string;
    if (equalIndex === -1) {
      const next = args[++i];
      if (next === undefined) {
        fail(`${name} requires a value`);
      }
      value = next;
    } else {
      value = arg.slice(equalIndex + 1);
    }

    switch (name) {
      case '--groonga':
        config.groonga = value;
        break;
      case '--base-directory':
        config.baseDirectory = value;
        break;
      case '--diff':
        config.diff = value;
        config.diffOptions = [];
        break;
      case '--diff-option':
        // The first one replaces the detected defaults
        config.diffOptions = diffOptionSpecified
          ? [...(config.diffOptions ?? []), value]
          : [value];
        diffOptionSpecified = true;
        break;
      case '--log-dir':
        config.logDir = value;
        break;
      case '--read-timeout':
        config.readTimeoutMs = parseSeconds(value);
        break;
    }
  }

  return { config, targets };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
grntest - runs groonga test scripts and compares their results

${USAGE}

Directories are searched recursively for *.test files. For each
FILE.test the result is compared with FILE.expected; a mismatch is
written to FILE.reject, a missing expectation to FILE.actual.

Script syntax:
  COMMAND ARGS...             Send a command to the server
  load ... (multi-line)       Stream a payload until a line ending in ]
  LINE \\                      Continue on the next line
  # disable-logging           Stop recording inputs and outputs
  # enable-logging            Resume recording
  # include PATH              Run another script (relative to base directory)
  # on-error default|omit     What a failing command does to the run
  # omit [REASON]             Stop and report the test as omitted

Options:
  --groonga=COMMAND           Server command (default: groonga)
  --base-directory=DIRECTORY  Base of relative include paths (default: .)
  --diff=DIFF                 Diff command (default: cut-diff or diff)
  --diff-option=OPTION        Diff option, repeatable
  --log-dir=DIRECTORY         Write a log file to DIRECTORY
  --read-timeout=SECONDS      Wait for a response this long (default: 1)
  --version, -V               Show version and exit
  --help, -h                  Show this help and exit
`);
}
