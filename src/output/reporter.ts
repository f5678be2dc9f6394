/**
 * Console reporter: one line per test, diffs for failures, a summary
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { errorMessage } from '../core/errors.js';
import type { Reporter } from '../types/reporter.js';
import type { TestOutcome } from '../types/tester.js';
import { DEFAULT_TERM_WIDTH } from '../utils/constants.js';
import { colorize, type ColorName } from './colors.js';
import type { Logger } from './logger.js';

export interface ReporterOutput {
  write(chunk: string | Uint8Array): unknown;
}

export interface ConsoleReporterOptions {
  diff: string;
  diffOptions: string[];
  output?: ReporterOutput | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  /** Colorize result labels */
  color?: boolean | undefined;
  /** Also receives result and summary lines */
  logger?: Logger | undefined;
}

/**
 * Terminal width from COLUMNS or TERM_WIDTH; 0 (no alignment) when the
 * variable is not an integer
 */
export function guessTermWidth(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env['COLUMNS'] ?? env['TERM_WIDTH'];
  if (raw === undefined) {
    return DEFAULT_TERM_WIDTH;
  }
  return /^\s*[-+]?\d+\s*$/.test(raw) ? Number.parseInt(raw, 10) : 0;
}

/**
 * Format a percentage with at most 4 significant digits
 */
export function formatPassRatio(nPassed: number, nTests: number): string {
  const ratio = nTests === 0 ? 0 : (nPassed / nTests) * 100;
  return `${Number(ratio.toPrecision(4))}%`;
}

const LABEL_COLORS: Record<TestOutcome, ColorName> = {
  pass: 'green',
  fail: 'red',
  'not checked': 'yellow',
  omitted: 'yellow',
};

export class ConsoleReporter implements Reporter {
  private readonly output: ReporterOutput;
  private readonly termWidth: number;
  private readonly color: boolean;
  private currentColumn = 0;
  private testName = '';
  private nTests = 0;
  private nPassedTests = 0;
  private nOmittedTests = 0;
  private readonly failedTests: string[] = [];

  constructor(private readonly options: ConsoleReporterOptions) {
    this.output = options.output ?? process.stdout;
    this.termWidth = guessTermWidth(options.env);
    this.color = options.color ?? false;
  }

  start(): void {
    this.currentColumn = 0;
  }

  startTest(scriptPath: string): void {
    this.testName = path.basename(scriptPath);
    this.print(`  ${this.testName}`);
  }

  passTest(): void {
    this.reportTestResult('pass');
    this.nPassedTests++;
  }

  async failTest(expected: string, actual: string): Promise<void> {
    this.reportTestResult('fail');
    this.puts('='.repeat(Math.max(this.termWidth, 0)));
    await this.reportDiff(expected, actual);
    this.puts('='.repeat(Math.max(this.termWidth, 0)));
    this.failedTests.push(this.testName);
  }

  noCheckTest(actual: string): void {
    this.reportTestResult('not checked');
    this.putsBinary(actual);
  }

  omitTest(reason: string): void {
    this.reportTestResult('omitted');
    if (reason !== '') {
      this.puts(`    ${reason}`);
    }
    this.nOmittedTests++;
  }

  finishTest(): void {
    this.nTests++;
  }

  finish(): void {
    const summary =
      `${this.nTests} tests, ` +
      `${this.nPassedTests} passes, ` +
      `${this.failedTests.length} failures, ` +
      `${this.nOmittedTests} omissions.`;
    const ratio = `${formatPassRatio(this.nPassedTests, this.nTests)} passed.`;
    this.puts();
    this.puts(summary);
    this.puts(ratio);
    this.options.logger?.log(summary);
    this.options.logger?.log(ratio);
  }

  private print(message: string): void {
    this.currentColumn += message.length;
    this.output.write(message);
  }

  private puts(message = ''): void {
    this.currentColumn = 0;
    this.output.write(message.endsWith('\n') ? message : `${message}\n`);
  }

  /** Write a byte string held as latin1 */
  private putsBinary(content: string): void {
    this.currentColumn = 0;
    const terminated = content.endsWith('\n') ? content : `${content}\n`;
    this.output.write(Buffer.from(terminated, 'latin1'));
  }

  private reportTestResult(label: TestOutcome): void {
    const plain = ` [${label}]`;
    const width = this.termWidth > 0 ? this.termWidth - this.currentColumn : 0;
    const padding = ' '.repeat(Math.max(width - plain.length, 0));
    const text = this.color ? colorize(label, LABEL_COLORS[label]) : label;
    this.puts(`${padding} [${text}]`);
    this.options.logger?.log(`${this.testName} [${text}]`);
  }

  private async reportDiff(expected: string, actual: string): Promise<void> {
    const directory = await fs.promises.mkdtemp(
      path.join(os.tmpdir(), 'grntest-diff-')
    );
    try {
      const expectedPath = path.join(directory, 'expected');
      const actualPath = path.join(directory, 'actual');
      await fs.promises.writeFile(expectedPath, expected, 'latin1');
      await fs.promises.writeFile(actualPath, actual, 'latin1');
      const args = [
        ...this.options.diffOptions,
        '--label',
        '(actual)',
        actualPath,
        '--label',
        '(expected)',
        expectedPath,
      ];
      const diffOutput = await runDiff(this.options.diff, args);
      this.output.write(diffOutput);
    } catch (error) {
      this.puts(`diff failed: ${errorMessage(error)}`);
    } finally {
      await fs.promises.rm(directory, { recursive: true, force: true });
    }
  }
}

/**
 * Run the diff command and collect its stdout.
 * Exit status 1 means "files differ" and is not a failure.
 */
function runDiff(command: string, args: string[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });
    child.on('error', reject);
    child.on('close', (exitCode: number | null) => {
      if (exitCode === 0 || exitCode === 1) {
        resolve(Buffer.concat(stdout));
      } else {
        reject(
          new Error(
            `${command} exited with ${exitCode ?? 'signal'}: ${stderr.trim()}`
          )
        );
      }
    });
  });
}
