/**
 * Server process management
 */

import { type ChildProcess, spawn } from 'child_process';

import type { Logger } from '../output/logger.js';
import { SERVER_EXIT_GRACE_MS } from '../utils/constants.js';
import { OutputChannel } from './channel.js';

export interface GroongaProcessOptions {
  /** Server executable */
  command: string;
  /** Database created by the server with -n */
  dbPath: string;
  cwd?: string | undefined;
  logger: Logger;
}

/**
 * Wait for the child to exit, killing it after a grace period
 */
function waitForExit(child: ChildProcess): Promise<number | null> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve(child.exitCode);
  }
  return new Promise((resolve) => {
    const killTimer = setTimeout(() => {
      child.kill('SIGKILL');
    }, SERVER_EXIT_GRACE_MS);
    child.once('exit', (exitCode: number | null) => {
      clearTimeout(killTimer);
      resolve(exitCode);
    });
  });
}

/**
 * Start `<command> -n <dbPath>`, hand its stdio to `fn` as a channel,
 * and shut the server down however `fn` finishes
 */
export async function withGroonga<T>(
  options: GroongaProcessOptions,
  fn: (channel: OutputChannel) => Promise<T>
): Promise<T> {
  const { command, dbPath, cwd, logger } = options;

  const child = spawn(command, ['-n', dbPath], {
    cwd,
    env: { ...process.env },
    stdio: ['pipe', 'pipe', 'pipe'],
  });

  const spawned = new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', (error: Error) => reject(error));
  });

  child.stderr.on('data', (chunk: Buffer) => {
    logger.logEvent({
      event: 'server_stderr',
      content: chunk.toString('utf8'),
    });
  });
  // Writes after the server died must not crash the tester
  child.stdin.on('error', (error: Error) => {
    logger.logEvent({ event: 'server_stdin_error', message: error.message });
  });

  await spawned;

  const channel = new OutputChannel(child.stdin, child.stdout);
  try {
    return await fn(channel);
  } finally {
    await channel.close();
    const exitCode = await waitForExit(child);
    logger.logEvent({ event: 'server_exit', exitCode });
  }
}
