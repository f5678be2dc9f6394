/**
 * Request/response byte channel to a server process
 *
 * Responses are not framed, so a response is whatever arrives within the
 * first-byte timeout plus whatever is already buffered behind it.
 */

import type { Readable, Writable } from 'stream';

import { DEFAULT_READ_TIMEOUT_MS } from '../utils/constants.js';

export class OutputChannel {
  private readonly pending: Buffer[] = [];
  private ended = false;
  private waiter: (() => void) | null = null;

  constructor(
    private readonly requests: Writable,
    responses: Readable
  ) {
    responses.on('data', (chunk: Buffer | string) => {
      this.pending.push(
        typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk
      );
      this.wake();
    });
    // A dead peer shows up as empty drains, not as a failure here
    const markEnded = (): void => {
      this.ended = true;
      this.wake();
    };
    responses.on('end', markEnded);
    responses.on('close', markEnded);
    responses.on('error', markEnded);
  }

  /**
   * Send raw bytes and resolve once the stream has taken them
   */
  write(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.requests.write(Buffer.from(data, 'latin1'), (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Collect one response.
   * Waits up to `firstTimeoutMs` for the first bytes, then keeps taking
   * already-arrived bytes until a zero-timeout poll comes back empty.
   */
  async drain(
    firstTimeoutMs: number = DEFAULT_READ_TIMEOUT_MS
  ): Promise<string> {
    const collected: Buffer[] = [];
    let timeoutMs = firstTimeoutMs;

    while (await this.waitReadable(timeoutMs)) {
      if (this.pending.length === 0) {
        break; // end of input
      }
      collected.push(...this.pending.splice(0));
      timeoutMs = 0;
    }

    return Buffer.concat(collected).toString('latin1');
  }

  /**
   * End the request stream
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.requests.writableEnded) {
        resolve();
        return;
      }
      this.requests.end(() => resolve());
    });
  }

  private get readable(): boolean {
    return this.pending.length > 0 || this.ended;
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private waitReadable(timeoutMs: number): Promise<boolean> {
    if (this.readable) {
      return Promise.resolve(true);
    }
    if (timeoutMs <= 0) {
      // One event-loop turn lets bytes already in the pipe arrive
      return new Promise((resolve) => {
        setImmediate(() => resolve(this.readable));
      });
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(this.readable);
      }, timeoutMs);
      this.waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
    });
  }
}
