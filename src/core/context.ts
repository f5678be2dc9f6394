/**
 * State shared by a top-level script and every script it includes
 */

import { ExecuterError } from './errors.js';
import { ResultLog } from './result-log.js';

/**
 * What to do when a command reports a failure
 * - default: record it and keep going
 * - omit: stop the whole run and report it as omitted
 */
export type OnErrorPolicy = 'default' | 'omit';

export const ON_ERROR_POLICIES: readonly OnErrorPolicy[] = ['default', 'omit'];

export function isOnErrorPolicy(value: string): value is OnErrorPolicy {
  return ON_ERROR_POLICIES.some((policy) => policy === value);
}

export interface ExecutionContextOptions {
  baseDirectory?: string | undefined;
  logging?: boolean | undefined;
  onError?: OnErrorPolicy | undefined;
}

export class ExecutionContext {
  logging: boolean;
  baseDirectory: string;
  onError: OnErrorPolicy;
  readonly result = new ResultLog();

  private nNested = 0;
  private omittedRun = false;
  private omitReason = '';
  private abortController: AbortController | null = null;

  constructor(options: ExecutionContextOptions = {}) {
    this.logging = options.logging ?? true;
    this.baseDirectory = options.baseDirectory ?? '.';
    this.onError = options.onError ?? 'default';
  }

  /**
   * Run `body` one nesting level deeper.
   * The outermost call establishes the run's abort token.
   */
  async execute<T>(body: () => Promise<T>): Promise<T> {
    this.nNested++;
    if (this.nNested === 1) {
      this.abortController = new AbortController();
    }
    try {
      return await body();
    } finally {
      this.nNested--;
    }
  }

  get nestingDepth(): number {
    return this.nNested;
  }

  get topLevel(): boolean {
    return this.nNested === 1;
  }

  get omitted(): boolean {
    return this.omittedRun;
  }

  get omissionReason(): string {
    return this.omitReason;
  }

  /** True once the current run's abort token has been tripped */
  get aborted(): boolean {
    return this.abortController?.signal.aborted ?? false;
  }

  error(): void {
    switch (this.onError) {
      case 'omit':
        this.omit();
        break;
      case 'default':
        break;
    }
  }

  omit(reason = ''): void {
    this.omittedRun = true;
    this.omitReason = reason;
    this.abort();
  }

  abort(): void {
    if (this.nNested === 0 || !this.abortController) {
      throw new ExecuterError('abort requested outside of a script run');
    }
    this.abortController.abort();
  }
}
