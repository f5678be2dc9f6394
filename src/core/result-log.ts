/**
 * Append-only log of one script run
 */

import type { ResultEntry } from '../types/result.js';

export class ResultLog implements Iterable<ResultEntry> {
  private readonly items: ResultEntry[] = [];

  append(entry: ResultEntry): void {
    this.items.push(entry);
  }

  get entries(): readonly ResultEntry[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<ResultEntry> {
    return this.items[Symbol.iterator]();
  }
}
