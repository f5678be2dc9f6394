import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  commandExists,
  detectSuitableDiff,
} from '../../src/utils/commands.js';

describe('commandExists', () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grntest-bin-'));
  });

  afterEach(async () => {
    await fs.promises.rm(binDir, { recursive: true, force: true });
  });

  it('finds an executable on the search path', async () => {
    await fs.promises.writeFile(path.join(binDir, 'cut-diff'), '', {
      mode: 0o755,
    });

    expect(commandExists('cut-diff', binDir)).toBe(true);
  });

  it('ignores files that are not executable', async () => {
    await fs.promises.writeFile(path.join(binDir, 'cut-diff'), '', {
      mode: 0o644,
    });

    expect(commandExists('cut-diff', binDir)).toBe(false);
  });

  it('returns false for an empty search path', () => {
    expect(commandExists('cut-diff', '')).toBe(false);
  });

  it('prefers cut-diff when installed', async () => {
    await fs.promises.writeFile(path.join(binDir, 'cut-diff'), '', {
      mode: 0o755,
    });

    expect(detectSuitableDiff(binDir)).toEqual({
      diff: 'cut-diff',
      diffOptions: ['--context-lines', '10'],
    });
  });

  it('falls back to unified diff', () => {
    expect(detectSuitableDiff(binDir)).toEqual({
      diff: 'diff',
      diffOptions: ['-u'],
    });
  });
});
