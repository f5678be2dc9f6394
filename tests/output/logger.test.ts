import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createLogger } from '../../src/output/logger.js';

function closeLogger(logger: ReturnType<typeof createLogger>): Promise<void> {
  return new Promise((resolve) => {
    logger.close();
    // end() flushes asynchronously
    setTimeout(resolve, 50);
  });
}

describe('createLogger', () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grntest-log-'));
  });

  afterEach(async () => {
    await fs.promises.rm(logDir, { recursive: true, force: true });
  });

  it('returns a no-op logger when disabled', () => {
    const logger = createLogger(false, logDir, 'grntest');

    logger.log('ignored');
    logger.logEvent({ event: 'run_start' });
    logger.close();

    expect(logger.filePath).toBeNull();
    expect(fs.readdirSync(logDir)).toEqual([]);
  });

  it('writes plain lines and structured events', async () => {
    const logger = createLogger(true, logDir, 'grntest');

    logger.log('\x1b[32mpass\x1b[0m');
    logger.logEvent({ event: 'test_start', path: 'a.test' });
    await closeLogger(logger);

    const filePath = logger.filePath ?? '';
    expect(path.dirname(filePath)).toBe(logDir);
    expect(path.basename(filePath)).toMatch(/^grntest-.*\.log$/);

    const [plain, json] = fs.readFileSync(filePath, 'utf8').split('\n');
    expect(plain).toBe('pass');
    expect(JSON.parse(json ?? '')).toMatchObject({
      type: 'tester',
      event: 'test_start',
      path: 'a.test',
    });
  });

  it('creates a missing log directory', async () => {
    const nested = path.join(logDir, 'nested', 'logs');
    const logger = createLogger(true, nested, 'grntest');
    await closeLogger(logger);

    expect(fs.existsSync(nested)).toBe(true);
  });
});
