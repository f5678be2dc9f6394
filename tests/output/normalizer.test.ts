import { stringify } from 'lossless-json';
import { describe, expect, it } from 'vitest';

import { ResultLog } from '../../src/core/result-log.js';
import {
  extractReturnCode,
  normalizeOutput,
  normalizeResult,
  normalizeStatus,
} from '../../src/output/normalizer.js';

describe('normalizeStatus', () => {
  it('zeroes timing of a successful status', () => {
    const status = normalizeStatus([0, 1700000000.0, 0.012]);

    expect(stringify(status)).toBe('[0,0.0,0.0]');
  });

  it('keeps the message of a failed status and drops the backtrace', () => {
    const status = normalizeStatus([
      1,
      1700000000.0,
      0.012,
      'boom',
      '<backtrace>',
    ]);

    expect(stringify(status)).toBe('[[1,0.0,0.0],"boom"]');
  });

  it('uses null when a failed status has no message', () => {
    const status = normalizeStatus([-22, 1.0, 0.1]);

    expect(stringify(status)).toBe('[[-22,0.0,0.0],null]');
  });
});

describe('normalizeOutput', () => {
  describe('json', () => {
    it('replaces a successful status', () => {
      expect(normalizeOutput('[[0,1700000000.0,0.012],true]', 'json')).toBe(
        '[[0,0.0,0.0],true]\n'
      );
    });

    it('replaces a failed status', () => {
      const content =
        '[[-22,1700000000.0,0.012,"invalid name",[["grn_obj_open","db.c",1]]],false]';

      expect(normalizeOutput(content, 'json')).toBe(
        '[[[-22,0.0,0.0],"invalid name"],false]\n'
      );
    });

    it('leaves normalized output unchanged', () => {
      const normalized = '[[0,0.0,0.0],{"n_hits":1.50,"score":10}]';

      expect(normalizeOutput(normalized, 'json')).toBe(`${normalized}\n`);
    });

    it('keeps a 79 byte result compact', () => {
      const value = 'a'.repeat(63);

      const output = normalizeOutput(`[[0,1.5,0.2],"${value}"]`, 'json');

      expect(output).toBe(`[[0,0.0,0.0],"${value}"]\n`);
      expect(output.length - 1).toBe(79);
    });

    it('pretty prints an 80 byte result', () => {
      const value = 'a'.repeat(64);

      expect(normalizeOutput(`[[0,1.5,0.2],"${value}"]`, 'json')).toBe(
        `[\n  [\n    0,\n    0.0,\n    0.0\n  ],\n  "${value}"\n]\n`
      );
    });

    it('keeps non-ASCII bytes', () => {
      expect(normalizeOutput('[[0,1.0,0.1],"\xe3\x81\x82"]', 'json')).toBe(
        '[[0,0.0,0.0],"\xe3\x81\x82"]\n'
      );
    });

    it('writes escaped characters as UTF-8 bytes', () => {
      expect(normalizeOutput('[[0,1.0,0.1],"\\u3042"]', 'json')).toBe(
        '[[0,0.0,0.0],"\xe3\x81\x82"]\n'
      );
    });

    it('tells escaped characters sharing a low byte apart', () => {
      expect(normalizeOutput('[[0,1.0,0.1],"\\u0142"]', 'json')).not.toBe(
        normalizeOutput('[[0,1.0,0.1],"\\u3042"]', 'json')
      );
    });

    it('measures the width in bytes', () => {
      // 22 three-byte characters: 38 chars, 82 bytes
      const value = '\\u3042'.repeat(22);
      const bytes = '\xe3\x81\x82'.repeat(22);

      expect(normalizeOutput(`[[0,1.5,0.2],"${value}"]`, 'json')).toBe(
        `[\n  [\n    0,\n    0.0,\n    0.0\n  ],\n  "${bytes}"\n]\n`
      );
    });

    it('normalizes a response that is not valid UTF-8', () => {
      expect(
        normalizeOutput('[[0,1.0,0.1],"\xff",["\\u3042"]]', 'json')
      ).toBe('[[0,0.0,0.0],"\xff",["\xe3\x81\x82"]]\n');
    });

    it('passes through a response that is not JSON', () => {
      expect(normalizeOutput('oops', 'json')).toBe('oops\n');
    });

    it('passes through a response without a status header', () => {
      expect(normalizeOutput('[1,2]', 'json')).toBe('[1,2]\n');
    });
  });

  describe('other formats', () => {
    it('only appends a newline', () => {
      expect(normalizeOutput('<RESULT CODE="0"/>', 'xml')).toBe(
        '<RESULT CODE="0"/>\n'
      );
      expect(normalizeOutput('table_create Users', 'groonga-command')).toBe(
        'table_create Users\n'
      );
      expect(normalizeOutput('raw', null)).toBe('raw\n');
    });
  });
});

describe('normalizeResult', () => {
  it('concatenates entries in order', () => {
    const log = new ResultLog();
    log.append({ tag: 'input', content: 'status\n' });
    log.append({
      tag: 'output',
      content: '[[0,1.0,0.5],{"alloc_count":3}]',
      options: { command: 'status', format: 'json' },
    });
    log.append({ tag: 'error', content: 'test.test:2:boom: failed' });
    log.append({ tag: 'input', content: 'dump\n' });
    log.append({
      tag: 'output',
      content: 'table_create Users TABLE_NO_KEY',
      options: { command: 'dump', format: 'groonga-command' },
    });

    expect(normalizeResult(log)).toBe(
      'status\n' +
        '[[0,0.0,0.0],{"alloc_count":3}]\n' +
        'test.test:2:boom: failed\n' +
        'dump\n' +
        'table_create Users TABLE_NO_KEY\n'
    );
  });

  it('returns an empty string for an empty log', () => {
    expect(normalizeResult(new ResultLog())).toBe('');
  });
});

describe('extractReturnCode', () => {
  it('reads the return code of a status header', () => {
    expect(extractReturnCode('[[-22,1.0,0.1,"invalid"],false]')).toBe(-22);
    expect(extractReturnCode('[[0,1.0,0.1],true]')).toBe(0);
  });

  it('returns null without a status header', () => {
    expect(extractReturnCode('table_create Users')).toBeNull();
    expect(extractReturnCode('[1]')).toBeNull();
  });
});
