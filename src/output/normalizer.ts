/**
 * Result normalization
 *
 * Turns a result log into one deterministic string: volatile status
 * fields of JSON responses are zeroed and long responses are indented.
 */

import {
  isLosslessNumber,
  LosslessNumber,
  parse,
  stringify,
} from 'lossless-json';

import type { OutputFormat, ResultEntry } from '../types/result.js';
import { MAX_N_COLUMNS } from '../utils/constants.js';

const ZERO_TIME = new LosslessNumber('0.0');

/** Parse a JSON response body, null when it is not a JSON array */
function parseResponse(content: string): unknown[] | null {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch {
    return null;
  }
  return Array.isArray(parsed) ? parsed : null;
}

function toNumber(value: unknown): number | null {
  if (isLosslessNumber(value)) {
    return Number(value.value);
  }
  return typeof value === 'number' ? value : null;
}

/**
 * Zero the timing fields of a status header and drop the backtrace
 * [rc, started, elapsed, message?, backtrace?]
 *   rc == 0: [0, 0.0, 0.0]
 *   rc != 0: [[rc, 0.0, 0.0], message]
 */
export function normalizeStatus(status: readonly unknown[]): unknown[] {
  const [returnCode, , , message] = status;
  if (toNumber(returnCode) === 0) {
    return [new LosslessNumber('0'), ZERO_TIME, ZERO_TIME];
  }
  return [[returnCode ?? null, ZERO_TIME, ZERO_TIME], message ?? null];
}

/**
 * Return code of a JSON response, or null when it has no status header
 */
export function extractReturnCode(content: string): number | null {
  const response = parseResponse(content);
  const status = response?.[0];
  if (!Array.isArray(status)) {
    return null;
  }
  return toNumber(status[0]);
}

/** UTF-8 text of a latin1 byte string, null when the bytes are not UTF-8 */
function decodeUtf8(bytes: string): string | null {
  const buffer = Buffer.from(bytes, 'latin1');
  const text = buffer.toString('utf8');
  return Buffer.from(text, 'utf8').equals(buffer) ? text : null;
}

function encodeUtf8(text: string): string {
  return Buffer.from(text, 'utf8').toString('latin1');
}

/** Encode only the chars a latin1 byte string cannot hold */
function encodeWideChars(text: string): string {
  return text.replace(/[^\x00-\xff]+/g, encodeUtf8);
}

function normalizeJsonOutput(content: string): string | null {
  const text = decodeUtf8(content);
  const response = parseResponse(text ?? content);
  if (!response) {
    return null;
  }
  const [status, ...values] = response;
  if (!Array.isArray(status)) {
    return null;
  }

  // Width is measured in bytes
  const encode = text === null ? encodeWideChars : encodeUtf8;
  const normalized = [normalizeStatus(status), ...values];
  const compact = encode(stringify(normalized) ?? '');
  if (compact.length > MAX_N_COLUMNS) {
    return encode(stringify(normalized, undefined, 2) ?? '');
  }
  return compact;
}

/**
 * Normalize one response body according to its output format
 */
export function normalizeOutput(
  content: string,
  format: OutputFormat | null
): string {
  switch (format) {
    case 'json':
      return `${normalizeJsonOutput(content) ?? content}\n`;
    case 'xml':
    case 'tsv':
    case 'msgpack':
    case 'groonga-command':
    case null:
      return `${content}\n`;
  }
}

/**
 * Concatenate a result log into the string compared with expectations
 */
export function normalizeResult(entries: Iterable<ResultEntry>): string {
  let normalized = '';
  for (const entry of entries) {
    switch (entry.tag) {
      case 'input':
        normalized += entry.content;
        break;
      case 'output':
        normalized += normalizeOutput(entry.content, entry.options.format);
        break;
      case 'error':
        normalized += `${entry.content}\n`;
        break;
      default: {
        const unexpected: never = entry;
        throw new Error(`Unknown result entry: ${JSON.stringify(unexpected)}`);
      }
    }
  }
  return normalized;
}
