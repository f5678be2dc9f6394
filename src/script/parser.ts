/**
 * Script line classification
 *
 * Script syntax, one statement per line:
 * - blank lines are ignored
 * - `# ...` is a comment; some comment bodies are directives:
 *   disable-logging, enable-logging, include <path>,
 *   on-error <default|omit>, omit [reason]
 * - a trailing backslash joins the line with the next one
 * - anything else is a server command
 */

import { parse } from 'shell-quote';

import { type OutputFormat, parseOutputFormat } from '../types/result.js';
import type { CommandInfo, Directive } from './types.js';

const OUTPUT_FORMAT_PATTERN = /^--output_format(?:=(.+))?$/s;

/**
 * Check if a line holds nothing but whitespace
 */
export function isBlankLine(line: string): boolean {
  return /^\s*$/.test(line);
}

/**
 * Body of a comment line (text after the first `#`), or null
 */
export function parseComment(line: string): string | null {
  const match = /^\s*#/.exec(line);
  return match ? line.slice(match[0].length) : null;
}

/**
 * Recognize a directive in a comment body; plain comments give null
 */
export function parseDirective(content: string): Directive | null {
  const body = content.trim();

  if (body === 'disable-logging') {
    return { type: 'disable-logging' };
  }
  if (body === 'enable-logging') {
    return { type: 'enable-logging' };
  }
  if (body === 'omit') {
    return { type: 'omit', reason: '' };
  }

  const argumentMatch = /^(include|on-error|omit)\s+/.exec(body);
  if (!argumentMatch) {
    return null;
  }
  const argument = body.slice(argumentMatch[0].length).trim();
  switch (argumentMatch[1]) {
    case 'include':
      return { type: 'include', path: argument };
    case 'on-error':
      return { type: 'on-error', policy: argument };
    default:
      return { type: 'omit', reason: argument };
  }
}

/**
 * Text before a trailing continuation backslash, or null when the line
 * does not continue. The line terminator goes with the backslash.
 */
export function splitContinuation(line: string): string | null {
  const match = /\\\n?$/.exec(line);
  return match ? line.slice(0, match.index) : null;
}

/**
 * A load payload line that may close the payload
 */
export function isLoadTerminator(line: string): boolean {
  return /\]\n?$/.test(line);
}

/**
 * Escape every `#` outside quotes so shell-quote reads it as part of a
 * word instead of the start of a comment
 */
function escapeHashes(command: string): string {
  let quote: string | null = null;
  let escaped = '';
  for (let i = 0; i < command.length; i++) {
    const c = command.charAt(i);
    if (c === '\\' && quote !== "'") {
      escaped += c + command.charAt(i + 1);
      i++;
    } else if (quote === null && c === '#') {
      escaped += '\\#';
    } else {
      if (c === quote) {
        quote = null;
      } else if (quote === null && (c === "'" || c === '"')) {
        quote = c;
      }
      escaped += c;
    }
  }
  return escaped;
}

/**
 * Split a command line into words with shell quoting rules.
 * Variables are not expanded and operators stay literal words.
 */
export function splitCommandWords(line: string): string[] {
  const command = escapeHashes(line.replace(/\r?\n$/, ''));
  return parse(command, (key) => `$${key}`).map((entry) => {
    if (typeof entry === 'string') {
      return entry;
    }
    if ('comment' in entry) {
      return `#${entry.comment}`;
    }
    if ('pattern' in entry) {
      return entry.pattern;
    }
    return entry.op;
  });
}

function detectOutputFormat(words: string[]): OutputFormat | null {
  for (const [i, word] of words.entries()) {
    const match = OUTPUT_FORMAT_PATTERN.exec(word);
    if (match) {
      return parseOutputFormat(match[1] ?? words[i + 1]);
    }
  }
  return 'json';
}

/**
 * Command name and the format its response will come back in
 */
export function extractCommandInfo(line: string): CommandInfo {
  const [name, ...words] = splitCommandWords(line);
  const outputFormat =
    name === 'dump' ? 'groonga-command' : detectOutputFormat(words);
  return { name: name ?? null, outputFormat };
}
