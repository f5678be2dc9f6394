/**
 * Result log entry types
 */

/**
 * Output formats the server can be asked for.
 * Anything else on --output_format is recorded as null.
 */
export type OutputFormat =
  | 'json'
  | 'xml'
  | 'tsv'
  | 'msgpack'
  | 'groonga-command';

const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'json',
  'xml',
  'tsv',
  'msgpack',
  'groonga-command',
];

export function parseOutputFormat(
  value: string | undefined
): OutputFormat | null {
  const found = OUTPUT_FORMATS.find((format) => format === value);
  return found ?? null;
}

export interface OutputOptions {
  command: string | null;
  format: OutputFormat | null;
}

/** A line sent to the server, terminator included */
export interface InputEntry {
  tag: 'input';
  content: string;
}

/** A drained server response */
export interface OutputEntry {
  tag: 'output';
  content: string;
  options: OutputOptions;
}

/** A failure raised while interpreting a script line */
export interface ErrorEntry {
  tag: 'error';
  content: string;
}

/**
 * One result log entry.
 * Content is a byte string held as latin1, one char per byte.
 */
export type ResultEntry = InputEntry | OutputEntry | ErrorEntry;

export type ResultTag = ResultEntry['tag'];
