/**
 * Script executer
 *
 * Reads a test script line by line, sends commands to the server and
 * records inputs, responses and failures in the execution context.
 * One executer handles one file; included files get their own executer
 * sharing the same context.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { ExecutionContext } from '../core/context.js';
import { isOnErrorPolicy } from '../core/context.js';
import { errorMessage, ExecuterError, NotExistError } from '../core/errors.js';
import type { ResultLog } from '../core/result-log.js';
import { extractReturnCode } from '../output/normalizer.js';
import type { OutputChannel } from '../process/channel.js';
import type {
  InputEntry,
  OutputEntry,
  OutputFormat,
} from '../types/result.js';
import { DEFAULT_READ_TIMEOUT_MS } from '../utils/constants.js';
import {
  extractCommandInfo,
  isBlankLine,
  isLoadTerminator,
  parseComment,
  parseDirective,
  splitContinuation,
} from './parser.js';
import type { Directive } from './types.js';

export interface ExecuterOptions {
  /** First-byte timeout of each response drain */
  readTimeoutMs?: number | undefined;
}

/**
 * Split file content into lines, each keeping its terminator
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function chomp(line: string): string {
  return line.replace(/\r?\n$|\r$/, '');
}

export class Executer {
  private loading = false;
  private pendingCommand = '';
  private currentCommand: string | null = null;
  private outputFormat: OutputFormat | null = null;
  private readonly readTimeoutMs: number;

  constructor(
    private readonly groonga: OutputChannel,
    private readonly context: ExecutionContext,
    private readonly options: ExecuterOptions = {}
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  }

  /**
   * Run a script file and return the context's result log
   *
   * @throws NotExistError when the script is missing
   */
  async execute(scriptPath: string): Promise<ResultLog> {
    if (!fs.existsSync(scriptPath)) {
      throw new NotExistError(scriptPath);
    }

    await this.context.execute(async () => {
      const content = await fs.promises.readFile(scriptPath, 'latin1');
      for (const [index, line] of splitLines(content).entries()) {
        if (this.context.aborted) {
          break;
        }
        try {
          if (this.loading) {
            await this.executeLineOnLoading(line);
          } else {
            await this.executeLineWithContinuationLineSupport(line);
          }
        } catch (error) {
          const lineInfo = `${scriptPath}:${index + 1}:${chomp(line)}`;
          this.logError(`${lineInfo}: ${errorMessage(error)}`);
          if (!this.context.topLevel) {
            throw error;
          }
        }
      }
    });

    return this.context.result;
  }

  private async executeLineOnLoading(line: string): Promise<void> {
    this.logInput(line);
    await this.groonga.write(line);
    if (isLoadTerminator(line)) {
      const currentResult = await this.readOutput();
      if (currentResult !== '') {
        this.loading = false;
        this.logOutput(currentResult);
      }
    }
  }

  private async executeLineWithContinuationLineSupport(
    line: string
  ): Promise<void> {
    const continued = splitContinuation(line);
    if (continued !== null) {
      this.pendingCommand += continued;
      return;
    }

    if (this.pendingCommand === '') {
      await this.executeLine(line);
    } else {
      const command = this.pendingCommand + line;
      this.pendingCommand = '';
      await this.executeLine(command);
    }
  }

  private async executeLine(line: string): Promise<void> {
    if (isBlankLine(line)) {
      return;
    }
    const comment = parseComment(line);
    if (comment !== null) {
      await this.executeComment(comment);
      return;
    }
    await this.executeCommand(line);
  }

  private async executeComment(content: string): Promise<void> {
    const directive = parseDirective(content);
    if (directive) {
      await this.executeDirective(directive);
    }
  }

  private async executeDirective(directive: Directive): Promise<void> {
    switch (directive.type) {
      case 'disable-logging':
        this.context.logging = false;
        break;
      case 'enable-logging':
        this.context.logging = true;
        break;
      case 'include':
        if (directive.path !== '') {
          await this.executeScript(directive.path);
        }
        break;
      case 'on-error':
        if (!isOnErrorPolicy(directive.policy)) {
          throw new ExecuterError(
            `unknown on-error policy: <${directive.policy}>`
          );
        }
        this.context.onError = directive.policy;
        break;
      case 'omit':
        this.context.omit(directive.reason);
        break;
    }
  }

  private async executeScript(scriptPath: string): Promise<void> {
    const executer = new Executer(this.groonga, this.context, this.options);
    const resolved = path.isAbsolute(scriptPath)
      ? scriptPath
      : path.join(this.context.baseDirectory, scriptPath);
    await executer.execute(resolved);
  }

  private async executeCommand(line: string): Promise<void> {
    const { name, outputFormat } = extractCommandInfo(line);
    this.currentCommand = name;
    this.outputFormat = outputFormat;
    if (name === 'load') {
      this.loading = true;
    }
    this.logInput(line);
    await this.groonga.write(line);
    if (!this.loading) {
      this.logOutput(await this.readOutput());
    }
  }

  private readOutput(): Promise<string> {
    return this.groonga.drain(this.readTimeoutMs);
  }

  private log(entry: InputEntry | OutputEntry): void {
    if (!this.context.logging || entry.content === '') {
      return;
    }
    this.context.result.append(entry);
  }

  private logInput(content: string): void {
    this.log({ tag: 'input', content });
  }

  private logOutput(content: string): void {
    this.log({
      tag: 'output',
      content,
      options: { command: this.currentCommand, format: this.outputFormat },
    });
    if (this.outputFormat === 'json') {
      const returnCode = extractReturnCode(content);
      if (returnCode !== null && returnCode !== 0) {
        this.context.error();
      }
    }
  }

  private logError(content: string): void {
    this.context.result.append({ tag: 'error', content });
  }
}
