/**
 * Errors raised by the script executer
 */

export class ExecuterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExecuterError';
  }
}

/**
 * A top-level or included script that is not on disk
 */
export class NotExistError extends ExecuterError {
  readonly path: string;

  constructor(scriptPath: string) {
    super(`<${scriptPath}> doesn't exist.`);
    this.name = 'NotExistError';
    this.path = scriptPath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
