/**
 * Reporter contract consumed by the test runner
 */

export interface Reporter {
  start(): void;
  startTest(scriptPath: string): void;
  passTest(): void;
  failTest(expected: string, actual: string): Promise<void>;
  noCheckTest(actual: string): void;
  omitTest(reason: string): void;
  finishTest(): void;
  finish(): void;
}
