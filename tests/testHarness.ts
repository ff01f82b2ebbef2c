export type TestFn = () => void | Promise<void>;

export type TestCase = {
  name: string;
  fn: TestFn;
  /** Fails the test when it has not settled by then. */
  timeoutMs: number;
};

const DEFAULT_TIMEOUT_MS = 10_000;

export const tests: TestCase[] = [];

export const test = (name: string, fn: TestFn, options: { timeoutMs?: number } = {}): void => {
  tests.push({ name, fn, timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS });
};
