/**
 * Mock process executors for testing
 */

import type { HookToolExecResult, HookToolExecutor } from "../../operator/hook-tools";

/**
 * Error shape execFile rejects with when a tool exits non-zero
 */
export interface HookToolExecError extends Error {
  code?: number | string;
  stderr?: string;
}

export interface MockHookToolCall {
  command: string;
  args: string[];
  input?: string;
}

export interface MockHookToolExecutor extends HookToolExecutor {
  calls: MockHookToolCall[];
}

/**
 * Executor answering every call with the same output, or failing with `error`
 */
export function createMockHookToolExecutor(
  response: HookToolExecResult | { error: HookToolExecError } = { stdout: "" },
): MockHookToolExecutor {
  const calls: MockHookToolCall[] = [];
  const executor = async (command: string, args: string[], input?: string) => {
    calls.push(input === undefined ? { command, args } : { command, args, input });
    if ("error" in response) {
      throw response.error;
    }
    return response;
  };
  return Object.assign(executor, { calls });
}

/**
 * Build the error execFile rejects with
 */
export function hookToolExecError(code: number, stderr: string): HookToolExecError {
  const error: HookToolExecError = new Error(`Command failed with exit code ${code}`);
  error.code = code;
  error.stderr = stderr;
  return error;
}
