/**
 * Short-lived helper commands (e.g. `which gs`) run through the same bounded
 * executor as the conversion tool. Failures come back as a non-zero exit code
 * instead of an exception, since callers only probe for an answer.
 */

import { ProcessExecutor } from './process-executor.js';
import { TIMEOUT_EXIT_CODE, type ProcessRunner } from './types.js';

const DEFAULT_COMMAND_TIMEOUT_SECONDS = 30;

export interface CommandResult {
  exitCode: number;
  /** stdout followed by stderr */
  output: string;
}

export type CommandRunnerFn = (
  fileName: string,
  args: string,
  timeoutSeconds?: number,
) => Promise<CommandResult>;

export function createCommandRunner(runner: ProcessRunner = new ProcessExecutor()): CommandRunnerFn {
  return async (fileName, args, timeoutSeconds = DEFAULT_COMMAND_TIMEOUT_SECONDS) => {
    try {
      const result = await runner.run({ executablePath: fileName, arguments: args, timeoutSeconds });
      if (result.timedOut) {
        return {
          exitCode: TIMEOUT_EXIT_CODE,
          output: `Command execution timed out after ${timeoutSeconds} seconds`,
        };
      }
      return { exitCode: result.exitCode, output: result.standardOutput + result.standardError };
    } catch (error) {
      return {
        exitCode: TIMEOUT_EXIT_CODE,
        output: error instanceof Error ? error.message : String(error),
      };
    }
  };
}
