/**
 * Core types for external process execution.
 */

/** Exit code reported when the process did not finish on its own (timeout or cancel) */
export const TIMEOUT_EXIT_CODE = -1;

export interface ExecutionRequest {
  executablePath: string;
  /** Opaque argument string, passed to the OS without a shell */
  arguments: string;
  timeoutSeconds: number;
}

export interface ExecutionResult {
  /** Real exit code, or TIMEOUT_EXIT_CODE when timedOut or cancelled is set */
  exitCode: number;
  standardOutput: string;
  standardError: string;
  timedOut: boolean;
  /** The caller's AbortSignal fired before the process exited */
  cancelled: boolean;
  /** Wall-clock from spawn to finalization, including any kill grace period */
  executionTimeMs: number;
}

/**
 * Anything that can run one external process to completion.
 * ProcessExecutor is the real implementation; tests substitute stubs.
 */
export interface ProcessRunner {
  run(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult>;
}
