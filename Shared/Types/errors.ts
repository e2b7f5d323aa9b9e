/**
 * Base error class for the conversion services.
 * Carries a stable machine-readable code next to the message.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Startup configuration errors (invalid env values, tool not found, no scratch space).
 * Always fatal: the service refuses to start.
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The external process could not be started or monitored.
 * Distinct from a process that ran and exited non-zero.
 */
export class ProcessExecutionError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROCESS_EXECUTION_ERROR', details);
    this.name = 'ProcessExecutionError';
  }
}

/**
 * Scratch file I/O failures (write or read of a conversion's temp files)
 */
export class ScratchFileError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'SCRATCH_FILE_ERROR', details);
    this.name = 'ScratchFileError';
  }
}
