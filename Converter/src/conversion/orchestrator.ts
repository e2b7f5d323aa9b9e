/**
 * PDF → PDF/A conversion.
 *
 * decode → write input scratch file → run Ghostscript → check output → read
 * and re-encode. Both scratch files are removed on every path, and every
 * failure comes back as a ConversionOutcome rather than an exception.
 */

import { Logger } from '@pdfa/shared/Utils/logger.js';
import type { ResolvedToolConfig } from '../config.js';
import type { TempFileManager } from '../files/temp-file-manager.js';
import type { ExecutionResult, ProcessRunner } from '../executor/types.js';
import { decodeBase64Strict } from './base64.js';
import type { ConversionErrorKind, ConversionFailure, ConversionOutcome, Converter } from './types.js';

export const EMPTY_INPUT_MESSAGE = 'Base64 PDF string cannot be null or empty';
export const INVALID_BASE64_MESSAGE = 'Base64 PDF string has an invalid base64 format';
export const OUTPUT_MISSING_MESSAGE = 'Conversion completed but output file was not created';
export const CANCELLED_MESSAGE = 'Conversion was cancelled';
export const UNEXPECTED_MESSAGE =
  'An unexpected error occurred during conversion. Please try again or contact support.';

/** Scratch file operations the orchestrator depends on */
export type ScratchFiles = Pick<
  TempFileManager,
  'createScratchPath' | 'writeBytes' | 'readBytes' | 'exists' | 'deleteIfExists'
>;

export interface ConversionOrchestratorDeps {
  config: ResolvedToolConfig;
  files: ScratchFiles;
  runner: ProcessRunner;
  logger?: Logger;
}

function failure(kind: ConversionErrorKind, message: string): ConversionFailure {
  return { ok: false, kind, message };
}

/**
 * Append the output and input paths to the configured flags. Output comes
 * before input, both quoted, as Ghostscript's command line expects.
 */
export function buildToolArguments(baseArguments: string, inputPath: string, outputPath: string): string {
  return `${baseArguments.trimEnd()} -sOutputFile="${outputPath}" "${inputPath}"`;
}

export class ConversionOrchestrator implements Converter {
  private readonly config: ResolvedToolConfig;
  private readonly files: ScratchFiles;
  private readonly runner: ProcessRunner;
  private readonly log: Logger;

  constructor(deps: ConversionOrchestratorDeps) {
    this.config = deps.config;
    this.files = deps.files;
    this.runner = deps.runner;
    this.log = deps.logger ?? new Logger('pdfa:conversion');
  }

  async convert(base64Input: string, signal?: AbortSignal): Promise<ConversionOutcome> {
    if (!base64Input) {
      return failure('InvalidInput', EMPTY_INPUT_MESSAGE);
    }

    const pdfBytes = decodeBase64Strict(base64Input);
    if (pdfBytes === null) {
      this.log.warn('Rejected input with invalid base64 format', { length: base64Input.length });
      return failure('InvalidInput', INVALID_BASE64_MESSAGE);
    }

    const inputPath = this.files.createScratchPath('.pdf');
    const outputPath = this.files.createScratchPath('.pdf');

    try {
      this.log.info(`Starting PDF conversion process. Input size: ${Math.floor(pdfBytes.length / 1024)} KB`);
      await this.files.writeBytes(inputPath, pdfBytes);

      const result = await this.runTool(inputPath, outputPath, signal);
      const toolFailure = this.checkResult(result, outputPath);
      if (toolFailure) {
        return toolFailure;
      }

      const convertedBytes = await this.files.readBytes(outputPath);
      this.log.info(
        `PDF conversion completed successfully. Output size: ${Math.floor(convertedBytes.length / 1024)} KB`,
      );
      return { ok: true, outputBytes: convertedBytes, base64Output: convertedBytes.toString('base64') };
    } catch (error) {
      this.log.error('Error during PDF conversion', error);
      return failure('Unexpected', UNEXPECTED_MESSAGE);
    } finally {
      await this.cleanup([inputPath, outputPath]);
    }
  }

  private async runTool(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<ExecutionResult> {
    const { executablePath, baseArguments, timeoutSeconds } = this.config;
    this.log.info(`Executing Ghostscript with timeout: ${timeoutSeconds} seconds`);

    const result = await this.runner.run(
      {
        executablePath,
        arguments: buildToolArguments(baseArguments, inputPath, outputPath),
        timeoutSeconds,
      },
      signal,
    );

    this.log.info(`Ghostscript completed in ${result.executionTimeMs}ms. Exit code: ${result.exitCode}`);
    return result;
  }

  /** Failure for a finished run, or null when the output is ready to read */
  private checkResult(result: ExecutionResult, outputPath: string): ConversionFailure | null {
    // A timed-out exit code is a sentinel; it is never inspected
    if (result.timedOut) {
      return failure(
        'Timeout',
        `Ghostscript conversion exceeded timeout of ${this.config.timeoutSeconds} seconds`,
      );
    }

    if (result.cancelled) {
      return failure('Unexpected', CANCELLED_MESSAGE);
    }

    if (result.exitCode !== 0) {
      const stderr = result.standardError.trim();
      this.log.error(`Ghostscript failed with exit code ${result.exitCode}. Error: ${stderr}`);
      return failure('ToolFailure', `Ghostscript conversion failed with exit code ${result.exitCode}: ${stderr}`);
    }

    if (!this.files.exists(outputPath)) {
      this.log.error('Ghostscript reported success but produced no output file', { outputPath });
      return failure('OutputMissing', OUTPUT_MISSING_MESSAGE);
    }

    if (result.standardOutput.trim()) {
      this.log.debug('Ghostscript output', { output: result.standardOutput });
    }
    return null;
  }

  private async cleanup(paths: string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        await this.files.deleteIfExists(filePath);
      } catch (error) {
        this.log.warn(`Failed to clean up scratch file: ${filePath}`, error);
      }
    }
  }
}
