/**
 * Scratch files for conversions.
 *
 * Every path is `<managed dir>/<uuid><ext>`, so concurrent requests never
 * collide and share the directory without locking. Paths are only reserved;
 * nothing touches the disk until writeBytes.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { ConfigurationError, ScratchFileError } from '@pdfa/shared/Types/errors.js';
import { generateScratchId } from '../utils/id-generator.js';

export class TempFileManager {
  private constructor(
    readonly directory: string,
    private readonly log: Logger,
  ) {}

  /**
   * Create the managed directory (recursively) and return a manager for it.
   * Throws ConfigurationError when the directory cannot be created: the
   * service has no scratch space and must not start.
   */
  static create(directory: string, logger: Logger = new Logger('pdfa:scratch')): TempFileManager {
    try {
      mkdirSync(directory, { recursive: true });
    } catch (error) {
      logger.error(`Failed to create temp directory: ${directory}`, error);
      throw new ConfigurationError(`Failed to create temp directory: ${directory}`, { cause: error });
    }
    logger.info(`Temp directory initialized: ${directory}`);
    return new TempFileManager(directory, logger);
  }

  createScratchPath(extension = '.pdf'): string {
    const filePath = join(this.directory, `${generateScratchId()}${extension}`);
    this.log.debug(`Created temp file path: ${filePath}`);
    return filePath;
  }

  async writeBytes(filePath: string, bytes: Uint8Array): Promise<void> {
    try {
      await writeFile(filePath, bytes);
    } catch (error) {
      this.log.error(`Failed to write bytes to file: ${filePath}`, error);
      throw new ScratchFileError(`Failed to write scratch file: ${filePath}`, { cause: error });
    }
    this.log.debug(`Wrote ${bytes.length} bytes to file: ${filePath}`);
  }

  async readBytes(filePath: string): Promise<Buffer> {
    try {
      const bytes = await readFile(filePath);
      this.log.debug(`Read ${bytes.length} bytes from file: ${filePath}`);
      return bytes;
    } catch (error) {
      this.log.error(`Failed to read bytes from file: ${filePath}`, error);
      throw new ScratchFileError(`Failed to read scratch file: ${filePath}`, { cause: error });
    }
  }

  exists(filePath: string): boolean {
    return existsSync(filePath);
  }

  /** Best-effort removal: failures are logged, never thrown */
  async deleteIfExists(filePath: string): Promise<void> {
    if (!this.exists(filePath)) return;
    try {
      await rm(filePath, { force: true });
      this.log.debug(`Deleted file: ${filePath}`);
    } catch (error) {
      this.log.warn(`Failed to delete file: ${filePath}`, error);
    }
  }
}
