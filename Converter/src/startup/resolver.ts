/**
 * Locates the Ghostscript executable once at startup.
 *
 * First existing candidate wins:
 *   1. the configured path
 *   2. the version-templated install path
 *   3. the platform's fallback install path
 *   4. the first line of `where`/`which` output that exists on disk
 *
 * Nothing found means the service must not start.
 */

import { existsSync } from 'node:fs';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { ConfigurationError } from '@pdfa/shared/Types/errors.js';
import type { ResolvedToolConfig, ServiceSettings } from '../config.js';
import { createCommandRunner, type CommandRunnerFn } from '../executor/command-runner.js';

const FALLBACK_VERSION = '10.06.0';

export interface ToolLocationDefaults {
  pathTemplate: string;
  fallbackPath: string;
  binaryName: string;
  searchCommand: string;
}

export interface ResolverDeps {
  platform?: NodeJS.Platform;
  fileExists?: (filePath: string) => boolean;
  runCommand?: CommandRunnerFn;
  logger?: Logger;
}

export function templatePath(template: string, version: string): string {
  return template.split('{version}').join(version);
}

export function platformDefaults(platform: NodeJS.Platform): ToolLocationDefaults {
  if (platform === 'win32') {
    const pathTemplate = 'C:\\Program Files\\gs\\gs{version}\\bin\\gswin64c.exe';
    return {
      pathTemplate,
      fallbackPath: templatePath(pathTemplate, FALLBACK_VERSION),
      binaryName: 'gswin64c.exe',
      searchCommand: 'where',
    };
  }
  return {
    pathTemplate: '/usr/local/ghostscript/gs{version}/bin/gs',
    fallbackPath: '/usr/bin/gs',
    binaryName: 'gs',
    searchCommand: 'which',
  };
}

/**
 * Walk the candidates in order and return the first path that exists.
 * Throws ConfigurationError listing everything that was checked.
 */
export async function locateExecutable(
  settings: Pick<ServiceSettings, 'executablePath' | 'version' | 'pathTemplate'>,
  deps: ResolverDeps = {},
): Promise<string> {
  const platform = deps.platform ?? process.platform;
  const fileExists = deps.fileExists ?? existsSync;
  const log = deps.logger ?? new Logger('pdfa:startup');
  const defaults = platformDefaults(platform);
  const checked: string[] = [];

  const accept = (candidate: string, source: string): boolean => {
    checked.push(candidate);
    if (fileExists(candidate)) {
      log.info(`Using Ghostscript from ${source}: ${candidate}`);
      return true;
    }
    log.debug(`Ghostscript not found at ${candidate} (${source})`);
    return false;
  };

  if (settings.executablePath && accept(settings.executablePath, 'configured path')) {
    return settings.executablePath;
  }

  if (settings.version) {
    const versioned = templatePath(settings.pathTemplate ?? defaults.pathTemplate, settings.version);
    if (accept(versioned, `version ${settings.version}`)) return versioned;
  }

  if (accept(defaults.fallbackPath, 'default install path')) {
    return defaults.fallbackPath;
  }

  const runCommand = deps.runCommand ?? createCommandRunner();
  const { exitCode, output } = await runCommand(defaults.searchCommand, defaults.binaryName);
  if (exitCode === 0) {
    const found = output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .find((line) => accept(line, `${defaults.searchCommand} ${defaults.binaryName}`));
    if (found) return found;
  } else {
    log.debug(`${defaults.searchCommand} ${defaults.binaryName} exited with ${exitCode}`, { output: output.trim() });
  }

  throw new ConfigurationError(
    `Ghostscript executable not found. Checked: ${checked.join(', ')}. ` +
      'Set GHOSTSCRIPT_EXECUTABLE_PATH or install Ghostscript.',
    { checked },
  );
}

/**
 * Build the immutable tool configuration the orchestrator runs with.
 */
export async function resolveToolConfig(
  settings: ServiceSettings,
  deps: ResolverDeps = {},
): Promise<ResolvedToolConfig> {
  const executablePath = await locateExecutable(settings, deps);
  return Object.freeze({
    executablePath,
    baseArguments: settings.baseParameters,
    timeoutSeconds: settings.timeoutSeconds,
    tempDirectory: settings.tempDirectory,
  });
}
