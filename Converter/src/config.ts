/**
 * Converter configuration
 *
 * Zod-validated environment settings. Missing values take their defaults;
 * present but invalid values are fatal at startup.
 */

import { z } from 'zod';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '@pdfa/shared/Types/errors.js';

// ── Defaults ─────────────────────────────────────────────────────────────────

/** PDF/A-1b flag set used when no base parameters are configured */
export const DEFAULT_BASE_PARAMETERS = [
  '-dNOPAUSE -dBATCH -dSAFER',
  '-sDEVICE=pdfwrite -dPDFA=1 -dPDFACompatibilityPolicy=1 -dCompatibilityLevel=1.4',
  '-dEmbedAllFonts=true -dSubsetFonts=true',
  '-sColorConversionStrategy=UseDeviceIndependentColor -sProcessColorModel=DeviceRGB',
  '-dDownsampleColorImages=false -dDownsampleGrayImages=false -dDownsampleMonoImages=false',
  '-dColorImageFilter=/FlateEncode -dGrayImageFilter=/FlateEncode -dMonoImageFilter=/CCITTFaxEncode',
].join(' ');

export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_PORT = 7015;
export const DEFAULT_MAX_INPUT_BYTES = 100 * 1024 * 1024;

// ── Schema ───────────────────────────────────────────────────────────────────

const configSchema = z.object({
  executablePath: z.string().optional(),
  version: z.string().optional(),
  pathTemplate: z
    .string()
    .refine((value) => value.includes('{version}'), 'must contain a {version} placeholder')
    .optional(),
  baseParameters: z.string().default(DEFAULT_BASE_PARAMETERS),
  timeoutSeconds: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
  tempDirectory: z.string().default(join(tmpdir(), 'PdfaConversion')),
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  maxInputBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_INPUT_BYTES),
});

export type ServiceSettings = Readonly<z.infer<typeof configSchema>>;

/** Tool settings after startup resolution; read-only for the process lifetime */
export type ResolvedToolConfig = Readonly<{
  executablePath: string;
  baseArguments: string;
  timeoutSeconds: number;
  tempDirectory: string;
}>;

/** Environment variable behind each setting, for error messages */
const ENV_NAMES: Record<keyof z.infer<typeof configSchema>, string> = {
  executablePath: 'GHOSTSCRIPT_EXECUTABLE_PATH',
  version: 'GHOSTSCRIPT_VERSION',
  pathTemplate: 'GHOSTSCRIPT_PATH_TEMPLATE',
  baseParameters: 'GHOSTSCRIPT_BASE_PARAMETERS',
  timeoutSeconds: 'GHOSTSCRIPT_TIMEOUT_SECONDS',
  tempDirectory: 'GHOSTSCRIPT_TEMP_DIRECTORY',
  host: 'PDFA_HOST',
  port: 'PDFA_PORT',
  maxInputBytes: 'PDFA_MAX_INPUT_BYTES',
};

function isSettingKey(key: unknown): key is keyof typeof ENV_NAMES {
  return typeof key === 'string' && key in ENV_NAMES;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

// ── Loading ──────────────────────────────────────────────────────────────────

/**
 * Parse settings from an environment map. Blank values count as unset.
 * Throws ConfigurationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceSettings {
  const setting = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const raw = {
    executablePath: setting('GHOSTSCRIPT_EXECUTABLE_PATH'),
    version: setting('GHOSTSCRIPT_VERSION'),
    pathTemplate: setting('GHOSTSCRIPT_PATH_TEMPLATE'),
    baseParameters: setting('GHOSTSCRIPT_BASE_PARAMETERS'),
    timeoutSeconds: setting('GHOSTSCRIPT_TIMEOUT_SECONDS') ?? setting('GHOSTSCRIPT_TIMEOUT_IN_SECONDS'),
    tempDirectory: setting('GHOSTSCRIPT_TEMP_DIRECTORY'),
    host: setting('PDFA_HOST'),
    port: setting('PDFA_PORT'),
    maxInputBytes: setting('PDFA_MAX_INPUT_BYTES'),
  };

  // Unset and blank keys are dropped so Zod defaults kick in
  const cleaned = Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path[0];
      const name = isSettingKey(key) ? ENV_NAMES[key] : String(key);
      return `${name}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      issues: result.error.issues,
    });
  }

  return Object.freeze({
    ...result.data,
    tempDirectory: resolve(expandHome(result.data.tempDirectory)),
  });
}
