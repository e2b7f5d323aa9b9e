import { describe, it, expect, vi } from 'vitest';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { ConfigurationError } from '@pdfa/shared/Types/errors.js';
import {
  locateExecutable,
  platformDefaults,
  resolveToolConfig,
  templatePath,
  type ResolverDeps,
} from '../../src/startup/resolver.js';
import { loadConfig } from '../../src/config.js';
import type { CommandRunnerFn } from '../../src/executor/command-runner.js';

const WINDOWS_FALLBACK = 'C:\\Program Files\\gs\\gs10.06.0\\bin\\gswin64c.exe';

function deps(existing: string[], overrides: Partial<ResolverDeps> = {}): ResolverDeps {
  const present = new Set(existing);
  return {
    platform: 'linux',
    fileExists: (filePath) => present.has(filePath),
    runCommand: vi.fn<CommandRunnerFn>(async () => ({ exitCode: 1, output: '' })),
    logger: new Logger('test:startup'),
    ...overrides,
  };
}

describe('templatePath', () => {
  it('should replace every placeholder', () => {
    expect(templatePath('/gs/{version}/gs{version}', '9.56')).toBe('/gs/9.56/gs9.56');
  });
});

describe('platformDefaults', () => {
  it('should use the Windows install layout on win32', () => {
    expect(platformDefaults('win32')).toEqual({
      pathTemplate: 'C:\\Program Files\\gs\\gs{version}\\bin\\gswin64c.exe',
      fallbackPath: WINDOWS_FALLBACK,
      binaryName: 'gswin64c.exe',
      searchCommand: 'where',
    });
  });

  it('should use /usr/bin/gs and which elsewhere', () => {
    expect(platformDefaults('linux')).toEqual({
      pathTemplate: '/usr/local/ghostscript/gs{version}/bin/gs',
      fallbackPath: '/usr/bin/gs',
      binaryName: 'gs',
      searchCommand: 'which',
    });
  });
});

describe('locateExecutable', () => {
  it('should prefer the configured path', async () => {
    const d = deps(['/opt/custom/gs', '/usr/bin/gs']);
    await expect(locateExecutable({ executablePath: '/opt/custom/gs' }, d)).resolves.toBe('/opt/custom/gs');
    expect(d.runCommand).not.toHaveBeenCalled();
  });

  it('should fall through to the version template when the configured path is missing', async () => {
    const path = await locateExecutable(
      { executablePath: '/missing/gs', version: '10.02.1' },
      deps(['/usr/local/ghostscript/gs10.02.1/bin/gs', '/usr/bin/gs']),
    );
    expect(path).toBe('/usr/local/ghostscript/gs10.02.1/bin/gs');
  });

  it('should use a configured path template', async () => {
    const path = await locateExecutable(
      { version: '9.56.1', pathTemplate: '/opt/gs-{version}/gs' },
      deps(['/opt/gs-9.56.1/gs']),
    );
    expect(path).toBe('/opt/gs-9.56.1/gs');
  });

  it('should try the fallback even when a version is configured', async () => {
    const path = await locateExecutable({ version: '10.02.1' }, deps(['/usr/bin/gs']));
    expect(path).toBe('/usr/bin/gs');
  });

  it('should use the Windows fallback on win32', async () => {
    const path = await locateExecutable({}, deps([WINDOWS_FALLBACK], { platform: 'win32' }));
    expect(path).toBe(WINDOWS_FALLBACK);
  });

  it('should take the first existing line of the search command output', async () => {
    const runCommand = vi.fn<CommandRunnerFn>(async () => ({
      exitCode: 0,
      output: 'C:\\stale\\gswin64c.exe\r\nC:\\tools\\gs\\gswin64c.exe\r\n',
    }));

    const path = await locateExecutable(
      {},
      deps(['C:\\tools\\gs\\gswin64c.exe'], { platform: 'win32', runCommand }),
    );

    expect(path).toBe('C:\\tools\\gs\\gswin64c.exe');
    expect(runCommand).toHaveBeenCalledWith('where', 'gswin64c.exe');
  });

  it('should ask which for gs on POSIX', async () => {
    const runCommand = vi.fn<CommandRunnerFn>(async () => ({ exitCode: 0, output: '/snap/bin/gs\n' }));

    await expect(locateExecutable({}, deps(['/snap/bin/gs'], { runCommand }))).resolves.toBe('/snap/bin/gs');
    expect(runCommand).toHaveBeenCalledWith('which', 'gs');
  });

  it('should ignore search output when the command fails', async () => {
    const runCommand = vi.fn<CommandRunnerFn>(async () => ({ exitCode: 1, output: '/usr/bin/gs\n' }));

    await expect(locateExecutable({}, deps(['/usr/bin/gs-other'], { runCommand }))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('should list every checked candidate when nothing is found', async () => {
    const runCommand = vi.fn<CommandRunnerFn>(async () => ({ exitCode: 0, output: '/stale/gs\n' }));

    await expect(
      locateExecutable({ executablePath: '/missing/gs', version: '10.02.1' }, deps([], { runCommand })),
    ).rejects.toThrow(
      'Ghostscript executable not found. Checked: /missing/gs, /usr/local/ghostscript/gs10.02.1/bin/gs, ' +
        '/usr/bin/gs, /stale/gs. Set GHOSTSCRIPT_EXECUTABLE_PATH or install Ghostscript.',
    );
  });
});

describe('resolveToolConfig', () => {
  it('should combine the located path with the loaded settings into a frozen config', async () => {
    const settings = loadConfig({
      GHOSTSCRIPT_EXECUTABLE_PATH: '/opt/gs/bin/gs',
      GHOSTSCRIPT_BASE_PARAMETERS: '-dNOPAUSE',
      GHOSTSCRIPT_TIMEOUT_SECONDS: '120',
      GHOSTSCRIPT_TEMP_DIRECTORY: '/var/tmp/pdfa',
    });

    const config = await resolveToolConfig(settings, deps(['/opt/gs/bin/gs']));

    expect(config).toEqual({
      executablePath: '/opt/gs/bin/gs',
      baseArguments: '-dNOPAUSE',
      timeoutSeconds: 120,
      tempDirectory: settings.tempDirectory,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });
});
