/**
 * PDF/A Converter: entry point
 *
 * Resolves Ghostscript and scratch space before listening; any startup
 * problem is fatal.
 */

import { createServer, type Server } from 'node:http';
import { loadEnvFile } from '@pdfa/shared/Utils/env.js';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { loadConfig } from './config.js';
import { resolveToolConfig } from './startup/resolver.js';
import { TempFileManager } from './files/temp-file-manager.js';
import { ProcessExecutor } from './executor/process-executor.js';
import { ConversionOrchestrator } from './conversion/orchestrator.js';
import { createApp } from './http/app.js';

// Before the first logger reads LOG_LEVEL
loadEnvFile(import.meta.url);

const logger = new Logger('pdfa');

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

async function main() {
  const settings = loadConfig();
  const toolConfig = await resolveToolConfig(settings, { logger: logger.child('startup') });
  const files = TempFileManager.create(toolConfig.tempDirectory, logger.child('scratch'));

  const converter = new ConversionOrchestrator({
    config: toolConfig,
    files,
    runner: new ProcessExecutor({ logger: logger.child('executor') }),
    logger: logger.child('conversion'),
  });

  const app = createApp({ converter, logger, maxInputBytes: settings.maxInputBytes });

  // Ghostscript on a large document can run for minutes; the tool timeout bounds the request instead
  const server = createServer(app);
  server.requestTimeout = 0;
  server.headersTimeout = 60_000;

  await listen(server, settings.port, settings.host);
  logger.info(`PDF/A converter listening on http://${settings.host}:${settings.port}`);
  logger.info(`Ghostscript: ${toolConfig.executablePath}`);
  logger.info(`Scratch: ${toolConfig.tempDirectory}`);
  logger.info(`Timeout: ${toolConfig.timeoutSeconds}s`);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((err) => {
      if (err) {
        logger.error('Error while closing server', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
