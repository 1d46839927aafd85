import { OcrBatchService } from '@ocr-words/core';
import type { FileSystemPort, OcrEnginePort } from '@ocr-words/core';
import { ConfigError, resolveConfig, USAGE } from './config.js';
import type { CliConfig } from './config.js';
import { createEngine } from './create-engine.js';
import { formatRunError } from './format-run-error.js';
import { createLogger } from './logger.js';
import { NodeFileSystem } from './node-file-system.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDependencies {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly fs?: FileSystemPort;
  readonly createEngine?: (config: CliConfig) => OcrEnginePort;
}

/** Runs one batch and returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const log = createLogger('Cli');

  let config: CliConfig;
  try {
    const resolution = resolveConfig(argv, deps.env);
    if (resolution.kind === 'help') {
      log.notify(USAGE);
      return EXIT_OK;
    }
    config = resolution.config;
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    log.error(formatRunError(error));
    log.notify(USAGE);
    return EXIT_USAGE;
  }

  const engine = (deps.createEngine ?? createEngine)(config);
  const service = new OcrBatchService(
    engine,
    deps.fs ?? new NodeFileSystem(),
    createLogger('Batch', { verbose: config.verbose }),
  );

  try {
    const result = await service.run({ imageDir: config.imageDir, outputPath: config.outputPath });
    log.notify(`Wrote OCR results to ${result.outputPath}`);
    return EXIT_OK;
  } catch (error) {
    log.error(formatRunError(error), config.verbose ? error : undefined);
    return EXIT_FAILURE;
  }
}
