import { EngineUnavailableError } from '@ocr-words/core';
import type { OcrEnginePort, TokenTable } from '@ocr-words/core';
import { DEFAULT_TESSERACT_COMMAND } from './resolve-command.js';
import { runCommand } from './run-command.js';
import type { CommandRunner } from './run-command.js';
import { parseTsv } from './tsv.js';

export const TESSERACT_HINT =
  'Install tesseract or provide the path via --tesseract-cmd or the TESSERACT_CMD environment variable.';

export interface TesseractCliConfig {
  command: string;
  lang: string;
}

/** Runs the tesseract executable once per operation. */
export class TesseractCliEngine implements OcrEnginePort {
  private readonly config: TesseractCliConfig;

  constructor(
    config: Partial<TesseractCliConfig> = {},
    private readonly run: CommandRunner = runCommand,
  ) {
    this.config = {
      command: config.command ?? DEFAULT_TESSERACT_COMMAND,
      lang: config.lang ?? 'eng',
    };
  }

  async verify(): Promise<void> {
    try {
      await this.run(this.config.command, ['--version']);
    } catch (error) {
      throw new EngineUnavailableError(this.config.command, { cause: error, hint: TESSERACT_HINT });
    }
  }

  async detectOrientation(imagePath: string): Promise<string> {
    const { stdout } = await this.run(this.config.command, [
      imagePath,
      'stdout',
      '--psm',
      '0',
      '-l',
      'osd',
    ]);
    return stdout;
  }

  async extractTokens(imagePath: string): Promise<TokenTable> {
    const { stdout } = await this.run(this.config.command, [
      imagePath,
      'stdout',
      '-l',
      this.config.lang,
      'tsv',
    ]);
    return parseTsv(stdout);
  }
}
