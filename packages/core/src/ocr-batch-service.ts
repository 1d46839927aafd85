import { EngineInvocationError, FileSystemError } from './exceptions.js';
import type { InvocationPhase } from './exceptions.js';
import { enumerateImages } from './images/enumerate-images.js';
import type { ImageEntry, OcrReport } from './models/image-entry.js';
import { parseOrientation } from './ocr/orientation.js';
import { buildWordRecords } from './ocr/word-records.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { LoggerPort } from './ports/logger.js';
import type { OcrEnginePort } from './ports/ocr-engine.js';
import { assembleReport, serializeReport } from './report/report-assembler.js';

export interface BatchRunOptions {
  readonly imageDir: string;
  readonly outputPath: string;
}

export interface BatchRunResult {
  readonly report: OcrReport;
  readonly outputPath: string;
  readonly imageCount: number;
  readonly wordCount: number;
}

const silentLogger: LoggerPort = {
  info: () => {},
  error: () => {},
};

export class OcrBatchService {
  constructor(
    private readonly engine: OcrEnginePort,
    private readonly fs: FileSystemPort,
    private readonly logger: LoggerPort = silentLogger,
  ) {}

  /**
   * Processes every image of `imageDir` in path order and writes one report.
   * The first failing image aborts the run before anything is written.
   */
  async run(options: BatchRunOptions): Promise<BatchRunResult> {
    let failed = false;
    try {
      await this.engine.verify();

      const images = await enumerateImages(this.fs, options.imageDir);
      this.logger.info(`Found ${images.length} image(s) in ${options.imageDir}`);

      const entries: ImageEntry[] = [];
      for (const image of images) {
        entries.push(await this.processImage(image));
      }

      const report = assembleReport(entries);
      try {
        await this.fs.writeFile(options.outputPath, serializeReport(report));
      } catch (error) {
        throw new FileSystemError('write', options.outputPath, error);
      }

      return {
        report,
        outputPath: options.outputPath,
        imageCount: entries.length,
        wordCount: entries.reduce((sum, entry) => sum + entry.words.length, 0),
      };
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      await this.terminate(failed);
    }
  }

  async processImage(file: string): Promise<ImageEntry> {
    const rotation = await this.invoke('orientation', file, async () =>
      parseOrientation(await this.engine.detectOrientation(file)),
    );
    const words = await this.invoke('tokens', file, async () =>
      buildWordRecords(await this.engine.extractTokens(file), rotation),
    );

    this.logger.info(`${file}: rotation ${rotation}, ${words.length} word(s)`);
    return { file, rotation, words };
  }

  /** A failed shutdown must not replace the error that ended the run. */
  private async terminate(failed: boolean): Promise<void> {
    try {
      await this.engine.terminate?.();
    } catch (error) {
      if (!failed) throw error;
      this.logger.error('Failed to stop the OCR engine', error);
    }
  }

  private async invoke<T>(
    phase: InvocationPhase,
    file: string,
    step: () => Promise<T>,
  ): Promise<T> {
    try {
      return await step();
    } catch (error) {
      throw new EngineInvocationError(phase, file, error);
    }
  }
}
