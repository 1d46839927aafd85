import { createWorker, type Worker } from 'tesseract.js';
import { EngineUnavailableError, MalformedEngineOutputError } from '@ocr-words/core';
import type { OcrEnginePort, TokenTable } from '@ocr-words/core';
import { parseTsv } from './tsv.js';

// tesseract.js OEM values; OSD only runs on the legacy engine
const OEM_TESSERACT_ONLY = 0;
const OEM_LSTM_ONLY = 1;

export const TESSERACT_JS_ENGINE = 'tesseract.js';

export interface TesseractJsConfig {
  lang: string;
  /** Directory holding `<lang>.traineddata.gz` and `osd.traineddata.gz`. Unset means the tesseract.js CDN */
  langPath?: string;
}

function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface OsdReport {
  orientation_degrees: number | null;
  orientation_confidence: number | null;
  script: string | null;
  script_confidence: number | null;
}

/**
 * Renders a tesseract.js detection result in the text layout of `tesseract --psm 0`.
 * tesseract.js reports `orientation_degrees` as the rotation needed to make the page upright.
 */
export function formatOsd(report: OsdReport): string {
  const lines: string[] = [];
  if (report.orientation_degrees != null) {
    const rotate = report.orientation_degrees;
    lines.push(`Orientation in degrees: ${(360 - rotate) % 360}`);
    lines.push(`Rotate: ${rotate}`);
  }
  if (report.orientation_confidence != null) {
    lines.push(`Orientation confidence: ${report.orientation_confidence.toFixed(2)}`);
  }
  if (report.script != null) lines.push(`Script: ${report.script}`);
  if (report.script_confidence != null) {
    lines.push(`Script confidence: ${report.script_confidence.toFixed(2)}`);
  }
  return lines.map((line) => `${line}\n`).join('');
}

/** In-process tesseract (WebAssembly). Language data comes from `langPath`, or the tesseract.js CDN when unset. */
export class TesseractJsEngine implements OcrEnginePort {
  private recognizer: Worker | null = null;
  private detector: Worker | null = null;
  private workerError: Error | null = null;
  private readonly config: TesseractJsConfig;

  constructor(config: Partial<TesseractJsConfig> = {}) {
    this.config = {
      lang: config.lang ?? 'eng',
      langPath: config.langPath,
    };
  }

  async verify(): Promise<void> {
    try {
      await this.initialize();
    } catch (error) {
      await this.terminate();
      throw new EngineUnavailableError(TESSERACT_JS_ENGINE, { cause: error });
    }
  }

  async detectOrientation(imagePath: string): Promise<string> {
    const { detector } = await this.initialize();
    const result = await this.settle(detector.detect(imagePath));
    return formatOsd(result.data);
  }

  async extractTokens(imagePath: string): Promise<TokenTable> {
    const { recognizer } = await this.initialize();
    const result = await this.settle(recognizer.recognize(imagePath, {}, { tsv: true }));
    const tsv = result.data.tsv;
    if (tsv == null) {
      throw new MalformedEngineOutputError('tesseract.js returned no TSV output');
    }
    return parseTsv(tsv);
  }

  async terminate(): Promise<void> {
    const workers = [this.recognizer, this.detector];
    this.recognizer = null;
    this.detector = null;
    for (const worker of workers) {
      await worker?.terminate();
    }
  }

  private async initialize(): Promise<{ recognizer: Worker; detector: Worker }> {
    // Unset keys must stay absent: tesseract.js spreads these over its defaults
    const options = {
      ...(this.config.langPath !== undefined ? { langPath: this.config.langPath } : {}),
      errorHandler: (error: unknown) => {
        this.workerError = normalizeError(error);
      },
    };
    if (!this.recognizer) {
      this.recognizer = await this.settle(createWorker(this.config.lang, OEM_LSTM_ONLY, options));
    }
    if (!this.detector) {
      this.detector = await this.settle(
        createWorker('osd', OEM_TESSERACT_ONLY, {
          ...options,
          legacyCore: true,
          legacyLang: true,
        }),
      );
    }
    return { recognizer: this.recognizer, detector: this.detector };
  }

  /** Awaits a worker job and rethrows the error its worker reported, if any. */
  private async settle<T>(job: Promise<T>): Promise<T> {
    try {
      const result = await job;
      if (this.workerError) throw this.workerError;
      return result;
    } catch (error) {
      throw this.workerError ?? normalizeError(error);
    } finally {
      this.workerError = null;
    }
  }
}
