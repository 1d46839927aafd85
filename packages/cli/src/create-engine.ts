import type { OcrEnginePort } from '@ocr-words/core';
import { TesseractCliEngine, TesseractJsEngine } from '@ocr-words/ocr-tesseract';
import type { CliConfig } from './config.js';

export function createEngine(config: CliConfig): OcrEnginePort {
  switch (config.engine) {
    case 'tesseract':
      return new TesseractCliEngine({ command: config.tesseractCmd, lang: config.lang });
    case 'tesseract-js':
      return new TesseractJsEngine({ lang: config.lang, langPath: config.tessdata });
  }
}
