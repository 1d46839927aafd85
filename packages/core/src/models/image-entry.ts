import type { WordRecord } from './word-record.js';

export interface ImageEntry {
  readonly file: string;
  readonly rotation: number;
  readonly words: readonly WordRecord[];
}

export interface OcrReport {
  readonly images: readonly ImageEntry[];
}
