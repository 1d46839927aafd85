export type { WordPosition, WordRecord } from './word-record.js';
export type { ImageEntry, OcrReport } from './image-entry.js';
