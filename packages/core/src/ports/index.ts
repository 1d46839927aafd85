export type { DirectoryEntry, FileSystemPort } from './file-system.js';
export type { LoggerPort } from './logger.js';
export type { OcrEnginePort, TokenCell, TokenTable } from './ocr-engine.js';
