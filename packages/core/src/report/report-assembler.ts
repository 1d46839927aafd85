import type { ImageEntry, OcrReport } from '../models/image-entry.js';

export function assembleReport(entries: readonly ImageEntry[]): OcrReport {
  return { images: [...entries] };
}

export function serializeReport(report: OcrReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
