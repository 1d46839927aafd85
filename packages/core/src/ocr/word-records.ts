import { MalformedEngineOutputError } from '../exceptions.js';
import type { WordRecord } from '../models/word-record.js';
import type { TokenCell, TokenTable } from '../ports/ocr-engine.js';

function toNumber(column: keyof TokenTable, index: number, cell: TokenCell | undefined): number {
  if (cell === undefined || (typeof cell === 'string' && cell.trim() === '')) {
    throw new MalformedEngineOutputError(`Missing ${column} value for token ${index}`);
  }
  const value = typeof cell === 'number' ? cell : Number(cell);
  if (!Number.isFinite(value)) {
    throw new MalformedEngineOutputError(`Invalid ${column} value for token ${index}: ${cell}`);
  }
  return value;
}

function toInt(column: keyof TokenTable, index: number, cell: TokenCell | undefined): number {
  return Math.trunc(toNumber(column, index, cell));
}

/**
 * One record per token with non-blank text, in engine order.
 * Blank tokens (block, paragraph and line rows of a tesseract table) are dropped.
 */
export function buildWordRecords(table: TokenTable, rotation: number): WordRecord[] {
  const words: WordRecord[] = [];

  for (let i = 0; i < table.text.length; i++) {
    const text = (table.text[i] ?? '').trim();
    if (!text) continue;

    const left = toInt('left', i, table.left[i]);
    const top = toInt('top', i, table.top[i]);
    const width = toInt('width', i, table.width[i]);
    const height = toInt('height', i, table.height[i]);

    words.push({
      text,
      rotation,
      position: {
        left,
        top,
        right: left + width,
        bottom: top + height,
        center_x: left + width / 2,
        center_y: top + height / 2,
      },
      font_size: height,
      confidence: toNumber('conf', i, table.conf[i]),
    });
  }

  return words;
}
