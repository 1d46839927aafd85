import { MalformedEngineOutputError } from '@ocr-words/core';
import type { TokenTable } from '@ocr-words/core';

function columnIndex(header: string[], column: string): number {
  const i = header.indexOf(column);
  if (i === -1) {
    throw new MalformedEngineOutputError(`TSV header has no ${column} column`);
  }
  return i;
}

/**
 * Parses tesseract's `tsv` output into parallel columns.
 * Cells stay strings; rows without text keep an empty string.
 */
export function parseTsv(tsv: string): TokenTable {
  const lines = tsv.split(/\r?\n/).filter((line) => line.length > 0);
  const table: TokenTable = { text: [], left: [], top: [], width: [], height: [], conf: [] };
  if (lines.length === 0) return table;

  const header = lines[0].split('\t');
  const text = columnIndex(header, 'text');
  const left = columnIndex(header, 'left');
  const top = columnIndex(header, 'top');
  const width = columnIndex(header, 'width');
  const height = columnIndex(header, 'height');
  const conf = columnIndex(header, 'conf');

  for (const line of lines.slice(1)) {
    const cells = line.split('\t');
    table.text.push(cells[text] ?? '');
    table.left.push(cells[left] ?? '');
    table.top.push(cells[top] ?? '');
    table.width.push(cells[width] ?? '');
    table.height.push(cells[height] ?? '');
    table.conf.push(cells[conf] ?? '');
  }

  return table;
}
