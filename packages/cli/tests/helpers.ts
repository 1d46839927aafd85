import { vi } from 'vitest';
import type { DirectoryEntry, FileSystemPort, OcrEnginePort } from '@ocr-words/core';

export function createMemoryFileSystem(dirs: Record<string, string[]>) {
  const written = new Map<string, string>();
  const fs = {
    isDirectory: vi.fn(async (dirPath: string) => dirPath in dirs),
    readDirectory: vi.fn(async (dirPath: string): Promise<DirectoryEntry[]> =>
      (dirs[dirPath] ?? []).map((name) => ({ name, isFile: true })),
    ),
    joinPath: (dir: string, name: string) => `${dir}/${name}`,
    writeFile: vi.fn(async (filePath: string, content: string) => {
      written.set(filePath, content);
    }),
  } satisfies FileSystemPort;
  return { fs, written };
}

export function createMockEngine(osd: string, tsv: string[][]) {
  return {
    verify: vi.fn().mockResolvedValue(undefined),
    detectOrientation: vi.fn().mockResolvedValue(osd),
    extractTokens: vi.fn().mockResolvedValue({
      text: tsv.map((row) => row[0]),
      left: tsv.map((row) => row[1]),
      top: tsv.map((row) => row[2]),
      width: tsv.map((row) => row[3]),
      height: tsv.map((row) => row[4]),
      conf: tsv.map((row) => row[5]),
    }),
    terminate: vi.fn().mockResolvedValue(undefined),
  } satisfies OcrEnginePort;
}
