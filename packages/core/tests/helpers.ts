import { vi } from 'vitest';
import type { DirectoryEntry, FileSystemPort } from '../src/ports/file-system.js';
import type { OcrEnginePort, TokenTable } from '../src/ports/ocr-engine.js';

export interface MemoryFileSystem extends FileSystemPort {
  readonly written: Map<string, string>;
}

export function createMemoryFileSystem(dirs: Record<string, DirectoryEntry[]>): MemoryFileSystem {
  const written = new Map<string, string>();
  return {
    written,
    isDirectory: vi.fn(async (path: string) => path in dirs),
    readDirectory: vi.fn(async (path: string) => dirs[path] ?? []),
    joinPath: (dir: string, name: string) => `${dir}/${name}`,
    writeFile: vi.fn(async (path: string, content: string) => {
      written.set(path, content);
    }),
  };
}

export function file(name: string): DirectoryEntry {
  return { name, isFile: true };
}

export function dir(name: string): DirectoryEntry {
  return { name, isFile: false };
}

export function tokenTable(
  rows: [text: string, left: number, top: number, width: number, height: number, conf: number][],
): TokenTable {
  return {
    text: rows.map((r) => r[0]),
    left: rows.map((r) => r[1]),
    top: rows.map((r) => r[2]),
    width: rows.map((r) => r[3]),
    height: rows.map((r) => r[4]),
    conf: rows.map((r) => r[5]),
  };
}

export function createMockEngine(
  osd: string = 'Orientation in degrees: 0\nRotate: 0\n',
  tokens: TokenTable = tokenTable([]),
): OcrEnginePort & { terminate: () => Promise<void> } {
  return {
    verify: vi.fn().mockResolvedValue(undefined),
    detectOrientation: vi.fn().mockResolvedValue(osd),
    extractTokens: vi.fn().mockResolvedValue(tokens),
    terminate: vi.fn().mockResolvedValue(undefined),
  };
}
