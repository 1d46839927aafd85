import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FileSystemError } from '@ocr-words/core';
import type { DirectoryEntry, FileSystemPort } from '@ocr-words/core';

function errnoCode(error: unknown): unknown {
  return error instanceof Error ? Reflect.get(error, 'code') : undefined;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export class NodeFileSystem implements FileSystemPort {
  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await fs.stat(dirPath)).isDirectory();
    } catch (error) {
      if (isMissing(error)) return false;
      throw new FileSystemError('stat', dirPath, error);
    }
  }

  async readDirectory(dirPath: string): Promise<DirectoryEntry[]> {
    const dirents = await fs.readdir(dirPath, { withFileTypes: true }).catch((error: unknown) => {
      throw new FileSystemError('read', dirPath, error);
    });

    const entries: DirectoryEntry[] = [];
    for (const dirent of dirents) {
      const isFile = dirent.isSymbolicLink()
        ? await this.isFileTarget(path.join(dirPath, dirent.name))
        : dirent.isFile();
      entries.push({ name: dirent.name, isFile });
    }
    return entries;
  }

  joinPath(dir: string, name: string): string {
    return path.join(dir, name);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, 'utf8');
  }

  private async isFileTarget(linkPath: string): Promise<boolean> {
    try {
      return (await fs.stat(linkPath)).isFile();
    } catch (error) {
      // dangling link
      if (isMissing(error)) return false;
      throw new FileSystemError('stat', linkPath, error);
    }
  }
}
