export interface DirectoryEntry {
  readonly name: string;
  readonly isFile: boolean;
}

export interface FileSystemPort {
  /** False when the path is missing or not a directory */
  isDirectory(path: string): Promise<boolean>;
  readDirectory(path: string): Promise<DirectoryEntry[]>;
  joinPath(dir: string, name: string): string;
  writeFile(path: string, content: string): Promise<void>;
}
