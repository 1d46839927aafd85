import { DirectoryNotFoundError } from '../exceptions.js';
import type { FileSystemPort } from '../ports/file-system.js';

export const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.tif',
  '.tiff',
  '.bmp',
]);

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  // dotfiles such as ".png" have no extension
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

export function isSupportedImage(name: string): boolean {
  return SUPPORTED_IMAGE_EXTENSIONS.has(extensionOf(name));
}

/** Supported image files directly inside `dir`, sorted by path. */
export async function enumerateImages(fs: FileSystemPort, dir: string): Promise<string[]> {
  if (!(await fs.isDirectory(dir))) {
    throw new DirectoryNotFoundError(dir);
  }

  const entries = await fs.readDirectory(dir);
  return entries
    .filter((entry) => entry.isFile && isSupportedImage(entry.name))
    .map((entry) => fs.joinPath(dir, entry.name))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
