import { MalformedEngineOutputError } from '../exceptions.js';

const ROTATE_MARKER = 'Rotate';

/**
 * Reads the rotation from an OSD report such as
 *
 * ```
 * Orientation in degrees: 270
 * Rotate: 90
 * ```
 *
 * Only the first line mentioning `Rotate` is used. No such line means 0.
 */
export function parseOrientation(osd: string): number {
  const line = osd.split(/\r?\n/).find((l) => l.includes(ROTATE_MARKER));
  if (line === undefined) return 0;

  const colon = line.indexOf(':');
  const value = colon === -1 ? '' : line.slice(colon + 1).trim();
  if (!/^[+-]?\d+$/.test(value)) {
    throw new MalformedEngineOutputError(`Unreadable rotation line: ${line.trim()}`);
  }
  return Number.parseInt(value, 10);
}
