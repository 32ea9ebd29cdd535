/**
 * Filesystem stat and clock seams for the caches.
 */

import { statSync } from "node:fs";

export interface FileStat {
  /** Modification time in milliseconds; throws when the path is missing. */
  mtime(path: string): number;
}

export type Clock = () => number;

export const nodeFileStat: FileStat = {
  mtime: (path) => statSync(path).mtimeMs,
};

export const systemClock: Clock = () => Date.now();

/**
 * True when a record loaded at `recordedMtime` is still current for `file`.
 * A failed stat counts as fresh.
 */
export function isFresh(recordedMtime: number, file: string, stat: FileStat): boolean {
  let current: number;
  try {
    current = stat.mtime(file);
  } catch {
    return true;
  }
  return recordedMtime >= current;
}
