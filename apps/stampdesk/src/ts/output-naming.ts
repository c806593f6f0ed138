/**
 * Output file naming for exports.
 *
 *   report.pdf        -> report_capgo.pdf
 *   report_capgo.pdf  -> report_capgo.pdf (suffix is not stacked)
 *   taken             -> report_capgo (1).pdf, report_capgo (2).pdf, ...
 *
 * Probing and reservation are serialized per destination directory, and a
 * reserved name stays taken in this process until it is released, so two
 * exports of the same base name never pick the same path.
 */

import { access, mkdir } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';

import { FileSystemError, errorMessage } from './errors';

/**
 * Base name with any previous export suffix (and what follows it) removed
 */
export function stripExportSuffix(baseName: string, suffix: string): string {
  const index = baseName.indexOf(suffix);
  return index === -1 ? baseName : baseName.slice(0, index);
}

/**
 * `n = 0` is the plain name; collisions count from 1
 */
export function candidateFileName(cleanBase: string, suffix: string, ext: string, n: number): string {
  return n === 0 ? `${cleanBase}${suffix}${ext}` : `${cleanBase}${suffix} (${n})${ext}`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface OutputReservation {
  /** Absolute path the export must write to */
  readonly path: string;
  /** Give the name back once the file is written (or the export failed) */
  release(): void;
}

const reserved = new Set<string>();
const directoryLocks = new Map<string, Promise<unknown>>();

function serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
  const previous = directoryLocks.get(key) ?? Promise.resolve();
  const next = previous.then(task, task);
  const tail = next.then(
    () => undefined,
    () => undefined
  );
  directoryLocks.set(key, tail);
  void tail.then(() => {
    if (directoryLocks.get(key) === tail) directoryLocks.delete(key);
  });
  return next;
}

/**
 * Pick and reserve the first free export path for `inputPath` in `outputDir`
 *
 * @throws FileSystemError if the destination directory cannot be created
 */
export function reserveOutputPath(
  inputPath: string,
  outputDir: string,
  suffix: string
): Promise<OutputReservation> {
  const dir = resolve(outputDir);

  return serialize(dir, async () => {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FileSystemError(`Cannot write to ${dir}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const ext = extname(inputPath);
    const cleanBase = stripExportSuffix(basename(inputPath, ext), suffix);

    for (let n = 0; ; n++) {
      const candidate = join(dir, candidateFileName(cleanBase, suffix, ext, n));
      if (reserved.has(candidate) || (await exists(candidate))) continue;

      reserved.add(candidate);
      let released = false;
      return {
        path: candidate,
        release: () => {
          if (released) return;
          released = true;
          reserved.delete(candidate);
        },
      };
    }
  });
}
