/**
 * Scoped temporary files.
 *
 * A `TempScope` owns one private directory under the OS temp dir. Every
 * file handed out lives inside it and the whole directory is removed by
 * `dispose()`, on success and on failure alike.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { FileSystemError } from './errors';
import { createLogger } from './logger';

const log = createLogger('TempFiles');

export class TempScope {
  private counter = 0;
  private disposed = false;

  private constructor(readonly dir: string) {}

  /**
   * @throws FileSystemError if the directory cannot be created
   */
  static async create(prefix: string): Promise<TempScope> {
    try {
      const dir = await mkdtemp(join(tmpdir(), prefix));
      return new TempScope(dir);
    } catch (error) {
      throw new FileSystemError(`Could not create a temporary directory: ${String(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Reserve a new, unique path inside the scope (the file is not created)
   */
  file(stem: string, ext: string): string {
    if (this.disposed) {
      throw new FileSystemError('Temporary scope has already been disposed');
    }
    this.counter += 1;
    return join(this.dir, `${stem}_${this.counter}${ext}`);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    try {
      await rm(this.dir, { recursive: true, force: true });
    } catch (error) {
      // Cleanup failure must not mask the operation's own outcome
      log.warn('Could not remove temporary directory', { dir: this.dir }, error);
    }
  }
}

/**
 * Run `fn` with a fresh scope and remove the scope afterwards
 */
export async function withTempScope<T>(
  prefix: string,
  fn: (scope: TempScope) => Promise<T>
): Promise<T> {
  const scope = await TempScope.create(prefix);
  try {
    return await fn(scope);
  } finally {
    await scope.dispose();
  }
}
