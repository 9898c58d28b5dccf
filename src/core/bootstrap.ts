import { mkdir } from 'node:fs/promises';
import { BootstrapError } from './errors.ts';

/**
 * Make sure every directory exists
 * Idempotent: existing directories are left alone.
 */
export async function ensureDirectories(paths: Iterable<string>): Promise<void> {
  for (const dir of new Set(paths)) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new BootstrapError(`Cannot create directory ${dir}`, { cause: error });
    }
  }
}
