import { access, constants } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Finds the first executable named `name` in the given directories
 */
export async function findBinary(name: string, binPaths: string[]): Promise<string | undefined> {
  for (const dir of binPaths) {
    const candidate = join(dir, name);
    try {
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not in this directory
    }
  }
  return undefined;
}
