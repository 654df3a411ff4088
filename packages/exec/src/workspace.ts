import { withDir } from 'tmp-promise';

export const WORKSPACE_PREFIX = 'arena-';

/**
 * Runs `fn` inside a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withWorkspace<T>(fn: (dir: string) => Promise<T>, prefix = WORKSPACE_PREFIX): Promise<T> {
  return withDir(({ path }) => fn(path), { prefix, unsafeCleanup: true });
}
