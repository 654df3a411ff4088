import which from 'which';
import { FatalError } from '@arena/shared';

/**
 * Looks a compiler up on PATH; returns null when it is not installed.
 */
export async function resolveCompiler(compiler: string): Promise<string | null> {
  return which(compiler, { nothrow: true });
}

export async function requireCompiler(compiler: string): Promise<string> {
  const resolved = await resolveCompiler(compiler);
  if (resolved === null) {
    throw new FatalError(`Compiler '${compiler}' was not found on PATH`);
  }
  return resolved;
}
