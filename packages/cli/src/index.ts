export const name = '@arena/cli';

export { buildProgram, runCli } from './program';
export type { CliContext, GlobalOptions } from './commands/options';
export { OutputRenderer } from './output/renderer';
