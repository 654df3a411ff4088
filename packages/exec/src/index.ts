export { ResourceBoundedExecutor } from './executor';
export type { ExecutorOptions, ProgramSources, CompiledProgram, CompileResult } from './executor';
export { runBounded, killProcessTree, withAddressSpaceLimit } from './runner/process';
export type { BoundedRunOptions, BoundedRunResult, CommandSpec, KillReason } from './runner/process';
export { classifyRun, toOutcome, compileErrorOutcome, MEMORY_NEAR_LIMIT_RATIO } from './runner/classify';
export { MemoryWatchdog, parseProcStatus, sampleMemory } from './runner/memory';
export { GccToolchain, CommandToolchain, nodeToolchain, artifactName } from './toolchain/toolchain';
export type { Toolchain, BuildInput, CommandToolchainOptions } from './toolchain/toolchain';
export { resolveCompiler, requireCompiler } from './toolchain/resolve';
export { withWorkspace } from './workspace';
