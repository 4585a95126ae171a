export * from "./diagnostics/index.js";
export * from "./config.js";
export type { Backend } from "./backend.js";
export {
  analyzeProgram,
  compileProgram,
  loadModuleGraph,
  type AnalyzeProgramResult,
  type CompileProgramFailureResult,
  type CompileProgramOptions,
  type CompileProgramResult,
  type CompileProgramSuccessResult,
  type LoadModulesOptions,
} from "./pipeline.js";
export { buildModuleGraph } from "./modules/graph.js";
export { createFsModuleHost } from "./modules/fs-host.js";
export { createMemoryModuleHost } from "./modules/memory-host.js";
export { createNodePathAdapter } from "./modules/node-path-adapter.js";
export type {
  FileRecord,
  Item,
  ModuleGraph,
  ModuleHost,
  ModulePathAdapter,
} from "./modules/types.js";
export { CharStream, computeLineOffsets, type LineRange } from "./parser/char-stream.js";
export { Parser, parseSource, type ParserOptions } from "./parser/parser.js";
export { ParserSyntaxError } from "./parser/errors.js";
export type * from "./parser/ast.js";
export type { Token, TokenInfo, Keyword, Punctuator } from "./parser/tokens.js";
export { resolveProgram, type ResolveResult } from "./semantics/resolve.js";
export { ScopeStack } from "./semantics/scope.js";
export type * from "./semantics/nodes.js";
export {
  COMPILER_PERF_COUNTERS,
  COMPILER_PERF_ENV,
  CompilerPerfRecorder,
  isCompilerPerfEnabled,
  type CompilerPerfCounter,
  type CompilerPerfPhase,
  type CompilerPerfSummary,
} from "./perf.js";
