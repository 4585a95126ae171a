import type { Backend } from "./backend.js";
import type { CompilerOptions } from "./config.js";
import type { Diagnostic } from "./diagnostics/index.js";
import { createFsModuleHost } from "./modules/fs-host.js";
import { buildModuleGraph } from "./modules/graph.js";
import type { ModuleGraph, ModuleHost } from "./modules/types.js";
import { CompilerPerfRecorder } from "./perf.js";
import type { LoweredProgram } from "./semantics/nodes.js";
import { resolveProgram } from "./semantics/resolve.js";

export type LoadModulesOptions = {
  entryPath: string;
  host?: ModuleHost;
  options?: Partial<CompilerOptions>;
};

export type AnalyzeProgramResult =
  | { program: LoweredProgram; diagnostics: readonly Diagnostic[]; errorCount: 0 }
  | { program?: undefined; diagnostics: readonly Diagnostic[]; errorCount: number };

export type CompileProgramOptions<R> = LoadModulesOptions & {
  backend?: Backend<R>;
};

export type CompileProgramSuccessResult<R> = {
  success: true;
  graph: ModuleGraph;
  program: LoweredProgram;
  /** Present when a backend was given */
  output?: R;
  diagnostics: readonly Diagnostic[];
};

export type CompileProgramFailureResult = {
  success: false;
  /** Has no root when the root file could not be read */
  graph: ModuleGraph;
  diagnostics: readonly Diagnostic[];
  errorCount: number;
};

export type CompileProgramResult<R> =
  | CompileProgramSuccessResult<R>
  | CompileProgramFailureResult;

export const loadModuleGraph = (options: LoadModulesOptions): ModuleGraph =>
  buildModuleGraph({
    entryPath: options.entryPath,
    host: options.host ?? createFsModuleHost(),
    options: options.options,
  });

/** Resolves names when the graph has no errors. */
export const analyzeProgram = (graph: ModuleGraph): AnalyzeProgramResult => {
  if (graph.errorCount > 0 || graph.root === undefined) {
    return {
      diagnostics: graph.diagnostics,
      errorCount: Math.max(graph.errorCount, 1),
    };
  }

  const { program, diagnostics, errorCount } = resolveProgram(graph);
  const combined = [...graph.diagnostics, ...diagnostics];
  if (errorCount > 0) {
    return { diagnostics: combined, errorCount };
  }
  return { program, diagnostics: combined, errorCount: 0 };
};

/**
 * Loads, parses and resolves the program rooted at `entryPath`. The backend
 * only runs when no stage reported an error.
 */
export const compileProgram = <R = never>(
  options: CompileProgramOptions<R>
): CompileProgramResult<R> => {
  const perf = new CompilerPerfRecorder(options.entryPath);

  const result = ((): CompileProgramResult<R> => {
    const graph = perf.time("modules", () => loadModuleGraph(options));
    const analysis = perf.time("resolve", () => analyzeProgram(graph));
    if (!analysis.program) {
      return {
        success: false,
        graph,
        diagnostics: analysis.diagnostics,
        errorCount: analysis.errorCount,
      };
    }

    const { program } = analysis;
    const backend = options.backend;
    const output = backend ? perf.time("backend", () => backend.run(program)) : undefined;
    return {
      success: true,
      graph,
      program,
      output,
      diagnostics: analysis.diagnostics,
    };
  })();

  perf.finish({ success: result.success, diagnostics: result.diagnostics.length });

  return result;
};
