import { performance } from "node:perf_hooks";

export const COMPILER_PERF_ENV = "BROOK_COMPILER_PERF";

export const COMPILER_PERF_COUNTERS = [
  "modules.read",
  "modules.diamond_hits",
  "lexer.tokens",
  "resolver.slots",
] as const;

export type CompilerPerfCounter = (typeof COMPILER_PERF_COUNTERS)[number];

export type CompilerPerfPhase = "modules" | "resolve" | "backend";

export type CompilerPerfSummary = {
  entryPath: string;
  success: boolean;
  diagnostics: number;
  phasesMs: Partial<Record<CompilerPerfPhase, number>>;
  counters: Partial<Record<CompilerPerfCounter, number>>;
};

const PERF_ENABLED = ["1", "true", "yes"].includes(
  (process.env[COMPILER_PERF_ENV] ?? "").trim().toLowerCase()
);

const totals = new Map<CompilerPerfCounter, number>();

export const isCompilerPerfEnabled = (): boolean => PERF_ENABLED;

export const incrementCompilerPerfCounter = (
  name: CompilerPerfCounter,
  amount = 1
): void => {
  if (!PERF_ENABLED) return;
  totals.set(name, (totals.get(name) ?? 0) + amount);
};

/**
 * Times the phases of one compilation and, on `finish`, prints a single
 * `[brook:compiler:perf]` JSON line to stderr with the counters it moved.
 * Does nothing unless perf is enabled.
 */
export class CompilerPerfRecorder {
  readonly #entryPath: string;
  readonly #now: () => number;
  readonly #startTotals = new Map(totals);
  #phasesMs: Partial<Record<CompilerPerfPhase, number>> = {};

  constructor(entryPath: string, now: () => number = () => performance.now()) {
    this.#entryPath = entryPath;
    this.#now = now;
  }

  time<T>(phase: CompilerPerfPhase, run: () => T): T {
    if (!PERF_ENABLED) return run();
    const start = this.#now();
    try {
      return run();
    } finally {
      const elapsed = this.#now() - start;
      this.#phasesMs[phase] = Math.round(elapsed * 1000) / 1000;
    }
  }

  finish({
    success,
    diagnostics,
  }: {
    success: boolean;
    diagnostics: number;
  }): CompilerPerfSummary | undefined {
    if (!PERF_ENABLED) return undefined;

    const counters: CompilerPerfSummary["counters"] = {};
    COMPILER_PERF_COUNTERS.forEach((name) => {
      const delta = (totals.get(name) ?? 0) - (this.#startTotals.get(name) ?? 0);
      if (delta !== 0) counters[name] = delta;
    });

    const summary: CompilerPerfSummary = {
      entryPath: this.#entryPath,
      success,
      diagnostics,
      phasesMs: this.#phasesMs,
      counters,
    };
    console.error(`[brook:compiler:perf] ${JSON.stringify(summary)}`);
    return summary;
  }
}
