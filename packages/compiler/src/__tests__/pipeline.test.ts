import { describe, expect, it } from "vitest";
import { resolve, sep } from "node:path";
import type { Backend } from "../backend.js";
import { createMemoryModuleHost } from "../modules/memory-host.js";
import { analyzeProgram, compileProgram, loadModuleGraph } from "../pipeline.js";
import type { LoweredProgram } from "../semantics/nodes.js";

const root = resolve("/proj/src");
const entryPath = `${root}${sep}main.brk`;

const countingBackend = () => {
  const runs: LoweredProgram[] = [];
  const backend: Backend<number> = {
    run: (program) => {
      runs.push(program);
      return program.functions.length;
    },
  };
  return { backend, runs };
};

describe("compileProgram", () => {
  it("hands a clean program to the backend", () => {
    const { backend, runs } = countingBackend();
    const result = compileProgram({
      entryPath,
      host: createMemoryModuleHost({
        files: { [entryPath]: "func main()\n  1\nend\nmain()\n" },
      }),
      backend,
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.output).toBe(1);
    expect(result.diagnostics).toEqual([]);
    expect(runs).toEqual([result.program]);
  });

  it("leaves the output empty without a backend", () => {
    const result = compileProgram({
      entryPath,
      host: createMemoryModuleHost({ files: { [entryPath]: "var x = 1\n" } }),
    });
    expect(result).toMatchObject({ success: true, output: undefined });
  });

  it("stops before name resolution on a syntax error", () => {
    const { backend, runs } = countingBackend();
    const result = compileProgram({
      entryPath,
      host: createMemoryModuleHost({ files: { [entryPath]: "var x = (1\n" } }),
      backend,
    });

    expect(result).toMatchObject({ success: false, errorCount: 1 });
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["PS0002"]);
    expect(runs).toEqual([]);
  });

  it("skips the backend when names do not resolve", () => {
    const { backend, runs } = countingBackend();
    const result = compileProgram({
      entryPath,
      host: createMemoryModuleHost({ files: { [entryPath]: "missing\n" } }),
      backend,
    });

    expect(result.success).toBe(false);
    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "undefined identifier 'missing'",
    ]);
    expect(runs).toEqual([]);
  });

  it("fails when the root file is missing", () => {
    const result = compileProgram({
      entryPath,
      host: createMemoryModuleHost({ files: {} }),
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.graph.root).toBeUndefined();
    expect(result.diagnostics[0]?.code).toBe("MD0003");
  });
});

describe("analyzeProgram", () => {
  it("returns the lowered program together with graph diagnostics", () => {
    const graph = loadModuleGraph({
      entryPath,
      host: createMemoryModuleHost({ files: { [entryPath]: "var x = 1\nx\n" } }),
    });
    const analysis = analyzeProgram(graph);

    expect(analysis.errorCount).toBe(0);
    expect(analysis.program?.files[0]?.statements[1]).toMatchObject({
      kind: "expr",
      expr: { kind: "global", file: 0, slot: 0 },
    });
  });

  it("counts a rootless graph as failed", () => {
    const graph = loadModuleGraph({
      entryPath,
      host: createMemoryModuleHost({ files: {} }),
    });
    const analysis = analyzeProgram(graph);
    expect(analysis.program).toBeUndefined();
    expect(analysis.errorCount).toBe(1);
  });
});
