import { describe, expect, it } from "vitest";
import { resolve, sep } from "node:path";
import { decodeSource } from "../fs-host.js";
import { buildModuleGraph } from "../graph.js";
import { createMemoryModuleHost } from "../memory-host.js";
import { createNodePathAdapter } from "../node-path-adapter.js";
import type { ModuleGraph } from "../types.js";

const root = resolve("/proj/src");
const at = (...parts: string[]) => [root, ...parts].join(sep);

const buildGraph = (
  files: Record<string, string>,
  {
    entryPath = at("main.brk"),
    symlinks,
  }: { entryPath?: string; symlinks?: Record<string, string> } = {}
): ModuleGraph => {
  const host = createMemoryModuleHost({
    files,
    symlinks,
    pathAdapter: createNodePathAdapter(),
  });
  return buildModuleGraph({ entryPath, host });
};

const importTarget = (graph: ModuleGraph, fileId: number, name: string) => {
  const item = graph.files[fileId]?.items.get(name);
  return item?.kind === "import" ? item.file : undefined;
};

describe("buildModuleGraph", () => {
  it("numbers files after their imports and reads shared imports once", () => {
    const graph = buildGraph({
      [at("main.brk")]: "import a\nimport b\n",
      [at("a.brk")]: "import c\n",
      [at("b.brk")]: "import c\n",
      [at("c.brk")]: "var x = 1\n",
    });

    expect(graph.diagnostics).toEqual([]);
    expect(graph.files.map((file) => file.path)).toEqual([
      at("c.brk"),
      at("a.brk"),
      at("b.brk"),
      at("main.brk"),
    ]);
    expect(graph.root).toBe(3);
    expect(importTarget(graph, 3, "a")).toBe(1);
    expect(importTarget(graph, 3, "b")).toBe(2);
    expect(importTarget(graph, 1, "c")).toBe(0);
    expect(importTarget(graph, 2, "c")).toBe(0);
    expect(graph.fileIndices.get(at("c.brk"))).toBe(0);
  });

  it("reports circular imports at the import declaration", () => {
    const graph = buildGraph({
      [at("main.brk")]: "import a\n",
      [at("a.brk")]: "import main\n",
    });

    expect(graph.errorCount).toBe(1);
    expect(graph.diagnostics[0]).toMatchObject({
      code: "MD0002",
      message: `circular import of ${at("main.brk")}`,
      span: {
        file: at("a.brk"),
        start: { line: 0, column: 0 },
        end: { line: 0, column: 11 },
      },
    });
    expect(graph.files.map((file) => file.path)).toEqual([at("a.brk"), at("main.brk")]);
    expect(graph.files[0]?.items.has("main")).toBe(false);
  });

  it("keeps reading the importer when an import cannot be read", () => {
    const graph = buildGraph({
      [at("main.brk")]: "import nope\nvar y = 2\n",
    });

    expect(graph.diagnostics).toHaveLength(1);
    expect(graph.diagnostics[0]?.code).toBe("MD0001");
    expect(graph.diagnostics[0]?.message).toBe(
      `cannot read imported file ${at("nope.brk")}: File not found: ${at("nope.brk")}`
    );
    expect(graph.files[0]?.statements).toHaveLength(1);
    expect(graph.files[0]?.items.size).toBe(0);
  });

  it("replaces the extension of an explicit import path", () => {
    const graph = buildGraph({
      [at("main.brk")]: 'import helpers("lib/helpers.txt")\n',
      [at("lib", "helpers.brk")]: "var h = 1\n",
    });

    expect(graph.diagnostics).toEqual([]);
    expect(graph.files[0]?.path).toBe(at("lib", "helpers.brk"));
    expect(importTarget(graph, 1, "helpers")).toBe(0);
  });

  it("takes an absolute explicit import path as is", () => {
    const shared = resolve("/shared/lib/util.brk");
    const graph = buildGraph({
      [at("main.brk")]: 'import util("/shared/lib/util")\n',
      [shared]: "var u = 1\n",
    });

    expect(graph.diagnostics).toEqual([]);
    expect(graph.files[0]?.path).toBe(shared);
    expect(importTarget(graph, 1, "util")).toBe(0);
  });

  it("reads a file once when it is reached through symbolic links", () => {
    const graph = buildGraph(
      {
        [at("main.brk")]: "import alias\nimport other\n",
        [at("real.brk")]: "var x = 1\n",
      },
      {
        symlinks: {
          [at("alias.brk")]: at("real.brk"),
          [at("other.brk")]: "real.brk",
        },
      }
    );

    expect(graph.diagnostics).toEqual([]);
    expect(graph.files.map((file) => file.path)).toEqual([at("real.brk"), at("main.brk")]);
    expect(importTarget(graph, 1, "alias")).toBe(0);
    expect(importTarget(graph, 1, "other")).toBe(0);
  });

  it("keeps the statements parsed before a syntax error", () => {
    const graph = buildGraph({
      [at("main.brk")]: "import bad\n",
      [at("bad.brk")]: "x\n)\ny\n",
    });

    expect(graph.diagnostics).toHaveLength(1);
    expect(graph.diagnostics[0]).toMatchObject({
      code: "PS0001",
      message: "unexpected ')'",
      span: {
        file: at("bad.brk"),
        start: { line: 1, column: 0 },
        end: { line: 1, column: 1 },
      },
    });
    expect(graph.files[0]?.statements).toHaveLength(1);
    expect(importTarget(graph, 1, "bad")).toBe(0);
  });

  it("reports an unreadable root file", () => {
    const graph = buildGraph({}, { entryPath: at("nope.brk") });

    expect(graph.root).toBeUndefined();
    expect(graph.files).toEqual([]);
    expect(graph.diagnostics).toEqual([
      expect.objectContaining({
        code: "MD0003",
        message: `cannot read root file ${at("nope.brk")}: File not found: ${at("nope.brk")}`,
      }),
    ]);
  });

  it("reports a root file that is not valid UTF-8 as unreadable", () => {
    const memory = createMemoryModuleHost({ files: { [at("main.brk")]: "" } });
    const graph = buildModuleGraph({
      entryPath: at("main.brk"),
      host: { ...memory, readFile: () => decodeSource(new Uint8Array([0xff])) },
    });

    expect(graph.root).toBeUndefined();
    expect(graph.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["MD0003"]);
  });

  it("adds the source extension to the entry path", () => {
    const graph = buildGraph(
      { [at("main.brk")]: "var x = 1\n" },
      { entryPath: at("main") }
    );

    expect(graph.root).toBe(0);
    expect(graph.files[0]?.path).toBe(at("main.brk"));
  });

  it("rejects a function that reuses the name of an import", () => {
    const graph = buildGraph({
      [at("main.brk")]: "import a\nfunc a()\nend\n",
      [at("a.brk")]: "",
    });

    expect(graph.diagnostics).toHaveLength(1);
    const [duplicate] = graph.diagnostics;
    expect(duplicate?.message).toBe("'a' is already defined as an imported module");
    expect(duplicate?.span.start).toEqual({ line: 1, column: 5 });
    expect(duplicate?.span.end).toEqual({ line: 1, column: 6 });
    expect(duplicate?.related?.[0]).toMatchObject({
      message: "previous definition here",
      span: { start: { line: 0, column: 7 }, end: { line: 0, column: 8 } },
    });
    expect(graph.functions).toEqual([]);
  });

  it("collects overloads under one item", () => {
    const graph = buildGraph({
      [at("main.brk")]: "func f(a)\nend\nfunc f(a, b)\nend\n",
    });

    expect(graph.diagnostics).toEqual([]);
    expect(graph.files[0]?.items.get("f")).toMatchObject({
      kind: "function",
      definitions: [0, 1],
    });
    expect(graph.functions.map((definition) => definition.parameters?.length)).toEqual([
      1, 2,
    ]);
  });
});
