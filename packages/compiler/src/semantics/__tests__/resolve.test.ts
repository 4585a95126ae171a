import { describe, expect, it } from "vitest";
import { resolve, sep } from "node:path";
import { buildModuleGraph } from "../../modules/graph.js";
import { createMemoryModuleHost } from "../../modules/memory-host.js";
import { resolveProgram } from "../resolve.js";

const root = resolve("/proj/src");
const at = (name: string) => `${root}${sep}${name}`;

const resolveFiles = (files: Record<string, string>) => {
  const host = createMemoryModuleHost({
    files: Object.fromEntries(
      Object.entries(files).map(([name, source]) => [at(name), source])
    ),
  });
  const graph = buildModuleGraph({ entryPath: at("main.brk"), host });
  expect(graph.diagnostics).toEqual([]);
  return resolveProgram(graph);
};

const resolveMain = (source: string) => resolveFiles({ "main.brk": source });

const range = (
  startLine: number,
  startColumn: number,
  endLine: number,
  endColumn: number
) => ({
  start: { line: startLine, column: startColumn },
  end: { line: endLine, column: endColumn },
});

describe("resolveProgram", () => {
  it("gives top-level variables dense global slots", () => {
    const { program, errorCount } = resolveMain(
      "var a = 1\nvar b = 2\nvar c = a\nb + a\n"
    );
    expect(errorCount).toBe(0);

    const [file] = program.files;
    expect(file?.globalCount).toBe(3);
    expect(file?.statements[2]).toMatchObject({
      kind: "declare",
      storage: "global",
      slot: 2,
      name: "c",
      init: { kind: "global", file: 0, slot: 0 },
    });
    expect(file?.statements[3]).toMatchObject({
      kind: "expr",
      expr: {
        kind: "call",
        callee: { kind: "method", name: "add" },
        args: [
          { kind: "global", file: 0, slot: 1 },
          { kind: "global", file: 0, slot: 0 },
        ],
      },
    });
    expect(file?.items.get("c")).toMatchObject({ kind: "global", slot: 2 });
  });

  it("scopes loop bodies and never reuses a slot", () => {
    const { program, errorCount } = resolveMain(
      "func f(x)\n  var y = x\n  while x\n    var y = 1\n  end\n  y\nend\n"
    );
    expect(errorCount).toBe(0);

    const [fn] = program.functions;
    expect(fn?.parameters).toEqual([{ name: "x", slot: 0, type: undefined }]);
    expect(fn?.localCount).toBe(3);
    expect(fn?.body).toMatchObject([
      { kind: "declare", storage: "local", slot: 1, init: { kind: "local", slot: 0 } },
      {
        kind: "while",
        condition: { kind: "local", slot: 0 },
        body: [{ kind: "declare", slot: 2, name: "y" }],
      },
      { kind: "expr", expr: { kind: "local", slot: 1 } },
    ]);
  });

  it("drops a statement with an undefined identifier and keeps going", () => {
    const { program, diagnostics, errorCount } = resolveMain("var x = 1\nprint(x)\n");
    expect(errorCount).toBe(1);
    expect(diagnostics[0]).toMatchObject({
      code: "NR0001",
      message: "undefined identifier 'print'",
      span: { file: at("main.brk"), ...range(1, 0, 1, 5) },
    });
    expect(program.files[0]?.statements).toHaveLength(1);
  });

  it("declares a variable whose initialiser fails", () => {
    const { program, diagnostics } = resolveMain("func f()\n  var a = b\n  a\nend\n");
    expect(diagnostics.map((diagnostic) => diagnostic.span.start)).toEqual([
      { line: 1, column: 10 },
    ]);
    expect(program.functions[0]?.body).toEqual([
      expect.objectContaining({ kind: "declare", slot: 0, name: "a", init: undefined }),
      expect.objectContaining({ kind: "expr", expr: { kind: "local", slot: 0, range: range(2, 2, 2, 3) } }),
    ]);
  });

  it("lets functions see globals declared after them but not the top level", () => {
    const { program, diagnostics } = resolveMain(
      "func show()\n  counter\nend\ncounter\nvar counter = 0\n"
    );
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.message).toBe("undefined identifier 'counter'");
    expect(diagnostics[0]?.span).toMatchObject(range(3, 0, 3, 7));
    expect(program.functions[0]?.body).toMatchObject([
      { kind: "expr", expr: { kind: "global", file: 0, slot: 0 } },
    ]);
  });

  it("rejects a global that reuses the name of a function", () => {
    const { program, diagnostics } = resolveMain("func g()\nend\nvar g = 1\n");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "NR0002",
      message: "'g' is already defined as a function",
      span: range(2, 4, 2, 5),
      related: [{ message: "previous definition here", span: range(0, 5, 0, 6) }],
    });
    expect(program.files[0]?.items.get("g")?.kind).toBe("function");
  });

  it("only declares plain identifiers", () => {
    const { diagnostics } = resolveMain("var a.b\n");
    expect(diagnostics[0]).toMatchObject({
      code: "NR0004",
      message: "'var' must be followed by a plain identifier",
      span: range(0, 4, 0, 7),
    });
  });

  it("reports missing operands and list elements", () => {
    const operand = resolveMain("var a = 1\na +\n");
    expect(operand.diagnostics[0]).toMatchObject({
      message: "missing operand for 'add'",
      span: range(1, 2, 1, 3),
    });

    const argument = resolveMain("func f(a, b)\nend\nf(1,,2)\n");
    expect(argument.diagnostics[0]).toMatchObject({
      message: "missing expression in argument list",
      span: range(2, 4, 2, 5),
    });
  });

  it("resolves imported modules by file", () => {
    const { program, errorCount } = resolveFiles({
      "main.brk": "import math\nmath.pi\n",
      "math.brk": "var pi = 3\n",
    });
    expect(errorCount).toBe(0);
    expect(program.root).toBe(1);
    expect(program.files[1]?.statements[0]).toMatchObject({
      kind: "expr",
      expr: { kind: "field", name: "pi", target: { kind: "module", file: 0 } },
    });
  });

  it("keeps parameter and return types as unresolved references", () => {
    const { program } = resolveMain("func f(a: int, b) -> float\n  a\nend\n");
    const [fn] = program.functions;
    expect(fn?.parameters).toEqual([
      { name: "a", slot: 0, type: { kind: "unresolved", range: range(0, 10, 0, 13) } },
      { name: "b", slot: 1, type: undefined },
    ]);
    expect(fn?.returnType).toEqual({ kind: "unresolved", range: range(0, 21, 0, 26) });
  });

  it("resolves names inside string interpolations", () => {
    const { program } = resolveMain('var n = 1\n"n={n}"\n');
    expect(program.files[0]?.statements[1]).toMatchObject({
      kind: "expr",
      expr: {
        kind: "string",
        parts: [
          { kind: "text", value: "n=" },
          { kind: "expr", expr: { kind: "global", file: 0, slot: 0 } },
        ],
      },
    });
  });
});
