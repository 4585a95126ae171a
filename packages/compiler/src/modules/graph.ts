import {
  DiagnosticEmitter,
  diagnosticFromCode,
  noteFromCode,
  type SourceSpan,
} from "../diagnostics/index.js";
import { resolveCompilerOptions, type CompilerOptions } from "../config.js";
import type { FunctionDefinition, ImportDeclaration, Stmt } from "../parser/ast.js";
import { CharStream } from "../parser/char-stream.js";
import { Parser } from "../parser/parser.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import { importTargetPath, withExtension } from "./path.js";
import type { FileRecord, Item, ModuleGraph, ModuleHost } from "./types.js";

type BuildGraphOptions = {
  entryPath: string;
  host: ModuleHost;
  options?: Partial<CompilerOptions>;
};

const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const describeItem = (item: Item): string => {
  switch (item.kind) {
    case "import":
      return "an imported module";
    case "function":
      return "a function";
    case "type":
      return "a type";
    case "global":
      return "a global variable";
  }
};

const emptySpan = (file: string): SourceSpan => ({
  file,
  start: { line: 0, column: 0 },
  end: { line: 0, column: 0 },
});

/**
 * Reads the entry file and, depth first, every file it imports. Files get
 * their index once parsed, so imports come before their importers.
 */
export const buildModuleGraph = ({
  entryPath,
  host,
  options,
}: BuildGraphOptions): ModuleGraph => {
  const { fileExtension } = resolveCompilerOptions(options);
  const emitter = new DiagnosticEmitter();
  const files: FileRecord[] = [];
  const functions: FunctionDefinition[] = [];
  const fileIndices = new Map<string, number>();
  const chain = new Set<string>();

  const finish = (root?: number): ModuleGraph => ({
    root,
    files,
    functions,
    fileIndices,
    diagnostics: emitter.diagnostics,
    errorCount: emitter.errorCount,
  });

  const defineItem = (
    filePath: string,
    items: Map<string, Item>,
    name: string,
    item: Item
  ): boolean => {
    const existing = items.get(name);
    if (!existing) {
      items.set(name, item);
      return true;
    }

    emitter.report(
      diagnosticFromCode({
        code: "NR0002",
        params: {
          kind: "duplicate-definition",
          name,
          existing: describeItem(existing),
        },
        span: { file: filePath, ...item.range },
        related: [
          noteFromCode({
            code: "NR0002",
            params: { kind: "previous-definition" },
            span: { file: filePath, ...existing.range },
          }),
        ],
      })
    );
    return false;
  };

  const registerFunction = (
    items: Map<string, Item>,
    definition: FunctionDefinition
  ) => {
    const existing = items.get(definition.name);
    if (existing?.kind === "function") {
      existing.definitions.push(functions.push(definition) - 1);
      return;
    }

    const item: Item = {
      kind: "function",
      definitions: [functions.length],
      range: definition.nameRange,
    };
    if (defineItem(definition.path, items, definition.name, item)) {
      functions.push(definition);
    }
  };

  const registerImport = (
    importerPath: string,
    items: Map<string, Item>,
    declaration: ImportDeclaration
  ) => {
    const target = importTargetPath({
      importerPath,
      name: declaration.name,
      explicitPath: declaration.path?.value,
      extension: fileExtension,
      pathAdapter: host.path,
    });
    const file = readImportedFile(target, { file: importerPath, ...declaration.range });
    if (file === undefined) return;

    defineItem(importerPath, items, declaration.name, {
      kind: "import",
      file,
      range: declaration.nameRange,
    });
  };

  const readImportedFile = (target: string, span: SourceSpan): number | undefined => {
    let canonical: string;
    let source: string;
    try {
      canonical = host.realpath(target);
      const cached = fileIndices.get(canonical);
      if (cached !== undefined) {
        incrementCompilerPerfCounter("modules.diamond_hits");
        return cached;
      }
      if (chain.has(canonical)) {
        emitter.report(
          diagnosticFromCode({
            code: "MD0002",
            params: { kind: "circular-import", path: canonical },
            span,
          })
        );
        return undefined;
      }
      source = host.readFile(canonical);
    } catch (error) {
      emitter.report(
        diagnosticFromCode({
          code: "MD0001",
          params: {
            kind: "cannot-read-import",
            path: target,
            errorMessage: formatErrorMessage(error),
          },
          span,
        })
      );
      return undefined;
    }

    chain.add(canonical);
    try {
      return parseFile(canonical, source);
    } finally {
      chain.delete(canonical);
    }
  };

  const parseFile = (path: string, source: string): number => {
    incrementCompilerPerfCounter("modules.read");
    const chars = new CharStream(source, path);
    const statements: Stmt[] = [];
    const items = new Map<string, Item>();

    // A syntax error abandons the rest of the file; what was parsed stays.
    emitter.recover(() => {
      const parser = new Parser(chars);
      for (;;) {
        const entry = parser.parseTopLevelEntry();
        if (!entry) return;
        switch (entry.kind) {
          case "import":
            registerImport(path, items, entry);
            break;
          case "function":
            registerFunction(items, entry.definition);
            break;
          case "statement":
            statements.push(entry.statement);
            break;
        }
      }
    });

    const id = files.length;
    files.push({ id, path, source, lines: chars.lines(), statements, items });
    fileIndices.set(path, id);
    return id;
  };

  const rootPath = withExtension(host.path.resolve(entryPath), fileExtension, host.path);
  let canonicalRoot: string;
  let rootSource: string;
  try {
    canonicalRoot = host.realpath(rootPath);
    rootSource = host.readFile(canonicalRoot);
  } catch (error) {
    emitter.report(
      diagnosticFromCode({
        code: "MD0003",
        params: {
          kind: "cannot-read-root",
          path: rootPath,
          errorMessage: formatErrorMessage(error),
        },
        span: emptySpan(rootPath),
      })
    );
    return finish();
  }

  chain.add(canonicalRoot);
  try {
    return finish(parseFile(canonicalRoot, rootSource));
  } finally {
    chain.delete(canonicalRoot);
  }
};
