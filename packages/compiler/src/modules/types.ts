import type { Diagnostic, SourceRange } from "../diagnostics/index.js";
import type { FunctionDefinition, Stmt } from "../parser/ast.js";
import type { LineRange } from "../parser/char-stream.js";

export interface ModulePathAdapter {
  resolve(...paths: string[]): string;
  join(...parts: string[]): string;
  dirname(path: string): string;
  extname(path: string): string;
}

export interface ModuleHost {
  path: ModulePathAdapter;
  readFile(path: string): string;
  /** Absolute path with every symbolic link resolved. Throws if it does not exist. */
  realpath(path: string): string;
}

/** An entry of a file's namespace. */
export type Item =
  | { kind: "import"; file: number; range: SourceRange }
  | { kind: "function"; definitions: number[]; range: SourceRange }
  | { kind: "type"; index: number; range: SourceRange }
  | { kind: "global"; slot: number; range: SourceRange };

export interface FileRecord {
  /** Index into `ModuleGraph.files`, used as the module id */
  id: number;
  /** Canonical path */
  path: string;
  source: string;
  lines: readonly LineRange[];
  statements: readonly Stmt[];
  items: ReadonlyMap<string, Item>;
}

export interface ModuleGraph {
  root?: number;
  files: readonly FileRecord[];
  functions: readonly FunctionDefinition[];
  fileIndices: ReadonlyMap<string, number>;
  diagnostics: readonly Diagnostic[];
  errorCount: number;
}
