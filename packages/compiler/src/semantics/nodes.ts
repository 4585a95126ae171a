import type { SourceRange } from "../diagnostics/index.js";
import type { Item } from "../modules/types.js";

/** Placeholder for a type expression; types are not checked yet. */
export type TypeRef = { kind: "unresolved"; range: SourceRange };

export type LoweredStringPart =
  | { kind: "text"; value: string }
  | { kind: "expr"; expr: LoweredExpr };

type LoweredExprBody =
  | { kind: "local"; slot: number }
  | { kind: "global"; file: number; slot: number }
  | { kind: "function"; file: number; name: string; definitions: readonly number[] }
  | { kind: "module"; file: number }
  | { kind: "type"; type: TypeRef }
  | { kind: "number"; value: string }
  | { kind: "string"; parts: LoweredStringPart[] }
  | { kind: "wildcard" }
  | { kind: "method"; name: string }
  | { kind: "call"; callee: LoweredExpr; args: LoweredExpr[] }
  | { kind: "assign"; operator: string; target: LoweredExpr; value: LoweredExpr }
  | { kind: "and" | "or"; operands: LoweredExpr[] }
  | { kind: "tuple"; elements: LoweredExpr[] }
  | { kind: "field"; target: LoweredExpr; name: string }
  | { kind: "element"; target: LoweredExpr; index: string }
  | { kind: "annotated"; value: LoweredExpr; type: TypeRef }
  | { kind: "instantiate"; target: LoweredExpr; typeArguments: TypeRef[] };

export type LoweredExpr = LoweredExprBody & { range: SourceRange };

export type LoweredStmt =
  | {
      kind: "declare";
      storage: "local" | "global";
      slot: number;
      name: string;
      type?: TypeRef;
      init?: LoweredExpr;
      range: SourceRange;
    }
  | { kind: "expr"; expr: LoweredExpr; range: SourceRange }
  | {
      kind: "while";
      condition: LoweredExpr;
      body: LoweredStmt[];
      range: SourceRange;
    };

export interface LoweredParameter {
  name: string;
  slot: number;
  type?: TypeRef;
}

export interface LoweredFunction {
  /** Index into the flat function table */
  index: number;
  file: number;
  name: string;
  typeParameters: TypeRef[];
  parameters: LoweredParameter[];
  returnType?: TypeRef;
  /** Number of local slots, parameters included */
  localCount: number;
  body: LoweredStmt[];
}

export interface LoweredFile {
  id: number;
  path: string;
  statements: LoweredStmt[];
  globalCount: number;
  /** The file's items, including its global variables */
  items: ReadonlyMap<string, Item>;
}

export interface LoweredProgram {
  root: number;
  files: LoweredFile[];
  functions: LoweredFunction[];
}
