import type { SourceRange } from "../diagnostics/types.js";

export type StringComponent =
  | { kind: "text"; value: string }
  | { kind: "term"; term?: Term };

/** An element of a delimited list; empty slots keep the comma that closed them. */
export type ListElement =
  | { kind: "element"; term: Term }
  | { kind: "empty"; commaRange: SourceRange };

export type MethodName = { kind: "method-name"; name: string; range: SourceRange };

type TermBody =
  | { kind: "numeric-literal"; value: string }
  | { kind: "string-literal"; components: StringComponent[] }
  | { kind: "integer-type" }
  | { kind: "float-type" }
  | { kind: "wildcard" }
  | { kind: "identifier"; name: string }
  | { kind: "method-name"; name: string }
  | { kind: "field-by-name"; left: Term; name: string; nameRange: SourceRange }
  | {
      kind: "field-by-number";
      left: Term;
      index: string;
      indexRange: SourceRange;
    }
  | {
      kind: "type-annotation";
      left: Term;
      colonRange: SourceRange;
      type?: Term;
    }
  | { kind: "unary-operation"; operator: MethodName; operand?: Term }
  | {
      kind: "binary-operation";
      left?: Term;
      operator: MethodName;
      right?: Term;
    }
  | { kind: "assignment"; left?: Term; operator: MethodName; right?: Term }
  | {
      kind: "conjunction" | "disjunction";
      conditions: (Term | undefined)[];
      operatorRanges: SourceRange[];
    }
  | { kind: "parenthesized"; inner: Term }
  | { kind: "tuple"; elements: ListElement[] }
  | { kind: "function-call"; callee: Term; args: ListElement[] }
  | { kind: "type-parameters"; left: Term; parameters: ListElement[] }
  | { kind: "return-type"; args: Term; arrowRange: SourceRange; ret?: Term };

export type Term = TermBody & { range: SourceRange };

export type TermOfKind<K extends Term["kind"]> = Extract<Term, { kind: K }>;

export type Stmt =
  | { kind: "var"; keywordRange: SourceRange; target: Term; range: SourceRange }
  | { kind: "expr"; term: Term; range: SourceRange }
  | {
      kind: "while";
      keywordRange: SourceRange;
      condition: Term;
      body: Stmt[];
      range: SourceRange;
    };

export interface FunctionDefinition {
  /** Canonical path of the file the definition belongs to */
  path: string;
  name: string;
  keywordRange: SourceRange;
  nameRange: SourceRange;
  /** Parsed but never resolved */
  typeParameters?: ListElement[];
  parameters?: ListElement[];
  returnType?: { arrowRange: SourceRange; type?: Term };
  body: Stmt[];
  range: SourceRange;
}

export interface ImportDeclaration {
  kind: "import";
  name: string;
  nameRange: SourceRange;
  keywordRange: SourceRange;
  path?: { value: string; range: SourceRange };
  range: SourceRange;
}

export type TopLevelEntry =
  | ImportDeclaration
  | { kind: "function"; definition: FunctionDefinition }
  | { kind: "statement"; statement: Stmt };
