export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "lexer" | "parser" | "module-graph" | "resolver";

/** Zero-based line and column; columns count code points. */
export interface SourceIndex {
  line: number;
  column: number;
}

/** Half-open range of source indices. */
export interface SourceRange {
  start: SourceIndex;
  end: SourceIndex;
}

export interface SourceSpan extends SourceRange {
  file: string;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};
