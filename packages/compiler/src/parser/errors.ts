import {
  DiagnosticError,
  diagnosticFromCode,
  noteFromCode,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticParams,
  type SourceRange,
} from "../diagnostics/index.js";

export class ParserSyntaxError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "ParserSyntaxError";
  }
}

export const syntaxNote = <K extends DiagnosticCode>(
  file: string,
  code: K,
  params: DiagnosticParams<K>,
  range: SourceRange
): Diagnostic => noteFromCode({ code, params, span: { file, ...range } });

export const throwSyntaxError = <K extends DiagnosticCode>({
  file,
  code,
  params,
  range,
  related,
}: {
  file: string;
  code: K;
  params: DiagnosticParams<K>;
  range: SourceRange;
  related?: readonly Diagnostic[];
}): never => {
  throw new ParserSyntaxError(
    diagnosticFromCode({ code, params, span: { file, ...range }, related })
  );
};
