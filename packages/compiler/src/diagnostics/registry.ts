import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const doubledBraceHint: DiagnosticHint = {
  message: "Write '{{' or '}}' to put a literal brace in a string.",
};

type DiagnosticParamsMap = {
  LX0001: { kind: "unexpected-character"; character: string };
  LX0002: { kind: "unterminated-string" };
  LX0003: { kind: "invalid-escape"; sequence: string };
  LX0004:
    | { kind: "unmatched-closing-brace" }
    | { kind: "string-start" };
  LX0005:
    | { kind: "unterminated-comment"; openCount: number }
    | { kind: "nested-comment-start" };
  LX0006: { kind: "misplaced-line-block-comment" };
  LX0007:
    | { kind: "unclosed-interpolation"; found?: string }
    | { kind: "interpolation-start" };
  PS0001: { kind: "unexpected-token"; found: string };
  PS0002:
    | { kind: "unclosed-delimiter"; delimiter: string }
    | { kind: "unexpected-token-in-delimiter"; delimiter: string; found: string }
    | { kind: "delimiter-opened"; delimiter: string };
  PS0003:
    | { kind: "unclosed-block" }
    | { kind: "unexpected-token-in-block"; found: string }
    | { kind: "block-opened"; keyword: string };
  PS0004:
    | { kind: "missing-import-name" }
    | { kind: "unexpected-token-after-import"; found: string }
    | { kind: "unexpected-token-after-import-name"; found: string }
    | { kind: "unexpected-token-after-import-path"; found: string }
    | { kind: "missing-import-path" }
    | { kind: "invalid-import-path" }
    | { kind: "import-keyword" };
  PS0005:
    | { kind: "missing-function-name" }
    | { kind: "unexpected-token-after-func"; found: string }
    | { kind: "func-keyword" };
  PS0006:
    | { kind: "missing-condition" }
    | { kind: "unexpected-token-after-while"; found: string }
    | { kind: "unexpected-token-after-condition"; found: string }
    | { kind: "while-keyword" }
    | { kind: "condition" };
  PS0007:
    | { kind: "unexpected-token-after-statement"; found: string }
    | { kind: "statement" };
  PS0008: { kind: "missing-variable-name" };
  PS0009: { kind: "missing-field-name"; found?: string };
  MD0001: {
    kind: "cannot-read-import";
    path: string;
    errorMessage?: string;
  };
  MD0002: { kind: "circular-import"; path: string };
  MD0003: {
    kind: "cannot-read-root";
    path: string;
    errorMessage?: string;
  };
  NR0001: { kind: "undefined-identifier"; name: string };
  NR0002:
    | { kind: "duplicate-definition"; name: string; existing: string }
    | { kind: "previous-definition" };
  NR0003:
    | { kind: "missing-operand"; operator: string }
    | { kind: "missing-expression"; context: string };
  NR0004:
    | { kind: "invalid-variable-target" }
    | { kind: "invalid-parameter" };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LX0001: {
    code: "LX0001",
    message: (params) => `unexpected character '${params.character}'`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0001"]>,
  LX0002: {
    code: "LX0002",
    message: () => "unterminated string literal",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0002"]>,
  LX0003: {
    code: "LX0003",
    message: (params) => `invalid escape sequence '${params.sequence}'`,
    severity: "error",
    hints: [
      {
        message: "Supported escapes are \\n, \\r, \\t, \\\", \\\\, \\0 and \\'.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0003"]>,
  LX0004: {
    code: "LX0004",
    message: (params) =>
      params.kind === "unmatched-closing-brace"
        ? "unmatched '}' in string literal"
        : "string literal starts here",
    severity: "error",
    hints: [doubledBraceHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0004"]>,
  LX0005: {
    code: "LX0005",
    message: (params) => {
      switch (params.kind) {
        case "unterminated-comment":
          return params.openCount === 1
            ? "unterminated block comment"
            : `unterminated block comment (${params.openCount} comments still open)`;
        case "nested-comment-start":
          return "nested comment opened here";
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0005"]>,
  LX0006: {
    code: "LX0006",
    message: () => "'//' comments must be the first token on a line",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0006"]>,
  LX0007: {
    code: "LX0007",
    message: (params) => {
      switch (params.kind) {
        case "unclosed-interpolation":
          return params.found
            ? `expected '}' to close the interpolation, found ${params.found}`
            : "interpolation is never closed";
        case "interpolation-start":
          return "interpolation starts here";
      }
      return exhaustive(params);
    },
    severity: "error",
    hints: [doubledBraceHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0007"]>,
  PS0001: {
    code: "PS0001",
    message: (params) => `unexpected ${params.found}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0001"]>,
  PS0002: {
    code: "PS0002",
    message: (params) => {
      switch (params.kind) {
        case "unclosed-delimiter":
          return `'${params.delimiter}' is never closed`;
        case "unexpected-token-in-delimiter":
          return `unexpected ${params.found} inside '${params.delimiter}'`;
        case "delimiter-opened":
          return `'${params.delimiter}' opened here`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0002"]>,
  PS0003: {
    code: "PS0003",
    message: (params) => {
      switch (params.kind) {
        case "unclosed-block":
          return "expected 'end' before the end of the file";
        case "unexpected-token-in-block":
          return `unexpected ${params.found} in block`;
        case "block-opened":
          return `'${params.keyword}' block opened here`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0003"]>,
  PS0004: {
    code: "PS0004",
    message: (params) => {
      switch (params.kind) {
        case "missing-import-name":
          return "expected a module name after 'import'";
        case "unexpected-token-after-import":
          return `expected a module name after 'import', found ${params.found}`;
        case "unexpected-token-after-import-name":
          return `unexpected ${params.found} after the imported module name`;
        case "unexpected-token-after-import-path":
          return `unexpected ${params.found} after the import path`;
        case "missing-import-path":
          return "expected a path between the parentheses";
        case "invalid-import-path":
          return "an import path must be a plain string literal";
        case "import-keyword":
          return "import declared here";
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0004"]>,
  PS0005: {
    code: "PS0005",
    message: (params) => {
      switch (params.kind) {
        case "missing-function-name":
          return "expected a function name after 'func'";
        case "unexpected-token-after-func":
          return `expected a function name after 'func', found ${params.found}`;
        case "func-keyword":
          return "function declared here";
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0005"]>,
  PS0006: {
    code: "PS0006",
    message: (params) => {
      switch (params.kind) {
        case "missing-condition":
          return "expected a condition on the same line as 'while'";
        case "unexpected-token-after-while":
          return `expected a condition after 'while', found ${params.found}`;
        case "unexpected-token-after-condition":
          return `expected a line break after the loop condition, found ${params.found}`;
        case "while-keyword":
          return "loop starts here";
        case "condition":
          return "condition ends here";
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0006"]>,
  PS0007: {
    code: "PS0007",
    message: (params) =>
      params.kind === "unexpected-token-after-statement"
        ? `expected a line break after the statement, found ${params.found}`
        : "statement ends here",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0007"]>,
  PS0008: {
    code: "PS0008",
    message: () => "expected a variable name after 'var'",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0008"]>,
  PS0009: {
    code: "PS0009",
    message: (params) =>
      params.found
        ? `expected a field name or index after '.', found ${params.found}`
        : "expected a field name or index after '.'",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0009"]>,
  MD0001: {
    code: "MD0001",
    message: (params) =>
      params.errorMessage
        ? `cannot read imported file ${params.path}: ${params.errorMessage}`
        : `cannot read imported file ${params.path}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0001"]>,
  MD0002: {
    code: "MD0002",
    message: (params) => `circular import of ${params.path}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0002"]>,
  MD0003: {
    code: "MD0003",
    message: (params) =>
      params.errorMessage
        ? `cannot read root file ${params.path}: ${params.errorMessage}`
        : `cannot read root file ${params.path}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0003"]>,
  NR0001: {
    code: "NR0001",
    message: (params) => `undefined identifier '${params.name}'`,
    severity: "error",
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NR0001"]>,
  NR0002: {
    code: "NR0002",
    message: (params) =>
      params.kind === "duplicate-definition"
        ? `'${params.name}' is already defined as ${params.existing}`
        : "previous definition here",
    severity: "error",
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NR0002"]>,
  NR0003: {
    code: "NR0003",
    message: (params) => {
      switch (params.kind) {
        case "missing-operand":
          return `missing operand for '${params.operator}'`;
        case "missing-expression":
          return `missing expression in ${params.context}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NR0003"]>,
  NR0004: {
    code: "NR0004",
    message: (params) =>
      params.kind === "invalid-variable-target"
        ? "'var' must be followed by a plain identifier"
        : "a parameter must be an identifier, optionally followed by ': type'",
    severity: "error",
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NR0004"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];

const exhaustive = (_value: never): never => _value;
