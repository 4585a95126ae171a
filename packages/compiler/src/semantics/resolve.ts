import {
  DiagnosticEmitter,
  DiagnosticError,
  diagnosticFromCode,
  noteFromCode,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticParams,
  type SourceRange,
} from "../diagnostics/index.js";
import { describeItem } from "../modules/graph.js";
import type { FileRecord, Item, ModuleGraph } from "../modules/types.js";
import type {
  FunctionDefinition,
  ListElement,
  MethodName,
  Stmt,
  Term,
  TermOfKind,
} from "../parser/ast.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import type {
  LoweredExpr,
  LoweredFile,
  LoweredFunction,
  LoweredParameter,
  LoweredProgram,
  LoweredStmt,
  LoweredStringPart,
  TypeRef,
} from "./nodes.js";
import { ScopeStack } from "./scope.js";

export type ResolveResult = {
  program: LoweredProgram;
  diagnostics: readonly Diagnostic[];
  errorCount: number;
};

type LowerContext = {
  file: FileRecord;
  items: ReadonlyMap<string, Item>;
  scope: ScopeStack;
  storage: "local" | "global";
  emitter: DiagnosticEmitter;
  /** Declaration ranges by slot */
  declarations: Map<number, SourceRange>;
};

type DeclarationTarget = {
  name: string;
  range: SourceRange;
  type?: TypeRef;
  init?: Term;
};

const fail = <K extends DiagnosticCode>(
  ctx: LowerContext,
  code: K,
  params: DiagnosticParams<K>,
  range: SourceRange
): never => {
  throw new DiagnosticError(
    diagnosticFromCode({ code, params, span: { file: ctx.file.path, ...range } })
  );
};

const unresolvedType = (range: SourceRange): TypeRef => ({
  kind: "unresolved",
  range,
});

/**
 * Assigns slots to every variable and resolves every identifier. Top levels
 * of all files are resolved first so that function bodies see each file's
 * global variables.
 */
export const resolveProgram = (graph: ModuleGraph): ResolveResult => {
  const root = graph.root;
  if (root === undefined) {
    throw new Error("cannot resolve a module graph without a root file");
  }

  const emitter = new DiagnosticEmitter();
  const files = graph.files.map((file) => resolveTopLevel(file, emitter));
  const functions = graph.functions.map((definition, index) => {
    const fileIndex = graph.fileIndices.get(definition.path);
    const file = fileIndex === undefined ? undefined : files[fileIndex];
    const record = fileIndex === undefined ? undefined : graph.files[fileIndex];
    if (!file || !record) {
      throw new Error(`function ${definition.name} belongs to unknown file ${definition.path}`);
    }
    return resolveFunction({ index, definition, record, items: file.items, emitter });
  });

  return {
    program: { root, files, functions },
    diagnostics: emitter.diagnostics,
    errorCount: emitter.errorCount,
  };
};

const resolveTopLevel = (
  file: FileRecord,
  emitter: DiagnosticEmitter
): LoweredFile => {
  const ctx: LowerContext = {
    file,
    items: file.items,
    scope: new ScopeStack(),
    storage: "global",
    emitter,
    declarations: new Map(),
  };
  const statements = lowerStatements(ctx, file.statements);

  const items = new Map(file.items);
  ctx.scope.visibleBindings().forEach(([name, slot]) => {
    const range = ctx.declarations.get(slot);
    if (!range) return;
    const existing = items.get(name);
    if (existing) {
      emitter.report(
        diagnosticFromCode({
          code: "NR0002",
          params: { kind: "duplicate-definition", name, existing: describeItem(existing) },
          span: { file: file.path, ...range },
          related: [
            noteFromCode({
              code: "NR0002",
              params: { kind: "previous-definition" },
              span: { file: file.path, ...existing.range },
            }),
          ],
        })
      );
      return;
    }
    items.set(name, { kind: "global", slot, range });
  });

  return {
    id: file.id,
    path: file.path,
    statements,
    globalCount: ctx.scope.slotCount,
    items,
  };
};

const resolveFunction = ({
  index,
  definition,
  record,
  items,
  emitter,
}: {
  index: number;
  definition: FunctionDefinition;
  record: FileRecord;
  items: ReadonlyMap<string, Item>;
  emitter: DiagnosticEmitter;
}): LoweredFunction => {
  const ctx: LowerContext = {
    file: record,
    items,
    scope: new ScopeStack(),
    storage: "local",
    emitter,
    declarations: new Map(),
  };

  const typeParameters = (definition.typeParameters ?? []).flatMap(
    (element): TypeRef[] => {
      const type = emitter.recover(() =>
        lowerTypeElement(ctx, element, "type parameter list")
      );
      return type ? [type] : [];
    }
  );

  const parameters = (definition.parameters ?? []).flatMap(
    (element): LoweredParameter[] => {
      const parameter = emitter.recover(() => parameterTarget(ctx, element));
      if (!parameter) return [];
      return [{ name: parameter.name, slot: declare(ctx, parameter), type: parameter.type }];
    }
  );

  const returnType =
    definition.returnType &&
    unresolvedType(definition.returnType.type?.range ?? definition.returnType.arrowRange);

  const body = lowerStatements(ctx, definition.body);
  return {
    index,
    file: record.id,
    name: definition.name,
    typeParameters,
    parameters,
    returnType,
    localCount: ctx.scope.slotCount,
    body,
  };
};

const declare = (ctx: LowerContext, target: DeclarationTarget): number => {
  const slot = ctx.scope.declare(target.name);
  ctx.declarations.set(slot, target.range);
  incrementCompilerPerfCounter("resolver.slots");
  return slot;
};

const lowerStatements = (
  ctx: LowerContext,
  statements: readonly Stmt[]
): LoweredStmt[] =>
  statements.flatMap((statement) => ctx.emitter.recover(() => lowerStatement(ctx, statement)) ?? []);

const lowerStatement = (ctx: LowerContext, statement: Stmt): LoweredStmt => {
  switch (statement.kind) {
    case "var": {
      const target = declarationTarget(ctx, statement.target);
      const initTerm = target.init;
      // The initialiser cannot see the variable it initialises.
      const init = initTerm && ctx.emitter.recover(() => lowerTerm(ctx, initTerm));
      return {
        kind: "declare",
        storage: ctx.storage,
        slot: declare(ctx, target),
        name: target.name,
        type: target.type,
        init,
        range: statement.range,
      };
    }
    case "expr":
      return { kind: "expr", expr: lowerTerm(ctx, statement.term), range: statement.range };
    case "while": {
      const condition = lowerTerm(ctx, statement.condition);
      const statements = statement.body;
      const body = ctx.scope.withBlock(() => lowerStatements(ctx, statements));
      return { kind: "while", condition, body, range: statement.range };
    }
  }
};

const declarationTarget = (ctx: LowerContext, term: Term): DeclarationTarget => {
  if (term.kind === "assignment" && term.operator.name === "assign") {
    const binding = term.left && bindingName(term.left);
    if (!binding) {
      return fail(ctx, "NR0004", { kind: "invalid-variable-target" }, term.left?.range ?? term.range);
    }
    const init = requireOperand(ctx, term.right, term.operator);
    return { ...binding, init };
  }

  const binding = bindingName(term);
  if (!binding) {
    return fail(ctx, "NR0004", { kind: "invalid-variable-target" }, term.range);
  }
  return binding;
};

const parameterTarget = (ctx: LowerContext, element: ListElement): DeclarationTarget => {
  if (element.kind === "empty") {
    return fail(ctx, "NR0003", { kind: "missing-expression", context: "parameter list" }, element.commaRange);
  }
  const binding = bindingName(element.term);
  if (!binding) {
    return fail(ctx, "NR0004", { kind: "invalid-parameter" }, element.term.range);
  }
  return binding;
};

/** `name` or `name: type` */
const bindingName = (term: Term): DeclarationTarget | undefined => {
  if (term.kind === "identifier") {
    return { name: term.name, range: term.range };
  }
  if (term.kind === "type-annotation" && term.left.kind === "identifier") {
    return {
      name: term.left.name,
      range: term.left.range,
      type: unresolvedType(term.type?.range ?? term.colonRange),
    };
  }
  return undefined;
};

const requireOperand = (
  ctx: LowerContext,
  operand: Term | undefined,
  operator: MethodName
): Term =>
  operand ?? fail(ctx, "NR0003", { kind: "missing-operand", operator: operator.name }, operator.range);

const lowerTerm = (ctx: LowerContext, term: Term): LoweredExpr => {
  const range = term.range;
  switch (term.kind) {
    case "numeric-literal":
      return { kind: "number", value: term.value, range };
    case "string-literal":
      return {
        kind: "string",
        parts: term.components.map((component): LoweredStringPart => {
          if (component.kind === "text") return component;
          if (!component.term) {
            return fail(ctx, "NR0003", { kind: "missing-expression", context: "string interpolation" }, range);
          }
          return { kind: "expr", expr: lowerTerm(ctx, component.term) };
        }),
        range,
      };
    case "integer-type":
    case "float-type":
    case "return-type":
      return { kind: "type", type: unresolvedType(range), range };
    case "wildcard":
      return { kind: "wildcard", range };
    case "identifier":
      return lowerIdentifier(ctx, term);
    case "method-name":
      return { kind: "method", name: term.name, range };
    case "field-by-name":
      return { kind: "field", target: lowerTerm(ctx, term.left), name: term.name, range };
    case "field-by-number":
      return { kind: "element", target: lowerTerm(ctx, term.left), index: term.index, range };
    case "type-annotation": {
      const type =
        term.type ??
        fail(ctx, "NR0003", { kind: "missing-operand", operator: ":" }, term.colonRange);
      return {
        kind: "annotated",
        value: lowerTerm(ctx, term.left),
        type: unresolvedType(type.range),
        range,
      };
    }
    case "unary-operation":
      return {
        kind: "call",
        callee: lowerMethod(term.operator),
        args: [lowerTerm(ctx, requireOperand(ctx, term.operand, term.operator))],
        range,
      };
    case "binary-operation":
      return {
        kind: "call",
        callee: lowerMethod(term.operator),
        args: [
          lowerTerm(ctx, requireOperand(ctx, term.left, term.operator)),
          lowerTerm(ctx, requireOperand(ctx, term.right, term.operator)),
        ],
        range,
      };
    case "assignment":
      return {
        kind: "assign",
        operator: term.operator.name,
        target: lowerTerm(ctx, requireOperand(ctx, term.left, term.operator)),
        value: lowerTerm(ctx, requireOperand(ctx, term.right, term.operator)),
        range,
      };
    case "conjunction":
    case "disjunction":
      return lowerChain(ctx, term);
    case "parenthesized":
      return lowerTerm(ctx, term.inner);
    case "tuple":
      return {
        kind: "tuple",
        elements: lowerElements(ctx, term.elements, "tuple"),
        range,
      };
    case "function-call":
      return {
        kind: "call",
        callee: lowerTerm(ctx, term.callee),
        args: lowerElements(ctx, term.args, "argument list"),
        range,
      };
    case "type-parameters":
      return {
        kind: "instantiate",
        target: lowerTerm(ctx, term.left),
        typeArguments: term.parameters.map((element) =>
          lowerTypeElement(ctx, element, "type argument list")
        ),
        range,
      };
  }
};

const lowerMethod = (operator: MethodName): LoweredExpr => ({
  kind: "method",
  name: operator.name,
  range: operator.range,
});

const lowerChain = (
  ctx: LowerContext,
  term: TermOfKind<"conjunction" | "disjunction">
): LoweredExpr => {
  const symbol = term.kind === "conjunction" ? "&&" : "||";
  const operands = term.conditions.map((condition, index) => {
    if (condition) return lowerTerm(ctx, condition);
    // A missing operand is reported at the operator after it, or before it for the last one.
    const operatorRange = term.operatorRanges[index] ?? term.operatorRanges[index - 1] ?? term.range;
    return fail(ctx, "NR0003", { kind: "missing-operand", operator: symbol }, operatorRange);
  });
  return {
    kind: term.kind === "conjunction" ? "and" : "or",
    operands,
    range: term.range,
  };
};

const lowerElements = (
  ctx: LowerContext,
  elements: readonly ListElement[],
  context: string
): LoweredExpr[] =>
  elements.map((element) =>
    element.kind === "element"
      ? lowerTerm(ctx, element.term)
      : fail(ctx, "NR0003", { kind: "missing-expression", context }, element.commaRange)
  );

const lowerTypeElement = (
  ctx: LowerContext,
  element: ListElement,
  context: string
): TypeRef =>
  element.kind === "element"
    ? unresolvedType(element.term.range)
    : fail(ctx, "NR0003", { kind: "missing-expression", context }, element.commaRange);

const lowerIdentifier = (
  ctx: LowerContext,
  term: TermOfKind<"identifier">
): LoweredExpr => {
  const { name, range } = term;
  const slot = ctx.scope.lookup(name);
  if (slot !== undefined) {
    return ctx.storage === "local"
      ? { kind: "local", slot, range }
      : { kind: "global", file: ctx.file.id, slot, range };
  }

  const item = ctx.items.get(name);
  if (!item) {
    return fail(ctx, "NR0001", { kind: "undefined-identifier", name }, range);
  }

  switch (item.kind) {
    case "function":
      return {
        kind: "function",
        file: ctx.file.id,
        name,
        definitions: item.definitions,
        range,
      };
    case "global":
      return { kind: "global", file: ctx.file.id, slot: item.slot, range };
    case "import":
      return { kind: "module", file: item.file, range };
    case "type":
      return { kind: "type", type: unresolvedType(range), range };
  }
};
