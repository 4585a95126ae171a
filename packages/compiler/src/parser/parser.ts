import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticParams,
  SourceIndex,
  SourceRange,
} from "../diagnostics/index.js";
import type {
  FunctionDefinition,
  ImportDeclaration,
  ListElement,
  MethodName,
  Stmt,
  Term,
  TopLevelEntry,
} from "./ast.js";
import { CharStream } from "./char-stream.js";
import { syntaxNote, throwSyntaxError } from "./errors.js";
import { ASSIGNMENT_OPERATORS, BINARY_TIERS, PREFIX_OPERATORS } from "./grammar.js";
import { readToken, type InterpolationReader } from "./lexer.js";
import {
  describeToken,
  isKeyword,
  isPunctuator,
  type Punctuator,
  type Token,
  type TokenInfo,
} from "./tokens.js";

export type ParserOptions = {
  isAdjacent?: boolean;
  isOnNewLine?: boolean;
};

type DelimitedList = { elements: ListElement[]; trailingComma: boolean };

const CLOSING_DELIMITERS = {
  "(": ")",
  "[": "]",
} as const satisfies Partial<Record<Punctuator, Punctuator>>;

type OpeningDelimiter = keyof typeof CLOSING_DELIMITERS;

const sameIndex = (left: SourceIndex, right: SourceIndex) =>
  left.line === right.line && left.column === right.column;

/**
 * Recursive descent parser with one token of lookahead. Each `parse*` method
 * that parses one expression returns undefined when nothing is there.
 *
 * `delimited` is true inside parentheses, brackets and interpolations, where
 * line breaks do not end an expression.
 */
export class Parser {
  readonly #chars: CharStream;
  #next?: TokenInfo;
  #nextStart: SourceIndex;
  #prevEnd: SourceIndex;

  constructor(chars: CharStream, options: ParserOptions = {}) {
    this.#chars = chars;
    const start = chars.index();
    this.#prevEnd = start;
    const result = readToken(
      chars,
      options.isAdjacent ?? true,
      options.isOnNewLine ?? true,
      readInterpolation
    );
    this.#next = result.info;
    this.#nextStart = result.start;
  }

  get filePath(): string {
    return this.#chars.filePath;
  }

  peek(): Token | undefined {
    return this.#next?.token;
  }

  peekAdjacent(): Token | undefined {
    return this.#next?.isAdjacent ? this.#next.token : undefined;
  }

  peekOnCurrentLine(): Token | undefined {
    return this.#next && !this.#next.isOnNewLine ? this.#next.token : undefined;
  }

  hasRemainingToken(): boolean {
    return this.#next !== undefined;
  }

  hasRemainingTokenOnCurrentLine(): boolean {
    return this.peekOnCurrentLine() !== undefined;
  }

  get nextTokenStart(): SourceIndex {
    return this.#nextStart;
  }

  /** Range of the lookahead token, or an empty range at the end of input */
  get nextTokenRange(): SourceRange {
    return {
      start: this.#nextStart,
      end: this.#next ? this.#chars.index() : this.#nextStart,
    };
  }

  /** From `start` to the end of the last consumed token */
  rangeFrom(start: SourceIndex): SourceRange {
    return { start, end: this.#prevEnd };
  }

  consume(): Token | undefined {
    const current = this.#next;
    if (!current) return undefined;

    this.#prevEnd = this.#chars.index();
    const result = readToken(this.#chars, true, false, readInterpolation);
    this.#next = result.info;
    this.#nextStart = result.start;
    return current.token;
  }

  parseTopLevelEntry(): TopLevelEntry | undefined {
    const token = this.peek();
    if (!token) return undefined;

    if (isKeyword(token, "import")) return this.parseImportDeclaration();
    if (isKeyword(token, "func")) {
      return { kind: "function", definition: this.parseFunctionDefinition() };
    }

    const statement = this.parseStatement([]);
    if (!statement) {
      return this.fail("PS0001", {
        kind: "unexpected-token",
        found: describeToken(token),
      });
    }
    return { kind: "statement", statement };
  }

  parseImportDeclaration(): ImportDeclaration {
    const start = this.nextTokenStart;
    const keywordRange = this.nextTokenRange;
    this.consume();
    const keywordNote = this.note("PS0004", { kind: "import-keyword" }, keywordRange);

    const nameToken = this.peekOnCurrentLine();
    if (!nameToken) {
      return this.fail("PS0004", { kind: "missing-import-name" }, keywordRange);
    }
    if (nameToken.kind !== "identifier") {
      return this.fail(
        "PS0004",
        { kind: "unexpected-token-after-import", found: describeToken(nameToken) },
        this.nextTokenRange,
        [keywordNote]
      );
    }
    const nameRange = this.nextTokenRange;
    this.consume();

    let path: ImportDeclaration["path"];
    if (isPunctuator(this.peekOnCurrentLine(), "(")) {
      const openRange = this.nextTokenRange;
      this.consume();
      const term = this.parseAssign(true);
      if (!term) {
        return this.fail("PS0004", { kind: "missing-import-path" }, {
          start: openRange.start,
          end: this.nextTokenRange.end,
        });
      }
      const [component, ...rest] =
        term.kind === "string-literal" ? term.components : [];
      if (component?.kind !== "text" || rest.length > 0) {
        return this.fail("PS0004", { kind: "invalid-import-path" }, term.range);
      }
      this.expectClosing("(", openRange);
      path = { value: component.value, range: term.range };
    }

    const trailing = this.peekOnCurrentLine();
    if (trailing) {
      const found = describeToken(trailing);
      return this.fail(
        "PS0004",
        path
          ? { kind: "unexpected-token-after-import-path", found }
          : { kind: "unexpected-token-after-import-name", found },
        this.nextTokenRange,
        [keywordNote]
      );
    }

    return {
      kind: "import",
      name: nameToken.name,
      nameRange,
      keywordRange,
      path,
      range: this.rangeFrom(start),
    };
  }

  parseFunctionDefinition(): FunctionDefinition {
    const start = this.nextTokenStart;
    const keywordRange = this.nextTokenRange;
    this.consume();

    const nameToken = this.peekOnCurrentLine();
    if (!nameToken) {
      return this.fail("PS0005", { kind: "missing-function-name" }, keywordRange);
    }
    if (nameToken.kind !== "identifier") {
      return this.fail(
        "PS0005",
        { kind: "unexpected-token-after-func", found: describeToken(nameToken) },
        this.nextTokenRange,
        [this.note("PS0005", { kind: "func-keyword" }, keywordRange)]
      );
    }
    const nameRange = this.nextTokenRange;
    this.consume();

    let typeParameters: ListElement[] | undefined;
    if (isPunctuator(this.peekOnCurrentLine(), "[")) {
      typeParameters = this.parseOpenedList("[").elements;
    }

    let parameters: ListElement[] | undefined;
    if (isPunctuator(this.peekOnCurrentLine(), "(")) {
      parameters = this.parseOpenedList("(").elements;
    }

    let returnType: FunctionDefinition["returnType"];
    if (isPunctuator(this.peekOnCurrentLine(), "->")) {
      const arrowRange = this.nextTokenRange;
      this.consume();
      returnType = { arrowRange, type: this.parseDisjunction(false) };
    }

    const body = this.parseBlock([keywordRange]);
    return {
      path: this.filePath,
      name: nameToken.name,
      keywordRange,
      nameRange,
      typeParameters,
      parameters,
      returnType,
      body,
      range: this.rangeFrom(start),
    };
  }

  /** Parses statements up to and including `end`. */
  parseBlock(openBlocks: readonly SourceRange[]): Stmt[] {
    const statements: Stmt[] = [];

    for (;;) {
      const token = this.peek();
      if (!token) {
        return this.fail(
          "PS0003",
          { kind: "unclosed-block" },
          this.nextTokenRange,
          this.openBlockNotes(openBlocks)
        );
      }

      if (isKeyword(token, "end")) {
        this.consume();
        return statements;
      }

      const statement = this.parseStatement(openBlocks);
      if (!statement) {
        return this.fail(
          "PS0003",
          { kind: "unexpected-token-in-block", found: describeToken(token) },
          this.nextTokenRange,
          this.openBlockNotes(openBlocks)
        );
      }
      statements.push(statement);
    }
  }

  parseStatement(openBlocks: readonly SourceRange[]): Stmt | undefined {
    const start = this.nextTokenStart;
    const token = this.peek();

    if (isKeyword(token, "var")) {
      const keywordRange = this.nextTokenRange;
      this.consume();
      const target = this.parseAssign(false);
      if (!target) {
        return this.fail("PS0008", { kind: "missing-variable-name" }, keywordRange);
      }
      this.expectLineBreak(start);
      return { kind: "var", keywordRange, target, range: this.rangeFrom(start) };
    }

    if (isKeyword(token, "while")) {
      return this.parseWhile(openBlocks);
    }

    const term = this.parseAssign(false);
    if (!term) return undefined;
    this.expectLineBreak(start);
    return { kind: "expr", term, range: term.range };
  }

  parseWhile(openBlocks: readonly SourceRange[]): Stmt {
    const start = this.nextTokenStart;
    const keywordRange = this.nextTokenRange;
    this.consume();
    const keywordNote = this.note("PS0006", { kind: "while-keyword" }, keywordRange);

    if (!this.hasRemainingTokenOnCurrentLine()) {
      return this.fail("PS0006", { kind: "missing-condition" }, keywordRange);
    }

    const condition = this.parseDisjunction(false);
    if (!condition) {
      return this.fail(
        "PS0006",
        { kind: "unexpected-token-after-while", found: describeToken(this.peek()) },
        this.nextTokenRange,
        [keywordNote]
      );
    }

    const trailing = this.peekOnCurrentLine();
    if (trailing) {
      return this.fail(
        "PS0006",
        { kind: "unexpected-token-after-condition", found: describeToken(trailing) },
        this.nextTokenRange,
        [keywordNote, this.note("PS0006", { kind: "condition" }, condition.range)]
      );
    }

    const body = this.parseBlock([...openBlocks, keywordRange]);
    return {
      kind: "while",
      keywordRange,
      condition,
      body,
      range: this.rangeFrom(start),
    };
  }

  /** Assignment, right associative. */
  parseAssign(delimited: boolean): Term | undefined {
    const start = this.nextTokenStart;
    const left = this.parseDisjunction(delimited);
    const token = this.peekInfix(delimited, start);
    const name =
      token?.kind === "punctuator" ? ASSIGNMENT_OPERATORS[token.value] : undefined;
    if (!name) return left;

    const operator = this.consumeOperator(name);
    const right = this.parseAssign(delimited);
    return {
      kind: "assignment",
      left,
      operator,
      right,
      range: this.rangeFrom(start),
    };
  }

  parseDisjunction(delimited: boolean): Term | undefined {
    return this.parseChain("disjunction", "||", delimited, () =>
      this.parseConjunction(delimited)
    );
  }

  parseConjunction(delimited: boolean): Term | undefined {
    return this.parseChain("conjunction", "&&", delimited, () =>
      this.parseBinary(0, delimited)
    );
  }

  /** Precedence climbing over `BINARY_TIERS`, starting at `tier`. */
  parseBinary(tier: number, delimited: boolean): Term | undefined {
    const operators = BINARY_TIERS[tier];
    if (!operators) return this.parseFactor(delimited);

    const start = this.nextTokenStart;
    let left = this.parseBinary(tier + 1, delimited);
    for (;;) {
      const token = this.peekInfix(delimited, start);
      const name = token?.kind === "punctuator" ? operators[token.value] : undefined;
      if (!name) return left;

      const operator = this.consumeOperator(name);
      const right = this.parseBinary(tier + 1, delimited);
      left = {
        kind: "binary-operation",
        left,
        operator,
        right,
        range: this.rangeFrom(start),
      };
    }
  }

  parseFactor(delimited: boolean): Term | undefined {
    const primary = this.parsePrimary(delimited);
    return primary && this.parsePostfix(primary, delimited);
  }

  parseDelimitedList(
    opening: OpeningDelimiter,
    openRange: SourceRange
  ): DelimitedList {
    const closing = CLOSING_DELIMITERS[opening];
    const elements: ListElement[] = [];
    let trailingComma = false;

    for (;;) {
      if (isPunctuator(this.peek(), closing)) {
        this.consume();
        return { elements, trailingComma };
      }

      const term = this.parseAssign(true);
      const next = this.peek();

      if (isPunctuator(next, ",")) {
        const commaRange = this.nextTokenRange;
        this.consume();
        elements.push(
          term ? { kind: "element", term } : { kind: "empty", commaRange }
        );
        trailingComma = true;
        continue;
      }

      if (term) {
        elements.push({ kind: "element", term });
        trailingComma = false;
      }
      this.expectClosing(opening, openRange);
      return { elements, trailingComma };
    }
  }

  private parsePrimary(delimited: boolean): Term | undefined {
    const start = this.nextTokenStart;
    const token = this.peek();
    if (!token) return undefined;

    switch (token.kind) {
      case "digits":
        this.consume();
        return this.parseNumber(token.text, start, delimited);
      case "string":
        this.consume();
        return {
          kind: "string-literal",
          components: token.components,
          range: this.rangeFrom(start),
        };
      case "identifier":
        this.consume();
        return { kind: "identifier", name: token.name, range: this.rangeFrom(start) };
      case "underscore":
        this.consume();
        return { kind: "wildcard", range: this.rangeFrom(start) };
      case "keyword":
        if (token.keyword === "int") {
          this.consume();
          return { kind: "integer-type", range: this.rangeFrom(start) };
        }
        if (token.keyword === "float") {
          this.consume();
          return { kind: "float-type", range: this.rangeFrom(start) };
        }
        return undefined;
      case "punctuator":
        return this.parsePunctuatorPrimary(token.value, start, delimited);
    }
  }

  private parsePunctuatorPrimary(
    value: Punctuator,
    start: SourceIndex,
    delimited: boolean
  ): Term | undefined {
    if (value === "(") {
      const { elements, trailingComma } = this.parseOpenedList("(");
      const [only] = elements;
      if (elements.length === 1 && !trailingComma && only?.kind === "element") {
        return { kind: "parenthesized", inner: only.term, range: this.rangeFrom(start) };
      }
      return { kind: "tuple", elements, range: this.rangeFrom(start) };
    }

    if (value === ".") {
      const dotRange = this.nextTokenRange;
      this.consume();
      const digits = this.peekAdjacent();
      if (digits?.kind !== "digits") {
        return this.fail("PS0001", { kind: "unexpected-token", found: "'.'" }, dotRange);
      }
      this.consume();
      return {
        kind: "numeric-literal",
        value: `.${digits.text}`,
        range: this.rangeFrom(start),
      };
    }

    const name = PREFIX_OPERATORS[value];
    if (!name) return undefined;
    const operator = this.consumeOperator(name);
    const operand = this.parseFactor(delimited);
    return {
      kind: "unary-operation",
      operator,
      operand,
      range: this.rangeFrom(start),
    };
  }

  /** `3.degrees` is a field access, `3.5` and `3.` are literals. */
  private parseNumber(text: string, start: SourceIndex, delimited: boolean): Term {
    const literalRange = this.rangeFrom(start);
    if (!isPunctuator(this.peekAdjacent(), ".")) {
      return { kind: "numeric-literal", value: text, range: literalRange };
    }
    this.consume();

    const next = delimited ? this.peek() : this.peekOnCurrentLine();
    if (next?.kind === "identifier") {
      const nameRange = this.nextTokenRange;
      this.consume();
      return {
        kind: "field-by-name",
        left: { kind: "numeric-literal", value: text, range: literalRange },
        name: next.name,
        nameRange,
        range: this.rangeFrom(start),
      };
    }

    const fraction = this.peekAdjacent();
    if (fraction?.kind === "digits") {
      this.consume();
      return {
        kind: "numeric-literal",
        value: `${text}.${fraction.text}`,
        range: this.rangeFrom(start),
      };
    }

    return { kind: "numeric-literal", value: `${text}.`, range: this.rangeFrom(start) };
  }

  private parsePostfix(primary: Term, delimited: boolean): Term {
    const start = primary.range.start;
    let term = primary;

    for (;;) {
      const token = delimited ? this.peek() : this.peekOnCurrentLine();
      if (token?.kind !== "punctuator") return term;

      switch (token.value) {
        case ".": {
          this.consume();
          const field = this.peekAdjacent();
          const fieldRange = this.nextTokenRange;
          if (field?.kind === "identifier") {
            this.consume();
            term = {
              kind: "field-by-name",
              left: term,
              name: field.name,
              nameRange: fieldRange,
              range: this.rangeFrom(start),
            };
            break;
          }
          if (field?.kind === "digits") {
            this.consume();
            term = {
              kind: "field-by-number",
              left: term,
              index: field.text,
              indexRange: fieldRange,
              range: this.rangeFrom(start),
            };
            break;
          }
          const found = this.peek();
          return this.fail(
            "PS0009",
            { kind: "missing-field-name", found: found && describeToken(found) },
            found ? fieldRange : this.rangeFrom(start)
          );
        }
        case "(": {
          const { elements } = this.parseOpenedList("(");
          term = {
            kind: "function-call",
            callee: term,
            args: elements,
            range: this.rangeFrom(start),
          };
          break;
        }
        case "[": {
          const { elements } = this.parseOpenedList("[");
          term = {
            kind: "type-parameters",
            left: term,
            parameters: elements,
            range: this.rangeFrom(start),
          };
          break;
        }
        case ":": {
          const colonRange = this.nextTokenRange;
          this.consume();
          term = {
            kind: "type-annotation",
            left: term,
            colonRange,
            type: this.parseFactor(delimited),
            range: this.rangeFrom(start),
          };
          break;
        }
        case "->": {
          const arrowRange = this.nextTokenRange;
          this.consume();
          term = {
            kind: "return-type",
            args: term,
            arrowRange,
            ret: this.parseFactor(delimited),
            range: this.rangeFrom(start),
          };
          break;
        }
        default:
          return term;
      }
    }
  }

  private parseChain(
    kind: "conjunction" | "disjunction",
    operatorText: Punctuator,
    delimited: boolean,
    parseOperand: () => Term | undefined
  ): Term | undefined {
    const start = this.nextTokenStart;
    const first = parseOperand();
    if (!isPunctuator(this.peekInfix(delimited, start), operatorText)) {
      return first;
    }

    const conditions: (Term | undefined)[] = [first];
    const operatorRanges: SourceRange[] = [];
    while (isPunctuator(this.peekInfix(delimited, start), operatorText)) {
      operatorRanges.push(this.nextTokenRange);
      this.consume();
      conditions.push(parseOperand());
    }
    return { kind, conditions, operatorRanges, range: this.rangeFrom(start) };
  }

  private parseOpenedList(opening: OpeningDelimiter): DelimitedList {
    const openRange = this.nextTokenRange;
    this.consume();
    return this.parseDelimitedList(opening, openRange);
  }

  /**
   * The lookahead as an infix operator. Outside delimiters an operator that
   * starts a new line ends the expression, unless nothing precedes it.
   */
  private peekInfix(delimited: boolean, start: SourceIndex): Token | undefined {
    if (delimited || sameIndex(this.nextTokenStart, start)) return this.peek();
    return this.peekOnCurrentLine();
  }

  private consumeOperator(name: string): MethodName {
    const range = this.nextTokenRange;
    this.consume();
    return { kind: "method-name", name, range };
  }

  private expectClosing(opening: OpeningDelimiter, openRange: SourceRange): void {
    const closing = CLOSING_DELIMITERS[opening];
    const token = this.peek();
    if (isPunctuator(token, closing)) {
      this.consume();
      return;
    }
    if (!token) {
      return this.fail("PS0002", { kind: "unclosed-delimiter", delimiter: opening }, openRange);
    }
    return this.fail(
      "PS0002",
      {
        kind: "unexpected-token-in-delimiter",
        delimiter: opening,
        found: describeToken(token),
      },
      this.nextTokenRange,
      [this.note("PS0002", { kind: "delimiter-opened", delimiter: opening }, openRange)]
    );
  }

  private expectLineBreak(start: SourceIndex): void {
    const trailing = this.peekOnCurrentLine();
    if (!trailing) return;
    return this.fail(
      "PS0007",
      { kind: "unexpected-token-after-statement", found: describeToken(trailing) },
      this.nextTokenRange,
      [this.note("PS0007", { kind: "statement" }, this.rangeFrom(start))]
    );
  }

  private openBlockNotes(openBlocks: readonly SourceRange[]): Diagnostic[] {
    return openBlocks.map((range) =>
      this.note(
        "PS0003",
        { kind: "block-opened", keyword: this.keywordAt(range) },
        range
      )
    );
  }

  private keywordAt(range: SourceRange): string {
    const line = this.#chars.lines()[range.start.line];
    if (!line) return "block";
    const text = Array.from(this.#chars.source.slice(line.start, line.end));
    return text.slice(range.start.column, range.end.column).join("");
  }

  private note<K extends DiagnosticCode>(
    code: K,
    params: DiagnosticParams<K>,
    range: SourceRange
  ): Diagnostic {
    return syntaxNote(this.filePath, code, params, range);
  }

  private fail<K extends DiagnosticCode>(
    code: K,
    params: DiagnosticParams<K>,
    range: SourceRange = this.nextTokenRange,
    related?: readonly Diagnostic[]
  ): never {
    return throwSyntaxError({ file: this.filePath, code, params, range, related });
  }
}

const readInterpolation: InterpolationReader = (chars, braceRange) => {
  const parser = new Parser(chars, { isOnNewLine: false });
  const term = parser.parseDisjunction(true);
  const token = parser.peek();
  if (isPunctuator(token, "}")) return term;

  if (!token) {
    return throwSyntaxError({
      file: chars.filePath,
      code: "LX0007",
      params: { kind: "unclosed-interpolation" },
      range: braceRange,
    });
  }
  return throwSyntaxError({
    file: chars.filePath,
    code: "LX0007",
    params: { kind: "unclosed-interpolation", found: describeToken(token) },
    range: parser.nextTokenRange,
    related: [
      syntaxNote(chars.filePath, "LX0007", { kind: "interpolation-start" }, braceRange),
    ],
  });
};

export const parseSource = (source: string, filePath: string): TopLevelEntry[] => {
  const parser = new Parser(new CharStream(source, filePath));
  const entries: TopLevelEntry[] = [];
  for (;;) {
    const entry = parser.parseTopLevelEntry();
    if (!entry) return entries;
    entries.push(entry);
  }
};
