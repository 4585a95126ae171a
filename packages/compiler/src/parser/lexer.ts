import type { SourceIndex, SourceRange } from "../diagnostics/index.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import type { StringComponent, Term } from "./ast.js";
import type { CharStream } from "./char-stream.js";
import { syntaxNote, throwSyntaxError } from "./errors.js";
import {
  asKeyword,
  asPunctuator,
  isPunctuatorText,
  type Token,
  type TokenInfo,
} from "./tokens.js";

/**
 * Parses the expression embedded after a `{` in a string literal and leaves
 * the stream just past its closing `}`.
 */
export type InterpolationReader = (
  chars: CharStream,
  braceRange: SourceRange
) => Term | undefined;

export interface LexResult {
  /** Where the token starts, or the end of input */
  start: SourceIndex;
  info?: TokenInfo;
}

const ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  '"': '"',
  "\\": "\\",
  "0": "\0",
  "'": "'",
};

const isDigit = (char: string) => char >= "0" && char <= "9";
const isNumberPart = (char: string) => /^[0-9a-zA-Z_]$/.test(char);
const isIdentifierStart = (char: string) =>
  char === "_" || /^\p{XID_Start}$/u.test(char);
const isIdentifierPart = (char: string) => /^\p{XID_Continue}$/u.test(char);
const isWhitespace = (char: string) => " \t\n\r\f".includes(char);

export const readToken = (
  chars: CharStream,
  isAdjacent: boolean,
  isOnNewLine: boolean,
  readInterpolation: InterpolationReader
): LexResult => {
  let adjacent = isAdjacent;
  let onNewLine = isOnNewLine;

  for (;;) {
    const start = chars.index();
    const char = chars.peek();
    if (char === undefined) return { start };

    if (char === "\n") {
      chars.consume();
      adjacent = false;
      onNewLine = true;
      continue;
    }

    if (isWhitespace(char)) {
      chars.consume();
      adjacent = false;
      continue;
    }

    const token = readTokenBody(chars, start, onNewLine, readInterpolation);
    if (token === "comment") {
      adjacent = false;
      continue;
    }
    if (token === "line-comment") {
      adjacent = false;
      onNewLine = true;
      continue;
    }

    incrementCompilerPerfCounter("lexer.tokens");
    return {
      start,
      info: { token, isAdjacent: adjacent, isOnNewLine: onNewLine },
    };
  }
};

const readTokenBody = (
  chars: CharStream,
  start: SourceIndex,
  isOnNewLine: boolean,
  readInterpolation: InterpolationReader
): Token | "comment" | "line-comment" => {
  const char = chars.consume();

  if (isDigit(char)) return readDigits(chars, char);
  if (char === '"') return readString(chars, start, readInterpolation);
  if (isIdentifierStart(char)) return readWord(chars, char);

  if (char === "-" && chars.consumeIf("-")) {
    skipRestOfLine(chars);
    return "comment";
  }

  if (char === "/" && chars.consumeIf("-")) {
    skipBlockComment(chars, start, "/-", "-/");
    return "comment";
  }

  if (char === "/" && chars.consumeIf("/")) {
    if (!isOnNewLine) {
      return throwSyntaxError({
        file: chars.filePath,
        code: "LX0006",
        params: { kind: "misplaced-line-block-comment" },
        range: { start, end: chars.index() },
      });
    }
    skipBlockComment(chars, start, "//", "\\\\");
    skipRestOfLine(chars);
    return "line-comment";
  }

  let text = char;
  for (;;) {
    const next = chars.peek();
    if (next === undefined || !isPunctuatorText(text + next)) break;
    text += chars.consume();
  }

  const value = asPunctuator(text);
  if (!value) {
    return throwSyntaxError({
      file: chars.filePath,
      code: "LX0001",
      params: { kind: "unexpected-character", character: char },
      range: { start, end: chars.index() },
    });
  }
  return { kind: "punctuator", value };
};

const readDigits = (chars: CharStream, first: string): Token => {
  let text = first;
  for (;;) {
    const next = chars.peek();
    if (next === undefined || !isNumberPart(next)) break;
    chars.consume();
    if (next === "_") continue;
    text += next;
    if (next === "e" || next === "E") {
      const sign = chars.peek();
      if (sign === "+" || sign === "-") text += chars.consume();
    }
  }
  return { kind: "digits", text };
};

const readWord = (chars: CharStream, first: string): Token => {
  let name = first;
  for (;;) {
    const next = chars.peek();
    if (next === undefined || !isIdentifierPart(next)) break;
    name += chars.consume();
  }

  if (name === "_") return { kind: "underscore" };
  const keyword = asKeyword(name);
  return keyword ? { kind: "keyword", keyword } : { kind: "identifier", name };
};

const skipRestOfLine = (chars: CharStream) => {
  while (chars.hasCharacters && chars.peek() !== "\n") chars.consume();
};

/** Skips a nestable comment whose opening delimiter was just consumed. */
const skipBlockComment = (
  chars: CharStream,
  start: SourceIndex,
  open: string,
  close: string
) => {
  const openStarts: SourceIndex[] = [start];

  while (openStarts.length > 0) {
    const position = chars.index();
    const char = chars.peek();
    if (char === undefined) {
      return reportUnterminatedComment(chars, openStarts, open.length);
    }

    const first = chars.consume();
    if (first === open[0] && chars.consumeIf(open[1] ?? "")) {
      openStarts.push(position);
    } else if (first === close[0] && chars.consumeIf(close[1] ?? "")) {
      openStarts.pop();
    }
  }
};

const reportUnterminatedComment = (
  chars: CharStream,
  openStarts: readonly SourceIndex[],
  delimiterLength: number
): never => {
  const toRange = (index: SourceIndex): SourceRange => ({
    start: index,
    end: { line: index.line, column: index.column + delimiterLength },
  });
  const [outermost, ...nested] = openStarts;
  return throwSyntaxError({
    file: chars.filePath,
    code: "LX0005",
    params: { kind: "unterminated-comment", openCount: openStarts.length },
    range: toRange(outermost ?? chars.index()),
    related: nested.map((index) =>
      syntaxNote(
        chars.filePath,
        "LX0005",
        { kind: "nested-comment-start" },
        toRange(index)
      )
    ),
  });
};

const readString = (
  chars: CharStream,
  start: SourceIndex,
  readInterpolation: InterpolationReader
): Token => {
  const components: StringComponent[] = [];
  let text = "";
  let previous: "border" | "char" | "expr" = "border";

  const pushChar = (value: string) => {
    text += value;
    previous = "char";
  };

  const flushText = () => {
    if (previous === "char") components.push({ kind: "text", value: text });
    text = "";
  };

  for (;;) {
    const position = chars.index();
    const char = chars.peek();
    if (char === undefined) {
      return throwSyntaxError({
        file: chars.filePath,
        code: "LX0002",
        params: { kind: "unterminated-string" },
        range: { start, end: position },
      });
    }
    chars.consume();

    if (char === '"') {
      flushText();
      return { kind: "string", components };
    }

    if (char === "\\") {
      const escaped = chars.peek();
      if (escaped === undefined) continue;
      chars.consume();
      const value = ESCAPES[escaped];
      if (value === undefined) {
        return throwSyntaxError({
          file: chars.filePath,
          code: "LX0003",
          params: { kind: "invalid-escape", sequence: `\\${escaped}` },
          range: { start: position, end: chars.index() },
        });
      }
      pushChar(value);
      continue;
    }

    if (char === "{") {
      if (chars.consumeIf("{")) {
        pushChar("{");
        continue;
      }
      flushText();
      const term = readInterpolation(chars, {
        start: position,
        end: { line: position.line, column: position.column + 1 },
      });
      components.push({ kind: "term", term });
      previous = "expr";
      continue;
    }

    if (char === "}") {
      if (chars.consumeIf("}")) {
        pushChar("}");
        continue;
      }
      return throwSyntaxError({
        file: chars.filePath,
        code: "LX0004",
        params: { kind: "unmatched-closing-brace" },
        range: { start: position, end: chars.index() },
        related: [
          syntaxNote(
            chars.filePath,
            "LX0004",
            { kind: "string-start" },
            { start, end: { line: start.line, column: start.column + 1 } }
          ),
        ],
      });
    }

    pushChar(char);
  }
};
