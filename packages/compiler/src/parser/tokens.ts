import type { StringComponent } from "./ast.js";

export const KEYWORDS = [
  "import",
  "export",
  "struct",
  "func",
  "method",
  "if",
  "else",
  "while",
  "break",
  "continue",
  "return",
  "end",
  "var",
  "int",
  "float",
] as const;

export type Keyword = (typeof KEYWORDS)[number];

export const PUNCTUATORS = [
  "+", "+=", "-", "-=", "->",
  "*", "*=", "/", "/=", "%", "%=",
  "=", "==", "=>", "!", "!=",
  ">", ">=", ">>", ">>=", "<", "<=", "<<", "<<=",
  "&", "&=", "&&", "|", "|=", "||", "^", "^=",
  ":", ";", ",", "?", "~", ".", "$",
  "(", ")", "[", "]", "{", "}",
] as const;

export type Punctuator = (typeof PUNCTUATORS)[number];

const punctuatorSet: ReadonlySet<string> = new Set(PUNCTUATORS);

export const asPunctuator = (text: string): Punctuator | undefined =>
  PUNCTUATORS.find((punctuator) => punctuator === text);

export const isPunctuatorText = (text: string): boolean =>
  punctuatorSet.has(text);

export const asKeyword = (text: string): Keyword | undefined =>
  KEYWORDS.find((keyword) => keyword === text);

export type Token =
  | { kind: "digits"; text: string }
  | { kind: "string"; components: StringComponent[] }
  | { kind: "identifier"; name: string }
  | { kind: "keyword"; keyword: Keyword }
  | { kind: "underscore" }
  | { kind: "punctuator"; value: Punctuator };

export interface TokenInfo {
  token: Token;
  /** No whitespace or comment separates it from the previous token */
  isAdjacent: boolean;
  /** First token of its line */
  isOnNewLine: boolean;
}

export const isPunctuator = (
  token: Token | undefined,
  value: Punctuator
): boolean => token?.kind === "punctuator" && token.value === value;

export const isKeyword = (token: Token | undefined, keyword: Keyword): boolean =>
  token?.kind === "keyword" && token.keyword === keyword;

export const describeToken = (token: Token | undefined): string => {
  if (!token) return "end of file";
  switch (token.kind) {
    case "digits":
      return `number '${token.text}'`;
    case "string":
      return "string literal";
    case "identifier":
      return `identifier '${token.name}'`;
    case "keyword":
      return `keyword '${token.keyword}'`;
    case "underscore":
      return "'_'";
    case "punctuator":
      return `'${token.value}'`;
  }
};
